import crypto from "node:crypto";
import type { RawData } from "ws";
import type { AuditEvent, DistributiveOmit } from "../logging/audit.js";
import { FormatError, ProtocolError, RecognizerError, SttError, errorMessage } from "./errors.js";
import { parseClientCommand, type ConnectionMode, type ServerEvent } from "./protocol.js";
import type { SessionDeps, SessionRegistry } from "./sessionRegistry.js";
import type { StreamSessionConfig } from "./streamSession.js";
import { normalizeText, type SttEngine } from "./sttEngine.js";
import { SESSION_CHANNELS, SESSION_SAMPLE_RATE, decodeClip } from "./wav.js";

/** What the manager needs from a WebSocket. */
export type SttTransport = {
  send(payload: string): void;
  isOpen(): boolean;
};

export type SttConnection = {
  readonly connectionId: string;
  readonly mode: ConnectionMode;
  handleMessage(data: RawData, isBinary: boolean): void;
  handleClose(): void;
};

export type SttManagerConfig = StreamSessionConfig & {
  debug: boolean;
};

export type SttManagerOptions = {
  newConnectionId?: () => string;
  audit?: (event: AuditEvent) => void;
  log?: (message: string) => void;
};

export function rawDataToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export class SttManager {
  private readonly cfg: SttManagerConfig;
  private readonly engine: SttEngine;
  private readonly registry: SessionRegistry;
  private readonly opts: SttManagerOptions;

  constructor(cfg: SttManagerConfig, engine: SttEngine, registry: SessionRegistry, opts: SttManagerOptions = {}) {
    this.cfg = cfg;
    this.engine = engine;
    this.registry = registry;
    this.opts = opts;
  }

  /** Streaming mode: start / audio... / stop, with partial and final events. */
  attachStreaming(transport: SttTransport, remote?: string): SttConnection {
    const connectionId = this.newConnectionId();
    const send = (event: ServerEvent) => this.sendJson(transport, event);
    const deps: SessionDeps = {
      engine: this.engine,
      config: this.cfg,
      send,
      audit: this.opts.audit,
      log: this.cfg.debug ? (message) => this.log(message) : undefined
    };
    this.registry.create(connectionId, deps);
    this.logEvent({ type: "stt_attach", connectionId, mode: "streaming", remote });
    send({
      type: "connected",
      message: "Connected to streaming STT service.",
      mode: "streaming",
      connection_id: connectionId
    });

    const handleText = (text: string) => {
      const session = this.registry.lookup(connectionId);
      if (!session) return;
      const cmd = parseClientCommand(text);
      if (cmd.command === "ping") {
        send({ type: "pong" });
        return;
      }
      if (cmd.command === "start") {
        const target = session.currentState === "closed" ? this.registry.renew(connectionId, deps) : session;
        target.start({ language: cmd.language, format: cmd.format, sample_rate: cmd.sample_rate });
        return;
      }
      session.stop().catch((err: unknown) => {
        console.error(`[stt:${connectionId}] stop failed`, err);
      });
    };

    return {
      connectionId,
      mode: "streaming",
      handleMessage: (data, isBinary) => {
        if (isBinary) {
          this.registry.lookup(connectionId)?.pushAudio(rawDataToBuffer(data));
          return;
        }
        try {
          handleText(rawDataToBuffer(data).toString("utf8"));
        } catch (err) {
          this.reportError(connectionId, transport, err);
        }
      },
      handleClose: () => {
        this.registry.lookup(connectionId)?.abort();
        this.registry.remove(connectionId);
        this.logEvent({ type: "stt_detach", connectionId, mode: "streaming" });
      }
    };
  }

  /** Single-shot mode: every binary message is one complete clip. */
  attachSingleShot(transport: SttTransport, remote?: string): SttConnection {
    const connectionId = this.newConnectionId();
    const controller = new AbortController();
    let chain: Promise<void> = Promise.resolve();
    this.logEvent({ type: "stt_attach", connectionId, mode: "single", remote });
    this.sendJson(transport, {
      type: "connected",
      message: "Connected to STT service.",
      mode: "single",
      connection_id: connectionId
    });

    const transcribeClip = async (bytes: Buffer) => {
      if (controller.signal.aborted) return;
      this.sendJson(transport, { type: "processing", message: "Transcribing..." });
      const startedAt = Date.now();
      try {
        const clip = decodeClip(bytes);
        if (clip.sampleRate !== SESSION_SAMPLE_RATE || clip.channels !== SESSION_CHANNELS || clip.bitsPerSample !== 16) {
          throw new FormatError(
            `Expected ${SESSION_SAMPLE_RATE}Hz mono 16-bit audio, got ${clip.sampleRate}Hz ${clip.channels}ch ${clip.bitsPerSample}-bit.`
          );
        }
        if (clip.pcm.length < 2 || clip.pcm.length % 2 !== 0) {
          throw new FormatError(`PCM16 clip has invalid length ${clip.pcm.length}.`);
        }
        let text: string;
        try {
          text = await this.engine.transcribe(
            clip.pcm,
            { model: this.cfg.model, language: this.cfg.language, sampleRate: SESSION_SAMPLE_RATE },
            controller.signal
          );
        } catch (err) {
          throw new RecognizerError(errorMessage(err, "transcribe failed"), err);
        }
        if (controller.signal.aborted) return;
        const normalized = normalizeText(text);
        if (!normalized) throw new RecognizerError("No speech recognized.");
        this.logEvent({ type: "stt_transcript", connectionId, text: normalized, ms: Date.now() - startedAt });
        this.sendJson(transport, { type: "result", text: normalized });
      } catch (err) {
        if (controller.signal.aborted) return;
        this.reportError(connectionId, transport, err);
      }
    };

    return {
      connectionId,
      mode: "single",
      handleMessage: (data, isBinary) => {
        if (isBinary) {
          const bytes = rawDataToBuffer(data);
          chain = chain.then(() => transcribeClip(bytes));
          return;
        }
        try {
          const cmd = parseClientCommand(rawDataToBuffer(data).toString("utf8"));
          if (cmd.command !== "ping") {
            throw new ProtocolError(`Command '${cmd.command}' is not available in single-shot mode.`);
          }
          this.sendJson(transport, { type: "pong" });
        } catch (err) {
          this.reportError(connectionId, transport, err);
        }
      },
      handleClose: () => {
        controller.abort();
        this.logEvent({ type: "stt_detach", connectionId, mode: "single" });
      }
    };
  }

  private reportError(connectionId: string, transport: SttTransport, err: unknown) {
    const code = err instanceof SttError ? err.code : "protocol";
    const message = errorMessage(err, "Request failed.");
    this.logEvent({ type: "stt_error", connectionId, code, message });
    this.sendJson(transport, { type: "error", code, message });
  }

  private newConnectionId() {
    return this.opts.newConnectionId?.() ?? crypto.randomUUID();
  }

  private sendJson(transport: SttTransport, payload: ServerEvent) {
    if (!transport.isOpen()) return;
    try {
      transport.send(JSON.stringify(payload));
    } catch (err) {
      console.error("[stt] failed to send event:", err);
    }
  }

  private log(message: string) {
    (this.opts.log ?? console.log)(message);
  }

  private logEvent(event: DistributiveOmit<AuditEvent, "at">) {
    if (!this.opts.audit) return;
    this.opts.audit({ ...event, at: new Date().toISOString() });
  }
}
