import type { AuditEvent, DistributiveOmit } from "../logging/audit.js";
import { AudioRingBuffer } from "./audioRingBuffer.js";
import { OverflowError, ProtocolError, SttError, errorMessage } from "./errors.js";
import type { ServerEvent, StartCommand } from "./protocol.js";
import { RecognitionScheduler, type SchedulerDecision, type TranscriptEvent } from "./recognitionScheduler.js";
import { SilenceDetector } from "./silenceDetector.js";
import type { SttEngine } from "./sttEngine.js";
import { SESSION_SAMPLE_RATE, decodeAudioMessage, type AudioFormat } from "./wav.js";

export type SessionState = "idle" | "active" | "draining" | "closed";

export type StreamSessionConfig = {
  model: string;
  language: string;
  format: AudioFormat;
  energyThreshold: number;
  frameMs: number;
  minSilenceMs: number;
  triggerIntervalMs: number;
  maxWindowMs: number;
  bufferCapacityMs: number;
};

type SessionAuditEvent = DistributiveOmit<AuditEvent, "at" | "connectionId">;

export type StreamSessionDeps = {
  id: string;
  connectionId: string;
  engine: SttEngine;
  config: StreamSessionConfig;
  send: (event: ServerEvent) => void;
  audit?: (event: AuditEvent) => void;
  log?: (message: string) => void;
};

export type SessionSnapshot = {
  id: string;
  connectionId: string;
  state: SessionState;
  language: string;
  format: AudioFormat;
  seq: number;
  bufferedMs: number;
  transcript: string;
};

type Pipeline = {
  buffer: AudioRingBuffer;
  scheduler: RecognitionScheduler;
};

/**
 * One streaming session: idle -> active -> draining -> closed.
 *
 * Every outbound event goes through `send` in trigger order. Recognition
 * passes never overlap; audio that arrives during a pass is buffered and
 * the scheduler is consulted again once the pass settles.
 */
export class StreamSession {
  readonly id: string;
  readonly connectionId: string;
  private readonly deps: StreamSessionDeps;

  private state: SessionState = "idle";
  private language: string;
  private format: AudioFormat;
  private pipeline: Pipeline | null = null;
  private seq = 0;
  private readonly committed: string[] = [];

  private pending: Promise<void> | null = null;
  private pendingKind: "partial" | "final" | null = null;
  private abortController: AbortController | null = null;

  constructor(deps: StreamSessionDeps) {
    this.id = deps.id;
    this.connectionId = deps.connectionId;
    this.deps = deps;
    this.language = deps.config.language;
    this.format = deps.config.format;
  }

  get currentState(): SessionState {
    return this.state;
  }

  get transcript(): string {
    return this.committed.join(" ");
  }

  start(cmd: Omit<StartCommand, "command"> = {}): void {
    if (this.state !== "idle") {
      this.reportError(new ProtocolError(`Cannot start: session is ${this.state}.`));
      return;
    }
    if (cmd.sample_rate !== undefined && cmd.sample_rate !== SESSION_SAMPLE_RATE) {
      this.reportError(new ProtocolError(`Unsupported sample_rate ${cmd.sample_rate}; expected ${SESSION_SAMPLE_RATE}.`));
      return;
    }
    const cfg = this.deps.config;
    if (cmd.language) this.language = cmd.language;
    if (cmd.format) this.format = cmd.format;

    const buffer = new AudioRingBuffer({ sampleRate: SESSION_SAMPLE_RATE, capacityMs: cfg.bufferCapacityMs });
    const detector = new SilenceDetector({
      sampleRate: SESSION_SAMPLE_RATE,
      energyThreshold: cfg.energyThreshold,
      frameMs: cfg.frameMs,
      minSilenceMs: cfg.minSilenceMs
    });
    const scheduler = new RecognitionScheduler(buffer, detector, this.deps.engine, {
      triggerIntervalMs: cfg.triggerIntervalMs,
      maxWindowMs: cfg.maxWindowMs,
      model: cfg.model,
      language: this.language
    });
    this.pipeline = { buffer, scheduler };
    this.state = "active";
    this.logAudit({ type: "stt_start", sessionId: this.id, lang: this.language, format: this.format });
    this.send({
      type: "session_started",
      session_id: this.id,
      language: this.language,
      format: this.format,
      sample_rate: SESSION_SAMPLE_RATE
    });
  }

  pushAudio(bytes: Buffer): void {
    if (this.state === "idle") {
      this.reportError(new ProtocolError("Send {\"command\":\"start\"} before audio."));
      return;
    }
    if (this.state !== "active" || !this.pipeline) return;
    const { buffer, scheduler } = this.pipeline;

    let decision: SchedulerDecision;
    try {
      const chunk = decodeAudioMessage(this.format, bytes);
      const { droppedSamples } = buffer.append(chunk);
      if (droppedSamples > 0) {
        this.reportError(new OverflowError(buffer.samplesToMs(droppedSamples)));
      }
      decision = scheduler.onAudioAppended(chunk.pcm);
    } catch (err) {
      this.reportError(err);
      return;
    }
    this.logDebug(
      `audio bytes=${bytes.length} buffered_ms=${buffer.unconsumedMs} pending_ms=${scheduler.pendingMs} silence_ms=${scheduler.trailingSilenceMs} decision=${decision}`
    );
    this.dispatch(decision);
  }

  /**
   * Explicit end of stream: forces final passes until everything buffered is
   * recognized, then emits `session_ended`. Resolves once the session is closed.
   */
  async stop(): Promise<void> {
    if (this.state === "closed") return;
    if (this.state !== "active" || !this.pipeline) {
      this.reportError(new ProtocolError(`Cannot stop: session is ${this.state}.`));
      return;
    }
    const { buffer, scheduler } = this.pipeline;
    this.state = "draining";

    // A running partial would be superseded by the forced final.
    if (this.pendingKind === "partial") this.abortController?.abort();
    await this.whenSettled();
    if (this.isClosed()) return;

    for (;;) {
      const head = buffer.headSample;
      const event = await this.forceFinal(scheduler);
      if (this.isClosed()) return;
      if (!event) {
        const endMs = buffer.samplesToMs(buffer.tailSample);
        this.emitTranscript({ kind: "final", text: "", isFinal: true, startMs: endMs, endMs });
        break;
      }
      this.emitTranscript(event);
      if (!buffer.unconsumedSamples || buffer.headSample === head) break;
    }
    this.logAudit({ type: "stt_stop", sessionId: this.id, lang: this.language, transcript: this.transcript });
    this.send({ type: "session_ended", session_id: this.id, transcript: this.transcript });
    this.close();
  }

  /**
   * Connection lost. Nothing else is emitted; an in-flight pass is
   * signalled to abort and buffers are released once it settles.
   */
  abort(): void {
    if (this.state === "closed") return;
    const wasRunning = this.state !== "idle";
    this.state = "closed";
    this.abortController?.abort();
    if (wasRunning) this.logAudit({ type: "stt_abort", sessionId: this.id, transcript: this.transcript });
    void this.whenSettled().then(() => this.release());
  }

  /** Resolves once no recognition pass is running. */
  async whenSettled(): Promise<void> {
    while (this.pending) {
      await this.pending;
    }
  }

  snapshot(): SessionSnapshot {
    return {
      id: this.id,
      connectionId: this.connectionId,
      state: this.state,
      language: this.language,
      format: this.format,
      seq: this.seq,
      bufferedMs: this.pipeline?.buffer.unconsumedMs ?? 0,
      transcript: this.transcript
    };
  }

  /** Resolves `null` when the pass failed; the failure is reported. */
  private async forceFinal(scheduler: RecognitionScheduler): Promise<TranscriptEvent | null> {
    const controller = new AbortController();
    this.abortController = controller;
    const pass = scheduler.runPass("final", { force: true, signal: controller.signal }).catch((err: unknown) => {
      if (!this.isClosed()) this.reportError(err);
      return null;
    });
    this.pendingKind = "final";
    this.pending = pass.then(() => undefined);
    try {
      return await pass;
    } finally {
      this.pending = null;
      this.pendingKind = null;
      if (this.abortController === controller) this.abortController = null;
    }
  }

  private dispatch(decision: SchedulerDecision) {
    if (decision === "none" || this.pending || this.state !== "active" || !this.pipeline) return;
    const { scheduler } = this.pipeline;
    const controller = new AbortController();
    this.abortController = controller;
    this.pendingKind = decision;
    const startedAt = Date.now();
    this.logDebug(`transcribe_start kind=${decision}`);

    this.pending = scheduler
      .runPass(decision, { signal: controller.signal })
      .then((event) => {
        this.logDebug(`transcribe_done kind=${decision} ms=${Date.now() - startedAt} skipped=${event === null}`);
        if (controller.signal.aborted || this.isClosed() || !event) return;
        this.emitTranscript(event);
      })
      .catch((err: unknown) => {
        if (controller.signal.aborted || this.isClosed()) return;
        this.reportError(err);
      })
      .finally(() => {
        this.pending = null;
        this.pendingKind = null;
        if (this.abortController === controller) this.abortController = null;
        if (this.state === "active") this.dispatch(scheduler.evaluate());
      });
  }

  private emitTranscript(event: TranscriptEvent) {
    this.seq += 1;
    if (event.kind === "partial") {
      this.send({
        type: "partial",
        text: event.text,
        is_final: false,
        seq: this.seq,
        start_ms: event.startMs,
        end_ms: event.endMs
      });
      return;
    }
    if (event.text) this.committed.push(event.text);
    this.logAudit({
      type: "stt_transcript",
      sessionId: this.id,
      seq: this.seq,
      text: event.text,
      ms: event.endMs - event.startMs
    });
    this.send({
      type: "final",
      text: event.text,
      is_final: true,
      seq: this.seq,
      start_ms: event.startMs,
      end_ms: event.endMs,
      transcript: this.transcript
    });
  }

  private reportError(err: unknown) {
    const error = err instanceof SttError ? err : null;
    const code = error?.code ?? "recognizer";
    const message = errorMessage(err, "Unexpected session error.");
    if (err instanceof OverflowError) {
      this.logAudit({ type: "stt_overflow", sessionId: this.id, droppedMs: err.droppedMs, message });
    } else {
      this.logAudit({ type: "stt_error", sessionId: this.id, code, message });
    }
    this.logDebug(`error code=${code} message="${message}"`);
    this.send({ type: "error", code, message });
  }

  private send(event: ServerEvent) {
    if (this.state === "closed") return;
    this.deps.send(event);
  }

  private close() {
    this.state = "closed";
    this.release();
  }

  private release() {
    this.pipeline?.buffer.clear();
  }

  // Re-reads state after an await; TS would otherwise keep the narrowed type.
  private isClosed(): boolean {
    return this.state === "closed";
  }

  private logAudit(event: SessionAuditEvent) {
    if (!this.deps.audit) return;
    this.deps.audit({ ...event, at: new Date().toISOString(), connectionId: this.connectionId });
  }

  private logDebug(message: string) {
    this.deps.log?.(`[stt:${this.id}] ${message}`);
  }
}
