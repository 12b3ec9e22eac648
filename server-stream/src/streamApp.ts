import http, { type IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";
import express from "express";
import { WebSocket, WebSocketServer } from "ws";
import { loadConfig, type StreamConfig } from "./config.js";
import { createAuditLogger, createNullAuditLogger, type AuditLogger } from "./logging/audit.js";
import { OpenAiSttEngine } from "./stt/engines/openai.js";
import { WhisperCppEngine } from "./stt/engines/whisperCpp.js";
import { RecognizerPool } from "./stt/recognizerPool.js";
import { SessionRegistry } from "./stt/sessionRegistry.js";
import type { SttEngine } from "./stt/sttEngine.js";
import { SttManager, type SttConnection } from "./stt/sttManager.js";

export type StreamAppOptions = {
  env?: NodeJS.ProcessEnv;
  /** Overrides the engine selected by config (tests, embedding). */
  engine?: SttEngine;
  audit?: AuditLogger;
};

export type StreamApp = {
  router: express.Router;
  handleUpgrade: (req: IncomingMessage, socket: Duplex, head: Buffer) => boolean;
  shutdown: () => void;
  config: StreamConfig;
  registry: SessionRegistry;
};

export type StreamServer = StreamApp & {
  server: http.Server;
  /** Aborts every session, drops sockets and stops listening. */
  close: () => Promise<void>;
};

export function normalizeBasePath(raw?: string): string {
  if (!raw) return "";
  let base = raw.trim();
  if (!base || base === "/") return "";
  if (!base.startsWith("/")) base = `/${base}`;
  if (base.endsWith("/")) base = base.slice(0, -1);
  return base;
}

function withBase(base: string, suffix: string): string {
  return base ? `${base}${suffix}` : suffix;
}

export function createEngine(config: StreamConfig): SttEngine {
  if (config.engine === "openai") {
    return new OpenAiSttEngine({
      apiKey: config.openAiApiKey ?? "",
      baseUrl: config.openAiBaseUrl,
      noSpeechThreshold: config.openAiNoSpeechThreshold
    });
  }
  return new WhisperCppEngine({
    binPath: config.whisperCppBin,
    modelPath: config.whisperCppModel,
    beamSize: config.whisperBeamSize
  });
}

export function createStreamApp(opts: StreamAppOptions = {}): StreamApp {
  const env = opts.env ?? process.env;
  const config = loadConfig(env);
  const basePath = normalizeBasePath(config.basePath);
  const audit =
    opts.audit ?? (config.auditLogPath ? createAuditLogger(config.auditLogPath) : createNullAuditLogger());
  const pool = new RecognizerPool(opts.engine ?? createEngine(config), {
    maxConcurrent: config.maxConcurrentPasses,
    maxQueueDepth: config.maxQueuedPasses
  });
  const registry = new SessionRegistry();
  const manager = new SttManager(
    {
      model: config.model,
      language: config.language,
      format: config.format,
      energyThreshold: config.energyThreshold,
      frameMs: config.frameMs,
      minSilenceMs: config.minSilenceMs,
      triggerIntervalMs: config.triggerIntervalMs,
      maxWindowMs: config.maxWindowMs,
      bufferCapacityMs: config.bufferCapacityMs,
      debug: config.debug
    },
    pool,
    registry,
    { audit: (event) => audit.log(event) }
  );

  const router = express.Router();
  router.get(withBase(basePath, "/healthz"), (_req, res) => res.json({ ok: true }));
  router.get(withBase(basePath, "/api/sessions"), (_req, res) => {
    res.json({
      sessions: registry.list(),
      recognizer: { running: pool.running, waiting: pool.waiting, maxConcurrent: config.maxConcurrentPasses }
    });
  });

  const streamPath = withBase(basePath, "/ws/stream");
  const singlePath = withBase(basePath, "/ws/transcribe");
  const streamWss = new WebSocketServer({ noServer: true, maxPayload: config.maxWsMessageBytes });
  const singleWss = new WebSocketServer({ noServer: true, maxPayload: config.maxWsMessageBytes });

  const bindSocket = (ws: WebSocket, connection: SttConnection) => {
    if (config.debug) {
      console.log("[ws] connection open", { connectionId: connection.connectionId, mode: connection.mode });
    }
    ws.on("message", (data, isBinary) => connection.handleMessage(data, isBinary));
    ws.on("error", (err) => {
      console.warn("[ws] connection error", { connectionId: connection.connectionId, message: err.message });
    });
    ws.on("close", () => connection.handleClose());
  };

  const transportFor = (ws: WebSocket) => ({
    send: (payload: string) => ws.send(payload),
    isOpen: () => ws.readyState === WebSocket.OPEN
  });

  streamWss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    bindSocket(ws, manager.attachStreaming(transportFor(ws), req.socket.remoteAddress));
  });
  singleWss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    bindSocket(ws, manager.attachSingleShot(transportFor(ws), req.socket.remoteAddress));
  });

  const handleUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const url = req.url;
    if (!url) return false;
    const pathname = new URL(url, "http://localhost").pathname;
    const wss = pathname === streamPath ? streamWss : pathname === singlePath ? singleWss : null;
    if (!wss) return false;
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit("connection", ws, req);
    });
    return true;
  };

  const shutdown = () => {
    registry.shutdown();
    for (const ws of streamWss.clients) ws.terminate();
    for (const ws of singleWss.clients) ws.terminate();
    audit.close();
  };

  return { router, handleUpgrade, shutdown, config, registry };
}

export function createStreamServer(opts: StreamAppOptions = {}): StreamServer {
  const streamApp = createStreamApp(opts);
  const app = express();
  app.disable("x-powered-by");
  app.use(streamApp.router);

  const server = http.createServer(app);
  server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    if (!streamApp.handleUpgrade(req, socket, head)) {
      socket.destroy();
    }
  });

  let closing: Promise<void> | null = null;
  const close = () => {
    if (!closing) {
      closing = new Promise<void>((resolve, reject) => {
        streamApp.shutdown();
        if (!server.listening) {
          resolve();
          return;
        }
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      });
    }
    return closing;
  };

  return { ...streamApp, server, close };
}
