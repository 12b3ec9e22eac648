import { createStreamServer, normalizeBasePath } from "./streamApp.js";

const rawLog = console.log.bind(console);
const rawWarn = console.warn.bind(console);
const rawError = console.error.bind(console);

const stamp = () => `[${new Date().toISOString()} pid=${process.pid}]`;

console.log = (...args: unknown[]) => rawLog(stamp(), ...args);
console.warn = (...args: unknown[]) => rawWarn(stamp(), ...args);
console.error = (...args: unknown[]) => rawError(stamp(), ...args);

const stream = createStreamServer();
const { config, registry, server } = stream;

function logExit(event: string, detail?: Record<string, unknown>) {
  console.error("[server-exit]", JSON.stringify({ event, uptimeSec: Math.round(process.uptime()), ...detail }));
}

process.on("uncaughtException", (err) => {
  logExit("uncaughtException", { message: err.message, stack: err.stack, liveSessions: registry.size });
});

process.on("unhandledRejection", (reason: unknown) => {
  logExit("unhandledRejection", {
    reason: reason instanceof Error ? { message: reason.message, stack: reason.stack } : String(reason)
  });
});

const handleSignal = (signal: NodeJS.Signals) => {
  // Sessions still streaming get no final; the audit log records stt_abort for each.
  logExit(signal, { abortedSessions: registry.list().filter((s) => s.state !== "closed").length });
  stream.close().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error("[server] close failed", err);
      process.exit(1);
    }
  );
  setTimeout(() => process.exit(0), 1500).unref();
};
process.once("SIGTERM", handleSignal);
process.once("SIGINT", handleSignal);

server.listen(config.port, config.host, () => {
  const base = normalizeBasePath(config.basePath);
  console.log("stream-stt listening", {
    host: config.host,
    port: config.port,
    engine: config.engine,
    maxConcurrentPasses: config.maxConcurrentPasses,
    streaming: `ws://${config.host}:${config.port}${base}/ws/stream`,
    singleShot: `ws://${config.host}:${config.port}${base}/ws/transcribe`,
    auditLog: config.auditLogPath || null
  });
});
