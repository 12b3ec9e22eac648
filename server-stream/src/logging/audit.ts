import fs from "node:fs";
import path from "node:path";

export type AuditEvent =
  | {
      type: "stt_attach" | "stt_detach";
      at: string;
      connectionId: string;
      mode: "streaming" | "single";
      remote?: string;
    }
  | {
      type: "stt_start" | "stt_stop" | "stt_abort";
      at: string;
      connectionId: string;
      sessionId: string;
      lang?: string;
      format?: string;
      transcript?: string;
    }
  | {
      type: "stt_error";
      at: string;
      connectionId: string;
      sessionId?: string;
      code: string;
      message: string;
    }
  | {
      type: "stt_overflow";
      at: string;
      connectionId: string;
      sessionId: string;
      droppedMs: number;
      message: string;
    }
  | {
      type: "stt_transcript";
      at: string;
      connectionId: string;
      sessionId?: string;
      seq?: number;
      text: string;
      ms: number;
    };

export type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type AuditLogger = {
  log(event: AuditEvent): void;
  close(): void;
};

export function createAuditLogger(filePath: string): AuditLogger {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
  const stream = fs.createWriteStream(filePath, { flags: "a" });
  stream.on("error", (err) => {
    console.error("[audit] write failed", { filePath, message: err.message });
  });

  return {
    log(event: AuditEvent) {
      stream.write(`${JSON.stringify(event)}\n`);
    },
    close() {
      stream.end();
    }
  };
}

/** Drops every event; used when `STT_AUDIT_LOG_PATH` is empty. */
export function createNullAuditLogger(): AuditLogger {
  return {
    log() {},
    close() {}
  };
}
