import { z } from "zod";
import { ProtocolError, type SttErrorCode } from "./errors.js";
import type { AudioFormat } from "./wav.js";

const StartCommandSchema = z.object({
  command: z.literal("start"),
  language: z.string().trim().min(1).max(32).optional(),
  format: z.enum(["pcm16", "wav"]).optional(),
  sample_rate: z.number().int().positive().optional()
});

const ClientCommandSchema = z.discriminatedUnion("command", [
  StartCommandSchema,
  z.object({ command: z.literal("stop") }),
  z.object({ command: z.literal("ping") })
]);

export type ClientCommand = z.infer<typeof ClientCommandSchema>;
export type StartCommand = z.infer<typeof StartCommandSchema>;

const KNOWN_COMMANDS = new Set(["start", "stop", "ping"]);

export type ConnectionMode = "streaming" | "single";

export type ServerEvent =
  | { type: "connected"; message: string; mode: ConnectionMode; connection_id: string }
  | {
      type: "session_started";
      session_id: string;
      language: string;
      format: AudioFormat;
      sample_rate: number;
    }
  | { type: "partial"; text: string; is_final: false; seq: number; start_ms: number; end_ms: number }
  | {
      type: "final";
      text: string;
      is_final: true;
      seq: number;
      start_ms: number;
      end_ms: number;
      transcript: string;
    }
  | { type: "error"; code: SttErrorCode; message: string }
  | { type: "session_ended"; session_id: string; transcript: string }
  | { type: "processing"; message: string }
  | { type: "result"; text: string }
  | { type: "pong" };

export function parseClientCommand(text: string): ClientCommand {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ProtocolError("Malformed control message (expected JSON).");
  }
  if (typeof raw === "object" && raw !== null && "command" in raw) {
    const command = raw.command;
    if (typeof command === "string" && !KNOWN_COMMANDS.has(command)) {
      throw new ProtocolError(`Unknown command '${command}'.`);
    }
  }
  const parsed = ClientCommandSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? ` (${issue.path.join(".")})` : "";
    throw new ProtocolError(`Invalid control message${where}: ${issue?.message ?? "unknown"}`);
  }
  return parsed.data;
}
