export type SttErrorCode = "format" | "recognizer" | "overflow" | "protocol";

/**
 * Base class for every condition a session reports back to its client as an
 * `error` event. None of them closes the session.
 */
export class SttError extends Error {
  readonly code: SttErrorCode;

  constructor(code: SttErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Audio chunk whose encoding does not match the session format. */
export class FormatError extends SttError {
  constructor(message: string) {
    super("format", message);
  }
}

/** The recognizer failed on one pass. */
export class RecognizerError extends SttError {
  constructor(message: string, cause?: unknown) {
    super("recognizer", message, { cause });
  }
}

/** Buffer capacity exceeded; the oldest audio was dropped. */
export class OverflowError extends SttError {
  readonly droppedMs: number;

  constructor(droppedMs: number) {
    super("overflow", `Audio buffer full, dropped ${droppedMs}ms of oldest audio.`);
    this.droppedMs = droppedMs;
  }
}

/** Unknown command, malformed control message, or a command out of order. */
export class ProtocolError extends SttError {
  constructor(message: string) {
    super("protocol", message);
  }
}

export function errorMessage(err: unknown, fallback: string): string {
  if (err instanceof Error && err.message) return err.message;
  return fallback;
}
