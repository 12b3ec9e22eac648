import type { StreamSessionConfig } from "../src/stt/streamSession.js";
import type { SttEngine, SttRequest } from "../src/stt/sttEngine.js";
import { SESSION_SAMPLE_RATE } from "../src/stt/wav.js";

export type EngineCall = {
  audio: Buffer;
  req: SttRequest;
  signal?: AbortSignal;
};

/** Recognizer stand-in. `respond` receives the 1-based call number. */
export class FakeEngine implements SttEngine {
  readonly calls: EngineCall[] = [];
  private readonly respond: (call: number) => Promise<string>;

  constructor(respond: string | ((call: number) => Promise<string>) = "hello world") {
    this.respond = typeof respond === "string" ? () => Promise.resolve(respond) : respond;
  }

  transcribe(audio: Buffer, req: SttRequest, signal?: AbortSignal): Promise<string> {
    this.calls.push({ audio, req, signal });
    return this.respond(this.calls.length);
  }
}

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
};

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Square wave at +/-amplitude; RMS equals the amplitude. */
export function voiced(ms: number, amplitude = 1000): Buffer {
  const samples = (ms * SESSION_SAMPLE_RATE) / 1000;
  const pcm = Buffer.alloc(samples * 2);
  for (let i = 0; i < samples; i += 1) {
    pcm.writeInt16LE(i % 2 === 0 ? amplitude : -amplitude, i * 2);
  }
  return pcm;
}

export function silence(ms: number): Buffer {
  return Buffer.alloc(((ms * SESSION_SAMPLE_RATE) / 1000) * 2);
}

/** Lets every queued promise callback run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function counter(prefix: string): () => string {
  let n = 0;
  return () => {
    n += 1;
    return `${prefix}-${n}`;
  };
}

export const sessionConfig: StreamSessionConfig = {
  model: "test-model",
  language: "auto",
  format: "pcm16",
  energyThreshold: 350,
  frameMs: 20,
  minSilenceMs: 300,
  triggerIntervalMs: 3000,
  maxWindowMs: 30000,
  bufferCapacityMs: 60000
};
