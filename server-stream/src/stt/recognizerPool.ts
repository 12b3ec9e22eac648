import type { SttEngine, SttRequest } from "./sttEngine.js";

export type RecognizerPoolOptions = {
  maxConcurrent: number;
  /** Passes waiting beyond this depth are rejected instead of queued. */
  maxQueueDepth?: number;
};

type Waiter = {
  resolve: () => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

/**
 * Bounds how many recognition passes run at once across all sessions.
 * Waiting passes are served in arrival order; an aborted waiter leaves the
 * queue without ever reaching the engine.
 */
export class RecognizerPool implements SttEngine {
  private readonly engine: SttEngine;
  private readonly opts: RecognizerPoolOptions;
  private active = 0;
  private readonly queue: Waiter[] = [];

  constructor(engine: SttEngine, opts: RecognizerPoolOptions) {
    this.engine = engine;
    this.opts = { ...opts, maxConcurrent: Math.max(1, opts.maxConcurrent) };
  }

  async transcribe(audio: Buffer, req: SttRequest, signal?: AbortSignal): Promise<string> {
    await this.acquire(signal);
    try {
      return await this.engine.transcribe(audio, req, signal);
    } finally {
      this.release();
    }
  }

  get running(): number {
    return this.active;
  }

  get waiting(): number {
    return this.queue.length;
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(new Error("transcribe aborted"));
    if (this.active < this.opts.maxConcurrent) {
      this.active += 1;
      return Promise.resolve();
    }
    if (this.opts.maxQueueDepth !== undefined && this.queue.length >= this.opts.maxQueueDepth) {
      return Promise.reject(new Error("Recognizer busy, try again later."));
    }
    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, signal };
      if (signal) {
        waiter.onAbort = () => {
          const idx = this.queue.indexOf(waiter);
          if (idx >= 0) this.queue.splice(idx, 1);
          reject(new Error("transcribe aborted"));
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }
      this.queue.push(waiter);
    });
  }

  private release() {
    const next = this.queue.shift();
    if (!next) {
      this.active = Math.max(0, this.active - 1);
      return;
    }
    if (next.signal && next.onAbort) next.signal.removeEventListener("abort", next.onAbort);
    // The slot passes straight to the next waiter.
    next.resolve();
  }
}
