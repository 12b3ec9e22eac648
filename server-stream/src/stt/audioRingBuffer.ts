import { FormatError } from "./errors.js";
import { SESSION_BITS_PER_SAMPLE, SESSION_CHANNELS, type AudioChunk } from "./wav.js";

const BYTES_PER_SAMPLE = 2;

export type RecognitionWindow = {
  readonly pcm: Buffer;
  /** Absolute stream offset (in samples) of the first sample. */
  readonly startSample: number;
  readonly endSample: number;
  readonly durationMs: number;
};

export type AppendResult = {
  appendedSamples: number;
  droppedSamples: number;
};

export type AudioRingBufferOptions = {
  sampleRate: number;
  capacityMs: number;
};

/**
 * Unconsumed PCM for one session. Offsets are absolute sample positions in
 * the session's stream: `headSample` is the first sample not yet committed,
 * `tailSample` is one past the last appended sample.
 */
export class AudioRingBuffer {
  private buffer = Buffer.alloc(0);
  private head = 0;
  readonly sampleRate: number;
  private readonly capacitySamples: number;

  constructor(opts: AudioRingBufferOptions) {
    this.sampleRate = opts.sampleRate;
    this.capacitySamples = Math.max(1, this.msToSamples(opts.capacityMs));
  }

  append(chunk: AudioChunk): AppendResult {
    if (
      chunk.sampleRate !== this.sampleRate ||
      chunk.channels !== SESSION_CHANNELS ||
      chunk.bitsPerSample !== SESSION_BITS_PER_SAMPLE
    ) {
      throw new FormatError(
        `Expected ${this.sampleRate}Hz mono ${SESSION_BITS_PER_SAMPLE}-bit audio, got ${chunk.sampleRate}Hz ${chunk.channels}ch ${chunk.bitsPerSample}-bit.`
      );
    }
    if (chunk.pcm.length % BYTES_PER_SAMPLE !== 0) {
      throw new FormatError(`PCM16 chunk has odd length ${chunk.pcm.length}.`);
    }
    if (!chunk.pcm.length) return { appendedSamples: 0, droppedSamples: 0 };

    this.buffer = Buffer.concat([this.buffer, chunk.pcm]);
    const appendedSamples = chunk.pcm.length / BYTES_PER_SAMPLE;
    let droppedSamples = 0;
    const excess = this.unconsumedSamples - this.capacitySamples;
    if (excess > 0) {
      this.buffer = this.buffer.subarray(excess * BYTES_PER_SAMPLE);
      this.head += excess;
      droppedSamples = excess;
    }
    return { appendedSamples, droppedSamples };
  }

  /** Most recent audio, up to `maxDurationMs`, copied so later appends cannot alter it. */
  snapshotWindow(maxDurationMs: number, notBefore = this.head): RecognitionWindow {
    const end = this.tailSample;
    const start = Math.max(this.head, notBefore, end - this.msToSamples(maxDurationMs));
    return this.slice(start, end);
  }

  /** Oldest audio from `fromSample` on, up to `maxDurationMs`. */
  windowFrom(fromSample: number, maxDurationMs: number): RecognitionWindow {
    const start = Math.max(this.head, fromSample);
    return this.slice(start, Math.min(this.tailSample, start + this.msToSamples(maxDurationMs)));
  }

  commit(uptoSample: number): void {
    const target = Math.min(Math.max(uptoSample, this.head), this.tailSample);
    const count = target - this.head;
    if (count <= 0) return;
    this.buffer = this.buffer.subarray(count * BYTES_PER_SAMPLE);
    this.head = target;
  }

  clear() {
    this.commit(this.tailSample);
  }

  get headSample(): number {
    return this.head;
  }

  get tailSample(): number {
    return this.head + this.unconsumedSamples;
  }

  get unconsumedSamples(): number {
    return this.buffer.length / BYTES_PER_SAMPLE;
  }

  get unconsumedMs(): number {
    return this.samplesToMs(this.unconsumedSamples);
  }

  samplesToMs(samples: number): number {
    return Math.round((samples * 1000) / this.sampleRate);
  }

  msToSamples(ms: number): number {
    return Math.round((ms * this.sampleRate) / 1000);
  }

  private slice(start: number, end: number): RecognitionWindow {
    const from = Math.min(start, end);
    const pcm = Buffer.from(
      this.buffer.subarray((from - this.head) * BYTES_PER_SAMPLE, (end - this.head) * BYTES_PER_SAMPLE)
    );
    return { pcm, startSample: from, endSample: end, durationMs: this.samplesToMs(end - from) };
  }
}
