import type { AudioRingBuffer, RecognitionWindow } from "./audioRingBuffer.js";
import { RecognizerError, errorMessage } from "./errors.js";
import type { SilenceDetector } from "./silenceDetector.js";
import { normalizeText, type SttEngine } from "./sttEngine.js";

export type SchedulerDecision = "none" | "partial" | "final";

export type TranscriptEvent = {
  kind: "partial" | "final";
  text: string;
  isFinal: boolean;
  /** Stream offsets covered by the recognized window. */
  startMs: number;
  endMs: number;
};

export type RecognitionSchedulerOptions = {
  triggerIntervalMs: number;
  maxWindowMs: number;
  model: string;
  language: string;
};

export type PassOptions = {
  /** Final pass requested by `stop`: skips every threshold and always yields an event. */
  force?: boolean;
  signal?: AbortSignal;
};

/**
 * Decides when a session re-runs recognition. All bookkeeping is in audio
 * time (absolute sample offsets of the session stream), never wall clock,
 * so the same audio always produces the same sequence of decisions.
 */
export class RecognitionScheduler {
  private readonly buffer: AudioRingBuffer;
  private readonly detector: SilenceDetector;
  private readonly engine: SttEngine;
  private readonly opts: RecognitionSchedulerOptions;

  private lastTriggerAt = 0;
  private utteranceStart = 0;
  private lastVoicedAt = -1;
  private trailingSilenceSamples = 0;
  private retryAfter = 0;
  private inFlight = false;

  constructor(
    buffer: AudioRingBuffer,
    detector: SilenceDetector,
    engine: SttEngine,
    opts: RecognitionSchedulerOptions
  ) {
    this.buffer = buffer;
    this.detector = detector;
    this.engine = engine;
    this.opts = opts;
  }

  /** Call after every successful `buffer.append` with the appended PCM. */
  onAudioAppended(pcm: Buffer): SchedulerDecision {
    const samples = Math.floor(pcm.length / 2);
    if (samples > 0) {
      const chunkStart = this.buffer.tailSample - samples;
      const analysis = this.detector.analyze(pcm);
      if (analysis.isSilence) {
        this.trailingSilenceSamples += samples;
      } else {
        this.trailingSilenceSamples = samples - analysis.lastVoicedSample;
        this.lastVoicedAt = chunkStart + analysis.lastVoicedSample;
      }
    }
    return this.evaluate();
  }

  evaluate(): SchedulerDecision {
    if (this.inFlight) return "none";
    const tail = this.buffer.tailSample;
    if (tail < this.retryAfter) return "none";

    const floor = this.floor();
    const voiced = this.lastVoicedAt > floor;
    if (voiced && this.detector.isBoundary(this.trailingSilenceMs)) return "final";
    if (voiced && this.buffer.samplesToMs(tail - floor) >= this.opts.maxWindowMs) return "final";

    const sinceTrigger = tail - Math.max(this.lastTriggerAt, floor);
    if (this.buffer.samplesToMs(sinceTrigger) >= this.opts.triggerIntervalMs) return "partial";
    return "none";
  }

  /**
   * Runs one recognition pass. Resolves `null` when the pass was skipped
   * (silent partial, or a silent final that was not forced).
   */
  async runPass(kind: "partial" | "final", opts: PassOptions = {}): Promise<TranscriptEvent | null> {
    if (this.inFlight) throw new Error("Recognition pass already in flight");
    this.inFlight = true;

    const previousUtterance = this.utteranceStart;
    const floor = this.floor();
    // Partials look at the most recent audio; finals consume the utterance
    // oldest-first so nothing is committed without being recognized.
    const window =
      kind === "partial"
        ? this.buffer.snapshotWindow(this.opts.maxWindowMs, floor)
        : this.buffer.windowFrom(floor, this.opts.maxWindowMs);
    this.lastTriggerAt = window.endSample;
    try {
      if (kind === "partial") {
        if (this.detector.analyze(window.pcm).isSilence) {
          if (this.lastVoicedAt <= floor) {
            this.buffer.commit(window.endSample);
            this.utteranceStart = window.endSample;
          }
          return null;
        }
        const text = await this.recognize(window, opts.signal);
        return this.toEvent("partial", text, window);
      }

      // Audio past the window end, including anything appended while this
      // pass runs, belongs to the next utterance.
      this.utteranceStart = window.endSample;
      const silent = !window.pcm.length || this.detector.analyze(window.pcm).isSilence;
      const text = silent ? "" : await this.recognize(window, opts.signal);
      this.buffer.commit(window.endSample);
      if (silent && !opts.force) return null;
      return this.toEvent("final", text, window);
    } catch (err) {
      this.utteranceStart = previousUtterance;
      this.retryAfter = window.endSample + this.buffer.msToSamples(this.opts.triggerIntervalMs);
      throw err;
    } finally {
      this.inFlight = false;
    }
  }

  get busy(): boolean {
    return this.inFlight;
  }

  get trailingSilenceMs(): number {
    return this.buffer.samplesToMs(this.trailingSilenceSamples);
  }

  /** Unconsumed audio that arrived after the last trigger. */
  get pendingMs(): number {
    const tail = this.buffer.tailSample;
    return this.buffer.samplesToMs(tail - Math.max(this.lastTriggerAt, this.floor()));
  }

  private floor() {
    return Math.max(this.utteranceStart, this.buffer.headSample);
  }

  private async recognize(window: RecognitionWindow, signal?: AbortSignal): Promise<string> {
    try {
      const text = await this.engine.transcribe(
        window.pcm,
        { model: this.opts.model, language: this.opts.language, sampleRate: this.buffer.sampleRate },
        signal
      );
      return normalizeText(text);
    } catch (err) {
      throw new RecognizerError(errorMessage(err, "transcribe failed"), err);
    }
  }

  private toEvent(kind: "partial" | "final", text: string, window: RecognitionWindow): TranscriptEvent {
    return {
      kind,
      text,
      isFinal: kind === "final",
      startMs: this.buffer.samplesToMs(window.startSample),
      endMs: this.buffer.samplesToMs(window.endSample)
    };
  }
}
