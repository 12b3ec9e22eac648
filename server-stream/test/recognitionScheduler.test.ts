import { describe, expect, it } from "@jest/globals";
import { AudioRingBuffer } from "../src/stt/audioRingBuffer.js";
import { RecognizerError } from "../src/stt/errors.js";
import { RecognitionScheduler, type RecognitionSchedulerOptions, type SchedulerDecision } from "../src/stt/recognitionScheduler.js";
import { SilenceDetector } from "../src/stt/silenceDetector.js";
import { FakeEngine, deferred, silence, voiced } from "./helpers.js";

function setup(engine = new FakeEngine(), overrides: Partial<RecognitionSchedulerOptions> = {}) {
  const buffer = new AudioRingBuffer({ sampleRate: 16000, capacityMs: 60000 });
  const detector = new SilenceDetector({ sampleRate: 16000, energyThreshold: 350, frameMs: 20, minSilenceMs: 300 });
  const scheduler = new RecognitionScheduler(buffer, detector, engine, {
    triggerIntervalMs: 3000,
    maxWindowMs: 30000,
    model: "test-model",
    language: "auto",
    ...overrides
  });
  const feed = (pcm: Buffer): SchedulerDecision => {
    buffer.append({ pcm, sampleRate: 16000, channels: 1, bitsPerSample: 16 });
    return scheduler.onAudioAppended(pcm);
  };
  return { buffer, scheduler, engine, feed };
}

describe("RecognitionScheduler", () => {
  it("triggers a partial once a trigger interval of new audio accumulates", () => {
    const { feed } = setup();
    expect(feed(voiced(2900))).toBe("none");
    expect(feed(voiced(200))).toBe("partial");
  });

  it("recognizes a partial without consuming the buffer", async () => {
    const { feed, scheduler, buffer, engine } = setup();
    feed(voiced(3100));
    await expect(scheduler.runPass("partial")).resolves.toEqual({
      kind: "partial",
      text: "hello world",
      isFinal: false,
      startMs: 0,
      endMs: 3100
    });
    expect(buffer.unconsumedMs).toBe(3100);
    expect(engine.calls[0]?.req).toEqual({ model: "test-model", language: "auto", sampleRate: 16000 });
    expect(scheduler.evaluate()).toBe("none");
  });

  it("finalizes once trailing silence reaches the boundary", async () => {
    const { feed, scheduler, buffer } = setup();
    expect(feed(voiced(1000))).toBe("none");
    expect(feed(silence(200))).toBe("none");
    expect(feed(silence(200))).toBe("final");
    await expect(scheduler.runPass("final")).resolves.toEqual({
      kind: "final",
      text: "hello world",
      isFinal: true,
      startMs: 0,
      endMs: 1400
    });
    expect(buffer.unconsumedSamples).toBe(0);
    expect(scheduler.evaluate()).toBe("none");
  });

  it("never sends silent audio to the recognizer", async () => {
    const { feed, scheduler, buffer, engine } = setup();
    expect(feed(silence(3000))).toBe("partial");
    await expect(scheduler.runPass("partial")).resolves.toBeNull();
    expect(engine.calls).toHaveLength(0);
    expect(buffer.unconsumedSamples).toBe(0);
    expect(scheduler.evaluate()).toBe("none");
  });

  it("forces a final when the utterance reaches the window ceiling", () => {
    const { feed } = setup(new FakeEngine(), { maxWindowMs: 2000 });
    expect(feed(voiced(1900))).toBe("none");
    expect(feed(voiced(100))).toBe("final");
  });

  it("finalizes an overlong utterance oldest-first without skipping audio", async () => {
    const { feed, scheduler, buffer } = setup(new FakeEngine(), { maxWindowMs: 5000 });
    expect(feed(voiced(8000))).toBe("final");
    await expect(scheduler.runPass("final")).resolves.toMatchObject({ startMs: 0, endMs: 5000 });
    expect(buffer.headSample).toBe(80000);
    expect(buffer.unconsumedMs).toBe(3000);
    await expect(scheduler.runPass("final", { force: true })).resolves.toMatchObject({ startMs: 5000, endMs: 8000 });
    expect(buffer.unconsumedSamples).toBe(0);
  });

  it("yields an empty final for a forced pass over silence", async () => {
    const { feed, scheduler, engine } = setup();
    feed(silence(500));
    await expect(scheduler.runPass("final", { force: true })).resolves.toEqual({
      kind: "final",
      text: "",
      isFinal: true,
      startMs: 0,
      endMs: 500
    });
    expect(engine.calls).toHaveLength(0);
  });

  it("skips an unforced final over silence", async () => {
    const { feed, scheduler } = setup();
    feed(silence(500));
    await expect(scheduler.runPass("final")).resolves.toBeNull();
  });

  it("keeps audio after a failed pass and waits one interval before retrying", async () => {
    const engine = new FakeEngine(() => Promise.reject(new Error("model crashed")));
    const { feed, scheduler, buffer } = setup(engine);
    expect(feed(voiced(3100))).toBe("partial");
    await expect(scheduler.runPass("partial")).rejects.toBeInstanceOf(RecognizerError);
    expect(scheduler.busy).toBe(false);
    expect(buffer.unconsumedMs).toBe(3100);
    expect(feed(voiced(100))).toBe("none");
    expect(feed(voiced(2900))).toBe("partial");
  });

  it("refuses to start a second pass while one is in flight", async () => {
    const pending = deferred<string>();
    const { feed, scheduler } = setup(new FakeEngine(() => pending.promise));
    feed(voiced(3100));
    const first = scheduler.runPass("partial");
    expect(scheduler.busy).toBe(true);
    expect(scheduler.evaluate()).toBe("none");
    await expect(scheduler.runPass("final")).rejects.toThrow("Recognition pass already in flight");
    pending.resolve("done");
    await expect(first).resolves.toMatchObject({ text: "done" });
  });

  it("makes the same decisions for the same audio regardless of recognizer output", () => {
    const audio = [voiced(1000), silence(400), voiced(3100), silence(100)];
    const a = setup(new FakeEngine("one"));
    const b = setup(new FakeEngine("two"));
    const decisionsA = audio.map((pcm) => a.feed(pcm));
    const decisionsB = audio.map((pcm) => b.feed(pcm));
    expect(decisionsA).toEqual(["none", "final", "partial", "partial"]);
    expect(decisionsB).toEqual(decisionsA);
  });
});
