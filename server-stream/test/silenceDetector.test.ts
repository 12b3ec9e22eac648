import { describe, expect, it } from "@jest/globals";
import { SilenceDetector, pcmRms16 } from "../src/stt/silenceDetector.js";
import { silence, voiced } from "./helpers.js";

const detector = new SilenceDetector({ sampleRate: 16000, energyThreshold: 350, frameMs: 20, minSilenceMs: 300 });

describe("pcmRms16", () => {
  it("computes RMS over 16-bit samples", () => {
    expect(pcmRms16(voiced(10))).toBe(1000);
    expect(pcmRms16(Buffer.alloc(0))).toBe(0);
  });
});

describe("SilenceDetector", () => {
  it("reports an all-zero buffer as silence", () => {
    expect(detector.analyze(silence(500))).toEqual({
      isSilence: true,
      trailingSilenceMs: 500,
      lastVoicedSample: -1
    });
  });

  it("measures trailing silence after speech", () => {
    expect(detector.analyze(Buffer.concat([voiced(200), silence(400)]))).toEqual({
      isSilence: false,
      trailingSilenceMs: 400,
      lastVoicedSample: 3200
    });
  });

  it("treats low-energy noise as silence", () => {
    expect(detector.analyze(voiced(200, 100)).isSilence).toBe(true);
  });

  it("flags a boundary once trailing silence reaches the minimum", () => {
    expect(detector.isBoundary(299)).toBe(false);
    expect(detector.isBoundary(300)).toBe(true);
  });
});
