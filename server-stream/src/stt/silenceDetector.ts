export type SilenceDetectorOptions = {
  sampleRate: number;
  /** RMS level (16-bit scale) below which a frame counts as silent. */
  energyThreshold: number;
  frameMs: number;
  minSilenceMs: number;
};

export type SilenceAnalysis = {
  isSilence: boolean;
  trailingSilenceMs: number;
  /** Sample index (within the analyzed buffer) just past the last voiced frame, or -1. */
  lastVoicedSample: number;
};

export function pcmRms16(buffer: Buffer, from = 0, to = buffer.length): number {
  const sampleCount = Math.floor((to - from) / 2);
  if (sampleCount <= 0) return 0;
  let sum = 0;
  for (let i = 0; i < sampleCount; i += 1) {
    const sample = buffer.readInt16LE(from + i * 2);
    sum += sample * sample;
  }
  return Math.sqrt(sum / sampleCount);
}

export class SilenceDetector {
  readonly minSilenceMs: number;
  private readonly sampleRate: number;
  private readonly energyThreshold: number;
  private readonly frameSamples: number;

  constructor(opts: SilenceDetectorOptions) {
    this.sampleRate = opts.sampleRate;
    this.energyThreshold = opts.energyThreshold;
    this.frameSamples = Math.max(1, Math.round((opts.frameMs * opts.sampleRate) / 1000));
    this.minSilenceMs = opts.minSilenceMs;
  }

  analyze(pcm: Buffer): SilenceAnalysis {
    const totalSamples = Math.floor(pcm.length / 2);
    let lastVoicedSample = -1;
    for (let start = 0; start < totalSamples; start += this.frameSamples) {
      const end = Math.min(totalSamples, start + this.frameSamples);
      if (pcmRms16(pcm, start * 2, end * 2) >= this.energyThreshold) {
        lastVoicedSample = end;
      }
    }
    const trailingSamples = lastVoicedSample < 0 ? totalSamples : totalSamples - lastVoicedSample;
    return {
      isSilence: lastVoicedSample < 0,
      trailingSilenceMs: this.toMs(trailingSamples),
      lastVoicedSample
    };
  }

  isBoundary(trailingSilenceMs: number): boolean {
    return trailingSilenceMs >= this.minSilenceMs;
  }

  private toMs(samples: number) {
    return Math.round((samples * 1000) / this.sampleRate);
  }
}
