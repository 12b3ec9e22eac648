import { FormatError } from "./errors.js";

export const SESSION_SAMPLE_RATE = 16_000;
export const SESSION_CHANNELS = 1;
export const SESSION_BITS_PER_SAMPLE = 16;

export type AudioFormat = "pcm16" | "wav";

export type AudioChunk = {
  /** 16-bit signed little-endian samples. */
  pcm: Buffer;
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
};

export function pcm16ToWav(pcm: Buffer, sampleRate: number, channels = 1): Buffer {
  const rate = Number(sampleRate);
  const ch = Number(channels);
  if (!Number.isFinite(rate) || rate <= 0) throw new Error("Invalid sampleRate");
  if (!Number.isFinite(ch) || ch <= 0) throw new Error("Invalid channels");

  const bitsPerSample = 16;
  const blockAlign = (ch * bitsPerSample) / 8;
  const byteRate = rate * blockAlign;
  const dataSize = pcm.length;

  const header = Buffer.alloc(44);
  header.write("RIFF", 0);
  header.writeUInt32LE(36 + dataSize, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16); // PCM header size
  header.writeUInt16LE(1, 20); // PCM format
  header.writeUInt16LE(ch, 22);
  header.writeUInt32LE(rate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36);
  header.writeUInt32LE(dataSize, 40);

  return Buffer.concat([header, pcm]);
}

/**
 * Parses a RIFF/WAVE container holding integer PCM. Chunks other than `fmt `
 * and `data` are skipped. A truncated `data` chunk (streamed WAV with a
 * placeholder size) yields whatever bytes are present.
 */
export function decodeWav(bytes: Buffer): AudioChunk {
  if (bytes.length < 12 || bytes.toString("ascii", 0, 4) !== "RIFF" || bytes.toString("ascii", 8, 12) !== "WAVE") {
    throw new FormatError("Not a RIFF/WAVE payload.");
  }
  let offset = 12;
  let fmt: { formatTag: number; channels: number; sampleRate: number; bitsPerSample: number } | null = null;
  while (offset + 8 <= bytes.length) {
    const id = bytes.toString("ascii", offset, offset + 4);
    const size = bytes.readUInt32LE(offset + 4);
    const body = offset + 8;
    if (id === "fmt ") {
      if (size < 16 || body + 16 > bytes.length) throw new FormatError("Truncated WAV fmt chunk.");
      fmt = {
        formatTag: bytes.readUInt16LE(body),
        channels: bytes.readUInt16LE(body + 2),
        sampleRate: bytes.readUInt32LE(body + 4),
        bitsPerSample: bytes.readUInt16LE(body + 14)
      };
    } else if (id === "data") {
      if (!fmt) throw new FormatError("WAV data chunk before fmt chunk.");
      if (fmt.formatTag !== 1) throw new FormatError(`Unsupported WAV format tag ${fmt.formatTag} (expected PCM).`);
      const end = Math.min(bytes.length, body + size);
      return {
        pcm: bytes.subarray(body, end),
        sampleRate: fmt.sampleRate,
        channels: fmt.channels,
        bitsPerSample: fmt.bitsPerSample
      };
    }
    // RIFF chunks are word aligned.
    offset = body + size + (size % 2);
  }
  throw new FormatError("WAV payload has no data chunk.");
}

export function decodeAudioMessage(format: AudioFormat, bytes: Buffer): AudioChunk {
  if (format === "wav") return decodeWav(bytes);
  return {
    pcm: bytes,
    sampleRate: SESSION_SAMPLE_RATE,
    channels: SESSION_CHANNELS,
    bitsPerSample: SESSION_BITS_PER_SAMPLE
  };
}

/** Accepts raw PCM16 or a WAV clip; used by the single-shot endpoint. */
export function decodeClip(bytes: Buffer): AudioChunk {
  const looksLikeWav = bytes.length >= 12 && bytes.toString("ascii", 0, 4) === "RIFF";
  return decodeAudioMessage(looksLikeWav ? "wav" : "pcm16", bytes);
}
