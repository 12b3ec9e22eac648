import { execFile } from "node:child_process";
import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import os from "node:os";
import { promisify } from "node:util";
import type { SttEngine, SttRequest } from "../sttEngine.js";
import { pcm16ToWav } from "../wav.js";

export type WhisperCppEngineOptions = {
  binPath: string;
  modelPath: string;
  /** Beam width passed to whisper-cli. */
  beamSize?: number;
};

const execFileAsync = promisify(execFile);

export const resolveModelPathSync = (requested: string | undefined, fallback: string) => {
  const candidates: string[] = [];
  if (requested) {
    const cleaned = requested.replace(/\.bin$/i, "").replace(/\.gguf$/i, "");
    const variants = [cleaned];
    if (!cleaned.startsWith("ggml-")) variants.push(`ggml-${cleaned}`);
    for (const variant of variants) {
      candidates.push(
        variant,
        `${variant}.bin`,
        `${variant}.gguf`,
        path.resolve(path.dirname(fallback), `${variant}.bin`),
        path.resolve(path.dirname(fallback), `${variant}.gguf`)
      );
    }
  }
  candidates.push(fallback);
  for (const candidate of candidates) {
    if (!candidate) continue;
    try {
      if (fsSync.statSync(candidate).isFile()) return candidate;
    } catch {
      // not there, try the next candidate
    }
  }
  return undefined;
};

/** Parses whisper-cli output printed with `--no-timestamps`: one line per segment. */
export function parseWhisperOutput(stdout: string): string {
  return stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line && !/^\[BLANK_AUDIO\]$/i.test(line))
    .join(" ");
}

export class WhisperCppEngine implements SttEngine {
  private readonly binPath: string;
  private readonly modelPath: string;
  private readonly beamSize: number;

  constructor(opts: WhisperCppEngineOptions) {
    this.binPath = opts.binPath;
    this.modelPath = opts.modelPath;
    this.beamSize = opts.beamSize ?? 5;
  }

  async transcribe(audio: Buffer, req: SttRequest, signal?: AbortSignal): Promise<string> {
    if (!fsSync.existsSync(this.binPath)) {
      throw new Error(`whisper.cpp binary not found at ${this.binPath}`);
    }
    const modelPath = resolveModelPathSync(req.model, this.modelPath);
    if (!modelPath) {
      throw new Error("whisper.cpp model not found");
    }
    const wav = pcm16ToWav(audio, req.sampleRate, 1);
    const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "stream-stt-"));
    const wavPath = path.join(tmpDir, "input.wav");
    await fs.writeFile(wavPath, wav);
    try {
      const args = [
        "-m",
        modelPath,
        "-f",
        wavPath,
        "-l",
        req.language || "auto",
        "--no-timestamps",
        "--print-progress",
        "false",
        "--beam-size",
        String(this.beamSize),
        "--temperature",
        "0"
      ];
      const { stdout } = await execFileAsync(this.binPath, args, { signal });
      return parseWhisperOutput(stdout.toString());
    } finally {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  }
}
