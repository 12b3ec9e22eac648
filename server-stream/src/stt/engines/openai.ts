import { z } from "zod";
import { RecognizerError, errorMessage } from "../errors.js";
import type { SttEngine, SttRequest } from "../sttEngine.js";
import { pcm16ToWav } from "../wav.js";

export type OpenAiSttEngineOptions = {
  apiKey: string;
  baseUrl: string;
  /** Segments rated above this `no_speech_prob` are dropped. */
  noSpeechThreshold?: number;
};

const TranscriptionSchema = z.object({
  text: z.string().default(""),
  segments: z
    .array(
      z.object({
        text: z.string(),
        no_speech_prob: z.number().optional()
      })
    )
    .optional()
});

export type Transcription = z.infer<typeof TranscriptionSchema>;

/** Text of a `verbose_json` transcription, minus segments rated as non-speech. */
export function transcriptionText(result: Transcription, noSpeechThreshold: number): string {
  if (!result.segments) return result.text.trim();
  return result.segments
    .filter((segment) => (segment.no_speech_prob ?? 0) < noSpeechThreshold)
    .map((segment) => segment.text.trim())
    .filter(Boolean)
    .join(" ");
}

/** Any server speaking the OpenAI `/v1/audio/transcriptions` API. */
export class OpenAiSttEngine implements SttEngine {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly noSpeechThreshold: number;

  constructor(opts: OpenAiSttEngineOptions) {
    this.apiKey = opts.apiKey;
    this.baseUrl = opts.baseUrl.replace(/\/+$/g, "");
    this.noSpeechThreshold = opts.noSpeechThreshold ?? 0.6;
  }

  async transcribe(audio: Buffer, req: SttRequest, signal?: AbortSignal): Promise<string> {
    const form = new FormData();
    form.set("model", req.model);
    if (req.language && req.language !== "auto") {
      form.set("language", req.language);
    }
    form.set("response_format", "verbose_json");
    form.set("temperature", "0");
    form.set("file", new Blob([new Uint8Array(pcm16ToWav(audio, req.sampleRate, 1))], { type: "audio/wav" }), "audio.wav");

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/v1/audio/transcriptions`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`
        },
        body: form,
        signal
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new RecognizerError(`OpenAI STT request failed: ${errorMessage(err, "network error")}`, err);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      throw new RecognizerError(`OpenAI STT failed (${response.status}): ${detail.trim() || response.statusText}`);
    }

    const body: unknown = await response.json().catch(() => null);
    const parsed = TranscriptionSchema.safeParse(body);
    if (!parsed.success) {
      throw new RecognizerError("OpenAI STT returned an unexpected payload.");
    }
    return transcriptionText(parsed.data, this.noSpeechThreshold);
  }
}
