export type SttRequest = {
  model: string;
  /** Language hint; "auto" leaves detection to the engine. */
  language: string;
  sampleRate: number;
};

/**
 * Recognizer collaborator. Takes one bounded PCM16 window per call; engines
 * may be shared by every session, so implementations must not keep
 * per-call state between invocations.
 */
export interface SttEngine {
  transcribe(audio: Buffer, req: SttRequest, signal?: AbortSignal): Promise<string>;
}

export function normalizeText(text: string): string {
  if (!text) return "";
  return text.replace(/[\r\n]+/g, " ").replace(/\s+/g, " ").trim();
}
