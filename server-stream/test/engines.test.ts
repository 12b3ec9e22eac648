import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, jest } from "@jest/globals";
import { RecognizerError } from "../src/stt/errors.js";
import { OpenAiSttEngine, transcriptionText } from "../src/stt/engines/openai.js";
import { parseWhisperOutput, resolveModelPathSync } from "../src/stt/engines/whisperCpp.js";
import { normalizeText, type SttRequest } from "../src/stt/sttEngine.js";

const req: SttRequest = { model: "whisper-1", language: "en", sampleRate: 16000 };

describe("normalizeText", () => {
  it("collapses whitespace and line breaks", () => {
    expect(normalizeText("  hello\nworld  \r\n again ")).toBe("hello world again");
    expect(normalizeText("")).toBe("");
  });
});

describe("transcriptionText", () => {
  it("falls back to the plain text without segments", () => {
    expect(transcriptionText({ text: "  plain text " }, 0.6)).toBe("plain text");
  });
});

describe("parseWhisperOutput", () => {
  it("joins segment lines and drops blank-audio markers", () => {
    expect(parseWhisperOutput(" Hello there.\n[BLANK_AUDIO]\n  How are you?\n\n")).toBe("Hello there. How are you?");
  });
});

describe("resolveModelPathSync", () => {
  it("finds a model by short name beside the fallback", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "stream-stt-models-"));
    try {
      const model = path.join(dir, "ggml-tiny-test.bin");
      fs.writeFileSync(model, "");
      expect(resolveModelPathSync("tiny-test", path.join(dir, "ggml-medium.bin"))).toBe(model);
      expect(resolveModelPathSync(undefined, path.join(dir, "missing.bin"))).toBeUndefined();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("OpenAiSttEngine", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("posts a WAV form and returns the trimmed text", async () => {
    const fetchMock = jest
      .spyOn(globalThis, "fetch")
      .mockResolvedValue(new Response(JSON.stringify({ text: " hi there " }), { status: 200 }));
    const engine = new OpenAiSttEngine({ apiKey: "test-secret", baseUrl: "http://stt.test/" });

    await expect(engine.transcribe(Buffer.alloc(320), req)).resolves.toBe("hi there");

    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe("http://stt.test/v1/audio/transcriptions");
    const init = call?.[1];
    expect(init?.headers).toEqual({ Authorization: "Bearer test-secret" });
    const body = init?.body;
    expect(body).toBeInstanceOf(FormData);
    if (body instanceof FormData) {
      expect(body.get("model")).toBe("whisper-1");
      expect(body.get("language")).toBe("en");
      expect(body.get("response_format")).toBe("verbose_json");
    }
  });

  it("drops segments rated as non-speech", async () => {
    const payload = {
      text: "Hello. Thanks for watching!",
      segments: [
        { text: " Hello.", no_speech_prob: 0.1 },
        { text: " Thanks for watching!", no_speech_prob: 0.92 }
      ]
    };
    jest.spyOn(globalThis, "fetch").mockResolvedValue(new Response(JSON.stringify(payload), { status: 200 }));
    const engine = new OpenAiSttEngine({ apiKey: "test-secret", baseUrl: "http://stt.test" });
    await expect(engine.transcribe(Buffer.alloc(320), req)).resolves.toBe("Hello.");
  });

  it("rejects an unexpected payload", async () => {
    jest.spyOn(globalThis, "fetch").mockResolvedValue(new Response("<html>gateway</html>", { status: 200 }));
    const engine = new OpenAiSttEngine({ apiKey: "test-secret", baseUrl: "http://stt.test" });
    await expect(engine.transcribe(Buffer.alloc(320), req)).rejects.toThrow("OpenAI STT returned an unexpected payload.");
  });

  it("surfaces HTTP failures", async () => {
    jest.spyOn(globalThis, "fetch").mockResolvedValue(new Response("quota exceeded", { status: 429 }));
    const engine = new OpenAiSttEngine({ apiKey: "test-secret", baseUrl: "http://stt.test" });
    const failure = engine.transcribe(Buffer.alloc(320), req);
    await expect(failure).rejects.toBeInstanceOf(RecognizerError);
    await expect(failure).rejects.toThrow("OpenAI STT failed (429): quota exceeded");
  });
});
