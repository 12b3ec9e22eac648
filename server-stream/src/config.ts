import path from "node:path";
import { z } from "zod";

const BoolEnv = z.preprocess(
  (v) => {
    if (typeof v !== "string") return v;
    const normalized = v.trim().toLowerCase();
    if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on")
      return true;
    if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off")
      return false;
    return v;
  },
  z.boolean()
);

const UrlEnv = z
  .string()
  .url()
  .transform((v) => v.replace(/\/+$/, ""));

const DEFAULT_WHISPER_BIN = path.resolve(process.cwd(), "transcribe/whisper_cpp/bin/whisper-cli");
const DEFAULT_WHISPER_MODEL = path.resolve(
  process.cwd(),
  "transcribe/whisper_cpp/models/ggml-medium.bin"
);

const ConfigSchema = z.object({
  host: z.string().default("127.0.0.1"),
  port: z.coerce.number().int().min(1).max(65535).default(8765),
  basePath: z.string().default(""),
  maxWsMessageBytes: z.coerce.number().int().min(1_024).default(1024 * 1024),

  auditLogPath: z.string().default("logs/stream-stt-audit.jsonl"),
  debug: BoolEnv.default(false),

  engine: z.enum(["cpp", "openai"]).default("cpp"),
  model: z.string().default("ggml-medium.bin"),
  language: z.string().default("auto"),
  format: z.enum(["pcm16", "wav"]).default("pcm16"),
  whisperCppBin: z.string().default(DEFAULT_WHISPER_BIN),
  whisperCppModel: z.string().default(DEFAULT_WHISPER_MODEL),
  whisperBeamSize: z.coerce.number().int().min(1).max(16).default(5),
  openAiApiKey: z.string().optional(),
  openAiBaseUrl: UrlEnv.default("https://api.openai.com"),
  openAiNoSpeechThreshold: z.coerce.number().min(0).max(1).default(0.6),

  energyThreshold: z.coerce.number().min(0).default(350),
  frameMs: z.coerce.number().int().min(5).max(200).default(20),
  minSilenceMs: z.coerce.number().int().min(50).max(10_000).default(300),
  triggerIntervalMs: z.coerce.number().int().min(200).max(60_000).default(3_000),
  maxWindowMs: z.coerce.number().int().min(1_000).max(120_000).default(30_000),
  bufferCapacityMs: z.coerce.number().int().min(1_000).max(600_000).default(60_000),
  maxConcurrentPasses: z.coerce.number().int().min(1).max(64).default(2),
  maxQueuedPasses: z.coerce.number().int().min(1).default(64)
});

export type StreamConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): StreamConfig {
  const parsed = ConfigSchema.parse({
    host: env.STT_HOST,
    port: env.STT_PORT,
    basePath: env.STT_BASE_PATH,
    maxWsMessageBytes: env.STT_MAX_WS_MESSAGE_BYTES,

    auditLogPath: env.STT_AUDIT_LOG_PATH,
    debug: env.STT_DEBUG,

    engine: env.STT_ENGINE,
    model: env.STT_MODEL,
    language: env.STT_LANG,
    format: env.STT_FORMAT,
    whisperCppBin: env.STT_WHISPER_CPP_BIN,
    whisperCppModel: env.STT_WHISPER_CPP_MODEL,
    whisperBeamSize: env.STT_WHISPER_BEAM_SIZE,
    openAiApiKey: env.STT_OPENAI_API_KEY ?? env.OPENAI_API_KEY,
    openAiBaseUrl: env.STT_OPENAI_BASE_URL,
    openAiNoSpeechThreshold: env.STT_OPENAI_NO_SPEECH_THRESHOLD,

    energyThreshold: env.STT_ENERGY_THRESHOLD,
    frameMs: env.STT_FRAME_MS,
    minSilenceMs: env.STT_MIN_SILENCE_MS,
    triggerIntervalMs: env.STT_TRIGGER_INTERVAL_MS,
    maxWindowMs: env.STT_MAX_WINDOW_MS,
    bufferCapacityMs: env.STT_BUFFER_CAPACITY_MS,
    maxConcurrentPasses: env.STT_MAX_CONCURRENT_PASSES,
    maxQueuedPasses: env.STT_MAX_QUEUED_PASSES
  });

  if (parsed.engine === "openai" && !parsed.openAiApiKey) {
    throw new Error(
      "STT_ENGINE=openai but no OpenAI API key was found. Set STT_OPENAI_API_KEY or OPENAI_API_KEY."
    );
  }

  if (parsed.bufferCapacityMs < parsed.maxWindowMs) {
    console.warn(
      `[config] STT_BUFFER_CAPACITY_MS (${parsed.bufferCapacityMs}) is below STT_MAX_WINDOW_MS (${parsed.maxWindowMs}); long utterances will overflow before they are finalized.`
    );
  }

  return parsed;
}
