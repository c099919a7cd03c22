import { z } from "zod";

const UrlEnv = z
  .string()
  .url()
  .transform((v) => v.replace(/\/+$/, ""));

const OptionalString = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  z.string().optional()
);

const ConfigSchema = z.object({
  host: z.string().default("0.0.0.0"),
  port: z.coerce.number().int().min(1).max(65535).default(5000),

  modelName: z.string().min(1).default("orpheus"),
  ollamaApiUrl: UrlEnv.default("http://localhost:11434/api/generate"),
  apiTimeoutMs: z.coerce.number().int().min(1_000).max(600_000).default(120_000),
  probeTimeoutMs: z.coerce.number().int().min(500).max(60_000).default(10_000),

  temperature: z.coerce.number().min(0).default(0.6),
  topP: z.coerce.number().min(0).max(1).default(0.9),
  repeatPenalty: z.coerce.number().min(0).default(1.1),

  sampleRate: z.coerce.number().int().min(8_000).max(192_000).default(24_000),
  chunkThreshold: z.coerce.number().int().min(1).max(4_096).default(4),
  maxTextChars: z.coerce.number().int().min(1).default(4_000),

  codecUrl: UrlEnv.default("http://localhost:9100"),
  codecTimeoutMs: z.coerce.number().int().min(1_000).optional(),

  appToken: OptionalString,
  corsOrigin: z.string().default("*"),
  auditLogPath: z.string().default("logs/tts-audit.jsonl")
});

export type SpeechConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SpeechConfig {
  return ConfigSchema.parse({
    host: env.ORPHEUS_HOST,
    port: env.ORPHEUS_PORT,

    modelName: env.ORPHEUS_MODEL_NAME,
    ollamaApiUrl: env.OLLAMA_API_URL,
    apiTimeoutMs: env.ORPHEUS_API_TIMEOUT_MS,
    probeTimeoutMs: env.ORPHEUS_PROBE_TIMEOUT_MS,

    temperature: env.ORPHEUS_TEMPERATURE,
    topP: env.ORPHEUS_TOP_P,
    repeatPenalty: env.ORPHEUS_REPEAT_PENALTY,

    sampleRate: env.ORPHEUS_SAMPLE_RATE,
    chunkThreshold: env.ORPHEUS_CHUNK_THRESHOLD,
    maxTextChars: env.ORPHEUS_MAX_TEXT_CHARS,

    codecUrl: env.ORPHEUS_CODEC_URL,
    codecTimeoutMs: env.ORPHEUS_CODEC_TIMEOUT_MS,

    appToken: env.ORPHEUS_APP_TOKEN,
    corsOrigin: env.ORPHEUS_CORS_ORIGIN,
    auditLogPath: env.ORPHEUS_AUDIT_LOG_PATH
  });
}
