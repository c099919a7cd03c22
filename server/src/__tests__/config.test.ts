import { describe, expect, it } from "vitest";
import { loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      host: "0.0.0.0",
      port: 5000,
      modelName: "orpheus",
      ollamaApiUrl: "http://localhost:11434/api/generate",
      apiTimeoutMs: 120_000,
      probeTimeoutMs: 10_000,
      temperature: 0.6,
      topP: 0.9,
      repeatPenalty: 1.1,
      sampleRate: 24_000,
      chunkThreshold: 4,
      maxTextChars: 4_000,
      codecUrl: "http://localhost:9100",
      codecTimeoutMs: undefined,
      appToken: undefined,
      corsOrigin: "*",
      auditLogPath: "logs/tts-audit.jsonl"
    });
  });

  it("reads and coerces environment overrides", () => {
    const config = loadConfig({
      ORPHEUS_PORT: "8080",
      ORPHEUS_MODEL_NAME: "orpheus-3b",
      OLLAMA_API_URL: "http://gpu-box:11434/api/generate/",
      ORPHEUS_TEMPERATURE: "0.2",
      ORPHEUS_SAMPLE_RATE: "22050",
      ORPHEUS_CHUNK_THRESHOLD: "16",
      ORPHEUS_APP_TOKEN: "test-secret"
    });
    expect(config).toMatchObject({
      port: 8080,
      modelName: "orpheus-3b",
      ollamaApiUrl: "http://gpu-box:11434/api/generate",
      temperature: 0.2,
      sampleRate: 22_050,
      chunkThreshold: 16,
      appToken: "test-secret"
    });
  });

  it("treats a blank app token as unset", () => {
    expect(loadConfig({ ORPHEUS_APP_TOKEN: "  " }).appToken).toBeUndefined();
  });

  it("rejects out-of-range values", () => {
    expect(() => loadConfig({ ORPHEUS_TOP_P: "1.5" })).toThrow();
    expect(() => loadConfig({ ORPHEUS_CHUNK_THRESHOLD: "0" })).toThrow();
    expect(() => loadConfig({ OLLAMA_API_URL: "not a url" })).toThrow();
  });
});
