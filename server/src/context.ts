import type { SpeechConfig } from "./config.js";
import { UpstreamUnavailableError, errorMessage } from "./errors.js";
import { SnacHttpEncoder, type AudioEncoder } from "./tts/audioEncoder.js";
import { checkTextBackend, type HealthReport } from "./tts/healthProbe.js";
import { OllamaClient, type TextGenerationClient } from "./tts/ollamaClient.js";
import { SynthesisPipeline, type SynthesisRequest } from "./tts/synthesisPipeline.js";
import type { SynthesisDefaults } from "./tts/synthesisRequest.js";

export type Readiness = { state: "ready" } | { state: "unavailable"; reason: string };

export type SpeechBackends = {
  textClient: TextGenerationClient;
  encoder: AudioEncoder;
};

/**
 * Process-wide state, built once at startup and handed to every request
 * handler. The codec probe runs at most once; its outcome is final for the
 * life of the process.
 */
export class SpeechContext {
  readonly config: SpeechConfig;
  readonly textClient: TextGenerationClient;
  readonly encoder: AudioEncoder;
  private readiness?: Promise<Readiness>;

  constructor(config: SpeechConfig, backends: SpeechBackends) {
    this.config = config;
    this.textClient = backends.textClient;
    this.encoder = backends.encoder;
  }

  ensureReady(): Promise<Readiness> {
    this.readiness ??= this.initialize();
    return this.readiness;
  }

  async requireReady(): Promise<void> {
    const readiness = await this.ensureReady();
    if (readiness.state === "unavailable") {
      throw new UpstreamUnavailableError(readiness.reason);
    }
  }

  defaults(): SynthesisDefaults {
    return {
      temperature: this.config.temperature,
      topP: this.config.topP,
      repeatPenalty: this.config.repeatPenalty,
      maxTextChars: this.config.maxTextChars
    };
  }

  /**
   * Resolves once the codec is known to be usable, so an unavailable codec is
   * reported before any audio byte is sent and before any upstream call.
   */
  async openPipeline(request: SynthesisRequest, signal?: AbortSignal): Promise<SynthesisPipeline> {
    await this.requireReady();
    return new SynthesisPipeline(this.textClient, this.encoder, request, {
      sampleRate: this.config.sampleRate,
      chunkThreshold: this.config.chunkThreshold,
      signal
    });
  }

  async checkHealth(): Promise<{ text: HealthReport; codec: Readiness }> {
    const [text, codec] = await Promise.all([checkTextBackend(this.textClient), this.ensureReady()]);
    return { text, codec };
  }

  private async initialize(): Promise<Readiness> {
    try {
      await this.encoder.probe();
      console.log("[tts] audio codec ready", { codecUrl: this.config.codecUrl });
      return { state: "ready" };
    } catch (err) {
      const reason = errorMessage(err);
      console.error("[tts] audio codec unavailable, synthesis disabled", { codecUrl: this.config.codecUrl, reason });
      return { state: "unavailable", reason };
    }
  }
}

export function createSpeechContext(config: SpeechConfig, backends: Partial<SpeechBackends> = {}): SpeechContext {
  const textClient =
    backends.textClient ??
    new OllamaClient({
      apiUrl: config.ollamaApiUrl,
      modelName: config.modelName,
      timeoutMs: config.apiTimeoutMs,
      probeTimeoutMs: config.probeTimeoutMs
    });
  const encoder =
    backends.encoder ??
    new SnacHttpEncoder({
      baseUrl: config.codecUrl,
      timeoutMs: config.codecTimeoutMs,
      probeTimeoutMs: config.probeTimeoutMs
    });
  console.log("[tts] initialized Orpheus backend", {
    ollamaApiUrl: config.ollamaApiUrl,
    model: config.modelName,
    temperature: config.temperature,
    topP: config.topP,
    repeatPenalty: config.repeatPenalty,
    sampleRate: config.sampleRate
  });
  return new SpeechContext(config, { textClient, encoder });
}
