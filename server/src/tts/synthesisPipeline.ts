import { ChunkAccumulator, DEFAULT_CHUNK_THRESHOLD } from "./chunkAccumulator.js";
import type { AudioEncoder } from "./audioEncoder.js";
import type { GenerationParams, TextFragment, TextGenerationClient } from "./ollamaClient.js";
import { quantize } from "./pcm.js";
import { formatPrompt, type Voice } from "./voices.js";
import { buildStreamingHeader, pcm16ToWav } from "./wav.js";
import { EncodingFailureError, SpeechError, errorMessage } from "../errors.js";

export type SynthesisRequest = Readonly<{
  text: string;
  voice: Voice;
  params: Readonly<GenerationParams>;
}>;

export type PipelineState = "idle" | "header_sent" | "accumulating" | "flushing" | "draining" | "done" | "failed";

export type PipelineOptions = {
  sampleRate: number;
  chunkThreshold?: number;
  signal?: AbortSignal;
};

export type PipelineStats = {
  flushes: number;
  pcmBytes: number;
  cancelled: boolean;
};

const TERMINAL: ReadonlySet<PipelineState> = new Set(["done", "failed"]);

/**
 * Drives one synthesis request: text fragments in, PCM out.
 *
 * Streaming mode yields the WAV header first, then one PCM buffer per flush.
 * Complete mode runs the same steps and returns a single WAV file. A pipeline
 * is single use; build a new one per request.
 */
export class SynthesisPipeline {
  private state: PipelineState = "idle";
  private readonly stats: PipelineStats = { flushes: 0, pcmBytes: 0, cancelled: false };
  private readonly threshold: number;

  constructor(
    private readonly textClient: TextGenerationClient,
    private readonly encoder: AudioEncoder,
    private readonly request: SynthesisRequest,
    private readonly opts: PipelineOptions
  ) {
    this.threshold = opts.chunkThreshold ?? DEFAULT_CHUNK_THRESHOLD;
  }

  getState(): PipelineState {
    return this.state;
  }

  getStats(): Readonly<PipelineStats> {
    return this.stats;
  }

  async *stream(): AsyncGenerator<Buffer, void, undefined> {
    this.begin();
    try {
      this.state = "header_sent";
      yield buildStreamingHeader(this.opts.sampleRate);
      const fragments = this.textClient.generateStream(this.prompt(), this.request.params, this.opts.signal);
      for await (const pcm of this.flushes(fragments)) {
        yield pcm;
      }
      this.state = "done";
    } catch (err) {
      this.state = "failed";
      throw err;
    } finally {
      if (!TERMINAL.has(this.state)) {
        // Consumer closed the generator mid-stream.
        this.stats.cancelled = true;
        this.state = "done";
      }
    }
  }

  async complete(): Promise<Buffer> {
    this.begin();
    try {
      this.state = "accumulating";
      const text = await this.textClient.generateComplete(this.prompt(), this.request.params, this.opts.signal);
      const chunks: Buffer[] = [];
      for await (const pcm of this.flushes(single({ content: text, isFinal: true }))) {
        chunks.push(pcm);
      }
      this.state = "done";
      return pcm16ToWav(Buffer.concat(chunks), this.opts.sampleRate, 1);
    } catch (err) {
      this.state = "failed";
      throw err;
    }
  }

  private async *flushes(fragments: AsyncIterable<TextFragment>): AsyncGenerator<Buffer, void, undefined> {
    const accumulator = new ChunkAccumulator(this.threshold);
    this.state = "accumulating";
    for await (const fragment of fragments) {
      const ready = accumulator.push(fragment.content);
      if (ready !== null) {
        const pcm = await this.flush(ready);
        this.state = "accumulating";
        if (pcm.length) yield pcm;
      }
      if (fragment.isFinal) break;
    }

    this.state = "draining";
    const rest = accumulator.drain();
    if (rest !== null) {
      const pcm = await this.flush(rest);
      this.state = "draining";
      if (pcm.length) yield pcm;
    }
  }

  private async flush(text: string): Promise<Buffer> {
    this.state = "flushing";
    let samples: Float32Array;
    try {
      samples = await this.encoder.encode(text, this.opts.signal);
    } catch (err) {
      if (err instanceof SpeechError) throw err;
      throw new EncodingFailureError(errorMessage(err), { cause: err });
    }
    const pcm = quantize(samples);
    this.stats.flushes += 1;
    this.stats.pcmBytes += pcm.length;
    return pcm;
  }

  private begin() {
    if (this.state !== "idle") {
      throw new Error("SynthesisPipeline has already run");
    }
  }

  private prompt(): string {
    return formatPrompt(this.request.text, this.request.voice);
  }
}

async function* single<T>(value: T): AsyncGenerator<T, void, undefined> {
  yield value;
}
