import { z } from "zod";
import { MalformedUpstreamRecordError, UpstreamRequestError, errorMessage } from "../errors.js";

export type GenerationParams = {
  temperature: number;
  topP: number;
  repeatPenalty: number;
};

export type TextFragment = {
  content: string;
  isFinal: boolean;
};

export type ConnectionStatus = {
  status: "connected" | "error";
  message: string;
};

export interface TextGenerationClient {
  generateComplete(prompt: string, params: GenerationParams, signal?: AbortSignal): Promise<string>;
  generateStream(prompt: string, params: GenerationParams, signal?: AbortSignal): AsyncGenerator<TextFragment, void, undefined>;
  testConnection(): Promise<ConnectionStatus>;
}

export type OllamaClientOptions = {
  apiUrl: string;
  modelName: string;
  timeoutMs: number;
  probeTimeoutMs?: number;
};

const DEFAULT_PROBE_TIMEOUT_MS = 10_000;
const PROBE_PROMPT = "Hello";

const GenerateRecordSchema = z.object({
  response: z.string().optional(),
  done: z.boolean().optional(),
  error: z.string().optional()
});

type GenerateRecord = z.infer<typeof GenerateRecordSchema>;

type GenerateRequest = {
  model: string;
  prompt: string;
  stream: boolean;
  options?: {
    temperature: number;
    top_p: number;
    repeat_penalty: number;
  };
};

export function parseGenerateRecord(line: string): GenerateRecord {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    throw new MalformedUpstreamRecordError(line, { cause: err });
  }
  const parsed = GenerateRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedUpstreamRecordError(line, { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * Splits a byte stream into lines. A trailing line without a newline is
 * still produced when the stream ends. Returning early cancels the reader.
 */
export async function* readLines(body: NonNullable<Response["body"]>): AsyncGenerator<string, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let pending = "";
  // Only a reader the consumer walked away from still needs cancelling.
  let settled = false;
  try {
    while (true) {
      let chunk: Awaited<ReturnType<typeof reader.read>>;
      try {
        chunk = await reader.read();
      } catch (err) {
        settled = true;
        throw err;
      }
      const { done, value } = chunk;
      settled = done;
      pending += done ? decoder.decode() : decoder.decode(value, { stream: true });
      const lines = pending.split("\n");
      pending = done ? "" : lines.pop() ?? "";
      for (const line of lines) yield line;
      if (done) return;
    }
  } finally {
    if (!settled) {
      await reader.cancel().catch((err: unknown) => {
        // The request was aborted while a line was being handled.
        if (isAbortError(err)) return;
        console.warn("[ollama] failed to release stream", { error: errorMessage(err) });
      });
    }
  }
}

function isAbortError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "name" in err && err.name === "AbortError";
}

const clip = (s: string, max = 50) => (s.length <= max ? s : `${s.slice(0, max)}...`);

/**
 * Client for Ollama's `/api/generate` endpoint, used to turn a voice-tagged
 * prompt into the token text the audio codec consumes.
 */
export class OllamaClient implements TextGenerationClient {
  private readonly apiUrl: string;
  private readonly modelName: string;
  private readonly timeoutMs: number;
  private readonly probeTimeoutMs: number;

  constructor(opts: OllamaClientOptions) {
    this.apiUrl = opts.apiUrl;
    this.modelName = opts.modelName;
    this.timeoutMs = opts.timeoutMs;
    this.probeTimeoutMs = opts.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  }

  async generateComplete(prompt: string, params: GenerationParams, signal?: AbortSignal): Promise<string> {
    console.log("[ollama] generate", { model: this.modelName, prompt: clip(prompt), stream: false });
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.post(this.buildRequest(prompt, params, false), controller, signal);
      const text = await response.text();
      let record: GenerateRecord;
      try {
        record = parseGenerateRecord(text);
      } catch (err) {
        throw new UpstreamRequestError("Ollama returned an unreadable response", response.status, text, {
          cause: err
        });
      }
      if (record.error) {
        throw new UpstreamRequestError(`Ollama error: ${record.error}`, response.status, text);
      }
      const generated = record.response ?? "";
      if (!generated) {
        console.warn("[ollama] empty response", { model: this.modelName });
      }
      return generated;
    } catch (err) {
      throw this.wrapTransportError(err, controller);
    } finally {
      clearTimeout(timeout);
    }
  }

  async *generateStream(
    prompt: string,
    params: GenerationParams,
    signal?: AbortSignal
  ): AsyncGenerator<TextFragment, void, undefined> {
    console.log("[ollama] generate", { model: this.modelName, prompt: clip(prompt), stream: true });
    const controller = new AbortController();
    // Idle timeout: only time spent waiting on Ollama counts, never the
    // consumer's work between fragments.
    let timeout: ReturnType<typeof setTimeout> | undefined;
    const arm = () => {
      clearTimeout(timeout);
      timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    };
    arm();
    let finished = false;
    try {
      let response: Response;
      try {
        response = await this.post(this.buildRequest(prompt, params, true), controller, signal);
      } catch (err) {
        throw this.wrapTransportError(err, controller);
      }

      if (response.body) {
        try {
          for await (const line of readLines(response.body)) {
            clearTimeout(timeout);
            const record = this.readStreamLine(line);
            if (record?.done) {
              finished = true;
              yield { content: record.response ?? "", isFinal: true };
              return;
            }
            if (record?.response) {
              yield { content: record.response, isFinal: false };
            }
            arm();
          }
        } catch (err) {
          throw this.wrapTransportError(err, controller);
        }
      }

      clearTimeout(timeout);
      finished = true;
      yield { content: "", isFinal: true };
    } finally {
      clearTimeout(timeout);
      // Consumer stopped early or the read failed: drop the connection.
      if (!finished) controller.abort();
    }
  }

  async testConnection(): Promise<ConnectionStatus> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.probeTimeoutMs);
    try {
      const response = await fetch(this.apiUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ model: this.modelName, prompt: PROBE_PROMPT, stream: false } satisfies GenerateRequest),
        signal: controller.signal
      });
      const body = await response.text();
      if (response.ok) {
        return { status: "connected", message: "Successfully connected to Ollama" };
      }
      return { status: "error", message: `Failed to connect: ${response.status} - ${body}` };
    } catch (err) {
      const reason = controller.signal.aborted ? `timed out after ${this.probeTimeoutMs}ms` : errorMessage(err);
      return { status: "error", message: `Failed to connect: ${reason}` };
    } finally {
      clearTimeout(timeout);
    }
  }

  private buildRequest(prompt: string, params: GenerationParams, stream: boolean): GenerateRequest {
    return {
      model: this.modelName,
      prompt,
      stream,
      options: {
        temperature: params.temperature,
        top_p: params.topP,
        repeat_penalty: params.repeatPenalty
      }
    };
  }

  private async post(payload: GenerateRequest, controller: AbortController, signal?: AbortSignal): Promise<Response> {
    const response = await fetch(this.apiUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      signal: signal ? AbortSignal.any([signal, controller.signal]) : controller.signal
    });
    if (!response.ok) {
      const errText = await response.text().catch(() => "");
      console.error("[ollama] request failed", { status: response.status, body: clip(errText, 200) });
      throw new UpstreamRequestError(
        `Ollama request failed (${response.status}): ${errText || response.statusText}`,
        response.status,
        errText
      );
    }
    return response;
  }

  private readStreamLine(line: string): GenerateRecord | null {
    const trimmed = line.trim();
    if (!trimmed) return null;
    let record: GenerateRecord;
    try {
      record = parseGenerateRecord(trimmed);
    } catch (err) {
      if (!(err instanceof MalformedUpstreamRecordError)) throw err;
      console.warn("[ollama] skipping malformed record", { line: clip(trimmed, 200) });
      return null;
    }
    if (record.error) {
      throw new UpstreamRequestError(`Ollama error: ${record.error}`, undefined, trimmed);
    }
    return record;
  }

  private wrapTransportError(err: unknown, controller: AbortController): unknown {
    if (err instanceof UpstreamRequestError) return err;
    if (controller.signal.aborted) {
      return new UpstreamRequestError(`Ollama request timed out after ${this.timeoutMs}ms`, undefined, undefined, {
        cause: err
      });
    }
    return new UpstreamRequestError(`Ollama request failed: ${errorMessage(err)}`, undefined, undefined, {
      cause: err
    });
  }
}
