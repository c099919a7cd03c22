import { z } from "zod";
import { EncodingFailureError, errorMessage } from "../errors.js";

/**
 * Turns generated token text into normalized float samples. Implementations
 * are expected to be slow; the pipeline calls them one flush at a time.
 */
export interface AudioEncoder {
  /** Throws when the codec cannot be used. Called once at startup. */
  probe(): Promise<void>;
  encode(text: string, signal?: AbortSignal): Promise<Float32Array>;
}

export type SnacEncoderOptions = {
  baseUrl: string;
  /** No timeout when unset; codec calls may legitimately take a while. */
  timeoutMs?: number;
  probeTimeoutMs?: number;
};

const DEFAULT_PROBE_TIMEOUT_MS = 10_000;

const DecodeResponseSchema = z.object({
  audio_base64: z.string()
});

export function base64ToFloat32(base64: string): Float32Array {
  const bytes = Buffer.from(base64, "base64");
  if (bytes.length % 4 !== 0) {
    throw new Error(`sample payload is ${bytes.length} bytes, not a multiple of 4`);
  }
  const out = new Float32Array(bytes.length / 4);
  for (let i = 0; i < out.length; i += 1) {
    out[i] = bytes.readFloatLE(i * 4);
  }
  return out;
}

/**
 * HTTP client for a SNAC decoder sidecar.
 *
 * - `GET /health` answers 2xx once the model is loaded
 * - `POST /decode {text}` answers `{audio_base64}` holding little-endian float32 samples
 */
export class SnacHttpEncoder implements AudioEncoder {
  private readonly baseUrl: string;
  private readonly timeoutMs?: number;
  private readonly probeTimeoutMs: number;

  constructor(opts: SnacEncoderOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/g, "");
    this.timeoutMs = opts.timeoutMs;
    this.probeTimeoutMs = opts.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  }

  async probe(): Promise<void> {
    const response = await fetch(`${this.baseUrl}/health`, {
      method: "GET",
      signal: AbortSignal.timeout(this.probeTimeoutMs)
    });
    if (!response.ok) {
      const errText = await response.text().catch(() => "");
      throw new Error(`SNAC health check failed (${response.status}): ${errText || response.statusText}`);
    }
    await response.text();
  }

  async encode(text: string, signal?: AbortSignal): Promise<Float32Array> {
    const signals: AbortSignal[] = [];
    if (signal) signals.push(signal);
    if (this.timeoutMs) signals.push(AbortSignal.timeout(this.timeoutMs));

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/decode`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ text }),
        signal: signals.length ? AbortSignal.any(signals) : undefined
      });
    } catch (err) {
      throw new EncodingFailureError(errorMessage(err), { cause: err });
    }

    if (!response.ok) {
      const errText = await response.text().catch(() => "");
      throw new EncodingFailureError(`SNAC decode failed (${response.status}): ${errText || response.statusText}`);
    }

    try {
      const parsed = DecodeResponseSchema.parse(await response.json());
      return base64ToFloat32(parsed.audio_base64);
    } catch (err) {
      throw new EncodingFailureError(`unreadable SNAC response: ${errorMessage(err)}`, { cause: err });
    }
  }
}
