export const DEFAULT_CHUNK_THRESHOLD = 4;

/**
 * Collects generated text until enough has arrived to be worth a codec call.
 * One instance per pipeline; never shared between requests.
 */
export class ChunkAccumulator {
  private buffer = "";
  private readonly threshold: number;

  constructor(threshold = DEFAULT_CHUNK_THRESHOLD) {
    if (!Number.isInteger(threshold) || threshold < 1) throw new Error("Invalid chunk threshold");
    this.threshold = threshold;
  }

  /** Returns the buffered text once it reaches the threshold, else null. */
  push(text: string): string | null {
    if (text) this.buffer += text;
    if (this.buffer.length < this.threshold) return null;
    return this.take();
  }

  /** Whatever is left after the final fragment, even below the threshold. */
  drain(): string | null {
    if (!this.buffer) return null;
    return this.take();
  }

  size() {
    return this.buffer.length;
  }

  private take(): string {
    const out = this.buffer;
    this.buffer = "";
    return out;
  }
}
