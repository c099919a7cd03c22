const INT16_MIN = -32_768;
const INT16_MAX = 32_767;
const SCALE = 32_767;

export const BYTES_PER_SAMPLE = 2;

/**
 * Float samples in [-1, 1] to signed 16-bit little-endian PCM.
 * Out-of-range values saturate; NaN becomes silence.
 */
export function quantize(samples: ArrayLike<number>): Buffer {
  const out = Buffer.alloc(samples.length * BYTES_PER_SAMPLE);
  for (let i = 0; i < samples.length; i += 1) {
    out.writeInt16LE(toInt16(samples[i] ?? 0), i * BYTES_PER_SAMPLE);
  }
  return out;
}

export function dequantize(pcm: Buffer): Float32Array {
  const count = Math.floor(pcm.length / BYTES_PER_SAMPLE);
  const out = new Float32Array(count);
  for (let i = 0; i < count; i += 1) {
    out[i] = pcm.readInt16LE(i * BYTES_PER_SAMPLE) / SCALE;
  }
  return out;
}

function toInt16(sample: number): number {
  if (Number.isNaN(sample)) return 0;
  const scaled = Math.round(sample * SCALE);
  if (scaled < INT16_MIN) return INT16_MIN;
  if (scaled > INT16_MAX) return INT16_MAX;
  return scaled;
}
