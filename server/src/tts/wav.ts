export const WAV_HEADER_BYTES = 44;

export type WavFormat = {
  sampleRate: number;
  channels?: number;
  bitsPerSample?: number;
};

export type WavHeaderInfo = {
  audioFormat: number;
  channels: number;
  sampleRate: number;
  byteRate: number;
  blockAlign: number;
  bitsPerSample: number;
  riffSize: number;
  dataSize: number;
};

export function buildWavHeader(format: WavFormat, dataSize: number): Buffer {
  const rate = Number(format.sampleRate);
  const ch = Number(format.channels ?? 1);
  const bitsPerSample = Number(format.bitsPerSample ?? 16);
  if (!Number.isFinite(rate) || rate <= 0) throw new Error("Invalid sampleRate");
  if (!Number.isFinite(ch) || ch <= 0) throw new Error("Invalid channels");
  if (!Number.isInteger(dataSize) || dataSize < 0) throw new Error("Invalid dataSize");

  const blockAlign = (ch * bitsPerSample) / 8;
  const byteRate = rate * blockAlign;

  const header = Buffer.alloc(WAV_HEADER_BYTES);
  header.write("RIFF", 0);
  header.writeUInt32LE(36 + dataSize, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16); // PCM header size
  header.writeUInt16LE(1, 20); // PCM format
  header.writeUInt16LE(ch, 22);
  header.writeUInt32LE(rate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36);
  header.writeUInt32LE(dataSize, 40);
  return header;
}

/**
 * Header for a stream whose length is unknown when it is sent. The data size
 * is left at zero; players that stream WAV read until the connection closes.
 */
export function buildStreamingHeader(sampleRate: number, channels = 1): Buffer {
  return buildWavHeader({ sampleRate, channels }, 0);
}

export function pcm16ToWav(pcm: Buffer, sampleRate: number, channels = 1): Buffer {
  return Buffer.concat([buildWavHeader({ sampleRate, channels }, pcm.length), pcm]);
}

export function parseWavHeader(buf: Buffer): WavHeaderInfo {
  if (buf.length < WAV_HEADER_BYTES) throw new Error("WAV header too short");
  if (buf.toString("ascii", 0, 4) !== "RIFF" || buf.toString("ascii", 8, 12) !== "WAVE") {
    throw new Error("Not a RIFF/WAVE buffer");
  }
  if (buf.toString("ascii", 12, 16) !== "fmt " || buf.toString("ascii", 36, 40) !== "data") {
    throw new Error("Unsupported WAV layout");
  }
  return {
    riffSize: buf.readUInt32LE(4),
    audioFormat: buf.readUInt16LE(20),
    channels: buf.readUInt16LE(22),
    sampleRate: buf.readUInt32LE(24),
    byteRate: buf.readUInt32LE(28),
    blockAlign: buf.readUInt16LE(32),
    bitsPerSample: buf.readUInt16LE(34),
    dataSize: buf.readUInt32LE(40)
  };
}
