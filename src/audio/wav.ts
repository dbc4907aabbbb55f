/**
 * Audio format helpers: PCM <-> WAV.
 */

export const WAV_HEADER_BYTES = 44;

/**
 * Prepend a 44-byte WAV header to 16-bit mono PCM.
 */
export function pcmToWav(pcm: Buffer, sampleRateHz: number): Buffer {
  const numChannels = 1;
  const bitsPerSample = 16;
  const byteRate = sampleRateHz * numChannels * (bitsPerSample / 8);
  const dataSize = pcm.length;
  const fileSize = WAV_HEADER_BYTES + dataSize;
  const header = Buffer.alloc(WAV_HEADER_BYTES);
  header.write("RIFF", 0);
  header.writeUInt32LE(fileSize - 8, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(numChannels, 22);
  header.writeUInt32LE(sampleRateHz, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE((numChannels * bitsPerSample) / 8, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36);
  header.writeUInt32LE(dataSize, 40);
  return Buffer.concat([header, pcm]);
}

export interface WavInfo {
  sampleRate: number;
  /** Seconds of audio in the data chunk. */
  duration: number;
}

const RIFF_HEADER_BYTES = 12;
const CHUNK_HEADER_BYTES = 8;

/**
 * Read sample rate and duration by walking the RIFF chunks to `fmt ` and `data`.
 * Null when the buffer is not RIFF/WAVE or either chunk is missing.
 */
export function readWavInfo(buf: Buffer): WavInfo | null {
  if (buf.length < RIFF_HEADER_BYTES) return null;
  if (buf.toString("ascii", 0, 4) !== "RIFF" || buf.toString("ascii", 8, 12) !== "WAVE") return null;
  let sampleRate = 0;
  let byteRate = 0;
  let offset = RIFF_HEADER_BYTES;
  while (offset + CHUNK_HEADER_BYTES <= buf.length) {
    const id = buf.toString("ascii", offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + CHUNK_HEADER_BYTES;
    if (id === "fmt " && body + 12 <= buf.length) {
      sampleRate = buf.readUInt32LE(body + 4);
      byteRate = buf.readUInt32LE(body + 8);
    } else if (id === "data") {
      if (sampleRate === 0 || byteRate === 0) return null;
      const dataSize = Math.min(size, buf.length - body);
      return { sampleRate, duration: dataSize / byteRate };
    }
    // Chunks are word-aligned.
    offset = body + size + (size % 2);
  }
  return null;
}

/** Duration of 16-bit mono PCM. */
export function pcmDuration(byteLength: number, sampleRateHz: number): number {
  return byteLength / (sampleRateHz * 2);
}
