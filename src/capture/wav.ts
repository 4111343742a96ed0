/**
 * 16-bit linear PCM WAV container
 * Transcription backends take a WAV file, not raw float samples.
 */

const HEADER_SIZE = 44;
const BITS_PER_SAMPLE = 16;
const INT16_MAX = 32767;

export type DecodedWav = {
  sampleRate: number;
  channels: number;
  samples: Float32Array;
};

export function floatToInt16(samples: Float32Array): Int16Array {
  const out = new Int16Array(samples.length);
  for (let i = 0; i < samples.length; i++) {
    const s = Math.max(-1, Math.min(1, samples[i]));
    out[i] = Math.round(s * INT16_MAX);
  }
  return out;
}

/**
 * Wrap float samples in a PCM WAV file (16-bit, little-endian)
 */
export function encodeWav(samples: Float32Array, sampleRate: number, channels = 1): Buffer {
  const pcm = floatToInt16(samples);
  const byteRate = sampleRate * channels * BITS_PER_SAMPLE / 8;
  const blockAlign = channels * BITS_PER_SAMPLE / 8;
  const dataSize = pcm.length * 2;

  const wav = Buffer.alloc(HEADER_SIZE + dataSize);

  // RIFF header
  wav.write('RIFF', 0);
  wav.writeUInt32LE(HEADER_SIZE + dataSize - 8, 4);
  wav.write('WAVE', 8);

  // fmt subchunk
  wav.write('fmt ', 12);
  wav.writeUInt32LE(16, 16); // Subchunk1Size (16 for PCM)
  wav.writeUInt16LE(1, 20);  // AudioFormat (1 for PCM)
  wav.writeUInt16LE(channels, 22);
  wav.writeUInt32LE(sampleRate, 24);
  wav.writeUInt32LE(byteRate, 28);
  wav.writeUInt16LE(blockAlign, 32);
  wav.writeUInt16LE(BITS_PER_SAMPLE, 34);

  // data subchunk
  wav.write('data', 36);
  wav.writeUInt32LE(dataSize, 40);

  for (let i = 0; i < pcm.length; i++) {
    wav.writeInt16LE(pcm[i], HEADER_SIZE + i * 2);
  }

  return wav;
}

type ChunkInfo = { id: string; offset: number; size: number };

function* chunks(buffer: Buffer): Generator<ChunkInfo> {
  let offset = 12;
  while (offset + 8 <= buffer.length) {
    const id = buffer.toString('ascii', offset, offset + 4);
    const size = buffer.readUInt32LE(offset + 4);
    yield { id, offset: offset + 8, size };
    // Chunks are word-aligned
    offset += 8 + size + (size % 2);
  }
}

function isRiffWave(buffer: Buffer): boolean {
  return (
    buffer.length >= 12 &&
    buffer.toString('ascii', 0, 4) === 'RIFF' &&
    buffer.toString('ascii', 8, 12) === 'WAVE'
  );
}

/**
 * Byte offset of the sample data in a WAV buffer, or null when the buffer does not
 * (yet) contain a complete header. Piped recorders write 0 or 0xFFFFFFFF as the data
 * size, so only the position is trusted here.
 */
export function findDataOffset(buffer: Buffer): number | null {
  if (!isRiffWave(buffer)) return null;
  for (const chunk of chunks(buffer)) {
    if (chunk.id === 'data') return chunk.offset;
  }
  return null;
}

export function decodeWav(buffer: Buffer): DecodedWav {
  if (!isRiffWave(buffer)) {
    throw new Error('Not a RIFF/WAVE buffer');
  }

  let sampleRate = 0;
  let channels = 0;
  let data: Buffer | null = null;

  for (const chunk of chunks(buffer)) {
    if (chunk.id === 'fmt ') {
      const format = buffer.readUInt16LE(chunk.offset);
      const bits = buffer.readUInt16LE(chunk.offset + 14);
      if (format !== 1 || bits !== BITS_PER_SAMPLE) {
        throw new Error(`Unsupported WAV encoding (format ${format}, ${bits} bits)`);
      }
      channels = buffer.readUInt16LE(chunk.offset + 2);
      sampleRate = buffer.readUInt32LE(chunk.offset + 4);
    } else if (chunk.id === 'data') {
      data = buffer.subarray(chunk.offset, Math.min(buffer.length, chunk.offset + chunk.size));
    }
  }

  if (!sampleRate || !data) {
    throw new Error('WAV buffer is missing its fmt or data chunk');
  }

  const count = Math.floor(data.length / 2);
  const samples = new Float32Array(count);
  for (let i = 0; i < count; i++) {
    samples[i] = data.readInt16LE(i * 2) / INT16_MAX;
  }

  return { sampleRate, channels, samples };
}
