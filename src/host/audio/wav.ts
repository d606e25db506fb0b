import { writeFile } from 'node:fs/promises';

const clamp = (v: number): number => v < -1 ? -1 : (v > 1 ? 1 : v);

export const floatToPCM16 = (f: number): number => Math.round(clamp(f) * 32767);

// RIFF/WAVE, PCM 16-bit little endian; mono input is duplicated when channels = 2
export function encodeWavPCM16(samples: Float32Array, sampleRate: number, channels: 1 | 2 = 1): Buffer {
  const dataBytes = samples.length * channels * 2;
  const out = Buffer.alloc(44 + dataBytes);
  out.write('RIFF', 0);
  out.writeUInt32LE(36 + dataBytes, 4);
  out.write('WAVE', 8);
  out.write('fmt ', 12);
  out.writeUInt32LE(16, 16); // fmt chunk size
  out.writeUInt16LE(1, 20); // PCM
  out.writeUInt16LE(channels, 22);
  out.writeUInt32LE(sampleRate, 24);
  out.writeUInt32LE(sampleRate * channels * 2, 28); // byte rate
  out.writeUInt16LE(channels * 2, 32); // block align
  out.writeUInt16LE(16, 34); // bits per sample
  out.write('data', 36);
  out.writeUInt32LE(dataBytes, 40);
  let off = 44;
  for (const f of samples) {
    const s = floatToPCM16(f);
    for (let c = 0; c < channels; c++) { out.writeInt16LE(s, off); off += 2; }
  }
  return out;
}

export async function writeWav(filePath: string, samples: Float32Array, sampleRate: number, channels: 1 | 2 = 1): Promise<void> {
  await writeFile(filePath, encodeWavPCM16(samples, sampleRate, channels));
}
