// CRC-32/IEEE (reflected polynomial 0xEDB88320), used to fingerprint framebuffers
const POLY = 0xEDB88320;

function buildTable(): Uint32Array {
  const t = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let bit = 0; bit < 8; bit++) c = (c >>> 1) ^ (c & 1 ? POLY : 0);
    t[n] = c >>> 0;
  }
  return t;
}

const TABLE = buildTable();

// Feed more bytes into a running (pre-inverted) register
export function crc32Update(reg: number, bytes: Uint8Array): number {
  let r = reg;
  for (const b of bytes) r = TABLE[(r ^ b) & 0xFF] ^ (r >>> 8);
  return r >>> 0;
}

export const crc32 = (bytes: Uint8Array): number => (crc32Update(0xFFFFFFFF, bytes) ^ 0xFFFFFFFF) >>> 0;

export const crc32Hex = (bytes: Uint8Array): string => crc32(bytes).toString(16).padStart(8, '0');
