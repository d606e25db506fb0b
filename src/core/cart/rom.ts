import { MAX_ROM_SIZE } from '@core/bus/memory';
import { RomLoadError } from '@core/cpu/errors';

// Raw CHIP-8 program image: no header, big-endian opcodes, loaded verbatim at $0200
export interface Chip8Rom {
  bytes: Uint8Array;
  name?: string;
}

export function parseRom(buffer: Uint8Array, name?: string): Chip8Rom {
  if (buffer.length === 0) throw new RomLoadError(`ROM${name ? ` ${name}` : ''} is empty`);
  if (buffer.length > MAX_ROM_SIZE) {
    throw new RomLoadError(`ROM${name ? ` ${name}` : ''} is ${buffer.length} bytes; at most ${MAX_ROM_SIZE} fit above $0200`);
  }
  return { bytes: buffer.slice(), name };
}
