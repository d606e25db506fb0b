import type { Byte, Word } from '@core/cpu/types';
import { MachineError, RomLoadError } from '@core/cpu/errors';

export const MEMORY_SIZE = 0x1000;
export const USER_SPACE_START = 0x200;
export const MAX_ROM_SIZE = MEMORY_SIZE - USER_SPACE_START;
export const GLYPH_SIZE = 5;

// Hex digit glyphs 0..F, 4 pixels wide and 5 rows tall, stored at 0x000
export const FONT_SET: readonly Byte[] = [
  0xF0, 0x90, 0x90, 0x90, 0xF0, // 0
  0x20, 0x60, 0x20, 0x20, 0x70, // 1
  0xF0, 0x10, 0xF0, 0x80, 0xF0, // 2
  0xF0, 0x10, 0xF0, 0x10, 0xF0, // 3
  0x90, 0x90, 0xF0, 0x10, 0x10, // 4
  0xF0, 0x80, 0xF0, 0x10, 0xF0, // 5
  0xF0, 0x80, 0xF0, 0x90, 0xF0, // 6
  0xF0, 0x10, 0x20, 0x40, 0x40, // 7
  0xF0, 0x90, 0xF0, 0x90, 0xF0, // 8
  0xF0, 0x90, 0xF0, 0x10, 0xF0, // 9
  0xF0, 0x90, 0xF0, 0x90, 0x90, // A
  0xE0, 0x90, 0xE0, 0x90, 0xE0, // B
  0xF0, 0x80, 0x80, 0x80, 0xF0, // C
  0xE0, 0x90, 0x90, 0x90, 0xE0, // D
  0xF0, 0x80, 0xF0, 0x80, 0xF0, // E
  0xF0, 0x80, 0xF0, 0x80, 0x80, // F
];

export const fontAddress = (digit: number): Word => (digit & 0x0F) * GLYPH_SIZE;

/**
 * Flat 4KB address space.
 *
 * 0x000-0x04F  font glyphs
 * 0x050-0x1FF  reserved (interpreter area, left zeroed)
 * 0x200-0xFFF  program
 *
 * Addresses are never masked: an access outside 0..0xFFF is a machine fault.
 */
export class Memory {
  private ram = new Uint8Array(MEMORY_SIZE);

  constructor() {
    this.ram.set(FONT_SET, 0);
  }

  read(addr: Word): Byte {
    this.check(addr, 'read');
    return this.ram[addr];
  }

  write(addr: Word, value: Byte): void {
    this.check(addr, 'write');
    this.ram[addr] = value & 0xFF;
  }

  // Copy program bytes to the start of user space
  load(bytes: Uint8Array): void {
    if (USER_SPACE_START + bytes.length > MEMORY_SIZE) {
      throw new RomLoadError(`ROM is ${bytes.length} bytes; at most ${MAX_ROM_SIZE} fit above $0200`);
    }
    this.ram.set(bytes, USER_SPACE_START);
  }

  slice(start: Word, end: Word): Uint8Array {
    return this.ram.slice(start, end);
  }

  private check(addr: Word, op: 'read' | 'write'): void {
    if (!Number.isInteger(addr) || addr < 0 || addr >= MEMORY_SIZE) {
      throw new MachineError('address-out-of-range', `${op} at ${addr} outside $0000-$0FFF`);
    }
  }
}
