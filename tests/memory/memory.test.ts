import { describe, it, expect } from 'vitest';
import { FONT_SET, MAX_ROM_SIZE, Memory, USER_SPACE_START, fontAddress } from '@core/bus/memory';
import { MachineError, RomLoadError } from '@core/cpu/errors';
import { Chip8CPU } from '@core/cpu/cpu';

describe('Memory layout', () => {
  it('preloads the 80-byte font table and leaves $050 zero', () => {
    const mem = new Memory();
    expect(FONT_SET.length).toBe(80);
    for (let i = 0; i < 0x50; i++) expect(mem.read(i)).toBe(FONT_SET[i]);
    expect(mem.read(0x050)).toBe(0);
    expect(mem.read(0x1FF)).toBe(0);
  });

  it('glyph address of digit d is d*5', () => {
    expect(fontAddress(0x0)).toBe(0);
    expect(fontAddress(0xA)).toBe(50);
    expect(fontAddress(0xF)).toBe(75);
    // glyph for 'A' starts F0 90 F0 90 90
    const mem = new Memory();
    expect(Array.from(mem.slice(50, 55))).toEqual([0xF0, 0x90, 0xF0, 0x90, 0x90]);
  });

  it('loads a 4-byte ROM verbatim at $200..$203', () => {
    const cpu = new Chip8CPU();
    cpu.load(new Uint8Array([0x01, 0x02, 0x03, 0x04]));
    expect(Array.from(cpu.memory.slice(0x200, 0x205))).toEqual([0x01, 0x02, 0x03, 0x04, 0x00]);
    expect(cpu.memory.read(0x000)).toBe(0xF0);
    expect(cpu.memory.read(0x050)).toBe(0);
    expect(cpu.pc).toBe(USER_SPACE_START);
  });

  it('accepts a ROM that exactly fills user space', () => {
    const mem = new Memory();
    const rom = new Uint8Array(MAX_ROM_SIZE).fill(0xAB);
    mem.load(rom);
    expect(mem.read(0xFFF)).toBe(0xAB);
  });

  it('rejects a ROM one byte larger than user space', () => {
    const mem = new Memory();
    expect(() => mem.load(new Uint8Array(MAX_ROM_SIZE + 1))).toThrow(RomLoadError);
  });
});

describe('Memory bounds', () => {
  it('masks written values to 8 bits', () => {
    const mem = new Memory();
    mem.write(0x300, 0x1FF);
    expect(mem.read(0x300)).toBe(0xFF);
  });

  it('never clamps or wraps out-of-range addresses', () => {
    const mem = new Memory();
    expect(() => mem.read(0x1000)).toThrow(MachineError);
    expect(() => mem.read(-1)).toThrow(MachineError);
    expect(() => mem.write(0x1000, 1)).toThrow(MachineError);
    expect(() => mem.read(1.5)).toThrow(MachineError);
    expect(() => mem.read(0x1000)).toThrow('read at 4096 outside $0000-$0FFF');
  });
});
