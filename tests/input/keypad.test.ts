import { describe, it, expect } from 'vitest';
import { KEY_MAP, emptyKeypad, firstPressed, formatKeypad, hexKeyFor, keypadOf } from '@core/input/keypad';

describe('keypad', () => {
  it('maps the 4x4 keyboard block onto the hex keypad', () => {
    expect(Object.keys(KEY_MAP)).toHaveLength(16);
    expect(new Set(Object.values(KEY_MAP)).size).toBe(16);
    expect(hexKeyFor('1')).toBe(0x1);
    expect(hexKeyFor('4')).toBe(0xC);
    expect(hexKeyFor('Q')).toBe(0x4);
    expect(hexKeyFor('x')).toBe(0x0);
    expect(hexKeyFor('v')).toBe(0xF);
    expect(hexKeyFor('p')).toBeNull();
  });

  it('keypadOf masks to 16 keys', () => {
    const k = keypadOf(0x15);
    expect(k).toHaveLength(16);
    expect(k[5]).toBe(true);
    expect(k.filter(Boolean)).toHaveLength(1);
  });

  it('firstPressed picks the lowest index', () => {
    expect(firstPressed(emptyKeypad())).toBeNull();
    expect(firstPressed(keypadOf(0xE, 0x3, 0x9))).toBe(3);
  });

  it('formats in physical layout order', () => {
    expect(formatKeypad(keypadOf(0x1, 0xF))).toBe('1:1 2:0 3:0 C:0 4:0 5:0 6:0 D:0 7:0 8:0 9:0 E:0 A:0 0:0 B:0 F:1');
  });
});
