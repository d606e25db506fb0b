import { describe, it, expect } from 'vitest';
import { SquareWave, TerminalBell } from '@host/audio/square-wave';
import { encodeWavPCM16, floatToPCM16 } from '@host/audio/wav';

describe('SquareWave', () => {
  it('alternates half periods at +/- volume', () => {
    // 4 samples per period
    const wave = new SquareWave(400, 100, 0.5);
    const out = new Float32Array(8);
    wave.fill(out, true);
    expect(Array.from(out)).toEqual([0.5, 0.5, 0.5, -0.5, 0.5, 0.5, 0.5, -0.5]);
  });

  it('is silent while gated off and keeps its phase', () => {
    const wave = new SquareWave(400, 100, 0.5);
    const out = new Float32Array(6);
    wave.fill(out, true, 0, 3);
    wave.fill(out, false, 3, 5);
    wave.fill(out, true, 5, 6);
    expect(Array.from(out)).toEqual([0.5, 0.5, 0.5, 0, 0, -0.5]);
  });
});

describe('TerminalBell', () => {
  it('rings only on a rising edge', () => {
    const writes: string[] = [];
    const bell = new TerminalBell({ write: (c: string) => { writes.push(c); return true; } });
    bell.setTone(true);
    bell.setTone(true);
    bell.setTone(false);
    bell.setTone(true);
    expect(writes).toEqual(['\u0007', '\u0007']);
  });
});

describe('WAV encoding', () => {
  it('converts and clamps samples', () => {
    expect(floatToPCM16(1)).toBe(32767);
    expect(floatToPCM16(-2)).toBe(-32767);
    expect(floatToPCM16(0)).toBe(0);
  });

  it('writes a 44-byte PCM header', () => {
    const buf = encodeWavPCM16(new Float32Array([0, 1]), 8000, 2);
    expect(buf.length).toBe(44 + 8);
    expect(buf.toString('ascii', 0, 4)).toBe('RIFF');
    expect(buf.readUInt32LE(4)).toBe(44);
    expect(buf.toString('ascii', 8, 16)).toBe('WAVEfmt ');
    expect(buf.readUInt16LE(22)).toBe(2);
    expect(buf.readUInt32LE(24)).toBe(8000);
    expect(buf.readUInt32LE(28)).toBe(32000);
    expect(buf.readUInt16LE(32)).toBe(4);
    expect(buf.readUInt32LE(40)).toBe(8);
    expect([buf.readInt16LE(44), buf.readInt16LE(46), buf.readInt16LE(48), buf.readInt16LE(50)]).toEqual([0, 0, 32767, 32767]);
  });
});
