import { describe, it, expect, vi } from 'vitest';
import { Chip8System } from '@core/system/system';
import { CpuFault } from '@core/cpu/errors';
import { emptyKeypad } from '@core/input/keypad';
import { romOf } from '../helpers/cpuh';

const loopRom = () => ({ bytes: romOf([0x1200]) });

describe('Chip8System.advance', () => {
  it('one second at 600 Hz runs 600 cycles and 60 timer ticks', () => {
    const sys = new Chip8System(loopRom(), { hz: 600, maxCatchUpMs: 2000 });
    const res = sys.advance(1000, emptyKeypad());
    expect(res.cycles).toBe(600);
    expect(res.ticks).toBe(60);
    expect(sys.cycles).toBe(600);
    expect(sys.ticks).toBe(60);
  });

  it('carries fractional cycles across calls', () => {
    const sys = new Chip8System(loopRom(), { hz: 600 });
    const counts: number[] = [];
    for (let i = 0; i < 5; i++) counts.push(sys.advance(1, emptyKeypad()).cycles);
    expect(counts).toEqual([0, 1, 0, 1, 1]);
    expect(sys.advance(10, emptyKeypad()).ticks).toBe(0);
    expect(sys.advance(5, emptyKeypad()).ticks).toBe(1);
  });

  it('frame-sized steps of 1000/60 ms tick exactly once per frame', () => {
    const sys = new Chip8System(loopRom(), { hz: 600 });
    const perFrame: Array<[number, number]> = [];
    for (let frame = 0; frame < 600; frame++) {
      const res = sys.advance(1000 / 60, emptyKeypad());
      perFrame.push([res.cycles, res.ticks]);
    }
    expect(perFrame.filter(([c, t]) => c !== 10 || t !== 1)).toEqual([]);
    expect(sys.ticks).toBe(600);
    expect(sys.cycles).toBe(6000);
  });

  it('interleaves ticks between cycles in time order', () => {
    const sys = new Chip8System(loopRom(), { hz: 600 });
    const events: string[] = [];
    sys.cpu.setTraceHook(() => { events.push('c'); });
    vi.spyOn(sys.cpu, 'tickTimers').mockImplementation(() => { events.push('t'); });
    sys.advance(20, emptyKeypad());
    expect(events.join('')).toBe('ccccccccctccc');
  });

  it('a tick due at the same instant as a cycle runs first', () => {
    const sys = new Chip8System(loopRom(), { hz: 60 });
    const events: string[] = [];
    sys.cpu.setTraceHook(() => { events.push('c'); });
    vi.spyOn(sys.cpu, 'tickTimers').mockImplementation(() => { events.push('t'); });
    sys.advance(50, emptyKeypad());
    expect(events.join('')).toBe('tctctc');
  });

  it('clamps long gaps to maxCatchUpMs and ignores negative time', () => {
    const sys = new Chip8System(loopRom(), { hz: 600, maxCatchUpMs: 250 });
    const res = sys.advance(10_000, emptyKeypad());
    expect(res.cycles).toBe(150);
    expect(res.ticks).toBe(15);
    expect(sys.advance(-100, emptyKeypad()).cycles).toBe(0);
  });

  it('timers count down by wall time, not by instructions', () => {
    const sys = new Chip8System({ bytes: romOf([0x6A78, 0xFA15, 0x1204]) }, { hz: 600, maxCatchUpMs: 2000 });
    sys.advance(1000, emptyKeypad());
    expect(sys.cpu.timers.delay).toBe(60);
  });

  it('reports display updates and the current frame', () => {
    const sys = new Chip8System({ bytes: romOf([0x6000, 0xF029, 0xD005, 0x1206]) }, { hz: 600 });
    const first = sys.advance(10, emptyKeypad());
    expect(first.displayUpdated).toBe(true);
    expect(first.framebuffer[0]).toBe(1);
    const second = sys.advance(10, emptyKeypad());
    expect(second.displayUpdated).toBe(false);
    expect(second.framebuffer).toBe(first.framebuffer);
    const idle = sys.advance(0, emptyKeypad());
    expect(idle.cycles).toBe(0);
    expect(Array.from(idle.framebuffer)).toEqual(Array.from(first.framebuffer));
  });

  it('propagates a CpuFault', () => {
    const sys = new Chip8System({ bytes: romOf([0x00EE]) });
    expect(() => sys.advance(100, emptyKeypad())).toThrow(CpuFault);
  });
});
