import { Chip8CPU, type CPUOptions } from '@core/cpu/cpu';
import { CpuFault } from '@core/cpu/errors';
import { parseRom } from '@core/cart/rom';
import { emptyKeypad, type KeypadState } from '@core/input/keypad';
import { crc32Hex } from '@utils/crc32';

export interface RunResult {
  cycles: number;
  reason: 'halt' | 'fault' | 'timeout';
  message?: string;
  framebufferCrc: string;
  cpu: Chip8CPU;
}

export interface RunOptions extends CPUOptions {
  maxCycles: number;
  // Timer ticks happen once per this many cycles (10 approximates 600 Hz against 60 Hz)
  cyclesPerTick?: number;
  keypad?: (cycle: number) => KeypadState;
}

// Run without host devices until the program parks on a jump-to-self, faults, or runs out of cycles
export function runRom(buffer: Uint8Array, opts: RunOptions): RunResult {
  const rom = parseRom(buffer);
  const cpu = new Chip8CPU(opts);
  cpu.load(rom.bytes);
  const perTick = Math.max(1, Math.floor(opts.cyclesPerTick ?? 10));
  const idle = emptyKeypad();

  let cycles = 0;
  const result = (reason: RunResult['reason'], message?: string): RunResult =>
    ({ cycles, reason, message, framebufferCrc: crc32Hex(cpu.display.snapshot()), cpu });

  while (cycles < opts.maxCycles) {
    const pc = cpu.pc;
    try {
      const out = cpu.cycle(opts.keypad ? opts.keypad(cycles) : idle);
      cycles++;
      if (out.instruction?.kind === 'jump' && out.instruction.addr === pc) {
        return result('halt', `jump to self at $${pc.toString(16).toUpperCase().padStart(4, '0')}`);
      }
    } catch (e) {
      if (e instanceof CpuFault) return result('fault', e.message);
      throw e;
    }
    if (cycles % perTick === 0) cpu.tickTimers();
  }
  return result('timeout');
}
