import { Chip8CPU, type CPUOptions, type CycleOutput } from '@core/cpu/cpu';
import type { Chip8Rom } from '@core/cart/rom';
import type { KeypadState } from '@core/input/keypad';
import { TIMER_HZ } from '@core/timers/timers';

export const DEFAULT_HZ = 600;

// Whole events due after `ms` at `rate` Hz. The epsilon absorbs the rounding left by
// summing fractional frame times such as 1000/60, which would otherwise floor one short.
const dueAt = (ms: number, rate: number): number => Math.floor((ms * rate) / 1000 + 1e-6);

export interface SystemOptions extends CPUOptions {
  // Instruction rate; timers always run at 60 Hz
  hz?: number;
  // Longest wall-clock gap one advance() will catch up on
  maxCatchUpMs?: number;
}

export interface AdvanceResult {
  cycles: number;
  ticks: number;
  displayUpdated: boolean;
  framebuffer: Uint8Array;
  soundActive: boolean;
}

export class Chip8System {
  readonly cpu: Chip8CPU;
  readonly hz: number;
  private maxCatchUpMs: number;
  // Emulated time and the number of cycles/ticks it has already paid for
  private elapsedMs = 0;
  private cyclesRun = 0;
  private ticksRun = 0;

  constructor(rom: Chip8Rom, opts: SystemOptions = {}) {
    this.cpu = new Chip8CPU(opts);
    this.cpu.load(rom.bytes);
    this.hz = Math.max(1, Math.floor(opts.hz ?? DEFAULT_HZ));
    this.maxCatchUpMs = opts.maxCatchUpMs ?? 250;
  }

  get cycles(): number { return this.cyclesRun; }
  get ticks(): number { return this.ticksRun; }

  stepInstruction(keypad: KeypadState): CycleOutput {
    this.cyclesRun++;
    return this.cpu.cycle(keypad);
  }

  tickTimers(): void {
    this.ticksRun++;
    this.cpu.tickTimers();
  }

  /**
   * Move emulated time forward by `ms` and run every instruction and timer tick
   * that falls due, in time order. Instruction count never drives the timers.
   * A CpuFault from an instruction propagates with the time already consumed.
   */
  advance(ms: number, keypad: KeypadState): AdvanceResult {
    const step = Math.min(Math.max(0, ms), this.maxCatchUpMs);
    this.elapsedMs += step;
    const cyclesDue = dueAt(this.elapsedMs, this.hz);
    const ticksDue = dueAt(this.elapsedMs, TIMER_HZ);
    const startCycles = this.cyclesRun;
    const startTicks = this.ticksRun;
    let displayUpdated = false;
    let framebuffer: Uint8Array | null = null;

    while (this.cyclesRun < cyclesDue || this.ticksRun < ticksDue) {
      // next cycle at (cyclesRun+1)/hz s, next tick at (ticksRun+1)/60 s; ties go to the timer
      const tickFirst = this.ticksRun < ticksDue &&
        (this.cyclesRun >= cyclesDue || (this.ticksRun + 1) * this.hz <= (this.cyclesRun + 1) * TIMER_HZ);
      if (tickFirst) {
        this.tickTimers();
      } else {
        const out = this.stepInstruction(keypad);
        if (out.displayUpdated) displayUpdated = true;
        framebuffer = out.framebuffer;
      }
    }

    return {
      cycles: this.cyclesRun - startCycles,
      ticks: this.ticksRun - startTicks,
      displayUpdated,
      framebuffer: framebuffer ?? this.cpu.display.snapshot(),
      soundActive: this.cpu.soundActive(),
    };
  }
}
