import type { Byte } from '@core/cpu/types';

export const TIMER_HZ = 60;

// Delay and sound counters; they only move when the driver calls tick() at 60 Hz
export class Timers {
  delay: Byte = 0;
  sound: Byte = 0;

  tick(): void {
    if (this.delay > 0) this.delay--;
    if (this.sound > 0) this.sound--;
  }

  soundActive(): boolean {
    return this.sound > 0;
  }
}
