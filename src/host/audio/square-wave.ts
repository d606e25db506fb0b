export const TONE_HZ = 440;
export const TONE_VOLUME = 0.2;

/**
 * Fixed-frequency square wave gated by the sound timer: +volume for the first
 * half of each period, -volume for the second, silence while gated off.
 */
export class SquareWave {
  private phase = 0;
  private phaseInc: number;

  constructor(sampleRate: number, private frequency = TONE_HZ, private volume = TONE_VOLUME) {
    this.phaseInc = this.frequency / sampleRate;
  }

  fill(out: Float32Array, on: boolean, start = 0, end = out.length): void {
    for (let i = start; i < end; i++) {
      if (!on) { out[i] = 0; continue; }
      out[i] = this.phase <= 0.5 ? this.volume : -this.volume;
      this.phase = (this.phase + this.phaseInc) % 1;
    }
  }
}

export interface AudioSink {
  setTone(on: boolean): void;
}

// Rings the terminal bell on each silent->audible edge
export class TerminalBell implements AudioSink {
  private on = false;

  constructor(private out: { write(chunk: string): boolean }) {}

  setTone(on: boolean): void {
    if (on && !this.on) this.out.write('\u0007');
    this.on = on;
  }
}
