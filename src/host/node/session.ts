import type { Chip8System } from '@core/system/system';
import { CpuFault } from '@core/cpu/errors';
import type { Instruction } from '@core/cpu/opcode';
import { formatKeypad } from '@core/input/keypad';
import { formatInstruction } from '@utils/disasm';
import type { AudioSink } from '@host/audio/square-wave';
import type { Renderer } from './terminal';
import { classifyKey, type HeldKeyboard } from './keyboard';

export type SessionEnd =
  | { reason: 'quit' }
  | { reason: 'fault'; fault: CpuFault };

export interface SessionDeps {
  system: Chip8System;
  renderer: Renderer;
  audio: AudioSink;
  keyboard: HeldKeyboard;
  now: () => number;
  // Single-step: the space key runs one cycle, wall-clock time is ignored
  debug?: boolean;
  // Receives a copy of the current frame when the screenshot key is pressed
  screenshot?: (framebuffer: Uint8Array) => void;
}

/**
 * Glue between the core and the host devices. The host calls frame() on a
 * timer and onInput() for each stdin chunk; the session turns elapsed time
 * into cycles and timer ticks and forwards video and tone state.
 */
export class Session {
  private last: number;
  private ended: SessionEnd | null = null;
  private lastInstr: Instruction | null = null;

  constructor(private deps: SessionDeps) {
    this.last = deps.now();
  }

  get end(): SessionEnd | null { return this.ended; }

  onInput(chunk: string): void {
    if (this.ended) return;
    const ev = classifyKey(chunk);
    switch (ev.type) {
      case 'quit':
        this.finish({ reason: 'quit' });
        break;
      case 'step':
        if (this.deps.debug) this.step();
        break;
      case 'key':
        this.deps.keyboard.press(ev.hex, this.deps.now());
        break;
      case 'screenshot':
        this.deps.screenshot?.(this.deps.system.cpu.display.snapshot());
        break;
      case 'ignored':
        break;
    }
  }

  frame(): void {
    if (this.ended) return;
    const now = this.deps.now();
    const elapsed = now - this.last;
    this.last = now;
    if (this.deps.debug) return;
    const { system, renderer, audio } = this.deps;
    try {
      const res = system.advance(elapsed, this.deps.keyboard.snapshot(now));
      renderer.render(res.framebuffer, res.displayUpdated);
      audio.setTone(res.soundActive);
    } catch (e) {
      this.fail(e);
    }
  }

  // One instruction plus one timer tick, for debug stepping
  step(): void {
    if (this.ended) return;
    const { system, renderer, audio } = this.deps;
    try {
      const out = system.stepInstruction(this.deps.keyboard.snapshot(this.deps.now()));
      system.tickTimers();
      this.lastInstr = out.instruction;
      renderer.render(out.framebuffer, true);
      audio.setTone(system.cpu.soundActive());
    } catch (e) {
      this.fail(e);
    }
  }

  status(): string {
    const s = this.deps.system.cpu.getState();
    const hex = (v: number, w: number): string => v.toString(16).toUpperCase().padStart(w, '0');
    const regs = s.v.map((v, i) => `V${hex(i, 1)}=${hex(v, 2)}`).join(' ');
    const instr = this.lastInstr ? formatInstruction(this.lastInstr) : '-';
    const keys = formatKeypad(this.deps.keyboard.snapshot(this.deps.now()));
    return `pc=$${hex(s.pc, 4)} I=$${hex(s.i, 4)} sp=${s.sp} dt=${s.delay} st=${s.sound} last=${instr}\n${regs}\n${keys}`;
  }

  private fail(e: unknown): void {
    if (!(e instanceof CpuFault)) throw e;
    this.finish({ reason: 'fault', fault: e });
  }

  private finish(end: SessionEnd): void {
    this.ended = end;
    this.deps.audio.setTone(false);
  }
}
