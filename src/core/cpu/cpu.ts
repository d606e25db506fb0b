import type { Byte, CPUState, CpuMode, Word } from './types';
import { decode, type Instruction } from './opcode';
import { CpuFault, MachineError } from './errors';
import { RegisterFile } from './registers';
import { CallStack } from './stack';
import { Memory, USER_SPACE_START, fontAddress } from '@core/bus/memory';
import { Framebuffer } from '@core/display/framebuffer';
import { Timers } from '@core/timers/timers';
import { firstPressed, type KeypadState } from '@core/input/keypad';
import { formatInstruction } from '@utils/disasm';
import { envFlag } from '@utils/env';

export interface CycleOutput {
  displayUpdated: boolean;
  // 2048-cell copy; the same object is handed out again until the display changes
  framebuffer: Uint8Array;
  soundActive: boolean;
  // null on a cycle spent waiting for a key
  instruction: Instruction | null;
}

export type TraceHook = (pc: Word, opcode: Word, instr: Instruction) => void;

export interface CPUOptions {
  // Source for Cxkk; must return 0..255
  randomByte?: () => Byte;
}

const hex = (v: number, width: number): string => v.toString(16).toUpperCase().padStart(width, '0');

const defaultRandomByte = (): Byte => Math.floor(Math.random() * 256) & 0xFF;

export class Chip8CPU {
  readonly memory = new Memory();
  readonly registers = new RegisterFile();
  readonly stack = new CallStack();
  readonly display = new Framebuffer();
  readonly timers = new Timers();
  pc: Word = USER_SPACE_START;
  private modeState: CpuMode = { kind: 'running' };
  private randomByte: () => Byte;
  private lastFrame: Uint8Array;
  private traceHook: TraceHook | null = null;
  private tracing: boolean;

  constructor(opts: CPUOptions = {}) {
    this.randomByte = opts.randomByte ?? defaultRandomByte;
    this.lastFrame = this.display.snapshot();
    this.tracing = envFlag('TRACE_CHIP8');
  }

  get mode(): CpuMode {
    return this.modeState;
  }

  // Per-instruction callback for harnesses and the trace script
  setTraceHook(fn: TraceHook | null): void { this.traceHook = fn; }
  // Log every instruction plus sys/unknown warnings to the console
  setTracing(enabled: boolean): void { this.tracing = enabled; }

  load(rom: Uint8Array): void {
    this.memory.load(rom);
  }

  /**
   * Run one step. While waiting on Fx0A the step only polls the keypad: a
   * pressed key completes the wait, otherwise nothing changes.
   *
   * @throws CpuFault on stack overflow/underflow or an out-of-range address
   */
  cycle(keypad: KeypadState): CycleOutput {
    if (this.modeState.kind === 'awaiting-key') {
      const key = firstPressed(keypad);
      if (key !== null) {
        this.registers.set(this.modeState.register, key);
        this.modeState = { kind: 'running' };
      }
      return this.output(false, null);
    }

    const pc = this.pc;
    let opcode: Word | null = null;
    try {
      opcode = (this.memory.read(pc) << 8) | this.memory.read(pc + 1);
      this.pc = pc + 2;
      const instr = decode(opcode);
      if (this.traceHook) this.traceHook(pc, opcode, instr);
      if (this.tracing) {
        // eslint-disable-next-line no-console
        console.log(`[cpu] pc=$${hex(pc, 4)} op=$${hex(opcode, 4)} ${formatInstruction(instr)}`);
      }
      const displayUpdated = this.execute(instr, keypad, pc);
      return this.output(displayUpdated, instr);
    } catch (e) {
      if (e instanceof MachineError) throw new CpuFault(e, pc, opcode);
      throw e;
    }
  }

  tickTimers(): void {
    this.timers.tick();
  }

  soundActive(): boolean {
    return this.timers.soundActive();
  }

  getState(): CPUState {
    return {
      v: this.registers.toArray(),
      i: this.registers.i,
      pc: this.pc,
      sp: this.stack.depth,
      delay: this.timers.delay,
      sound: this.timers.sound,
    };
  }

  // Returns true when the framebuffer changed
  private execute(instr: Instruction, keypad: KeypadState, pc: Word): boolean {
    const r = this.registers;
    switch (instr.kind) {
      case 'sys':
      case 'unknown':
        if (this.tracing) {
          const what = instr.kind === 'sys' ? `legacy SYS $${hex(instr.addr, 3)} ignored` : `unknown opcode $${hex(instr.opcode, 4)} ignored`;
          // eslint-disable-next-line no-console
          console.warn(`[cpu] ${what} at pc=$${hex(pc, 4)}`);
        }
        return false;
      case 'cls':
        this.display.reset();
        return true;
      case 'ret':
        this.pc = this.stack.pop();
        return false;
      case 'jump':
        this.pc = instr.addr;
        return false;
      case 'call':
        this.stack.push(this.pc);
        this.pc = instr.addr;
        return false;
      case 'skip-eq-imm':
        if (r.get(instr.x) === instr.kk) this.skip();
        return false;
      case 'skip-ne-imm':
        if (r.get(instr.x) !== instr.kk) this.skip();
        return false;
      case 'skip-eq-reg':
        if (r.get(instr.x) === r.get(instr.y)) this.skip();
        return false;
      case 'skip-ne-reg':
        if (r.get(instr.x) !== r.get(instr.y)) this.skip();
        return false;
      case 'load-imm':
        r.set(instr.x, instr.kk);
        return false;
      case 'add-imm':
        r.set(instr.x, r.get(instr.x) + instr.kk);
        return false;
      case 'load-reg':
        r.set(instr.x, r.get(instr.y));
        return false;
      case 'or':
        r.set(instr.x, r.get(instr.x) | r.get(instr.y));
        return false;
      case 'and':
        r.set(instr.x, r.get(instr.x) & r.get(instr.y));
        return false;
      case 'xor':
        r.set(instr.x, r.get(instr.x) ^ r.get(instr.y));
        return false;
      case 'add': {
        const sum = r.get(instr.x) + r.get(instr.y);
        r.setWithFlag(instr.x, sum & 0xFF, sum > 0xFF ? 1 : 0);
        return false;
      }
      case 'sub':
        this.subtract(instr.x, r.get(instr.x), r.get(instr.y));
        return false;
      case 'subn':
        this.subtract(instr.x, r.get(instr.y), r.get(instr.x));
        return false;
      case 'shr': {
        const v = r.get(instr.x);
        r.setWithFlag(instr.x, v >>> 1, (v & 0x01) === 0 ? 0 : 1);
        return false;
      }
      case 'shl': {
        const v = r.get(instr.x);
        r.setWithFlag(instr.x, (v << 1) & 0xFF, (v & 0x80) === 0 ? 0 : 1);
        return false;
      }
      case 'load-index':
        r.i = instr.addr;
        return false;
      case 'jump-offset':
        this.pc = instr.addr + r.get(0);
        return false;
      case 'random':
        r.set(instr.x, this.randomByte() & instr.kk);
        return false;
      case 'draw':
        this.draw(instr.x, instr.y, instr.n);
        return true;
      case 'skip-key':
        if (keypad[r.get(instr.x) & 0xF]) this.skip();
        return false;
      case 'skip-not-key':
        if (!keypad[r.get(instr.x) & 0xF]) this.skip();
        return false;
      case 'load-delay':
        r.set(instr.x, this.timers.delay);
        return false;
      case 'wait-key':
        this.modeState = { kind: 'awaiting-key', register: instr.x };
        return false;
      case 'set-delay':
        this.timers.delay = r.get(instr.x);
        return false;
      case 'set-sound':
        this.timers.sound = r.get(instr.x);
        return false;
      case 'add-index':
        r.i = r.i + r.get(instr.x);
        return false;
      case 'load-font':
        r.i = fontAddress(r.get(instr.x));
        return false;
      case 'bcd': {
        const v = r.get(instr.x);
        this.memory.write(r.i, Math.floor(v / 100));
        this.memory.write(r.i + 1, Math.floor(v / 10) % 10);
        this.memory.write(r.i + 2, v % 10);
        return false;
      }
      case 'store-regs':
        for (let k = 0; k <= instr.x; k++) this.memory.write(r.i + k, r.get(k));
        return false;
      case 'load-regs':
        for (let k = 0; k <= instr.x; k++) r.set(k, this.memory.read(r.i + k));
        return false;
      default: {
        const never: never = instr;
        throw new Error(`unhandled instruction ${JSON.stringify(never)}`);
      }
    }
  }

  private skip(): void {
    this.pc += 2;
  }

  // VF = 1 means no borrow occurred
  private subtract(x: number, a: Byte, b: Byte): void {
    this.registers.setWithFlag(x, (a - b) & 0xFF, a < b ? 0 : 1);
  }

  private draw(vx: number, vy: number, rows: number): void {
    const r = this.registers;
    const { width, height } = this.display;
    const x0 = r.get(vx) & (width - 1);
    const y0 = r.get(vy) & (height - 1);
    r.set(0xF, 0);
    for (let row = 0; row < rows; row++) {
      const sprite = this.memory.read(r.i + row);
      const y = (y0 + row) % height;
      for (let col = 0; col < 8; col++) {
        const bit = (sprite >>> (7 - col)) & 1 ? 1 : 0;
        const cell = y * width + ((x0 + col) % width);
        if (this.display.xorPixel(cell, bit)) r.set(0xF, 1);
      }
    }
  }

  private output(displayUpdated: boolean, instruction: Instruction | null): CycleOutput {
    if (displayUpdated) this.lastFrame = this.display.snapshot();
    return { displayUpdated, framebuffer: this.lastFrame, soundActive: this.timers.soundActive(), instruction };
  }
}
