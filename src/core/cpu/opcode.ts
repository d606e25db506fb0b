import type { Byte, Word } from './types';

/*
  Opcode anatomy: four nibbles, c x y n

    c    bits 15..12  group
    x    bits 11..8   register
    y    bits 7..4    register
    n    bits 3..0    nibble (sprite height, ALU selector)
    kk   bits 7..0    immediate byte
    nnn  bits 11..0   address
*/
export const opC = (op: Word): number => (op & 0xF000) >>> 12;
export const opX = (op: Word): number => (op & 0x0F00) >>> 8;
export const opY = (op: Word): number => (op & 0x00F0) >>> 4;
export const opN = (op: Word): number => op & 0x000F;
export const opKK = (op: Word): Byte => op & 0x00FF;
export const opNNN = (op: Word): Word => op & 0x0FFF;

type RegReg = { x: number; y: number };
type RegImm = { x: number; kk: Byte };
type Reg = { x: number };
type Addr = { addr: Word };

export type Instruction =
  | ({ kind: 'sys' } & Addr)
  | { kind: 'cls' }
  | { kind: 'ret' }
  | ({ kind: 'jump' } & Addr)
  | ({ kind: 'call' } & Addr)
  | ({ kind: 'skip-eq-imm' } & RegImm)
  | ({ kind: 'skip-ne-imm' } & RegImm)
  | ({ kind: 'skip-eq-reg' } & RegReg)
  | ({ kind: 'load-imm' } & RegImm)
  | ({ kind: 'add-imm' } & RegImm)
  | ({ kind: 'load-reg' } & RegReg)
  | ({ kind: 'or' } & RegReg)
  | ({ kind: 'and' } & RegReg)
  | ({ kind: 'xor' } & RegReg)
  | ({ kind: 'add' } & RegReg)
  | ({ kind: 'sub' } & RegReg)
  | ({ kind: 'shr' } & RegReg)
  | ({ kind: 'subn' } & RegReg)
  | ({ kind: 'shl' } & RegReg)
  | ({ kind: 'skip-ne-reg' } & RegReg)
  | ({ kind: 'load-index' } & Addr)
  | ({ kind: 'jump-offset' } & Addr)
  | ({ kind: 'random' } & RegImm)
  | { kind: 'draw'; x: number; y: number; n: number }
  | ({ kind: 'skip-key' } & Reg)
  | ({ kind: 'skip-not-key' } & Reg)
  | ({ kind: 'load-delay' } & Reg)
  | ({ kind: 'wait-key' } & Reg)
  | ({ kind: 'set-delay' } & Reg)
  | ({ kind: 'set-sound' } & Reg)
  | ({ kind: 'add-index' } & Reg)
  | ({ kind: 'load-font' } & Reg)
  | ({ kind: 'bcd' } & Reg)
  | ({ kind: 'store-regs' } & Reg)
  | ({ kind: 'load-regs' } & Reg)
  | { kind: 'unknown'; opcode: Word };

export type InstructionKind = Instruction['kind'];

const ALU: Record<number, 'load-reg' | 'or' | 'and' | 'xor' | 'add' | 'sub' | 'shr' | 'subn' | 'shl'> = {
  0x0: 'load-reg',
  0x1: 'or',
  0x2: 'and',
  0x3: 'xor',
  0x4: 'add',
  0x5: 'sub',
  0x6: 'shr',
  0x7: 'subn',
  0xE: 'shl',
};

const MISC: Record<number, 'load-delay' | 'wait-key' | 'set-delay' | 'set-sound' | 'add-index' | 'load-font' | 'bcd' | 'store-regs' | 'load-regs'> = {
  0x07: 'load-delay',
  0x0A: 'wait-key',
  0x15: 'set-delay',
  0x18: 'set-sound',
  0x1E: 'add-index',
  0x29: 'load-font',
  0x33: 'bcd',
  0x55: 'store-regs',
  0x65: 'load-regs',
};

// Total: every 16-bit word maps to an instruction, 'unknown' for unassigned patterns
export function decode(word: Word): Instruction {
  const op = word & 0xFFFF;
  const x = opX(op), y = opY(op), n = opN(op), kk = opKK(op), addr = opNNN(op);
  switch (opC(op)) {
    case 0x0:
      if (op === 0x00E0) return { kind: 'cls' };
      if (op === 0x00EE) return { kind: 'ret' };
      return { kind: 'sys', addr };
    case 0x1: return { kind: 'jump', addr };
    case 0x2: return { kind: 'call', addr };
    case 0x3: return { kind: 'skip-eq-imm', x, kk };
    case 0x4: return { kind: 'skip-ne-imm', x, kk };
    case 0x5:
      return n === 0 ? { kind: 'skip-eq-reg', x, y } : { kind: 'unknown', opcode: op };
    case 0x6: return { kind: 'load-imm', x, kk };
    case 0x7: return { kind: 'add-imm', x, kk };
    case 0x8: {
      const kind = ALU[n];
      return kind ? { kind, x, y } : { kind: 'unknown', opcode: op };
    }
    case 0x9:
      return n === 0 ? { kind: 'skip-ne-reg', x, y } : { kind: 'unknown', opcode: op };
    case 0xA: return { kind: 'load-index', addr };
    case 0xB: return { kind: 'jump-offset', addr };
    case 0xC: return { kind: 'random', x, kk };
    case 0xD: return { kind: 'draw', x, y, n };
    case 0xE:
      if (kk === 0x9E) return { kind: 'skip-key', x };
      if (kk === 0xA1) return { kind: 'skip-not-key', x };
      return { kind: 'unknown', opcode: op };
    default: {
      // 0xF
      const kind = MISC[kk];
      return kind ? { kind, x } : { kind: 'unknown', opcode: op };
    }
  }
}
