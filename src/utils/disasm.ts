import type { Word } from '@core/cpu/types';
import { decode, type Instruction } from '@core/cpu/opcode';
import { USER_SPACE_START } from '@core/bus/memory';

export interface DisasmLine {
  addr: Word;
  opcode: Word | null; // null for a trailing odd byte
  text: string;
}

const hex = (v: number, width: number): string => v.toString(16).toUpperCase().padStart(width, '0');
const V = (x: number): string => `V${hex(x, 1)}`;
const addr = (a: number): string => `0x${hex(a, 3)}`;
const byte = (b: number): string => `0x${hex(b, 2)}`;

// Conventional CHIP-8 assembler mnemonics (LD/SE/DRW...)
export function formatInstruction(instr: Instruction): string {
  switch (instr.kind) {
    case 'sys': return `SYS ${addr(instr.addr)}`;
    case 'cls': return 'CLS';
    case 'ret': return 'RET';
    case 'jump': return `JP ${addr(instr.addr)}`;
    case 'call': return `CALL ${addr(instr.addr)}`;
    case 'skip-eq-imm': return `SE ${V(instr.x)}, ${byte(instr.kk)}`;
    case 'skip-ne-imm': return `SNE ${V(instr.x)}, ${byte(instr.kk)}`;
    case 'skip-eq-reg': return `SE ${V(instr.x)}, ${V(instr.y)}`;
    case 'skip-ne-reg': return `SNE ${V(instr.x)}, ${V(instr.y)}`;
    case 'load-imm': return `LD ${V(instr.x)}, ${byte(instr.kk)}`;
    case 'add-imm': return `ADD ${V(instr.x)}, ${byte(instr.kk)}`;
    case 'load-reg': return `LD ${V(instr.x)}, ${V(instr.y)}`;
    case 'or': return `OR ${V(instr.x)}, ${V(instr.y)}`;
    case 'and': return `AND ${V(instr.x)}, ${V(instr.y)}`;
    case 'xor': return `XOR ${V(instr.x)}, ${V(instr.y)}`;
    case 'add': return `ADD ${V(instr.x)}, ${V(instr.y)}`;
    case 'sub': return `SUB ${V(instr.x)}, ${V(instr.y)}`;
    case 'subn': return `SUBN ${V(instr.x)}, ${V(instr.y)}`;
    case 'shr': return `SHR ${V(instr.x)}`;
    case 'shl': return `SHL ${V(instr.x)}`;
    case 'load-index': return `LD I, ${addr(instr.addr)}`;
    case 'jump-offset': return `JP V0, ${addr(instr.addr)}`;
    case 'random': return `RND ${V(instr.x)}, ${byte(instr.kk)}`;
    case 'draw': return `DRW ${V(instr.x)}, ${V(instr.y)}, ${instr.n}`;
    case 'skip-key': return `SKP ${V(instr.x)}`;
    case 'skip-not-key': return `SKNP ${V(instr.x)}`;
    case 'load-delay': return `LD ${V(instr.x)}, DT`;
    case 'wait-key': return `LD ${V(instr.x)}, K`;
    case 'set-delay': return `LD DT, ${V(instr.x)}`;
    case 'set-sound': return `LD ST, ${V(instr.x)}`;
    case 'add-index': return `ADD I, ${V(instr.x)}`;
    case 'load-font': return `LD F, ${V(instr.x)}`;
    case 'bcd': return `LD B, ${V(instr.x)}`;
    case 'store-regs': return `LD [I], ${V(instr.x)}`;
    case 'load-regs': return `LD ${V(instr.x)}, [I]`;
    case 'unknown': return `DW 0x${hex(instr.opcode, 4)}`;
  }
}

// Linear sweep; CHIP-8 has no instruction-length ambiguity, only data mixed into code
export function disassemble(bytes: Uint8Array, origin: Word = USER_SPACE_START): DisasmLine[] {
  const out: DisasmLine[] = [];
  let i = 0;
  for (; i + 1 < bytes.length; i += 2) {
    const opcode = (bytes[i] << 8) | bytes[i + 1];
    out.push({ addr: origin + i, opcode, text: formatInstruction(decode(opcode)) });
  }
  if (i < bytes.length) {
    out.push({ addr: origin + i, opcode: null, text: `DB ${byte(bytes[i])}` });
  }
  return out;
}

// "0200  00E0  CLS"
export function formatLine(line: DisasmLine): string {
  const op = line.opcode === null ? '' : hex(line.opcode, 4);
  return `${hex(line.addr, 4)}  ${op.padEnd(4, ' ')}  ${line.text}`;
}
