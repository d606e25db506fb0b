import type { Word } from './types';

export type FaultKind = 'stack-overflow' | 'stack-underflow' | 'address-out-of-range';

const hex4 = (v: number): string => (v & 0xFFFF).toString(16).toUpperCase().padStart(4, '0');

// Raised by memory and the call stack; carries no CPU context
export class MachineError extends Error {
  constructor(readonly kind: FaultKind, message: string) {
    super(message);
    this.name = 'MachineError';
  }
}

// A MachineError surfaced by cycle(), tagged with the instruction that caused it
export class CpuFault extends Error {
  readonly kind: FaultKind;

  constructor(cause: MachineError, readonly pc: Word, readonly opcode: Word | null) {
    const op = opcode === null ? '????' : hex4(opcode);
    super(`fault ${cause.kind} at pc=$${hex4(pc)} opcode=$${op}: ${cause.message}`, { cause });
    this.name = 'CpuFault';
    this.kind = cause.kind;
  }
}

export class RomLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RomLoadError';
  }
}
