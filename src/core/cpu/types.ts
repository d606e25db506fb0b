export type Byte = number; // 0..255
export type Word = number; // 0..65535

// Read-only register/timer view, used by traces and the debugger output
export interface CPUState {
  v: Byte[]; // V0..VF
  i: Word;
  pc: Word;
  sp: number; // call stack depth
  delay: Byte;
  sound: Byte;
}

export type CpuMode =
  | { kind: 'running' }
  | { kind: 'awaiting-key'; register: number };
