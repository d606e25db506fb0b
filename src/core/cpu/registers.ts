import type { Byte, Word } from './types';

export const VF = 0xF;

// V0..VF plus the index register I
export class RegisterFile {
  private v = new Uint8Array(16);
  private index: Word = 0;

  get(x: number): Byte {
    return this.v[x & 0xF];
  }

  set(x: number, value: Byte): void {
    this.v[x & 0xF] = value & 0xFF;
  }

  // Flag-producing ALU ops write VF first, then the result, so a result aimed at VF wins
  setWithFlag(x: number, value: Byte, flag: 0 | 1): void {
    this.v[VF] = flag;
    this.v[x & 0xF] = value & 0xFF;
  }

  get i(): Word {
    return this.index;
  }

  set i(value: Word) {
    this.index = value & 0xFFFF;
  }

  toArray(): Byte[] {
    return Array.from(this.v);
  }
}
