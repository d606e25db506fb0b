import type { Word } from './types';
import { MachineError } from './errors';

export const STACK_DEPTH = 16;

export class CallStack {
  private entries: Word[] = [];

  get depth(): number {
    return this.entries.length;
  }

  push(addr: Word): void {
    if (this.entries.length >= STACK_DEPTH) {
      throw new MachineError('stack-overflow', `call stack already holds ${STACK_DEPTH} return addresses`);
    }
    this.entries.push(addr & 0xFFFF);
  }

  pop(): Word {
    const addr = this.entries.pop();
    if (addr === undefined) {
      throw new MachineError('stack-underflow', 'return with an empty call stack');
    }
    return addr;
  }

  peek(): Word | undefined {
    return this.entries[this.entries.length - 1];
  }
}
