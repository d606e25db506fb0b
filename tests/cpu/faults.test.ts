import { describe, it, expect } from 'vitest';
import { cpuWithProgram, steps } from '../helpers/cpuh';
import { emptyKeypad } from '@core/input/keypad';
import { CpuFault, MachineError } from '@core/cpu/errors';

function faultOf(fn: () => unknown): CpuFault {
  try {
    fn();
  } catch (e) {
    if (e instanceof CpuFault) return e;
    throw e;
  }
  throw new Error('expected a CpuFault');
}

describe('Fatal faults', () => {
  it('the 17th nested CALL overflows the stack', () => {
    const cpu = cpuWithProgram([0x2200]);
    steps(cpu, 16);
    expect(cpu.stack.depth).toBe(16);
    const f = faultOf(() => cpu.cycle(emptyKeypad()));
    expect(f.kind).toBe('stack-overflow');
    expect(f.pc).toBe(0x200);
    expect(f.opcode).toBe(0x2200);
    expect(f.message).toBe('fault stack-overflow at pc=$0200 opcode=$2200: call stack already holds 16 return addresses');
    expect(f.cause).toBeInstanceOf(MachineError);
  });

  it('RET on an empty stack underflows', () => {
    const cpu = cpuWithProgram([0x00EE]);
    const f = faultOf(() => cpu.cycle(emptyKeypad()));
    expect(f.kind).toBe('stack-underflow');
    expect(f.opcode).toBe(0x00EE);
  });

  it('fetching past $0FFF is an addressing fault without an opcode', () => {
    const cpu = cpuWithProgram([0x1FFF]);
    cpu.cycle(emptyKeypad());
    const f = faultOf(() => cpu.cycle(emptyKeypad()));
    expect(f.kind).toBe('address-out-of-range');
    expect(f.pc).toBe(0xFFF);
    expect(f.opcode).toBeNull();
    expect(f.message).toBe('fault address-out-of-range at pc=$0FFF opcode=$????: read at 4096 outside $0000-$0FFF');
  });

  it('JP V0, nnn can leave memory and faults on the next fetch', () => {
    const cpu = cpuWithProgram([0x60FF, 0xBFFF]);
    steps(cpu, 2);
    expect(cpu.pc).toBe(0x10FE);
    expect(faultOf(() => cpu.cycle(emptyKeypad())).pc).toBe(0x10FE);
  });

  it('sprite rows past $0FFF fault', () => {
    const cpu = cpuWithProgram([0xAFFE, 0xD015]);
    cpu.cycle(emptyKeypad());
    const f = faultOf(() => cpu.cycle(emptyKeypad()));
    expect(f.kind).toBe('address-out-of-range');
    expect(f.pc).toBe(0x202);
    expect(f.opcode).toBe(0xD015);
  });

  it('register store past $0FFF faults', () => {
    const cpu = cpuWithProgram([0xAFFF, 0xF155]);
    cpu.cycle(emptyKeypad());
    expect(faultOf(() => cpu.cycle(emptyKeypad())).kind).toBe('address-out-of-range');
  });
});
