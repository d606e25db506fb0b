#!/usr/bin/env tsx
/* eslint-disable no-console */
import fs from 'node:fs'
import { Chip8CPU } from '@core/cpu/cpu'
import { CpuFault } from '@core/cpu/errors'
import { parseRom } from '@core/cart/rom'
import { emptyKeypad } from '@core/input/keypad'
import { formatInstruction } from '@utils/disasm'
import { getEnv } from '@utils/env'

function parseArgs() {
  const argv = process.argv.slice(2)
  let rom = getEnv('CHIP8_ROM') || ''
  let max = parseInt(getEnv('TRACE_MAX') || '1000', 10)
  let cyclesPerTick = 10
  for (const a of argv) {
    if (a.startsWith('--max=')) max = parseInt(a.slice(6), 10)
    else if (a.startsWith('--cycles-per-tick=')) cyclesPerTick = Math.max(1, parseInt(a.slice(18), 10) || 10)
    else if (!a.startsWith('-')) rom = a
  }
  if (!Number.isFinite(max) || max <= 0) max = 1000
  return { rom, max, cyclesPerTick }
}

const hex = (v: number, w: number) => v.toString(16).toUpperCase().padStart(w, '0')

const main = async (): Promise<number> => {
  const args = parseArgs()
  if (!args.rom || !fs.existsSync(args.rom)) { console.error(`ROM not found: ${args.rom || '(none)'}`); return 2 }
  const rom = parseRom(new Uint8Array(fs.readFileSync(args.rom)), args.rom)
  const cpu = new Chip8CPU()
  cpu.load(rom.bytes)
  cpu.setTraceHook((pc, opcode, instr) => {
    const s = cpu.getState()
    const regs = s.v.map((v) => hex(v, 2)).join(' ')
    console.log(`${hex(pc, 4)}  ${hex(opcode, 4)}  ${formatInstruction(instr).padEnd(18, ' ')} I:${hex(s.i, 4)} SP:${s.sp} DT:${hex(s.delay, 2)} ST:${hex(s.sound, 2)} V:${regs}`)
  })
  const keypad = emptyKeypad()
  for (let i = 0; i < args.max; i++) {
    try {
      cpu.cycle(keypad)
    } catch (e) {
      if (e instanceof CpuFault) { console.error(e.message); return 1 }
      throw e
    }
    if (cpu.mode.kind === 'awaiting-key') { console.error(`waiting for key into V${hex(cpu.mode.register, 1)}; trace stops`); return 0 }
    if ((i + 1) % args.cyclesPerTick === 0) cpu.tickTimers()
  }
  return 0
}

main().then((code) => process.exit(code)).catch((e) => { console.error(e); process.exit(1) })
