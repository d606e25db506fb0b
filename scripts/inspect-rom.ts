#!/usr/bin/env tsx
/* eslint-disable no-console */
import fs from 'node:fs'
import { parseRom } from '@core/cart/rom'
import { disassemble, formatLine } from '@utils/disasm'

function usage(): never {
  console.error('Usage: tsx scripts/inspect-rom.ts <rom> [--origin=200]')
  process.exit(2)
}

const args = process.argv.slice(2)
const romPath = args.find((a) => !a.startsWith('--'))
if (!romPath) usage()
if (!fs.existsSync(romPath)) {
  console.error(`ROM not found: ${romPath}`)
  process.exit(2)
}
const originArg = args.find((a) => a.startsWith('--origin='))
const origin = originArg ? parseInt(originArg.slice(9), 16) & 0xFFF : 0x200

const rom = parseRom(new Uint8Array(fs.readFileSync(romPath)), romPath)
for (const line of disassemble(rom.bytes, origin)) console.log(formatLine(line))
