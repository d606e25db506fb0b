#!/usr/bin/env tsx
/* eslint-disable no-console */
import fs from 'node:fs'
import path from 'node:path'
import { runRom } from '@core/harness/headless'
import { writePng } from '@host/png'

function parseArgs() {
  const argv = process.argv.slice(2)
  let rom = ''
  let cycles = 5000
  let scale = 10
  let out = ''
  for (const a of argv) {
    if (a.startsWith('--cycles=')) cycles = Math.max(1, parseInt(a.slice(9), 10) || 5000)
    else if (a.startsWith('--scale=')) scale = Math.max(1, parseInt(a.slice(8), 10) || 10)
    else if (a.startsWith('--out=')) out = a.slice(6)
    else if (!a.startsWith('-')) rom = a
  }
  if (!out && rom) out = path.resolve(`out/${path.basename(rom).replace(/\.[^.]+$/, '')}.png`)
  return { rom, cycles, scale, out }
}

const main = async (): Promise<void> => {
  const args = parseArgs()
  if (!args.rom || !fs.existsSync(args.rom)) {
    console.error('Usage: tsx scripts/screenshot.ts <rom> [--cycles=5000] [--scale=10] [--out=out/rom.png]')
    process.exit(2)
  }
  const res = runRom(new Uint8Array(fs.readFileSync(args.rom)), { maxCycles: args.cycles })
  await writePng(args.out, res.cpu.display.snapshot(), { scale: args.scale })
  console.log(JSON.stringify({ rom: args.rom, cycles: res.cycles, reason: res.reason, message: res.message ?? null, crc: res.framebufferCrc, png: args.out }))
}

main().catch((e) => { console.error(e); process.exit(1) })
