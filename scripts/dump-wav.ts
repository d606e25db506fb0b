#!/usr/bin/env tsx
/*
  Render a ROM's sound timer as a 440 Hz square wave into a WAV file.
  Usage:
    tsx scripts/dump-wav.ts <rom_path> [--seconds 5] [--sr 44100] [--hz 600] [--out out.wav]
*/
import { readFile } from 'node:fs/promises'
import { basename, resolve } from 'node:path'
import { Chip8System } from '@core/system/system'
import { parseRom } from '@core/cart/rom'
import { emptyKeypad } from '@core/input/keypad'
import { SquareWave } from '@host/audio/square-wave'
import { writeWav } from '@host/audio/wav'

interface CliOptions { romPath: string; seconds: number; sampleRate: number; hz: number; outPath: string }

const parseArgs = (): CliOptions => {
  const argv = process.argv.slice(2)
  let romPath = ''
  let seconds = 5
  let sampleRate = 44100
  let hz = 600
  let outPath = ''
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i]
    if (a === '--seconds' || a === '-s') { seconds = Math.max(1, Number(argv[++i] || 5)) }
    else if (a === '--sr' || a === '--sample-rate') { sampleRate = Math.max(8000, Number(argv[++i] || 44100)) }
    else if (a === '--hz') { hz = Math.max(1, Number(argv[++i] || 600)) }
    else if (a === '--out' || a === '-o') { outPath = String(argv[++i] || '') }
    else if (!a.startsWith('-')) { romPath = a }
  }
  if (!romPath) {
    console.error('Usage: dump-wav <rom_path> [--seconds 5] [--sr 44100] [--hz 600] [--out out.wav]')
    process.exit(1)
  }
  outPath = outPath ? resolve(outPath) : resolve(`out/${basename(romPath).replace(/\.[^.]+$/, '')}_${sampleRate}Hz_${seconds}s.wav`)
  return { romPath, seconds, sampleRate, hz, outPath }
}

const main = async (): Promise<void> => {
  const opts = parseArgs()
  const rom = parseRom(new Uint8Array(await readFile(resolve(opts.romPath))), basename(opts.romPath))
  const sys = new Chip8System(rom, { hz: opts.hz, maxCatchUpMs: Number.POSITIVE_INFINITY })
  const keypad = emptyKeypad()
  const wave = new SquareWave(opts.sampleRate)
  const total = Math.round(opts.seconds * opts.sampleRate)
  const pcm = new Float32Array(total)
  // Advance emulated time one 60 Hz frame at a time and gate that frame's samples
  const frameMs = 1000 / 60
  let written = 0
  for (let frame = 1; written < total; frame++) {
    const res = sys.advance(frameMs, keypad)
    const end = Math.min(total, Math.round((frame * opts.sampleRate) / 60))
    wave.fill(pcm, res.soundActive, written, end)
    written = end
  }
  await writeWav(opts.outPath, pcm, opts.sampleRate)
  console.log(`WAV written: ${opts.outPath}`)
}

main().catch((e) => { console.error(e); process.exit(1) })
