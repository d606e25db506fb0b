#!/usr/bin/env tsx
/* eslint-disable no-console */
import path from 'node:path';
import { Chip8System } from '@core/system/system';
import { RomLoadError } from '@core/cpu/errors';
import { disassemble, formatLine } from '@utils/disasm';
import { TerminalBell } from '@host/audio/square-wave';
import type { Chip8Rom } from '@core/cart/rom';
import { ConfigError, USAGE, parseConfig, type Chip8Config } from './config';
import { readRomFile } from './rom-file';
import { CLEAR_SCREEN, HIDE_CURSOR, TerminalRenderer, terminalRestorer } from './terminal';
import { HeldKeyboard } from './keyboard';
import { Session } from './session';
import { ScreenshotSaver } from './screenshot';

const FRAME_MS = 1000 / 60;

const main = async (): Promise<number> => {
  let config: Chip8Config;
  try {
    config = parseConfig(process.argv.slice(2));
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    console.error(e.message);
    console.error(USAGE);
    return 2;
  }

  let rom: Chip8Rom;
  try {
    rom = await readRomFile(config.romPath);
  } catch (e) {
    if (!(e instanceof RomLoadError)) throw e;
    console.error(`[main] ${e.message}`);
    return 2;
  }

  if (config.inspect) {
    for (const line of disassemble(rom.bytes)) console.log(formatLine(line));
    return 0;
  }

  if (!process.stdin.isTTY) {
    console.error('[main] stdin is not a terminal; keyboard input needs a TTY');
    return 2;
  }

  const system = new Chip8System(rom, { hz: config.hz });
  const out = process.stdout;
  const shots = new ScreenshotSaver(path.resolve('out'), rom.name ?? 'chip8', config.scale);
  let lastShot = '';
  const status = (): string => (config.debug
    ? s.status()
    : `${rom.name ?? ''} ${config.hz} Hz  [p] screenshot  [esc] quit  ${lastShot}`);
  const renderer = new TerminalRenderer(out, status);
  const s = new Session({
    system,
    renderer,
    audio: new TerminalBell(out),
    keyboard: new HeldKeyboard(),
    now: () => performance.now(),
    debug: config.debug,
    screenshot: (fb) => {
      shots.save(fb)
        .then((file) => { lastShot = `saved ${file}`; })
        .catch((e: unknown) => { lastShot = `screenshot failed: ${e instanceof Error ? e.message : String(e)}`; });
    },
  });

  // An uncaught error skips check() below; the exit hook still hands the terminal back
  const restore = terminalRestorer(process.stdin, out);
  process.once('exit', restore);
  out.write(CLEAR_SCREEN + HIDE_CURSOR);
  renderer.render(system.cpu.display.snapshot(), true);
  process.stdin.setRawMode(true);
  process.stdin.setEncoding('utf8');
  process.stdin.resume();

  return new Promise<number>((resolve) => {
    const onData = (chunk: string): void => {
      s.onInput(chunk);
      check();
    };
    const timer = setInterval(() => {
      s.frame();
      check();
    }, FRAME_MS);
    const check = (): void => {
      const end = s.end;
      if (!end) return;
      clearInterval(timer);
      process.stdin.off('data', onData);
      restore();
      if (end.reason === 'fault') {
        console.error(`[main] ${end.fault.message}`);
        resolve(1);
      } else {
        console.error('[main] CHIP-8 exiting');
        resolve(0);
      }
    };
    process.stdin.on('data', onData);
  });
};

main().then((code) => process.exit(code)).catch((e) => { console.error(e); process.exit(1) });
