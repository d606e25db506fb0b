import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { parseRom, type Chip8Rom } from '@core/cart/rom';
import { RomLoadError } from '@core/cpu/errors';

export async function readRomFile(romPath: string): Promise<Chip8Rom> {
  let buf: Buffer;
  try {
    buf = await readFile(romPath);
  } catch (e) {
    throw new RomLoadError(`Cannot read ROM ${romPath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseRom(new Uint8Array(buf), basename(romPath));
}
