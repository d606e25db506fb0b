import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PNG } from 'pngjs';
import { ScreenshotSaver } from '@host/node/screenshot';

describe('ScreenshotSaver', () => {
  it('writes numbered PNGs at the configured scale', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chip8-shot-'));
    const saver = new ScreenshotSaver(dir, 'pong.ch8', 3);
    const fb = new Uint8Array(64 * 32);
    fb[0] = 1;
    const first = await saver.save(fb);
    const second = await saver.save(fb);
    expect(path.basename(first)).toBe('pong-1.png');
    expect(path.basename(second)).toBe('pong-2.png');
    const png = PNG.sync.read(fs.readFileSync(first));
    expect([png.width, png.height]).toEqual([192, 96]);
    expect(Array.from(png.data.subarray((2 * 192 + 2) * 4, (2 * 192 + 2) * 4 + 4))).toEqual([255, 255, 255, 255]);
    expect(Array.from(png.data.subarray(3 * 4, 3 * 4 + 4))).toEqual([0, 0, 0, 255]);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('falls back to a default name', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chip8-shot-'));
    const file = await new ScreenshotSaver(dir, '', 1).save(new Uint8Array(64 * 32));
    expect(path.basename(file)).toBe('chip8-1.png');
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
