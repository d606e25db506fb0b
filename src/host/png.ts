import fs from 'node:fs';
import path from 'node:path';
import { PNG } from 'pngjs';
import { SCREEN_HEIGHT, SCREEN_WIDTH } from '@core/display/framebuffer';

export type RGB = [number, number, number];

export interface PngOptions {
  scale?: number;
  foreground?: RGB;
  background?: RGB;
}

// Each framebuffer cell becomes a scale x scale block
export function framebufferToPng(fb: Uint8Array, opts: PngOptions = {}): PNG {
  const scale = Math.max(1, Math.floor(opts.scale ?? 10));
  const fg = opts.foreground ?? [255, 255, 255];
  const bg = opts.background ?? [0, 0, 0];
  const W = SCREEN_WIDTH * scale, H = SCREEN_HEIGHT * scale;
  const png = new PNG({ width: W, height: H });
  for (let y = 0; y < SCREEN_HEIGHT; y++) {
    for (let x = 0; x < SCREEN_WIDTH; x++) {
      const [r, g, b] = fb[y * SCREEN_WIDTH + x] ? fg : bg;
      for (let dy = 0; dy < scale; dy++) {
        const oy = (y * scale + dy) * W;
        for (let dx = 0; dx < scale; dx++) {
          const o = (oy + (x * scale + dx)) << 2;
          png.data[o + 0] = r;
          png.data[o + 1] = g;
          png.data[o + 2] = b;
          png.data[o + 3] = 255;
        }
      }
    }
  }
  return png;
}

export async function writePng(outPath: string, fb: Uint8Array, opts: PngOptions = {}): Promise<void> {
  const png = framebufferToPng(fb, opts);
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  const stream = fs.createWriteStream(outPath);
  await new Promise<void>((resolve, reject) => {
    stream.on('finish', () => resolve());
    stream.on('error', (e) => reject(e));
    png.pack().pipe(stream);
  });
}
