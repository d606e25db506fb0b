import path from 'node:path';
import { writePng } from '@host/png';

/**
 * Numbered PNG captures of the live screen: `<dir>/<rom>-1.png`, `<rom>-2.png`, ...
 * Each cell is drawn as a `scale` x `scale` block.
 */
export class ScreenshotSaver {
  private count = 0;
  private base: string;

  constructor(private dir: string, romName: string, private scale: number) {
    this.base = romName.replace(/\.[^.]+$/, '') || 'chip8';
  }

  async save(framebuffer: Uint8Array): Promise<string> {
    this.count++;
    const file = path.join(this.dir, `${this.base}-${this.count}.png`);
    await writePng(file, framebuffer, { scale: this.scale });
    return file;
  }
}
