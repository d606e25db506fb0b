import { SCREEN_HEIGHT, SCREEN_WIDTH } from '@core/display/framebuffer';

const ESC = '\u001b[';
export const HIDE_CURSOR = `${ESC}?25l`;
export const SHOW_CURSOR = `${ESC}?25h`;
export const CLEAR_SCREEN = `${ESC}2J`;
const HOME = `${ESC}H`;

// Upper/lower pixel pair -> half block glyph
const GLYPHS = [' ', '▄', '▀', '█'];

/**
 * Packs two framebuffer rows into one text line using half blocks, so the
 * 64x32 screen becomes 16 lines of 64 characters.
 */
export function framebufferToText(fb: Uint8Array, width = SCREEN_WIDTH, height = SCREEN_HEIGHT): string[] {
  const lines: string[] = [];
  for (let y = 0; y < height; y += 2) {
    let line = '';
    for (let x = 0; x < width; x++) {
      const top = fb[y * width + x] ? 2 : 0;
      const bottom = y + 1 < height && fb[(y + 1) * width + x] ? 1 : 0;
      line += GLYPHS[top | bottom];
    }
    lines.push(line);
  }
  return lines;
}

export interface RawInput {
  setRawMode(mode: boolean): unknown;
  pause(): unknown;
}

// Undo raw mode and the hidden cursor; safe to call more than once
export function terminalRestorer(input: RawInput, out: { write(chunk: string): boolean }): () => void {
  let restored = false;
  return () => {
    if (restored) return;
    restored = true;
    input.setRawMode(false);
    input.pause();
    out.write(SHOW_CURSOR + '\n');
  };
}

export interface Renderer {
  render(framebuffer: Uint8Array, displayUpdated: boolean): void;
}

export class TerminalRenderer implements Renderer {
  private drawn = false;

  constructor(private out: { write(chunk: string): boolean }, private status: () => string = () => '') {}

  render(framebuffer: Uint8Array, displayUpdated: boolean): void {
    if (!displayUpdated && this.drawn) return;
    const body = framebufferToText(framebuffer).map((l) => `│${l}│`).join('\n');
    const edge = '─'.repeat(SCREEN_WIDTH);
    this.out.write(`${HOME}┌${edge}┐\n${body}\n└${edge}┘\n${this.status()}${ESC}K`);
    this.drawn = true;
  }
}
