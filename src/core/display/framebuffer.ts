export const SCREEN_WIDTH = 64;
export const SCREEN_HEIGHT = 32;
export const SCREEN_AREA = SCREEN_WIDTH * SCREEN_HEIGHT;

// One byte per pixel (0 or 1), row-major
export class Framebuffer {
  readonly width = SCREEN_WIDTH;
  readonly height = SCREEN_HEIGHT;
  private cells = new Uint8Array(SCREEN_AREA);

  reset(): void {
    this.cells.fill(0);
  }

  get(index: number): 0 | 1 {
    this.check(index);
    return this.cells[index] ? 1 : 0;
  }

  set(index: number, value: 0 | 1): void {
    this.check(index);
    this.cells[index] = value;
  }

  // XOR one sprite bit into a cell; true when a lit pixel was switched off
  xorPixel(index: number, bit: 0 | 1): boolean {
    const old = this.get(index);
    this.cells[index] = old ^ bit;
    return old === 1 && bit === 1;
  }

  snapshot(): Uint8Array {
    return this.cells.slice();
  }

  private check(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= SCREEN_AREA) {
      throw new RangeError(`framebuffer index ${index} outside 0..${SCREEN_AREA - 1}`);
    }
  }
}
