import { KEY_COUNT, hexKeyFor } from '@core/input/keypad';

export const DEFAULT_HOLD_MS = 120;

export type KeyboardEvent =
  | { type: 'key'; hex: number }
  | { type: 'quit' }
  | { type: 'step' }
  | { type: 'screenshot' }
  | { type: 'ignored' };

// Terminals report key presses (and auto-repeat) but never releases
export function classifyKey(chunk: string): KeyboardEvent {
  if (chunk === '\u0003' || chunk === '\u001b') return { type: 'quit' };
  if (chunk === ' ') return { type: 'step' };
  if (chunk === 'p' || chunk === 'P') return { type: 'screenshot' };
  const hex = chunk.length === 1 ? hexKeyFor(chunk) : null;
  return hex === null ? { type: 'ignored' } : { type: 'key', hex };
}

/**
 * Keypad fed by terminal input: a press holds the key down for `holdMs`, and
 * auto-repeat keeps refreshing it while the physical key stays down.
 */
export class HeldKeyboard {
  private lastSeen = new Array<number>(KEY_COUNT).fill(Number.NEGATIVE_INFINITY);

  constructor(private holdMs = DEFAULT_HOLD_MS) {}

  press(hex: number, now: number): void {
    this.lastSeen[hex & 0xF] = now;
  }

  snapshot(now: number): boolean[] {
    return this.lastSeen.map((t) => now - t < this.holdMs);
  }
}
