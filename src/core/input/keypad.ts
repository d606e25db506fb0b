export const KEY_COUNT = 16;

// pressed flags indexed by hex key value 0x0..0xF
export type KeypadState = readonly boolean[];

/*
  COSMAC VIP keypad      PC keyboard
    1 2 3 C              1 2 3 4
    4 5 6 D              Q W E R
    7 8 9 E              A S D F
    A 0 B F              Z X C V
*/
export const KEY_MAP: Readonly<Record<string, number>> = {
  '1': 0x1, '2': 0x2, '3': 0x3, '4': 0xC,
  q: 0x4, w: 0x5, e: 0x6, r: 0xD,
  a: 0x7, s: 0x8, d: 0x9, f: 0xE,
  z: 0xA, x: 0x0, c: 0xB, v: 0xF,
};

export const emptyKeypad = (): boolean[] => new Array<boolean>(KEY_COUNT).fill(false);

export function keypadOf(...keys: number[]): boolean[] {
  const state = emptyKeypad();
  for (const k of keys) state[k & 0xF] = true;
  return state;
}

// Hex key for a physical key name (case-insensitive), or null when unmapped
export function hexKeyFor(name: string): number | null {
  const k = KEY_MAP[name.toLowerCase()];
  return k === undefined ? null : k;
}

// Lowest pressed key index, the order Fx0A resolves simultaneous presses in
export function firstPressed(keypad: KeypadState): number | null {
  for (let k = 0; k < KEY_COUNT; k++) {
    if (keypad[k]) return k;
  }
  return null;
}

// Render like "1:0 2:1 3:0 C:0 ..." in physical layout order
export function formatKeypad(keypad: KeypadState): string {
  const order = [0x1, 0x2, 0x3, 0xC, 0x4, 0x5, 0x6, 0xD, 0x7, 0x8, 0x9, 0xE, 0xA, 0x0, 0xB, 0xF];
  return order.map((k) => `${k.toString(16).toUpperCase()}:${keypad[k] ? 1 : 0}`).join(' ');
}
