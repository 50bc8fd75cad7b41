import type { KeyInput } from '@core/cpu/types';

export const KEY_COUNT = 16;

// Hex keypad laid out as
//   1 2 3 C
//   4 5 6 D
//   7 8 9 E
//   A 0 B F
export class Keypad implements KeyInput {
  private pressed = new Array<boolean>(KEY_COUNT).fill(false);

  setKey(key: number, down: boolean) {
    if (!Keypad.isValidKey(key)) throw new RangeError(`Invalid key: ${key}`);
    this.pressed[key] = down;
  }

  isKeyPressed(key: number): boolean {
    return Keypad.isValidKey(key) && this.pressed[key];
  }

  releaseAll() { this.pressed.fill(false); }

  pressedKeys(): number[] {
    const out: number[] = [];
    for (let k = 0; k < KEY_COUNT; k++) if (this.pressed[k]) out.push(k);
    return out;
  }

  static isValidKey(key: number): boolean {
    return Number.isInteger(key) && key >= 0 && key < KEY_COUNT;
  }
}
