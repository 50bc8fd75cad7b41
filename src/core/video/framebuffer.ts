import type { Byte } from '@core/cpu/types';
import { DISPLAY_HEIGHT, DISPLAY_WIDTH } from '@core/cpu/constants';

// Monochrome pixel grid, one byte per pixel (0 or 1), row-major.
export class Framebuffer {
  readonly width: number;
  readonly height: number;
  private pixels: Uint8Array;
  private changeHook: (() => void) | null = null;

  constructor(width = DISPLAY_WIDTH, height = DISPLAY_HEIGHT) {
    this.width = width;
    this.height = height;
    this.pixels = new Uint8Array(width * height);
  }

  // Called after every mutation (clear or sprite draw)
  setChangeHook(fn: (() => void) | null) { this.changeHook = fn; }

  clear(): void {
    this.pixels.fill(0);
    this.changed();
  }

  /**
   * XOR a sprite onto the grid. Each byte is one row, most significant bit
   * leftmost; coordinates wrap on both axes instead of clipping.
   * @returns true when at least one lit pixel was turned off
   */
  drawSprite(x: number, y: number, rows: ArrayLike<Byte>): boolean {
    let collision = false;
    for (let row = 0; row < rows.length; row++) {
      const bits = rows[row] & 0xFF;
      if (bits === 0) continue;
      const py = (y + row) % this.height;
      for (let col = 0; col < 8; col++) {
        if ((bits & (0x80 >> col)) === 0) continue;
        const px = (x + col) % this.width;
        const idx = py * this.width + px;
        if (this.pixels[idx] === 1) collision = true;
        this.pixels[idx] ^= 1;
      }
    }
    this.changed();
    return collision;
  }

  getPixel(x: number, y: number): boolean {
    return this.pixels[(y % this.height) * this.width + (x % this.width)] === 1;
  }

  getFrameBuffer(): Readonly<Uint8Array> { return this.pixels; }

  countLit(): number {
    let n = 0;
    for (let k = 0; k < this.pixels.length; k++) n += this.pixels[k];
    return n;
  }

  private changed() {
    if (this.changeHook) this.changeHook();
  }
}
