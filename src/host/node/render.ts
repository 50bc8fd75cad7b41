import { PNG } from 'pngjs';
import type { Framebuffer } from '@core/video/framebuffer';

const LIT: [number, number, number] = [0xE8, 0xE8, 0xE8];
const DARK: [number, number, number] = [0x10, 0x10, 0x10];

export function renderAscii(fb: Framebuffer, on = '█', off = ' '): string {
  const lines: string[] = [];
  for (let y = 0; y < fb.height; y++) {
    let line = '';
    for (let x = 0; x < fb.width; x++) line += fb.getPixel(x, y) ? on : off;
    lines.push(line);
  }
  return lines.join('\n');
}

export function framebufferToPng(fb: Framebuffer, scale = 8): PNG {
  const W = fb.width * scale, H = fb.height * scale;
  const png = new PNG({ width: W, height: H });
  const pixels = fb.getFrameBuffer();
  for (let y = 0; y < fb.height; y++) {
    for (let x = 0; x < fb.width; x++) {
      const [r, g, b] = pixels[y * fb.width + x] ? LIT : DARK;
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

export function encodePng(fb: Framebuffer, scale = 8): Buffer {
  return PNG.sync.write(framebufferToPng(fb, scale));
}
