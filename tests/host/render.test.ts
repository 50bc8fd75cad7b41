import { describe, it, expect } from 'vitest';
import { PNG } from 'pngjs';
import { Framebuffer } from '@core/video/framebuffer';
import { encodePng, framebufferToPng, renderAscii } from '@host/node/render';

function smallScreen(): Framebuffer {
  const fb = new Framebuffer(4, 2);
  fb.drawSprite(0, 0, [0x90]);
  return fb;
}

describe('host rendering', () => {
  it('renders rows as text', () => {
    expect(renderAscii(smallScreen(), '#', '.')).toBe('#..#\n....');
  });

  it('scales pixels into an RGBA image', () => {
    const png = framebufferToPng(smallScreen(), 2);
    expect(png.width).toBe(8);
    expect(png.height).toBe(4);
    // (1,1) is inside the lit pixel (0,0); (2,0) belongs to the unlit pixel (1,0)
    const at = (x: number, y: number) => Array.from(png.data.subarray((y * 8 + x) * 4, (y * 8 + x) * 4 + 4));
    expect(at(1, 1)).toEqual([0xE8, 0xE8, 0xE8, 255]);
    expect(at(2, 0)).toEqual([0x10, 0x10, 0x10, 255]);
    expect(at(6, 1)).toEqual([0xE8, 0xE8, 0xE8, 255]);
  });

  it('encodes a readable PNG', () => {
    const decoded = PNG.sync.read(encodePng(smallScreen(), 3));
    expect(decoded.width).toBe(12);
    expect(decoded.height).toBe(6);
  });
});
