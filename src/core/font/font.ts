import glyphs from './font.json';
import { GLYPH_SIZE } from '@core/cpu/constants';

// Hex digit sprites 0..F, five rows each
export const FONT_DATA: Uint8Array = Uint8Array.from(glyphs);

export const GLYPH_COUNT = FONT_DATA.length / GLYPH_SIZE;
