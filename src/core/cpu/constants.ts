// Memory map
export const MEMORY_SIZE = 0x1000;
export const FONT_START = 0x000;
export const GLYPH_SIZE = 5;
export const STACK_START = 0x052;
export const STACK_DEPTH = 16;
export const STACK_END = STACK_START + STACK_DEPTH * 2; // exclusive
export const PROGRAM_START = 0x200;
export const MAX_PROGRAM_SIZE = MEMORY_SIZE - PROGRAM_START;

// Display
export const DISPLAY_WIDTH = 64;
export const DISPLAY_HEIGHT = 32;

// Timing
export const TIMER_HZ = 60;
export const DEFAULT_CPU_HZ = 500;

export const FLAG = 0xF;
