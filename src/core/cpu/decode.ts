import type { Byte, Word } from './types';

// Decoded form of one 2-byte opcode. Field names follow the nibble layout:
// x = bits 8-11, y = bits 4-7, n = bits 0-3, nn = bits 0-7, nnn = bits 0-11.
export type Instruction =
  | { kind: 'CLS' }
  | { kind: 'RET' }
  | { kind: 'JP'; nnn: Word }
  | { kind: 'CALL'; nnn: Word }
  | { kind: 'SE_IMM'; x: number; nn: Byte }
  | { kind: 'SNE_IMM'; x: number; nn: Byte }
  | { kind: 'SE_REG'; x: number; y: number }
  | { kind: 'LD_IMM'; x: number; nn: Byte }
  | { kind: 'ADD_IMM'; x: number; nn: Byte }
  | { kind: 'LD_REG'; x: number; y: number }
  | { kind: 'OR'; x: number; y: number }
  | { kind: 'AND'; x: number; y: number }
  | { kind: 'XOR'; x: number; y: number }
  | { kind: 'ADD_REG'; x: number; y: number }
  | { kind: 'SUB'; x: number; y: number }
  | { kind: 'SHR'; x: number; y: number }
  | { kind: 'SUBN'; x: number; y: number }
  | { kind: 'SHL'; x: number; y: number }
  | { kind: 'SNE_REG'; x: number; y: number }
  | { kind: 'LD_I'; nnn: Word }
  | { kind: 'JP_V0'; nnn: Word }
  | { kind: 'RND'; x: number; nn: Byte }
  | { kind: 'DRW'; x: number; y: number; n: number }
  | { kind: 'SKP'; x: number }
  | { kind: 'SKNP'; x: number }
  | { kind: 'LD_VX_DT'; x: number }
  | { kind: 'LD_KEY'; x: number }
  | { kind: 'LD_DT_VX'; x: number }
  | { kind: 'LD_ST_VX'; x: number }
  | { kind: 'ADD_I'; x: number }
  | { kind: 'LD_FONT'; x: number }
  | { kind: 'BCD'; x: number }
  | { kind: 'STORE'; x: number }
  | { kind: 'LOAD'; x: number };

// Returns null for words that match no pattern
export function decode(opcode: Word): Instruction | null {
  const op = opcode & 0xFFFF;
  const x = (op >> 8) & 0xF;
  const y = (op >> 4) & 0xF;
  const n = op & 0xF;
  const nn = op & 0xFF;
  const nnn = op & 0xFFF;

  switch (op & 0xF000) {
    case 0x0000:
      if (op === 0x00E0) return { kind: 'CLS' };
      if (op === 0x00EE) return { kind: 'RET' };
      return null;
    case 0x1000: return { kind: 'JP', nnn };
    case 0x2000: return { kind: 'CALL', nnn };
    case 0x3000: return { kind: 'SE_IMM', x, nn };
    case 0x4000: return { kind: 'SNE_IMM', x, nn };
    case 0x5000: return n === 0 ? { kind: 'SE_REG', x, y } : null;
    case 0x6000: return { kind: 'LD_IMM', x, nn };
    case 0x7000: return { kind: 'ADD_IMM', x, nn };
    case 0x8000:
      switch (n) {
        case 0x0: return { kind: 'LD_REG', x, y };
        case 0x1: return { kind: 'OR', x, y };
        case 0x2: return { kind: 'AND', x, y };
        case 0x3: return { kind: 'XOR', x, y };
        case 0x4: return { kind: 'ADD_REG', x, y };
        case 0x5: return { kind: 'SUB', x, y };
        case 0x6: return { kind: 'SHR', x, y };
        case 0x7: return { kind: 'SUBN', x, y };
        case 0xE: return { kind: 'SHL', x, y };
        default: return null;
      }
    case 0x9000: return n === 0 ? { kind: 'SNE_REG', x, y } : null;
    case 0xA000: return { kind: 'LD_I', nnn };
    case 0xB000: return { kind: 'JP_V0', nnn };
    case 0xC000: return { kind: 'RND', x, nn };
    case 0xD000: return { kind: 'DRW', x, y, n };
    case 0xE000:
      if (nn === 0x9E) return { kind: 'SKP', x };
      if (nn === 0xA1) return { kind: 'SKNP', x };
      return null;
    case 0xF000:
      switch (nn) {
        case 0x07: return { kind: 'LD_VX_DT', x };
        case 0x0A: return { kind: 'LD_KEY', x };
        case 0x15: return { kind: 'LD_DT_VX', x };
        case 0x18: return { kind: 'LD_ST_VX', x };
        case 0x1E: return { kind: 'ADD_I', x };
        case 0x29: return { kind: 'LD_FONT', x };
        case 0x33: return { kind: 'BCD', x };
        case 0x55: return { kind: 'STORE', x };
        case 0x65: return { kind: 'LOAD', x };
        default: return null;
      }
    default:
      return null;
  }
}
