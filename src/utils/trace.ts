import type { Instruction } from '@core/cpu/decode';
import type { TraceEntry } from '@core/cpu/cpu';

const h2 = (v: number) => (v & 0xFF).toString(16).toUpperCase().padStart(2, '0');
const h3 = (v: number) => (v & 0xFFF).toString(16).toUpperCase().padStart(3, '0');
const h4 = (v: number) => (v & 0xFFFF).toString(16).toUpperCase().padStart(4, '0');
const reg = (r: number) => `V${r.toString(16).toUpperCase()}`;

// One-line human description of an instruction, used for trace output
export function describeInstruction(ins: Instruction): string {
  switch (ins.kind) {
    case 'CLS': return 'Clear the screen';
    case 'RET': return 'Return from subroutine';
    case 'JP': return `Jump to 0x${h3(ins.nnn)}`;
    case 'CALL': return `Call subroutine at 0x${h3(ins.nnn)}`;
    case 'SE_IMM': return `Skip if ${reg(ins.x)} == 0x${h2(ins.nn)}`;
    case 'SNE_IMM': return `Skip if ${reg(ins.x)} != 0x${h2(ins.nn)}`;
    case 'SE_REG': return `Skip if ${reg(ins.x)} == ${reg(ins.y)}`;
    case 'LD_IMM': return `${reg(ins.x)} = 0x${h2(ins.nn)}`;
    case 'ADD_IMM': return `${reg(ins.x)} += 0x${h2(ins.nn)} (no carry)`;
    case 'LD_REG': return `${reg(ins.x)} = ${reg(ins.y)}`;
    case 'OR': return `${reg(ins.x)} |= ${reg(ins.y)}`;
    case 'AND': return `${reg(ins.x)} &= ${reg(ins.y)}`;
    case 'XOR': return `${reg(ins.x)} ^= ${reg(ins.y)}`;
    case 'ADD_REG': return `${reg(ins.x)} += ${reg(ins.y)}, VF = carry`;
    case 'SUB': return `${reg(ins.x)} -= ${reg(ins.y)}, VF = no borrow`;
    case 'SHR': return `${reg(ins.x)} >>= 1, VF = shifted out bit`;
    case 'SUBN': return `${reg(ins.x)} = ${reg(ins.y)} - ${reg(ins.x)}, VF = no borrow`;
    case 'SHL': return `${reg(ins.x)} <<= 1, VF = shifted out bit`;
    case 'SNE_REG': return `Skip if ${reg(ins.x)} != ${reg(ins.y)}`;
    case 'LD_I': return `I = 0x${h3(ins.nnn)}`;
    case 'JP_V0': return `Jump to 0x${h3(ins.nnn)} + V0`;
    case 'RND': return `${reg(ins.x)} = random & 0x${h2(ins.nn)}`;
    case 'DRW': return `Draw ${ins.n}-row sprite at (${reg(ins.x)}, ${reg(ins.y)})`;
    case 'SKP': return `Skip if key ${reg(ins.x)} is pressed`;
    case 'SKNP': return `Skip if key ${reg(ins.x)} is not pressed`;
    case 'LD_VX_DT': return `${reg(ins.x)} = delay timer`;
    case 'LD_KEY': return `Wait for keypress into ${reg(ins.x)}`;
    case 'LD_DT_VX': return `Delay timer = ${reg(ins.x)}`;
    case 'LD_ST_VX': return `Sound timer = ${reg(ins.x)}`;
    case 'ADD_I': return `I += ${reg(ins.x)}`;
    case 'LD_FONT': return `I = glyph address of ${reg(ins.x)}`;
    case 'BCD': return `Store BCD of ${reg(ins.x)} at I`;
    case 'STORE': return `Store V0..${reg(ins.x)} at I`;
    case 'LOAD': return `Load V0..${reg(ins.x)} from I`;
  }
}

export function formatTraceLine(entry: TraceEntry): string {
  return `[${h4(entry.opcode)}] 0x${h3(entry.pc)} ${describeInstruction(entry.instruction)}`;
}
