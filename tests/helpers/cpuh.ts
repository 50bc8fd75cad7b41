import { Memory } from '@core/bus/memory';
import { Chip8CPU, type Chip8Options } from '@core/cpu/cpu';
import { FONT_DATA } from '@core/font/font';
import { Keypad } from '@core/input/keypad';
import { Framebuffer } from '@core/video/framebuffer';

// Host events recorded by the test host
export interface HostLog {
  display: number;
  errors: Error[];
  halts: number[];
}

// Split 16-bit opcodes into big-endian program bytes
export function words(...ops: number[]): number[] {
  const out: number[] = [];
  for (const op of ops) out.push((op >> 8) & 0xFF, op & 0xFF);
  return out;
}

export function cpuWithProgram(ops: number[], opts: Chip8Options = {}) {
  const memory = new Memory();
  const framebuffer = new Framebuffer();
  const keypad = new Keypad();
  const log: HostLog = { display: 0, errors: [], halts: [] };
  const cpu = new Chip8CPU(memory, framebuffer, keypad, {
    displayChanged: () => { log.display++; },
    emulationError: (e) => { log.errors.push(e); },
    haltRecommended: (addr) => { log.halts.push(addr); },
  }, opts);
  memory.loadFont(FONT_DATA);
  memory.loadProgram(words(...ops));
  return { cpu, memory, framebuffer, keypad, log };
}

// Run n instructions
export function run(cpu: Chip8CPU, n: number) {
  for (let k = 0; k < n; k++) cpu.step();
}
