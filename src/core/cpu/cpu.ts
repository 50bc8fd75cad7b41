import type { Byte, CPUState, HostNotifier, KeyInput, Word } from './types';
import { decode, type Instruction } from './decode';
import { Chip8Error, StackFaultError, UnimplementedInstructionError } from './errors';
import { FLAG, FONT_START, GLYPH_SIZE, PROGRAM_START, STACK_END, STACK_START } from './constants';
import { Memory } from '@core/bus/memory';
import { Framebuffer } from '@core/video/framebuffer';
import { KEY_COUNT } from '@core/input/keypad';

export interface TraceEntry {
  pc: Word; // fetch address
  opcode: Word;
  instruction: Instruction;
}

export interface Chip8Options {
  // Byte source for CXNN; defaults to Math.random
  random?: () => Byte;
}

// 'resumed' means a pending key wait was satisfied; no opcode was fetched
export type StepOutcome = 'executed' | 'waiting' | 'resumed';

const defaultRandom = (): Byte => Math.floor(Math.random() * 256) & 0xFF;
const noop = () => {};

function initialState(): CPUState {
  return {
    v: new Uint8Array(16),
    i: 0,
    pc: PROGRAM_START,
    sp: STACK_START,
    delay: 0,
    sound: 0,
    status: 'running',
    keyTarget: 0,
    steps: 0,
  };
}

export class Chip8CPU {
  state: CPUState = initialState();
  private host: HostNotifier;
  private random: () => Byte;
  // Fatal error latched until reset()
  private fault: Chip8Error | null = null;
  private traceHook: ((entry: TraceEntry) => void) | null = null;

  constructor(
    private memory: Memory,
    private framebuffer: Framebuffer,
    private keys: KeyInput,
    host: Partial<HostNotifier> = {},
    opts: Chip8Options = {},
  ) {
    this.host = {
      displayChanged: host.displayChanged ?? noop,
      emulationError: host.emulationError ?? noop,
      haltRecommended: host.haltRecommended ?? noop,
    };
    this.random = opts.random ?? defaultRandom;
    this.framebuffer.setChangeHook(() => this.host.displayChanged());
  }

  // Per-instruction trace callback, invoked once an instruction has completed
  setTraceHook(fn: ((entry: TraceEntry) => void) | null) { this.traceHook = fn; }

  get faulted(): Chip8Error | null { return this.fault; }

  reset() {
    this.state = initialState();
    this.fault = null;
    this.framebuffer.clear();
  }

  snapshot(): CPUState {
    return { ...this.state, v: this.state.v.slice() };
  }

  isSoundActive(): boolean { return this.state.sound > 0; }

  tickTimers() {
    const s = this.state;
    if (s.delay > 0) s.delay--;
    if (s.sound > 0) s.sound--;
  }

  step(): StepOutcome {
    if (this.fault) throw this.fault;
    const s = this.state;

    if (s.status === 'awaiting-key') {
      for (let key = 0; key < KEY_COUNT; key++) {
        if (this.keys.isKeyPressed(key)) {
          s.v[s.keyTarget] = key;
          s.status = 'running';
          return 'resumed';
        }
      }
      return 'waiting';
    }

    const pc = s.pc;
    try {
      const opcode = this.memory.read16(pc);
      const ins = decode(opcode);
      if (!ins) throw new UnimplementedInstructionError(opcode, pc);
      s.pc = (pc + 2) & 0xFFFF;
      this.execute(ins, pc);
      if (this.traceHook) this.traceHook({ pc, opcode, instruction: ins });
      s.steps++;
      return 'executed';
    } catch (e) {
      s.pc = pc;
      if (e instanceof UnimplementedInstructionError || e instanceof StackFaultError) this.fault = e;
      if (e instanceof Error) this.host.emulationError(e);
      throw e;
    }
  }

  private execute(ins: Instruction, fetchPc: Word) {
    const s = this.state;
    const v = s.v;
    switch (ins.kind) {
      case 'CLS':
        this.framebuffer.clear();
        break;
      case 'RET':
        if (s.sp - 2 < STACK_START) throw new StackFaultError('underflow', s.sp, fetchPc);
        s.pc = this.memory.read16(s.sp - 2);
        s.sp -= 2;
        break;
      case 'JP':
        this.jump(ins.nnn, fetchPc);
        break;
      case 'CALL':
        if (s.sp + 2 > STACK_END) throw new StackFaultError('overflow', s.sp, fetchPc);
        this.memory.write16(s.sp, s.pc);
        s.sp += 2;
        s.pc = ins.nnn;
        break;
      case 'SE_IMM':
        if (v[ins.x] === ins.nn) this.skip();
        break;
      case 'SNE_IMM':
        if (v[ins.x] !== ins.nn) this.skip();
        break;
      case 'SE_REG':
        if (v[ins.x] === v[ins.y]) this.skip();
        break;
      case 'LD_IMM':
        v[ins.x] = ins.nn;
        break;
      case 'ADD_IMM':
        v[ins.x] = (v[ins.x] + ins.nn) & 0xFF;
        break;
      case 'LD_REG':
        v[ins.x] = v[ins.y];
        break;
      case 'OR':
        v[ins.x] = v[ins.x] | v[ins.y];
        break;
      case 'AND':
        v[ins.x] = v[ins.x] & v[ins.y];
        break;
      case 'XOR':
        v[ins.x] = v[ins.x] ^ v[ins.y];
        break;
      case 'ADD_REG': {
        const sum = v[ins.x] + v[ins.y];
        v[ins.x] = sum & 0xFF;
        v[FLAG] = sum > 0xFF ? 1 : 0;
        break;
      }
      case 'SUB': {
        const diff = v[ins.x] - v[ins.y];
        v[ins.x] = diff & 0xFF;
        v[FLAG] = diff < 0 ? 0 : 1;
        break;
      }
      case 'SHR':
        // Flag is written first; with x = F the shifted flag wins
        v[FLAG] = v[ins.x] & 0x01;
        v[ins.x] = v[ins.x] >>> 1;
        break;
      case 'SUBN': {
        const diff = v[ins.y] - v[ins.x];
        v[ins.x] = diff & 0xFF;
        v[FLAG] = diff < 0 ? 0 : 1;
        break;
      }
      case 'SHL':
        v[FLAG] = (v[ins.x] & 0x80) >> 7;
        v[ins.x] = (v[ins.x] << 1) & 0xFF;
        break;
      case 'SNE_REG':
        if (v[ins.x] !== v[ins.y]) this.skip();
        break;
      case 'LD_I':
        s.i = ins.nnn;
        break;
      case 'JP_V0':
        this.jump(ins.nnn + v[0], fetchPc);
        break;
      case 'RND':
        v[ins.x] = this.random() & ins.nn;
        break;
      case 'DRW': {
        const sprite = this.memory.readRange(s.i, ins.n);
        const collision = this.framebuffer.drawSprite(v[ins.x], v[ins.y], sprite);
        v[FLAG] = collision ? 1 : 0;
        break;
      }
      case 'SKP':
        if (this.keys.isKeyPressed(v[ins.x])) this.skip();
        break;
      case 'SKNP':
        if (!this.keys.isKeyPressed(v[ins.x])) this.skip();
        break;
      case 'LD_VX_DT':
        v[ins.x] = s.delay;
        break;
      case 'LD_KEY':
        s.keyTarget = ins.x;
        s.status = 'awaiting-key';
        break;
      case 'LD_DT_VX':
        s.delay = v[ins.x];
        break;
      case 'LD_ST_VX':
        s.sound = v[ins.x];
        break;
      case 'ADD_I': {
        const sum = s.i + v[ins.x];
        if (sum > 0xFFF) {
          s.i = sum & 0xFFF;
          v[FLAG] = 1;
        } else {
          s.i = sum;
          v[FLAG] = 0;
        }
        break;
      }
      case 'LD_FONT':
        s.i = FONT_START + v[ins.x] * GLYPH_SIZE;
        break;
      case 'BCD': {
        const value = v[ins.x];
        this.memory.writeRange(s.i, [Math.floor(value / 100), Math.floor(value / 10) % 10, value % 10]);
        break;
      }
      case 'STORE':
        this.memory.writeRange(s.i, v.subarray(0, ins.x + 1));
        break;
      case 'LOAD':
        v.set(this.memory.readRange(s.i, ins.x + 1));
        break;
      default: {
        const unreachable: never = ins;
        throw new Error(`Unhandled instruction ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private skip() { this.state.pc = (this.state.pc + 2) & 0xFFFF; }

  // A jump onto its own fetch address can never make progress
  private jump(target: Word, fetchPc: Word) {
    if (target === fetchPc) this.host.haltRecommended(fetchPc);
    this.state.pc = target & 0xFFFF;
  }
}
