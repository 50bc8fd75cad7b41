import { Memory } from '@core/bus/memory';
import { Chip8CPU, type Chip8Options, type StepOutcome } from '@core/cpu/cpu';
import { DEFAULT_CPU_HZ, TIMER_HZ } from '@core/cpu/constants';
import type { Word } from '@core/cpu/types';
import { FONT_DATA } from '@core/font/font';
import { Keypad } from '@core/input/keypad';
import { Framebuffer } from '@core/video/framebuffer';
import { formatTraceLine } from '@utils/trace';

export interface SystemOptions extends Chip8Options {
  cpuHz?: number;
  trace?: boolean;
  font?: ArrayLike<number>; // 16 glyphs x 5 bytes, defaults to the built-in set
}

export interface FrameResult {
  steps: number;
  reason: 'frame' | 'halt' | 'error';
}

type Listener<T> = (arg: T) => void;

// Wires memory, display, keypad and CPU together and plays the host role:
// it receives display/error/halt notifications and slices execution into
// 60 Hz frames with one timer tick each.
export class Chip8System {
  public memory: Memory;
  public framebuffer: Framebuffer;
  public keypad: Keypad;
  public cpu: Chip8CPU;
  public paused = false;
  public lastError: Error | null = null;
  public displayVersion = 0;
  public frames = 0;
  private cpuHz: number;
  private stepCarry = 0;
  private displayListeners: Listener<void>[] = [];
  private errorListeners: Listener<Error>[] = [];
  private haltListeners: Listener<Word>[] = [];

  constructor(program: ArrayLike<number>, opts: SystemOptions = {}) {
    this.cpuHz = opts.cpuHz ?? DEFAULT_CPU_HZ;
    if (!(this.cpuHz > 0) || !Number.isFinite(this.cpuHz)) throw new RangeError(`Invalid CPU rate: ${this.cpuHz}`);
    this.memory = new Memory();
    this.framebuffer = new Framebuffer();
    this.keypad = new Keypad();
    this.cpu = new Chip8CPU(this.memory, this.framebuffer, this.keypad, {
      displayChanged: () => {
        this.displayVersion++;
        for (const fn of this.displayListeners) fn();
      },
      emulationError: (err) => {
        this.lastError = err;
        for (const fn of this.errorListeners) fn(err);
      },
      haltRecommended: (addr) => {
        this.paused = true;
        for (const fn of this.haltListeners) fn(addr);
      },
    }, { random: opts.random });

    this.memory.loadFont(opts.font ?? FONT_DATA);
    this.memory.loadProgram(program);

    const env = typeof process !== 'undefined' ? process.env : undefined;
    if (opts.trace ?? env?.CHIP8_TRACE === '1') {
      // eslint-disable-next-line no-console
      this.cpu.setTraceHook((entry) => console.log(formatTraceLine(entry)));
    }
  }

  onDisplayChanged(fn: Listener<void>) { this.displayListeners.push(fn); }
  onError(fn: Listener<Error>) { this.errorListeners.push(fn); }
  onHalt(fn: Listener<Word>) { this.haltListeners.push(fn); }

  get stepsPerFrame(): number { return this.cpuHz / TIMER_HZ; }

  // Warm restart: registers, timers and screen cleared, program kept
  reset() {
    this.cpu.reset();
    this.keypad.releaseAll();
    this.paused = false;
    this.lastError = null;
    this.stepCarry = 0;
  }

  resume() { this.paused = false; }

  stepInstruction(): StepOutcome {
    return this.cpu.step();
  }

  // Run one 1/60 s slice, at most stepLimit instructions. Errors are recorded
  // in lastError and end the frame.
  runFrame(stepLimit = Number.POSITIVE_INFINITY): FrameResult {
    if (this.cpu.faulted) return { steps: 0, reason: 'error' };
    if (this.paused) return { steps: 0, reason: 'halt' };

    this.stepCarry += this.stepsPerFrame;
    const whole = Math.floor(this.stepCarry);
    this.stepCarry -= whole;
    const budget = Math.min(whole, stepLimit);

    let steps = 0;
    let reason: FrameResult['reason'] = 'frame';
    while (steps < budget) {
      try {
        this.cpu.step();
      } catch (e) {
        if (!(e instanceof Error)) throw e;
        reason = 'error';
        break;
      }
      steps++;
      if (this.paused) { reason = 'halt'; break; }
    }
    this.cpu.tickTimers();
    this.frames++;
    return { steps, reason };
  }
}
