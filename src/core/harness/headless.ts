import { Chip8System, type SystemOptions } from '@core/system/system';

export interface RunResult {
  steps: number;
  frames: number;
  reason: 'halt' | 'error' | 'timeout';
  message?: string;
  system: Chip8System;
}

export interface HeadlessOptions extends SystemOptions {
  maxFrames: number;
  maxSteps?: number;
  keys?: number[]; // held for the whole run
}

// Runs a program frame by frame until it halts on a self-jump, faults, or
// reaches maxFrames or maxSteps.
export function runHeadless(program: ArrayLike<number>, opts: HeadlessOptions): RunResult {
  const system = new Chip8System(program, opts);
  for (const k of opts.keys ?? []) system.keypad.setKey(k, true);

  const maxSteps = opts.maxSteps ?? Number.POSITIVE_INFINITY;
  let steps = 0;
  while (system.frames < opts.maxFrames && steps < maxSteps) {
    const r = system.runFrame(maxSteps - steps);
    steps += r.steps;
    if (r.reason === 'halt') return { steps, frames: system.frames, reason: 'halt', system };
    if (r.reason === 'error') {
      return { steps, frames: system.frames, reason: 'error', message: system.lastError?.message, system };
    }
  }
  return { steps, frames: system.frames, reason: 'timeout', system };
}
