import { describe, it, expect } from 'vitest';
import { cpuWithProgram, run } from '../helpers/cpuh';

describe('CPU timers', () => {
  it('FX15/FX18 load the timers and FX07 reads the delay timer', () => {
    const { cpu } = cpuWithProgram([0x6103, 0xF115, 0xF118, 0xF207]);
    run(cpu, 3);
    expect(cpu.state.delay).toBe(3);
    expect(cpu.state.sound).toBe(3);
    expect(cpu.isSoundActive()).toBe(true);
    cpu.tickTimers();
    cpu.tickTimers();
    cpu.step();
    expect(cpu.state.v[2]).toBe(1);
  });

  it('ticks count down to zero and stop there', () => {
    const { cpu } = cpuWithProgram([0x6102, 0xF115, 0x6105, 0xF118]);
    run(cpu, 4);
    for (let k = 0; k < 3; k++) cpu.tickTimers();
    expect(cpu.state.delay).toBe(0);
    expect(cpu.state.sound).toBe(2);
    for (let k = 0; k < 5; k++) cpu.tickTimers();
    expect(cpu.state.sound).toBe(0);
    expect(cpu.isSoundActive()).toBe(false);
  });

  it('instructions alone do not move the timers', () => {
    const { cpu } = cpuWithProgram([0x6109, 0xF115, 0x7001, 0x7001, 0x7001]);
    run(cpu, 5);
    expect(cpu.state.delay).toBe(9);
  });
});
