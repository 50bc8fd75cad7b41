import { describe, it, expect } from 'vitest';
import { cpuWithProgram, run } from '../helpers/cpuh';

const SAMPLES = [0x00, 0x01, 0x0F, 0x7F, 0x80, 0x81, 0xFE, 0xFF];

describe('CPU register loads and arithmetic', () => {
  it('6XNN loads the immediate into every register', () => {
    for (let x = 0; x < 16; x++) {
      for (const nn of SAMPLES) {
        const { cpu } = cpuWithProgram([0x6000 | (x << 8) | nn]);
        cpu.step();
        expect(cpu.state.v[x]).toBe(nn);
      }
    }
  });

  it('7XNN wraps modulo 256 and leaves VF alone', () => {
    for (const a of SAMPLES) {
      for (const nn of SAMPLES) {
        const { cpu } = cpuWithProgram([0x6F55, 0x6100 | a, 0x7100 | nn]);
        run(cpu, 3);
        expect(cpu.state.v[1]).toBe((a + nn) % 256);
        expect(cpu.state.v[0xF]).toBe(0x55);
      }
    }
  });

  it('8XY4 sets VF on carry', () => {
    for (const a of SAMPLES) {
      for (const b of SAMPLES) {
        const { cpu } = cpuWithProgram([0x6100 | a, 0x6200 | b, 0x8124]);
        run(cpu, 3);
        expect(cpu.state.v[1]).toBe((a + b) % 256);
        expect(cpu.state.v[0xF]).toBe(a + b > 255 ? 1 : 0);
        expect(cpu.state.v[2]).toBe(b);
      }
    }
  });

  it('8XY5 clears VF on borrow', () => {
    for (const a of SAMPLES) {
      for (const b of SAMPLES) {
        const { cpu } = cpuWithProgram([0x6100 | a, 0x6200 | b, 0x8125]);
        run(cpu, 3);
        expect(cpu.state.v[1]).toBe((a - b + 256) % 256);
        expect(cpu.state.v[0xF]).toBe(a < b ? 0 : 1);
      }
    }
  });

  it('8XY7 subtracts VX from VY', () => {
    for (const a of SAMPLES) {
      for (const b of SAMPLES) {
        const { cpu } = cpuWithProgram([0x6100 | a, 0x6200 | b, 0x8127]);
        run(cpu, 3);
        expect(cpu.state.v[1]).toBe((b - a + 256) % 256);
        expect(cpu.state.v[0xF]).toBe(b < a ? 0 : 1);
      }
    }
  });

  it('8XY1/2/3 combine registers bitwise', () => {
    const cases: [number, number][] = [[0x8121, 0xEE], [0x8122, 0x88], [0x8123, 0x66]];
    for (const [op, expected] of cases) {
      const { cpu } = cpuWithProgram([0x61CC, 0x62AA, op]);
      run(cpu, 3);
      expect(cpu.state.v[1]).toBe(expected);
    }
  });

  it('8XY0 copies VY into VX', () => {
    const { cpu } = cpuWithProgram([0x62AB, 0x8120]);
    run(cpu, 2);
    expect(cpu.state.v[1]).toBe(0xAB);
  });

  it('8XY6 shifts right and puts the dropped bit in VF', () => {
    const odd = cpuWithProgram([0x6105, 0x8106]);
    run(odd.cpu, 2);
    expect(odd.cpu.state.v[1]).toBe(0x02);
    expect(odd.cpu.state.v[0xF]).toBe(1);

    const even = cpuWithProgram([0x6184, 0x8106]);
    run(even.cpu, 2);
    expect(even.cpu.state.v[1]).toBe(0x42);
    expect(even.cpu.state.v[0xF]).toBe(0);
  });

  it('8XYE shifts left modulo 256 and puts bit 7 in VF', () => {
    const hi = cpuWithProgram([0x6181, 0x810E]);
    run(hi.cpu, 2);
    expect(hi.cpu.state.v[1]).toBe(0x02);
    expect(hi.cpu.state.v[0xF]).toBe(1);

    const lo = cpuWithProgram([0x6141, 0x810E]);
    run(lo.cpu, 2);
    expect(lo.cpu.state.v[1]).toBe(0x82);
    expect(lo.cpu.state.v[0xF]).toBe(0);
  });

  it('flag output overrides the result when VF is the destination of 8XY4', () => {
    const { cpu } = cpuWithProgram([0x6FFF, 0x6101, 0x8F14]);
    run(cpu, 3);
    expect(cpu.state.v[0xF]).toBe(1);
  });

  it('shift result overrides the flag when VF is the destination of 8XY6', () => {
    const { cpu } = cpuWithProgram([0x6F03, 0x8F06]);
    run(cpu, 2);
    // VF = 3 & 1 = 1, then VF = 1 >> 1
    expect(cpu.state.v[0xF]).toBe(0);
  });

  it('CXNN masks the random byte with NN', () => {
    const { cpu } = cpuWithProgram([0xC10F, 0xC2F0], { random: () => 0xAB });
    run(cpu, 2);
    expect(cpu.state.v[1]).toBe(0x0B);
    expect(cpu.state.v[2]).toBe(0xA0);
  });
});
