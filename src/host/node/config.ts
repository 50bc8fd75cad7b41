import { DEFAULT_CPU_HZ } from '@core/cpu/constants';

export interface HostConfig {
  rom: string | null;
  cpuHz: number;
  maxFrames: number;
  trace: boolean;
  scale: number;
  out: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function getEnv(env: Env, name: string): string | null { const v = env[name]; return v && v.length > 0 ? v : null }

function positiveInt(name: string, raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  return n;
}

// Environment first, then --flag=value arguments on top
export function loadConfig(argv: string[], env: Env): HostConfig {
  let rom = getEnv(env, 'CHIP8_ROM');
  let hz = getEnv(env, 'CHIP8_CPU_HZ') ?? String(DEFAULT_CPU_HZ);
  let frames = getEnv(env, 'CHIP8_MAX_FRAMES') ?? '600';
  let trace = getEnv(env, 'CHIP8_TRACE') === '1';
  let scale = getEnv(env, 'CHIP8_SCALE') ?? '8';
  let out = getEnv(env, 'CHIP8_OUT') ?? 'screenshots/chip8.png';

  for (const a of argv) {
    if (a.startsWith('--rom=')) rom = a.slice(6);
    else if (a.startsWith('--hz=')) hz = a.slice(5);
    else if (a.startsWith('--frames=')) frames = a.slice(9);
    else if (a === '--trace') trace = true;
    else if (a.startsWith('--scale=')) scale = a.slice(8);
    else if (a.startsWith('--out=')) out = a.slice(6);
    else if (!a.startsWith('--')) rom = a;
    else throw new ConfigError(`Unknown argument: ${a}`);
  }

  return {
    rom,
    cpuHz: positiveInt('cpu rate', hz),
    maxFrames: positiveInt('frame count', frames),
    trace,
    scale: positiveInt('scale', scale),
    out,
  };
}
