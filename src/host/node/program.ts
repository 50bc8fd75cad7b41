import fs from 'node:fs';
import { MAX_PROGRAM_SIZE } from '@core/cpu/constants';
import { ConfigError } from './config';

// Raw program image from disk; no container format
export function readProgram(file: string | null): Uint8Array {
  if (!file) throw new ConfigError('No program given. Pass --rom=<file> or set CHIP8_ROM');
  if (!fs.existsSync(file)) throw new ConfigError(`Program not found: ${file}`);
  const bytes = new Uint8Array(fs.readFileSync(file));
  if (bytes.length === 0) throw new ConfigError(`Program is empty: ${file}`);
  if (bytes.length > MAX_PROGRAM_SIZE) {
    throw new ConfigError(`Program is ${bytes.length} bytes, limit is ${MAX_PROGRAM_SIZE}: ${file}`);
  }
  return bytes;
}
