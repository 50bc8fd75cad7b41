import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { readProgram } from '@host/node/program';
import { ConfigError } from '@host/node/config';

describe('program loading', () => {
  const dirs: string[] = [];
  const tmpFile = (bytes: Uint8Array) => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chip8-'));
    dirs.push(dir);
    const file = path.join(dir, 'prog.ch8');
    fs.writeFileSync(file, bytes);
    return file;
  };

  afterEach(() => {
    for (const d of dirs.splice(0)) fs.rmSync(d, { recursive: true, force: true });
  });

  it('reads raw bytes', () => {
    const file = tmpFile(new Uint8Array([0x00, 0xE0, 0x12, 0x02]));
    expect(Array.from(readProgram(file))).toEqual([0x00, 0xE0, 0x12, 0x02]);
  });

  it('rejects missing, empty and oversized programs', () => {
    expect(() => readProgram(null)).toThrow(ConfigError);
    expect(() => readProgram(path.join(os.tmpdir(), 'no-such-program.ch8'))).toThrow(/Program not found/);
    expect(() => readProgram(tmpFile(new Uint8Array(0)))).toThrow(/Program is empty/);
    expect(() => readProgram(tmpFile(new Uint8Array(0xE01)))).toThrow('Program is 3585 bytes, limit is 3584');
  });
});
