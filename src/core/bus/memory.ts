import type { Byte, Word } from '@core/cpu/types';
import { FONT_START, MEMORY_SIZE, PROGRAM_START } from '@core/cpu/constants';
import { OutOfBoundsError } from '@core/cpu/errors';

// Flat 4 KiB store. The interpreter area below PROGRAM_START holds the font
// table and the call stack; programs load at PROGRAM_START.
export class Memory {
  private ram: Uint8Array;

  constructor(size: number = MEMORY_SIZE) {
    this.ram = new Uint8Array(size);
  }

  get size(): number { return this.ram.length; }

  loadFont(bytes: ArrayLike<number>): void {
    this.writeRange(FONT_START, bytes);
  }

  loadProgram(bytes: ArrayLike<number>): void {
    this.writeRange(PROGRAM_START, bytes);
  }

  read(addr: Word): Byte {
    this.check(addr, 1);
    return this.ram[addr];
  }

  write(addr: Word, value: Byte): void {
    this.check(addr, 1);
    this.ram[addr] = value & 0xFF;
  }

  // Big-endian 16-bit read (opcodes and stack entries)
  read16(addr: Word): Word {
    this.check(addr, 2);
    return (this.ram[addr] << 8) | this.ram[addr + 1];
  }

  write16(addr: Word, value: Word): void {
    this.check(addr, 2);
    this.ram[addr] = (value >> 8) & 0xFF;
    this.ram[addr + 1] = value & 0xFF;
  }

  // Returns a copy; callers may keep it across later writes
  readRange(addr: Word, length: number): Uint8Array {
    this.check(addr, length);
    return this.ram.slice(addr, addr + length);
  }

  writeRange(addr: Word, bytes: ArrayLike<number>): void {
    this.check(addr, bytes.length);
    for (let k = 0; k < bytes.length; k++) this.ram[addr + k] = bytes[k] & 0xFF;
  }

  private check(addr: number, length: number): void {
    if (!Number.isInteger(addr) || !Number.isInteger(length) || addr < 0 || length < 0 || addr + length > this.ram.length) {
      throw new OutOfBoundsError(addr, length, this.ram.length);
    }
  }
}
