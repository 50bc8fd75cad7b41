import type { Word } from './types';

const hex = (v: number, width: number) => v.toString(16).toUpperCase().padStart(width, '0');

export class Chip8Error extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class OutOfBoundsError extends Chip8Error {
  constructor(public readonly address: number, public readonly length: number, public readonly size: number) {
    super(`Memory access out of bounds: 0x${hex(address, 3)}+${length} (size ${size})`);
  }
}

export class UnimplementedInstructionError extends Chip8Error {
  constructor(public readonly opcode: Word, public readonly address: Word) {
    super(`Unimplemented instruction 0x${hex(opcode, 4)} at address 0x${hex(address, 3)}`);
  }
}

export type StackFaultKind = 'overflow' | 'underflow';

// Raised when CALL/RET would move the stack pointer outside its window
export class StackFaultError extends Chip8Error {
  constructor(public readonly kind: StackFaultKind, public readonly pointer: Word, public readonly address: Word) {
    super(`Stack ${kind} at address 0x${hex(address, 3)} (sp=0x${hex(pointer, 3)})`);
  }
}
