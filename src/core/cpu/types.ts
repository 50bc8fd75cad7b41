export type Byte = number; // 0..255
export type Word = number; // 0..65535

export type CPUStatus = 'running' | 'awaiting-key';

export interface CPUState {
  v: Uint8Array; // V0..VF, VF doubles as carry/borrow/collision output
  i: Word; // index register
  pc: Word; // program counter
  sp: Word; // next free stack slot (absolute address)
  delay: Byte;
  sound: Byte;
  status: CPUStatus;
  keyTarget: number; // destination register while awaiting a key
  steps: number; // executed instructions
}

// Capability the core queries for key state (keys 0x0..0xF)
export interface KeyInput {
  isKeyPressed(key: number): boolean;
}

// Signals the core raises towards whoever drives it
export interface HostNotifier {
  displayChanged(): void;
  emulationError(err: Error): void;
  haltRecommended(address: Word): void;
}
