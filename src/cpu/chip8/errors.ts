/**
 * Fatal engine errors. CHIP-8 has no exception mechanism of its own, so each
 * of these terminates the current run and is surfaced to the host.
 */

function hex(value: number, width: number): string {
  return "$" + value.toString(16).toUpperCase().padStart(width, "0");
}

export class Chip8Error extends Error {
  /** Address of the instruction that failed. */
  readonly pc: number;

  constructor(message: string, pc: number) {
    super(`${message} (at PC=${hex(pc, 3)})`);
    this.name = new.target.name;
    this.pc = pc;
  }
}

/** Instruction word matches no opcode pattern. */
export class DecodeError extends Chip8Error {
  readonly word: number;

  constructor(word: number, pc: number) {
    super(`Unknown instruction ${hex(word, 4)}`, pc);
    this.word = word;
  }
}

/** CALL with all 16 frames in use. */
export class StackOverflowError extends Chip8Error {
  constructor(pc: number) {
    super("Cannot CALL when the stack is full", pc);
  }
}

/** RET with an empty stack. */
export class StackUnderflowError extends Chip8Error {
  constructor(pc: number) {
    super("Cannot RET when the stack is empty", pc);
  }
}

/** A read, write, fetch or call target outside $000-$FFF. */
export class AddressError extends Chip8Error {
  readonly address: number;

  constructor(address: number, pc: number, what = "Memory access") {
    super(`${what} outside memory: ${hex(address, 4)}`, pc);
    this.address = address;
  }
}
