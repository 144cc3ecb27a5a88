/**
 * CHIP-8 Types
 *
 * The CHIP-8 machine has:
 * - 4K of unified code/data memory ($000-$FFF), programs load at $200
 * - 16 general-purpose 8-bit registers V0-VF (VF doubles as the flag register)
 * - I: 16-bit address register
 * - PC: 16-bit program counter, instructions are 2 bytes, big-endian
 * - A 16-entry call stack of return addresses
 * - Delay and sound timers counting down at 60 Hz
 * - A 64×32 monochrome framebuffer and a 16-key hex keypad
 */

/** Flat byte-addressed storage. */
export interface Memory {
  read(address: number): number;
  write(address: number, value: number): void;
}

export const MEMORY_SIZE = 0x1000;
export const PROGRAM_START = 0x200;
export const FONT_BASE = 0x100;
export const FONT_GLYPH_BYTES = 5;

export const REGISTER_COUNT = 16;
export const STACK_DEPTH = 16;
export const FLAG_REGISTER = 0xf;

export const SCREEN_WIDTH = 64;
export const SCREEN_HEIGHT = 32;
export const SPRITE_WIDTH = 8;

/** The 16 keys of the hex keypad. */
export enum Chip8Key {
  K0 = 0x0, K1, K2, K3,
  K4, K5, K6, K7,
  K8, K9, KA, KB,
  KC, KD, KE, KF,
}

export const KEY_COUNT = 16;

/**
 * Convert an integer to a keypad key. Throws RangeError for anything outside 0-15,
 * so callers never index the key vector with an arbitrary number.
 */
export function toChip8Key(value: number): Chip8Key {
  if (!Number.isInteger(value) || value < 0 || value >= KEY_COUNT) {
    throw new RangeError(`Invalid CHIP-8 key: ${value}`);
  }
  return value;
}

/** Reduce a value to a key the way the skip-if-key opcodes do (mod 16). */
export function keyFromNibble(value: number): Chip8Key {
  return toChip8Key(value & 0xf);
}

/** A 4-bit value (register index, sprite height, key number). */
export type Nibble = number;

/**
 * Extract nibble `index` (0 = most significant) from a 16-bit word.
 * $0123 has nibbles 0, 1, 2, 3 from left to right.
 */
export function nibble(word: number, index: number): Nibble {
  if (index < 0 || index > 3) {
    throw new RangeError(`Nibble index must be in [0, 3], got ${index}`);
  }
  const shift = 4 * (3 - index);
  return (word >> shift) & 0xf;
}

/** Operand fields decoded from an instruction word. */
export interface Operands {
  /** Second nibble, usually a register index. */
  x: Nibble;
  /** Third nibble, usually a register index. */
  y: Nibble;
  /** Low nibble. */
  n: Nibble;
  /** Low byte immediate. */
  kk: number;
  /** Low 12-bit address. */
  nnn: number;
}

export function decodeOperands(word: number): Operands {
  return {
    x: nibble(word, 1),
    y: nibble(word, 2),
    n: nibble(word, 3),
    kk: word & 0xff,
    nnn: word & 0x0fff,
  };
}

/** Rendering collaborator: presents the current framebuffer. */
export interface Renderer {
  present(frame: Framebuffer): void;
}

/** Read-only view of the framebuffer handed to renderers. */
export interface Framebuffer {
  readonly width: number;
  readonly height: number;
  getPixel(x: number, y: number): boolean;
}

/** Monotonic clock returning microseconds. */
export type Clock = () => number;

/** Produces a uniformly distributed byte. */
export type ByteSource = () => number;

/** Source of keypad state for the skip-if-key and wait-for-key opcodes. */
export interface KeyInput {
  isPressed(key: Chip8Key): boolean;
  requestNextKeypress(): Promise<Chip8Key>;
}

/** Countdown timer as seen by the engine. */
export interface CountdownTimer {
  value(): number;
  set(value: number): void;
}

/** Emitted before each instruction executes when a trace hook is installed. */
export interface TraceEvent {
  pc: number;
  word: number;
  name: string;
}

export type TraceCallback = (event: TraceEvent) => void;

export interface Chip8State {
  v: number[];
  i: number;
  pc: number;
  sp: number;
  stack: number[];
  delayTimer: number;
  soundTimer: number;
  halted: boolean;
}
