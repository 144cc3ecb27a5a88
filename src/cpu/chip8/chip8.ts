/**
 * CHIP-8 Execution Engine
 *
 * Fetch-decode-dispatch over a 4K flat address space:
 * - Instructions are 16-bit big-endian words fetched at PC
 * - PC advances by 2 before the handler runs; jumps, calls, returns and
 *   skips overwrite or adjust it
 * - The engine owns registers, I, PC and the call stack; memory, screen,
 *   keypad and timers are injected collaborators
 *
 * step() is async only because LD Vx, K suspends until the keypad hands
 * over the next key-down. Every other instruction completes synchronously.
 */

import {
  type Memory,
  type KeyInput,
  type CountdownTimer,
  type ByteSource,
  type TraceCallback,
  type Chip8Key,
  MEMORY_SIZE,
  PROGRAM_START,
  REGISTER_COUNT,
  STACK_DEPTH,
  decodeOperands,
} from './types';
import { type Opcode, buildOpcodeTable, decode } from './opcodes';
import { AddressError, DecodeError, StackOverflowError, StackUnderflowError } from './errors';

/** What the engine needs from the framebuffer. */
export interface Screen {
  clear(): void;
  /** XOR an 8-pixel-wide sprite at (x, y). Returns true if any set pixel was cleared. */
  xorSprite(x: number, y: number, rows: Uint8Array): boolean;
  present(): void;
}

export interface Chip8Devices {
  memory: Memory;
  screen: Screen;
  keys: KeyInput;
  delayTimer: CountdownTimer;
  soundTimer: CountdownTimer;
  random: ByteSource;
}

export interface Chip8CpuOptions {
  /** Halt when a JP targets its own address (an idle loop that can never exit). */
  stopOnTightLoop?: boolean;
  onTrace?: TraceCallback;
}

export class Chip8Cpu {
  // Registers
  readonly v = new Uint8Array(REGISTER_COUNT);
  i = 0;
  pc = PROGRAM_START;

  // Call stack; sp is the next free slot
  readonly stack = new Uint16Array(STACK_DEPTH);
  sp = 0;

  halted = false;
  /** True once a tight JP-to-self loop was detected. */
  tightLoop = false;
  instructions = 0;

  /** Address of the instruction currently executing. */
  private current = PROGRAM_START;

  readonly memory: Memory;
  readonly screen: Screen;
  readonly keys: KeyInput;
  readonly delayTimer: CountdownTimer;
  readonly soundTimer: CountdownTimer;
  readonly random: ByteSource;

  private readonly opcodeTable: Opcode[][];
  private readonly stopOnTightLoop: boolean;
  private readonly onTrace: TraceCallback | null;

  constructor(devices: Chip8Devices, options: Chip8CpuOptions = {}) {
    this.memory = devices.memory;
    this.screen = devices.screen;
    this.keys = devices.keys;
    this.delayTimer = devices.delayTimer;
    this.soundTimer = devices.soundTimer;
    this.random = devices.random;
    this.stopOnTightLoop = options.stopOnTightLoop ?? false;
    this.onTrace = options.onTrace ?? null;
    this.opcodeTable = buildOpcodeTable();
  }

  // --- Memory access ---
  checkRange(address: number, length: number, what: string): void {
    if (address < 0 || address + length > MEMORY_SIZE) {
      // Report the first byte that falls outside
      const outside = address < 0 ? address : Math.max(address, MEMORY_SIZE);
      throw new AddressError(outside, this.current, what);
    }
  }

  readByte(address: number): number {
    this.checkRange(address, 1, 'Read');
    return this.memory.read(address);
  }

  writeByte(address: number, value: number): void {
    this.checkRange(address, 1, 'Write');
    this.memory.write(address, value & 0xff);
  }

  // --- Stack operations ---
  push(address: number): void {
    if (this.sp >= STACK_DEPTH) {
      throw new StackOverflowError(this.current);
    }
    this.stack[this.sp] = address;
    this.sp++;
  }

  pop(): number {
    if (this.sp === 0) {
      throw new StackUnderflowError(this.current);
    }
    this.sp--;
    return this.stack[this.sp];
  }

  // --- Flow helpers ---
  /** Skip the next instruction when `condition` holds. */
  skipIf(condition: boolean): void {
    if (condition) {
      this.pc = (this.pc + 2) & 0xffff;
    }
  }

  /**
   * Suspend until the keypad hands over the next key-down.
   * If the wait is abandoned (host halt), PC is rewound so the
   * instruction is reissued when execution resumes.
   */
  async waitForKey(): Promise<Chip8Key> {
    try {
      return await this.keys.requestNextKeypress();
    } catch (err) {
      this.pc = this.current;
      throw err;
    }
  }

  // --- Reset ---
  reset(): void {
    this.v.fill(0);
    this.i = 0;
    this.pc = PROGRAM_START;
    this.current = PROGRAM_START;
    this.stack.fill(0);
    this.sp = 0;
    this.halted = false;
    this.tightLoop = false;
    this.instructions = 0;
  }

  // --- Execute single instruction ---
  async step(): Promise<void> {
    if (this.halted) return;

    const pc = this.pc;
    this.current = pc;
    this.checkRange(pc, 2, 'Instruction fetch');
    const word = (this.memory.read(pc) << 8) | this.memory.read(pc + 1);

    const opcode = decode(this.opcodeTable, word);
    if (!opcode) {
      throw new DecodeError(word, pc);
    }

    if (this.onTrace) {
      this.onTrace({ pc, word, name: opcode.name });
    }

    this.pc = (pc + 2) & 0xffff;
    await opcode.execute(this, decodeOperands(word));
    this.instructions++;

    if (this.stopOnTightLoop && (word & 0xf000) === 0x1000 && this.pc === pc) {
      this.tightLoop = true;
      this.halted = true;
    }
  }

  /** Run up to `maxInstructions` instructions. Returns how many executed. */
  async run(maxInstructions: number): Promise<number> {
    const start = this.instructions;
    while (this.instructions - start < maxInstructions && !this.halted) {
      await this.step();
    }
    return this.instructions - start;
  }

  getPC(): number {
    return this.pc;
  }
}
