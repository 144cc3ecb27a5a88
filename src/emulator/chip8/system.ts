/**
 * CHIP-8 System Integration
 *
 * Wires together the execution engine, memory, display, keypad and the
 * two 60 Hz timers, and provides the host-facing run loop:
 *   - loadProgram() parses an image and restarts the machine with it
 *   - run()/runFrame() execute instructions until the budget is spent,
 *     the machine halts, or a fatal error occurs
 *   - keyDown()/keyUp() feed the keypad from the input-polling side
 *   - halt() stops the machine, releasing a blocked LD Vx, K
 *
 * Fatal engine errors (decode, stack, addressing) halt the machine, are
 * kept in lastError, and are rethrown to the caller. They never touch the
 * timers or keypad, which the machine owns independently.
 */

import { Chip8Cpu } from '@/cpu/chip8/chip8';
import type { Chip8Key, Chip8State } from '@/cpu/chip8/types';
import { RequestCancelledError } from '@/lib/request-channel';
import { createPrng } from '@/lib/prng';
import {
  type ProgramFileFormat,
  type ParsedProgram,
  ProgramParseError,
  parseProgram,
} from '@/lib/program-parser';
import { type Chip8Config, resolveChip8Config } from './config';
import { Chip8Memory } from './memory';
import { Chip8Display } from './display';
import { Chip8Keypad } from './keypad';
import { Timer60Hz } from './timer';

export type HaltReason = 'halted' | 'tight-loop' | 'error';

export class Chip8System {
  readonly cpu: Chip8Cpu;
  readonly memory: Chip8Memory;
  readonly display: Chip8Display;
  readonly keypad: Chip8Keypad;
  readonly delayTimer: Timer60Hz;
  readonly soundTimer: Timer60Hz;
  private readonly config: Chip8Config;

  /** Why the machine stopped, or null while it can run. */
  haltReason: HaltReason | null = null;
  /** The fatal error that halted the machine, if any. */
  lastError: Error | null = null;
  /** Why the last loadProgram() call failed, if it did. */
  lastLoadError: ProgramParseError | null = null;
  /** Metadata of the program currently loaded. */
  program: ParsedProgram | null = null;

  constructor(config: Partial<Chip8Config> = {}) {
    this.config = resolveChip8Config(config);
    this.memory = new Chip8Memory();
    this.display = new Chip8Display();
    this.display.setRenderer(this.config.renderer);
    this.keypad = new Chip8Keypad();
    this.delayTimer = new Timer60Hz(this.config.clock);
    this.soundTimer = new Timer60Hz(this.config.clock);

    const prng = createPrng(this.config.seed);
    this.cpu = new Chip8Cpu(
      {
        memory: this.memory,
        screen: this.display,
        keys: this.keypad,
        delayTimer: this.delayTimer,
        soundTimer: this.soundTimer,
        random: prng.nextByte,
      },
      {
        stopOnTightLoop: this.config.stopOnTightLoop,
        onTrace: this.config.onTrace,
      }
    );
  }

  get cyclesPerFrame(): number {
    return this.config.cyclesPerFrame;
  }

  /**
   * Parse a program image and restart the machine with it at $200.
   * Returns false, leaving the machine untouched, if the image is malformed
   * or too large.
   */
  loadProgram(data: Uint8Array | string, format?: ProgramFileFormat): boolean {
    let program: ParsedProgram;
    try {
      program = parseProgram(data, format ? { format } : undefined);
    } catch (err) {
      if (err instanceof ProgramParseError) {
        this.lastLoadError = err;
        return false;
      }
      throw err;
    }
    if (!Chip8Memory.fits(program.regions)) {
      this.lastLoadError = new ProgramParseError('Program image does not fit in memory');
      return false;
    }

    this.reset();
    this.memory.loadRegions(program.regions);
    this.cpu.pc = program.entryPoint;
    this.program = program;
    this.lastLoadError = null;
    return true;
  }

  /** Cold reset: clear memory (keeping the font), screen, keys, timers and CPU. */
  reset(): void {
    this.keypad.cancelWait('Machine reset');
    this.keypad.reset();
    this.memory.reset();
    this.display.reset();
    this.delayTimer.set(0);
    this.soundTimer.set(0);
    this.cpu.reset();
    this.haltReason = null;
    this.lastError = null;
    this.program = null;
  }

  /** Execute a single instruction. */
  async step(): Promise<void> {
    await this.run(1);
  }

  /**
   * Execute up to `instructions` instructions. Returns how many executed.
   * Resolves early when the machine halts; rejects with the engine error
   * when execution fails.
   */
  async run(instructions: number): Promise<number> {
    const start = this.cpu.instructions;
    try {
      await this.cpu.run(instructions);
    } catch (err) {
      // A blocked key wait abandoned by halt()/reset() is a clean stop
      if (!(err instanceof RequestCancelledError)) {
        this.cpu.halted = true;
        this.haltReason = 'error';
        this.lastError = err instanceof Error ? err : new Error(String(err));
        throw err;
      }
    }
    if (this.cpu.tightLoop) {
      this.haltReason = 'tight-loop';
    }
    return this.cpu.instructions - start;
  }

  /** Run one 60 Hz frame's worth of instructions. */
  runFrame(): Promise<number> {
    return this.run(this.config.cyclesPerFrame);
  }

  /** Stop the machine. A pending LD Vx, K is abandoned and reissued on resume(). */
  halt(): void {
    this.cpu.halted = true;
    if (this.haltReason === null) {
      this.haltReason = 'halted';
    }
    this.keypad.cancelWait('Machine halted');
  }

  /** Continue after halt(). Machines stopped by an error or tight loop stay stopped. */
  resume(): void {
    if (this.haltReason !== 'halted') return;
    this.cpu.halted = false;
    this.haltReason = null;
  }

  isHalted(): boolean {
    return this.cpu.halted;
  }

  /** Press a key on the keypad. */
  keyDown(key: Chip8Key): void {
    this.keypad.keyDown(key);
  }

  /** Release a key on the keypad. */
  keyUp(key: Chip8Key): void {
    this.keypad.keyUp(key);
  }

  /** Hand the current framebuffer to the renderer. */
  present(): void {
    this.display.present();
  }

  getPC(): number {
    return this.cpu.getPC();
  }

  getState(): Chip8State {
    return {
      v: Array.from(this.cpu.v),
      i: this.cpu.i,
      pc: this.cpu.pc,
      sp: this.cpu.sp,
      stack: Array.from(this.cpu.stack.subarray(0, this.cpu.sp)),
      delayTimer: this.delayTimer.value(),
      soundTimer: this.soundTimer.value(),
      halted: this.cpu.halted,
    };
  }
}
