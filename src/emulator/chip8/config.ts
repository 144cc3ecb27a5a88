/**
 * CHIP-8 machine configuration and defaults.
 */

import type { Clock, Renderer, TraceCallback } from '@/cpu/chip8/types';
import { monotonicClock } from './timer';

/** Host frame rate; timers tick at the same 60 Hz. */
export const FRAMES_PER_SECOND = 60;

export interface Chip8Config {
  /** Instructions executed per 60 Hz frame by runFrame(). */
  cyclesPerFrame: number;
  /** Halt when the program jumps to its own address. */
  stopOnTightLoop: boolean;
  /** Seed for RND. Omit to seed from the clock. */
  seed?: number;
  /** Monotonic microsecond clock for the timers. */
  clock: Clock;
  /** Rendering collaborator, called after every CLS/DRW. */
  renderer: Renderer | null;
  /** Per-instruction trace hook. */
  onTrace?: TraceCallback;
}

export const DEFAULT_CHIP8_CONFIG: Chip8Config = {
  cyclesPerFrame: 10,
  stopOnTightLoop: false,
  clock: monotonicClock,
  renderer: null,
};

/** Merge overrides onto the defaults, dropping invalid frame budgets. */
export function resolveChip8Config(overrides: Partial<Chip8Config> = {}): Chip8Config {
  const config: Chip8Config = { ...DEFAULT_CHIP8_CONFIG, ...overrides };
  if (!Number.isInteger(config.cyclesPerFrame) || config.cyclesPerFrame <= 0) {
    config.cyclesPerFrame = DEFAULT_CHIP8_CONFIG.cyclesPerFrame;
  }
  return config;
}
