/**
 * CHIP-8 60 Hz countdown timer (delay and sound)
 *
 * Rather than being ticked from the run loop, the timer stores the value it
 * was set to and the clock reading at that moment. The current value is
 * derived from elapsed time on every read:
 *
 *   ticks = 60 × whole seconds + floor(remaining µs / 16667)
 *   value = max(0, stored − ticks)
 *
 * 16667 µs rounds 1/60 s; splitting off whole seconds keeps the rounding
 * error from accumulating beyond one tick per second.
 */

import type { Clock, CountdownTimer } from '@/cpu/chip8/types';

const MICROS_PER_SECOND = 1_000_000;
const MICROS_PER_TICK = 16_667;
const TICKS_PER_SECOND = 60;

/** Monotonic microsecond clock backed by performance.now(). */
export const monotonicClock: Clock = () => Math.floor(performance.now() * 1000);

/** Number of whole 60 Hz ticks in `elapsedMicros`. */
export function ticksElapsed(elapsedMicros: number): number {
  if (elapsedMicros <= 0) return 0;
  const seconds = Math.floor(elapsedMicros / MICROS_PER_SECOND);
  const remainder = elapsedMicros % MICROS_PER_SECOND;
  return TICKS_PER_SECOND * seconds + Math.floor(remainder / MICROS_PER_TICK);
}

export class Timer60Hz implements CountdownTimer {
  private stored = 0;
  private setAt: number;
  private readonly clock: Clock;

  constructor(clock: Clock = monotonicClock) {
    this.clock = clock;
    this.setAt = clock();
  }

  /** Current value. Reads never change the timer. */
  value(): number {
    if (this.stored === 0) return 0;
    const ticks = ticksElapsed(this.clock() - this.setAt);
    return ticks >= this.stored ? 0 : this.stored - ticks;
  }

  set(value: number): void {
    this.stored = value & 0xff;
    this.setAt = this.clock();
  }
}
