/**
 * Audio collaborator for the terminal: polls the sound timer and rings the
 * terminal bell each time the timer goes from silent to sounding.
 */

import type { CountdownTimer } from "@/cpu/chip8/types";
import type { TextOutput } from "./terminal";

const BELL = "\x07";
const DEFAULT_POLL_INTERVAL_MS = 1000 / 60;

export class TerminalBeeper {
  private readonly timer: CountdownTimer;
  private readonly out: TextOutput;
  private sounding = false;
  private interval: ReturnType<typeof setInterval> | null = null;

  constructor(soundTimer: CountdownTimer, out: TextOutput) {
    this.timer = soundTimer;
    this.out = out;
  }

  /** Sample the timer once. Returns true if the bell was rung. */
  poll(): boolean {
    const active = this.timer.value() > 0;
    const ring = active && !this.sounding;
    this.sounding = active;
    if (ring) this.out.write(BELL);
    return ring;
  }

  start(intervalMs = DEFAULT_POLL_INTERVAL_MS): void {
    if (this.interval) return;
    this.interval = setInterval(() => this.poll(), intervalMs);
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
  }
}
