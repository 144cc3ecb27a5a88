/**
 * Input-polling context for the terminal host.
 *
 * Raw key presses are queued as they arrive and drained on a fixed
 * interval, at most MAX_EVENTS_PER_POLL at a time. Terminals report key
 * presses but never releases, so each press is held down for a minimum
 * time and released by a later poll. Auto-repeat presses of a held key
 * only extend the hold; they do not produce a second key-down, so a
 * blocked LD Vx, K is satisfied by a fresh press only.
 */

import type { Chip8Key } from "@/cpu/chip8/types";
import { keyFromChar } from "@/emulator/chip8/keypad";

export type InputEvent = { type: "press"; char: string } | { type: "quit" };

/** Where decoded key transitions go (the keypad, or the system wrapping it). */
export interface KeySink {
  keyDown(key: Chip8Key): void;
  keyUp(key: Chip8Key): void;
}

export interface InputPollerOptions {
  /** Called when a quit event is drained. */
  onQuit?: () => void;
  /** Milliseconds a key stays down after its last press. */
  holdMs?: number;
  maxEventsPerPoll?: number;
  /** Millisecond clock. */
  now?: () => number;
}

export const MAX_EVENTS_PER_POLL = 64;
const DEFAULT_HOLD_MS = 100;
const DEFAULT_POLL_INTERVAL_MS = 5;

export class InputPoller {
  private readonly sink: KeySink;
  private readonly queue: InputEvent[] = [];
  /** Held keys and the time at which each is released. */
  private readonly releaseAt = new Map<Chip8Key, number>();
  private readonly onQuit: () => void;
  private readonly holdMs: number;
  private readonly maxEventsPerPoll: number;
  private readonly now: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(sink: KeySink, options: InputPollerOptions = {}) {
    this.sink = sink;
    this.onQuit = options.onQuit ?? (() => {});
    this.holdMs = options.holdMs ?? DEFAULT_HOLD_MS;
    this.maxEventsPerPoll = options.maxEventsPerPoll ?? MAX_EVENTS_PER_POLL;
    this.now = options.now ?? Date.now;
  }

  enqueue(event: InputEvent): void {
    this.queue.push(event);
  }

  /** Number of events waiting to be drained. */
  get pending(): number {
    return this.queue.length;
  }

  /**
   * Release expired keys, then drain queued events.
   * Returns true if the queue was fully drained.
   */
  poll(): boolean {
    const now = this.now();

    for (const [key, at] of this.releaseAt) {
      if (at <= now) {
        this.releaseAt.delete(key);
        this.sink.keyUp(key);
      }
    }

    const batch = this.queue.splice(0, this.maxEventsPerPoll);
    for (const event of batch) {
      if (event.type === "quit") {
        this.onQuit();
        continue;
      }
      const key = keyFromChar(event.char);
      if (key === null) continue;
      if (!this.releaseAt.has(key)) {
        this.sink.keyDown(key);
      }
      this.releaseAt.set(key, now + this.holdMs);
    }

    return this.queue.length === 0;
  }

  /** Keys currently held down by the poller. */
  heldKeys(): Chip8Key[] {
    return [...this.releaseAt.keys()].sort((a, b) => a - b);
  }

  start(intervalMs = DEFAULT_POLL_INTERVAL_MS): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.poll(), intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
