/**
 * CHIP-8 hex keypad
 *
 *   1 2 3 C
 *   4 5 6 D
 *   7 8 9 E
 *   A 0 B F
 *
 * Holds the pressed/released state of all 16 keys and the channel the
 * engine blocks on for LD Vx, K. The input-polling side calls keyDown/keyUp;
 * the engine reads isPressed() and awaits requestNextKeypress().
 *
 * A key-down first offers the key to an outstanding request, then updates
 * the pressed vector. With no request outstanding it only updates state.
 */

import { type Chip8Key, type KeyInput, KEY_COUNT, toChip8Key } from '@/cpu/chip8/types';
import { RequestChannel } from '@/lib/request-channel';

/** Keyboard characters for keys 0-F, in key order. */
const KEY_CHARS = '0123456789abcdef';

/** Map a typed character ('0'-'9', 'a'-'f', case-insensitive) to a key. */
export function keyFromChar(char: string): Chip8Key | null {
  if (char.length !== 1) return null;
  const index = KEY_CHARS.indexOf(char.toLowerCase());
  return index >= 0 ? toChip8Key(index) : null;
}

export class Chip8Keypad implements KeyInput {
  private readonly pressed: boolean[] = new Array<boolean>(KEY_COUNT).fill(false);
  private readonly channel = new RequestChannel<Chip8Key>();

  /** Optional callback invoked whenever the engine starts waiting for a key. */
  private onWait: (() => void) | null = null;

  /** Register a callback invoked when a blocking key read begins. */
  setWaitCallback(cb: (() => void) | null): void {
    this.onWait = cb;
  }

  isPressed(key: Chip8Key): boolean {
    return this.pressed[key];
  }

  /** Block (asynchronously) until the next key-down. */
  requestNextKeypress(): Promise<Chip8Key> {
    const request = this.channel.request();
    if (this.onWait) {
      this.onWait();
    }
    return request;
  }

  /** True while the engine is waiting in LD Vx, K. */
  isWaiting(): boolean {
    return this.channel.isRequestPending();
  }

  keyDown(key: Chip8Key): void {
    this.channel.sendIfRequested(key);
    this.pressed[key] = true;
  }

  keyUp(key: Chip8Key): void {
    this.pressed[key] = false;
  }

  /** Abandon an outstanding wait, e.g. when the machine is halted. */
  cancelWait(reason?: string): boolean {
    return this.channel.cancel(reason);
  }

  /** Release all keys. An outstanding wait is left in place. */
  reset(): void {
    this.pressed.fill(false);
  }

  /** Snapshot of the 16-key pressed vector. */
  getState(): boolean[] {
    return [...this.pressed];
  }
}
