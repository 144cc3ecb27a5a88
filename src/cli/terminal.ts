/**
 * Terminal adapters: screen output and raw keyboard input.
 *
 * The renderer receives every present() from the display but only writes
 * to the terminal on flush(), once per host frame, so a program that draws
 * many sprites per frame does not flood the terminal.
 */

import { emitKeypressEvents, type Key } from "node:readline";
import type { Framebuffer, Renderer } from "@/cpu/chip8/types";
import { framebufferToLines } from "@/emulator/chip8/display";
import type { InputPoller } from "./input-poller";

/** Anything terminal output can be written to. */
export interface TextOutput {
  write(chunk: string): boolean;
}

const CURSOR_HOME = "\x1b[H";
const CLEAR_SCREEN = "\x1b[2J";
const HIDE_CURSOR = "\x1b[?25l";
const SHOW_CURSOR = "\x1b[?25h";

export class TerminalRenderer implements Renderer {
  private readonly out: TextOutput;
  private lines: string[] | null = null;
  private lastWritten = "";

  constructor(out: TextOutput) {
    this.out = out;
  }

  present(frame: Framebuffer): void {
    this.lines = framebufferToLines(frame);
  }

  /** Write the most recently presented frame if it differs from the last one written. */
  flush(): boolean {
    if (!this.lines) return false;
    const text = this.lines.join("\n");
    this.lines = null;
    if (text === this.lastWritten) return false;
    this.lastWritten = text;
    this.out.write(CURSOR_HOME + text + "\n");
    return true;
  }

  begin(): void {
    this.out.write(CLEAR_SCREEN + CURSOR_HOME + HIDE_CURSOR);
  }

  end(): void {
    this.out.write(SHOW_CURSOR);
  }
}

/** The parts of process.stdin used for raw key input. */
export interface KeyInputStream extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

/**
 * Route raw terminal key presses into the poller's queue.
 * Escape and Ctrl-C queue a quit. Returns a function that detaches.
 */
export function attachTerminalInput(stdin: KeyInputStream, poller: InputPoller): () => void {
  emitKeypressEvents(stdin);
  const raw = stdin.isTTY === true && typeof stdin.setRawMode === "function";
  if (raw) stdin.setRawMode?.(true);

  const onKeypress = (str: string | undefined, key: Key | undefined) => {
    if (key?.name === "escape" || (key?.ctrl === true && key.name === "c")) {
      poller.enqueue({ type: "quit" });
      return;
    }
    if (str) {
      poller.enqueue({ type: "press", char: str });
    }
  };

  stdin.on("keypress", onKeypress);
  stdin.resume();

  return () => {
    stdin.off("keypress", onKeypress);
    if (raw) stdin.setRawMode?.(false);
    stdin.pause();
  };
}
