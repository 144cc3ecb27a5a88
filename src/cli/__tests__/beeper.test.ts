import { describe, it, expect, beforeEach } from "vitest";
import { TerminalBeeper } from "../beeper";
import type { CountdownTimer } from "@/cpu/chip8/types";

class FixedTimer implements CountdownTimer {
  current = 0;

  value(): number {
    return this.current;
  }

  set(value: number): void {
    this.current = value;
  }
}

describe("TerminalBeeper", () => {
  let timer: FixedTimer;
  let written: string[];
  let beeper: TerminalBeeper;

  beforeEach(() => {
    timer = new FixedTimer();
    written = [];
    beeper = new TerminalBeeper(timer, {
      write: (chunk) => {
        written.push(chunk);
        return true;
      },
    });
  });

  it("stays quiet while the sound timer is zero", () => {
    expect(beeper.poll()).toBe(false);
    expect(written).toEqual([]);
  });

  it("rings once when the timer starts sounding", () => {
    timer.set(5);
    expect(beeper.poll()).toBe(true);
    timer.set(4);
    expect(beeper.poll()).toBe(false);
    expect(written).toEqual(["\x07"]);
  });

  it("rings again after the timer has run out", () => {
    timer.set(5);
    beeper.poll();
    timer.set(0);
    beeper.poll();
    timer.set(3);
    expect(beeper.poll()).toBe(true);
    expect(written).toEqual(["\x07", "\x07"]);
  });
});
