import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { InputPoller, type KeySink } from "../input-poller";
import { Chip8Key } from "@/cpu/chip8/types";

class RecordingSink implements KeySink {
  events: string[] = [];

  keyDown(key: Chip8Key): void {
    this.events.push(`down ${key.toString(16)}`);
  }

  keyUp(key: Chip8Key): void {
    this.events.push(`up ${key.toString(16)}`);
  }
}

describe("InputPoller", () => {
  let now: number;
  let sink: RecordingSink;
  let quits: number;
  let poller: InputPoller;

  beforeEach(() => {
    now = 0;
    quits = 0;
    sink = new RecordingSink();
    poller = new InputPoller(sink, { now: () => now, onQuit: () => quits++ });
  });

  afterEach(() => {
    poller.stop();
    vi.useRealTimers();
  });

  it("turns a press into a key-down held for 100 ms", () => {
    poller.enqueue({ type: "press", char: "a" });
    expect(poller.poll()).toBe(true);
    expect(sink.events).toEqual(["down a"]);
    expect(poller.heldKeys()).toEqual([Chip8Key.KA]);

    now = 99;
    poller.poll();
    expect(sink.events).toEqual(["down a"]);

    now = 100;
    poller.poll();
    expect(sink.events).toEqual(["down a", "up a"]);
    expect(poller.heldKeys()).toEqual([]);
  });

  it("treats repeats of a held key as one press", () => {
    poller.enqueue({ type: "press", char: "5" });
    poller.poll();
    now = 50;
    poller.enqueue({ type: "press", char: "5" });
    poller.poll();
    now = 120;
    poller.poll();
    expect(sink.events).toEqual(["down 5"]);
    now = 150;
    poller.poll();
    expect(sink.events).toEqual(["down 5", "up 5"]);
  });

  it("releases expired keys before new presses", () => {
    poller.enqueue({ type: "press", char: "a" });
    poller.poll();
    now = 100;
    poller.enqueue({ type: "press", char: "a" });
    poller.poll();
    expect(sink.events).toEqual(["down a", "up a", "down a"]);
  });

  it("ignores characters that are not keys", () => {
    poller.enqueue({ type: "press", char: "z" });
    poller.poll();
    expect(sink.events).toEqual([]);
  });

  it("reports quit events", () => {
    poller.enqueue({ type: "quit" });
    poller.poll();
    expect(quits).toBe(1);
  });

  it("drains a bounded number of events per poll", () => {
    poller = new InputPoller(sink, { now: () => now, maxEventsPerPoll: 2 });
    poller.enqueue({ type: "press", char: "1" });
    poller.enqueue({ type: "press", char: "2" });
    poller.enqueue({ type: "press", char: "3" });
    expect(poller.poll()).toBe(false);
    expect(poller.pending).toBe(1);
    expect(sink.events).toEqual(["down 1", "down 2"]);
    expect(poller.poll()).toBe(true);
    expect(sink.events).toEqual(["down 1", "down 2", "down 3"]);
  });

  it("polls on an interval once started", () => {
    vi.useFakeTimers();
    poller.start();
    poller.enqueue({ type: "press", char: "c" });
    vi.advanceTimersByTime(5);
    expect(sink.events).toEqual(["down c"]);
    poller.stop();
    poller.enqueue({ type: "press", char: "d" });
    vi.advanceTimersByTime(50);
    expect(sink.events).toEqual(["down c"]);
  });
});
