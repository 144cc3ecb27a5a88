import { describe, it, expect, beforeEach } from 'vitest';
import fc from 'fast-check';
import { Timer60Hz, ticksElapsed } from '../timer';

describe('ticksElapsed', () => {
  it('counts whole 1/60 s ticks', () => {
    expect(ticksElapsed(0)).toBe(0);
    expect(ticksElapsed(-5)).toBe(0);
    expect(ticksElapsed(16_666)).toBe(0);
    expect(ticksElapsed(16_667)).toBe(1);
    expect(ticksElapsed(999_999)).toBe(59);
    expect(ticksElapsed(1_000_000)).toBe(60);
    expect(ticksElapsed(2_016_667)).toBe(121);
  });
});

describe('Timer60Hz', () => {
  let now: number;
  let timer: Timer60Hz;

  beforeEach(() => {
    now = 5_000_000;
    timer = new Timer60Hz(() => now);
  });

  it('reads 0 before it is set', () => {
    expect(timer.value()).toBe(0);
  });

  it('counts down with elapsed time', () => {
    timer.set(10);
    expect(timer.value()).toBe(10);
    now += 16_666;
    expect(timer.value()).toBe(10);
    now += 1;
    expect(timer.value()).toBe(9);
  });

  it('never goes below zero', () => {
    timer.set(10);
    now += 1_000_000;
    expect(timer.value()).toBe(0);
  });

  it('runs 60 ticks per second', () => {
    timer.set(120);
    now += 1_000_000;
    expect(timer.value()).toBe(60);
    now += 1_000_000;
    expect(timer.value()).toBe(0);
  });

  it('reads do not change the value', () => {
    timer.set(30);
    now += 50_000;
    expect(timer.value()).toBe(28);
    expect(timer.value()).toBe(28);
  });

  it('set() restarts the countdown', () => {
    timer.set(10);
    now += 100_000;
    expect(timer.value()).toBe(5);
    timer.set(10);
    expect(timer.value()).toBe(10);
  });

  it('stores only the low byte', () => {
    timer.set(0x1ff);
    expect(timer.value()).toBe(0xff);
  });

  it('never increases and reaches 0 after value × 16667 µs', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 255 }),
        fc.array(fc.integer({ min: 0, max: 5_000_000 }), { maxLength: 20 }),
        (start, offsets) => {
          let t = 0;
          const t0 = new Timer60Hz(() => t);
          t0.set(start);
          let last = start;
          for (const offset of [...offsets].sort((a, b) => a - b)) {
            t = offset;
            const v = t0.value();
            expect(v).toBeLessThanOrEqual(last);
            expect(v).toBeGreaterThanOrEqual(0);
            last = v;
          }
          t = start * 16_667;
          expect(t0.value()).toBe(0);
        },
      ),
    );
  });
});
