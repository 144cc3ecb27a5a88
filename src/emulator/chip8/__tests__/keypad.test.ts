import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Chip8Keypad, keyFromChar } from '../keypad';
import { Chip8Key } from '@/cpu/chip8/types';
import { RequestCancelledError } from '@/lib/request-channel';

describe('keyFromChar', () => {
  it('maps hex digits in either case', () => {
    expect(keyFromChar('0')).toBe(Chip8Key.K0);
    expect(keyFromChar('7')).toBe(Chip8Key.K7);
    expect(keyFromChar('a')).toBe(Chip8Key.KA);
    expect(keyFromChar('F')).toBe(Chip8Key.KF);
  });

  it('returns null for anything else', () => {
    expect(keyFromChar('g')).toBeNull();
    expect(keyFromChar('ab')).toBeNull();
    expect(keyFromChar('')).toBeNull();
  });
});

describe('Chip8Keypad', () => {
  let keypad: Chip8Keypad;

  beforeEach(() => {
    keypad = new Chip8Keypad();
  });

  it('tracks pressed keys', () => {
    keypad.keyDown(Chip8Key.K3);
    expect(keypad.isPressed(Chip8Key.K3)).toBe(true);
    expect(keypad.isPressed(Chip8Key.K4)).toBe(false);
    keypad.keyUp(Chip8Key.K3);
    expect(keypad.isPressed(Chip8Key.K3)).toBe(false);
  });

  it('delivers the next key-down to a pending request', async () => {
    const request = keypad.requestNextKeypress();
    expect(keypad.isWaiting()).toBe(true);
    keypad.keyDown(Chip8Key.KB);
    await expect(request).resolves.toBe(Chip8Key.KB);
    expect(keypad.isWaiting()).toBe(false);
    expect(keypad.isPressed(Chip8Key.KB)).toBe(true);
  });

  it('does not deliver a key pressed before the request', async () => {
    keypad.keyDown(Chip8Key.K1);
    const request = keypad.requestNextKeypress();
    keypad.keyDown(Chip8Key.K2);
    await expect(request).resolves.toBe(Chip8Key.K2);
  });

  it('satisfies each request exactly once', async () => {
    const first = keypad.requestNextKeypress();
    keypad.keyDown(Chip8Key.K5);
    keypad.keyDown(Chip8Key.K6);
    await expect(first).resolves.toBe(Chip8Key.K5);

    const second = keypad.requestNextKeypress();
    keypad.keyDown(Chip8Key.K7);
    await expect(second).resolves.toBe(Chip8Key.K7);
  });

  it('allows only one outstanding request', () => {
    void keypad.requestNextKeypress().catch(() => undefined);
    expect(() => keypad.requestNextKeypress()).toThrow('A request is already outstanding on this channel');
    keypad.cancelWait();
  });

  it('cancelWait() rejects the pending request', async () => {
    const request = keypad.requestNextKeypress();
    expect(keypad.cancelWait('Machine halted')).toBe(true);
    await expect(request).rejects.toBeInstanceOf(RequestCancelledError);
    await expect(request).rejects.toThrow('Machine halted');
    expect(keypad.cancelWait()).toBe(false);
  });

  it('calls the wait callback when a request begins', () => {
    const onWait = vi.fn(() => {
      expect(keypad.isWaiting()).toBe(true);
    });
    keypad.setWaitCallback(onWait);
    const request = keypad.requestNextKeypress();
    expect(onWait).toHaveBeenCalledTimes(1);
    keypad.keyDown(Chip8Key.K0);
    return request;
  });

  it('reset() releases every key', () => {
    keypad.keyDown(Chip8Key.K1);
    keypad.keyDown(Chip8Key.KF);
    keypad.reset();
    expect(keypad.getState()).toEqual(new Array(16).fill(false));
  });
});
