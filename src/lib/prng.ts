/**
 * Deterministic xorshift32 byte source for the RND instruction.
 * Seeding makes runs reproducible; the default seed comes from the clock.
 */

export interface Prng {
  readonly seed: number;
  nextU32: () => number;
  nextByte: () => number;
}

export const createPrng = (seed: number = Date.now()): Prng => {
  // xorshift32 has a fixed point at 0
  let state = seed >>> 0 || 0x2545f491;
  const nextU32 = (): number => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return state >>> 0;
  };
  const nextByte = (): number => nextU32() & 0xff;
  return { seed: seed >>> 0, nextU32, nextByte };
};
