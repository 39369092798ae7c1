export type Rng = Readonly<{
  /** Next unsigned 32-bit value. */
  u32: () => number;
  /** Integer in [min, max]. */
  int: (min: number, max: number) => number;
  /** True with probability `percent`/100. */
  chance: (percent: number) => boolean;
}>;

/**
 * Deterministic xorshift32 generator. The same seed always yields the same
 * sequence; seed 0 is mapped to a fixed non-zero state.
 */
export function createRng(seed: number): Rng {
  let state = seed >>> 0 || 0x9e3779b9;

  const u32 = (): number => {
    state ^= state << 13;
    state >>>= 0;
    state ^= state >>> 17;
    state ^= state << 5;
    state >>>= 0;
    return state;
  };

  return Object.freeze({
    u32,
    int: (min: number, max: number) => min + (u32() % (max - min + 1)),
    chance: (percent: number) => u32() % 100 < percent,
  });
}
