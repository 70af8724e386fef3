// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Uniform [0, 1) source. */
export type Rng = () => number;

/** Seedable xorshift PRNG for reproducible simulations. */
export function createRng(seed: number): Rng {
  let s0 = seed | 0 || 1;
  let s1 = (seed >>> 16) ^ 0x5deece66d;
  if (s1 === 0) s1 = 0xdeadbeef;
  return () => {
    let x = s0;
    const y = s1;
    s0 = y;
    x ^= x << 23;
    x ^= x >> 17;
    x ^= y;
    x ^= y >> 26;
    s1 = x;
    return ((s0 + s1) >>> 0) / 0x100000000;
  };
}

/** Integer in [min, max]. */
export function randomInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}
