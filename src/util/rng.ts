import { randomInt as cryptoRandomInt } from 'crypto';

export type RNG = (maxExclusive: number) => number;

export const cryptoRNG: RNG = (maxExclusive: number) => {
  if (maxExclusive <= 0) throw new Error('maxExclusive must be > 0');
  return cryptoRandomInt(0, maxExclusive);
};

/** Repeatable draws for replaying a shoe order; mulberry32 under the hood. */
export function seededRNG(seed: number): RNG {
  let state = seed >>> 0;
  return (maxExclusive) => {
    state = (state + 0x6d2b79f5) >>> 0;
    let x = Math.imul(state ^ (state >>> 15), state | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    const unit = ((x ^ (x >>> 14)) >>> 0) / 2 ** 32;
    return Math.floor(unit * maxExclusive);
  };
}

/** In-place Fisher-Yates. */
export function shuffleInPlace<T>(arr: T[], rng: RNG = cryptoRNG): T[] {
  for (let i = arr.length - 1; i > 0; i--) {
    const j = rng(i + 1);
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
  return arr;
}
