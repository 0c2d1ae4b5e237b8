/**
 * Injectable randomness. Every stochastic routine takes a RandomSource so
 * that tests can replay a walk exactly.
 */

/** Returns a value in [0, 1). `Math.random` satisfies this. */
export type RandomSource = () => number;

const LCG_MULTIPLIER = 1103515245;
const LCG_INCREMENT = 12345;
const LCG_MODULUS = 0x80000000;

/**
 * Deterministic linear congruential generator (glibc constants).
 * The same seed always yields the same sequence.
 */
export function seededRandom(seed: number): RandomSource {
  let s = Math.trunc(seed) & 0x7fffffff;
  return () => {
    s = (Math.imul(s, LCG_MULTIPLIER) + LCG_INCREMENT) & 0x7fffffff;
    return s / LCG_MODULUS;
  };
}

export function randomChoice<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) {
    throw new RangeError('Cannot choose from an empty list');
  }
  const idx = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[idx];
}

/**
 * Pick one item with probability proportional to its weight.
 * Weights need not be normalized. A draw at or past the running total
 * (rounding) lands on the last item with positive weight.
 */
export function weightedChoice<T>(items: readonly T[], weights: readonly number[], random: RandomSource): T {
  if (items.length === 0 || items.length !== weights.length) {
    throw new RangeError('Items and weights must be non-empty and of equal length');
  }

  let total = 0;
  let last = -1;
  for (let i = 0; i < weights.length; i++) {
    const w = weights[i];
    if (!(w >= 0)) throw new RangeError(`Weight at index ${i} must be non-negative, got ${w}`);
    if (w > 0) last = i;
    total += w;
  }
  if (last < 0) throw new RangeError('At least one weight must be positive');

  const target = random() * total;
  let cumulative = 0;
  for (let i = 0; i <= last; i++) {
    cumulative += weights[i];
    if (target < cumulative) return items[i];
  }
  return items[last];
}
