/**
 * Fixed-point primitives. bigint only: nothing in the reward path
 * touches a float.
 */

import { STAKE_BOOST_MAX_BRACKET } from "./constants.js";

/**
 * Floor square root: the largest r with r² ≤ n.
 * Newton iteration seeded above the root, so it descends monotonically.
 */
export function isqrt(n: bigint): bigint {
  if (n < 0n) throw new RangeError("isqrt: negative input");
  if (n < 2n) return n;

  let x = 1n << (BigInt(n.toString(2).length + 1) >> 1n);
  for (;;) {
    const y = (x + n / x) >> 1n;
    if (y >= x) return x;
    x = y;
  }
}

/**
 * Discrete log10: number of decade thresholds (10, 100, … 10^9) that
 * `value` reaches. Returns 0..9; saturates at 9.
 */
export function decadeBracket(value: bigint): number {
  let bracket = 0;
  let threshold = 10n;
  while (bracket < STAKE_BOOST_MAX_BRACKET && value >= threshold) {
    bracket++;
    threshold *= 10n;
  }
  return bracket;
}

/** a × b / c, floored. */
export function mulDiv(a: bigint, b: bigint, c: bigint): bigint {
  if (c === 0n) throw new RangeError("mulDiv: division by zero");
  return (a * b) / c;
}

export function minBig(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxBig(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}
