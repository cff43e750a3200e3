/**
 * Adaptive halving: pure threshold and rate formulas.
 *
 * threshold' = INITIAL × (P + totalBurned × P / BURN_SCALE) / P
 * rate       = clamp(50 × (P + stakingRatio / 10) / P − keyEffect, 0, 80)
 *
 * Burning pushes the next halving further out; staking nudges the
 * advisory rate up; Legendary "halving keys" pull it down.
 */

import {
  PRECISION,
  INITIAL_HALVING_THRESHOLD,
  HALVING_BURN_SCALE,
  BASE_HALVING_RATE_PCT,
  MAX_HALVING_RATE_PCT,
  STAKING_RATIO_DIVISOR,
} from "./constants.js";
import { maxBig, minBig, mulDiv } from "./fixed-point.js";

export function nextHalvingThreshold(totalBurned: bigint): bigint {
  const burnFactor = PRECISION + (totalBurned * PRECISION) / HALVING_BURN_SCALE;
  return mulDiv(INITIAL_HALVING_THRESHOLD, burnFactor, PRECISION);
}

export function isHalvingDue(totalMinted: bigint, currentThreshold: bigint): boolean {
  return totalMinted >= currentThreshold;
}

/** totalStaked / totalSupply scaled by PRECISION; 0 for an empty supply. */
export function stakingRatio(totalStaked: bigint, totalSupply: bigint): bigint {
  if (totalSupply === 0n) return 0n;
  return (totalStaked * PRECISION) / totalSupply;
}

export interface AdjustedRateInput {
  totalStaked: bigint;
  totalSupply: bigint;
  keyEffectPercent: bigint;
}

/** Advisory halving rate in whole percent, 0..80. */
export function adjustedHalvingRate(input: AdjustedRateInput): bigint {
  const ratio = stakingRatio(input.totalStaked, input.totalSupply);
  const stakeFactor = PRECISION + (ratio * PRECISION) / STAKING_RATIO_DIVISOR / PRECISION;
  const rate = mulDiv(BASE_HALVING_RATE_PCT, stakeFactor, PRECISION);
  const reduced = maxBig(0n, rate - input.keyEffectPercent);
  return minBig(reduced, MAX_HALVING_RATE_PCT);
}
