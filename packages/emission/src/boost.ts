/**
 * Mint power formula.
 *
 *   timeReward          = min(elapsed × rate / 3600, rate × 24)   (≥ 1 wei if elapsed > 0)
 *   stakeBoost          = 1 + bracket(stakedBase + 1)             (1 when stakedBase = 0)
 *   burnBoostScaled     = P + 7 × sqrt(burnedBase × P²) / 10      (P = PRECISION)
 *   effectiveMintPower  = timeReward × stakeBoost × burnBoostScaled / P
 *
 * All amounts are wei (SCALE = 10^18). Boosts read whole-token "base units".
 */

import {
  SCALE,
  PRECISION,
  SECONDS_PER_HOUR,
  MAX_REWARD_HOURS,
  BURN_BOOST_NUMERATOR,
  BURN_BOOST_DENOMINATOR,
  DAO_POINTS_PER_TOKEN,
  AIRDROP_RIGHTS_PER_TOKEN,
} from "./constants.js";
import { decadeBracket, isqrt, minBig, mulDiv } from "./fixed-point.js";

/** Wei → whole tokens (floor). */
export function toBaseUnits(amount: bigint): bigint {
  return amount / SCALE;
}

/**
 * Time component of a claim. Grows linearly for 24h then saturates.
 * Any non-zero wait earns at least 1 wei.
 */
export function timeReward(elapsedSeconds: bigint, baseRatePerHour: bigint): bigint {
  if (elapsedSeconds <= 0n) return 0n;
  const linear = (elapsedSeconds * baseRatePerHour) / SECONDS_PER_HOUR;
  const reward = minBig(linear, baseRatePerHour * MAX_REWARD_HOURS);
  return reward === 0n ? 1n : reward;
}

/** Integer stake multiplier, 1..10. */
export function stakeBoostOf(stakedAmount: bigint): bigint {
  const base = toBaseUnits(stakedAmount);
  if (base === 0n) return 1n;
  return 1n + BigInt(decadeBracket(base + 1n));
}

/** Burn multiplier scaled by PRECISION (PRECISION == ×1.0). */
export function burnBoostScaled(cumulativeBurned: bigint): bigint {
  const burnedBase = toBaseUnits(cumulativeBurned);
  if (burnedBase === 0n) return PRECISION;
  const sqrtScaled = isqrt(burnedBase * PRECISION * PRECISION);
  return PRECISION + (BURN_BOOST_NUMERATOR * sqrtScaled) / BURN_BOOST_DENOMINATOR;
}

export interface MintPowerInput {
  timeReward: bigint;
  stakedAmount: bigint;
  cumulativeBurned: bigint;
}

export interface MintPower {
  stakeBoost: bigint;
  burnBoostScaled: bigint;
  rawMintPower: bigint;
  effectiveMintPower: bigint;
}

export function computeMintPower(input: MintPowerInput): MintPower {
  const stakeBoost = stakeBoostOf(input.stakedAmount);
  const burnBoost = burnBoostScaled(input.cumulativeBurned);
  const rawMintPower = input.timeReward * stakeBoost;
  return {
    stakeBoost,
    burnBoostScaled: burnBoost,
    rawMintPower,
    effectiveMintPower: mulDiv(rawMintPower, burnBoost, PRECISION),
  };
}

/**
 * Snapshot metric stored on a burn certificate: what a full 24h claim
 * would have been worth with the burn history *before* this burn.
 */
export function mintPowerSnapshot(
  baseRatePerHour: bigint,
  stakedAmount: bigint,
  cumulativeBurnedBefore: bigint,
): bigint {
  return computeMintPower({
    timeReward: baseRatePerHour * MAX_REWARD_HOURS,
    stakedAmount,
    cumulativeBurned: cumulativeBurnedBefore,
  }).effectiveMintPower;
}

export function daoPointsFor(amountBurned: bigint): bigint {
  return toBaseUnits(amountBurned) * DAO_POINTS_PER_TOKEN;
}

export function airdropRightsFor(amountBurned: bigint): bigint {
  return toBaseUnits(amountBurned) * AIRDROP_RIGHTS_PER_TOKEN;
}
