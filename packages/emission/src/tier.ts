/**
 * Reward tiers: randomized final multiplier.
 *
 * roll = SHA256("TIER_DRAW" || entropy || now_u64be || account_utf8 || nonce_u64be) mod 100
 *
 *   [0, 70)   Common     ×1.0
 *   [70, 92)  Rare       ×1.8
 *   [92, 99)  Epic       ×3.5   + anti-halving shield
 *   [99, 100) Legendary  ×8.0   + halving rate −3%
 *
 * The per-account nonce makes two draws in the same second with the same
 * entropy hash to different rolls.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex } from "@noble/hashes/utils";
import { TIER_ROLL_MODULUS, TIER_MULTIPLIER_DIVISOR } from "./constants.js";

// ── Bands ──────────────────────────────────────────────────────────

export type TierId = 0 | 1 | 2 | 3;
export type TierName = "Common" | "Rare" | "Epic" | "Legendary";
export type TierEffect = "none" | "shield" | "rate_reduction";

export interface TierBand {
  id: TierId;
  name: TierName;
  /** Exclusive upper bound of the cumulative roll band. */
  rollCeiling: number;
  /** Multiplier in tenths (18 = ×1.8). */
  multiplierTenths: bigint;
  effect: TierEffect;
}

export const TIER_BANDS: readonly TierBand[] = [
  { id: 0, name: "Common", rollCeiling: 70, multiplierTenths: 10n, effect: "none" },
  { id: 1, name: "Rare", rollCeiling: 92, multiplierTenths: 18n, effect: "none" },
  { id: 2, name: "Epic", rollCeiling: 99, multiplierTenths: 35n, effect: "shield" },
  { id: 3, name: "Legendary", rollCeiling: 100, multiplierTenths: 80n, effect: "rate_reduction" },
];

export function tierForRoll(roll: number): TierBand {
  if (!Number.isInteger(roll) || roll < 0 || roll >= Number(TIER_ROLL_MODULUS)) {
    throw new RangeError(`tierForRoll: roll out of range: ${roll}`);
  }
  const band = TIER_BANDS.find((b) => roll < b.rollCeiling);
  if (!band) throw new RangeError(`tierForRoll: no band for roll ${roll}`);
  return band;
}

export function tierById(id: TierId): TierBand {
  const band = TIER_BANDS.find((b) => b.id === id);
  if (!band) throw new RangeError(`tierById: unknown tier ${id}`);
  return band;
}

/** mintPower × multiplier, floored. */
export function applyTierMultiplier(mintPower: bigint, tier: TierBand): bigint {
  return (mintPower * tier.multiplierTenths) / TIER_MULTIPLIER_DIVISOR;
}

// ── Seed ───────────────────────────────────────────────────────────

const TIER_DRAW_PREFIX = "TIER_DRAW";

export interface TierSeedInput {
  entropy: Uint8Array;
  /** Claim timestamp (seconds). */
  timestamp: number;
  account: string;
  nonce: bigint;
}

function uint64BE(n: bigint): Uint8Array {
  const buf = new Uint8Array(8);
  new DataView(buf.buffer).setBigUint64(0, n, false);
  return buf;
}

/** Raw SHA256 seed for a draw. */
export function tierSeed(input: TierSeedInput): Uint8Array {
  const encoder = new TextEncoder();
  const parts = [
    encoder.encode(TIER_DRAW_PREFIX),
    input.entropy,
    uint64BE(BigInt(input.timestamp)),
    encoder.encode(input.account),
    uint64BE(input.nonce),
  ];

  const totalLen = parts.reduce((sum, p) => sum + p.length, 0);
  const combined = new Uint8Array(totalLen);
  let offset = 0;
  for (const part of parts) {
    combined.set(part, offset);
    offset += part.length;
  }

  return sha256(combined);
}

/** Roll in [0, 100). */
export function tierRoll(input: TierSeedInput): number {
  const seed = BigInt(`0x${bytesToHex(tierSeed(input))}`);
  return Number(seed % TIER_ROLL_MODULUS);
}
