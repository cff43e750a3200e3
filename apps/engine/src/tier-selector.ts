/**
 * Randomized reward tier draw.
 *
 * Each draw advances the account's nonce before hashing, so the first
 * draw for an account uses nonce 1. The selector only decides the tier;
 * the engine applies the tier's side effect after minting.
 */

import {
  applyTierMultiplier,
  tierForRoll,
  tierRoll,
  type Address,
  type TierBand,
} from "@emberstake/emission";
import type { Checkpointable, Restore } from "@emberstake/ledger-client";
import type { EntropySource } from "./entropy.js";

export interface TierDraw {
  tier: TierBand;
  roll: number;
  nonce: bigint;
  finalReward: bigint;
}

export class RandomTierSelector implements Checkpointable {
  private nonces = new Map<Address, bigint>();

  constructor(private readonly entropy: EntropySource) {}

  draw(account: Address, mintPower: bigint, now: number): TierDraw {
    const nonce = this.nonceOf(account) + 1n;
    this.nonces.set(account, nonce);

    const roll = tierRoll({
      entropy: this.entropy.current(),
      timestamp: now,
      account,
      nonce,
    });
    const tier = tierForRoll(roll);
    return { tier, roll, nonce, finalReward: applyTierMultiplier(mintPower, tier) };
  }

  nonceOf(account: Address): bigint {
    return this.nonces.get(account) ?? 0n;
  }

  checkpoint(): Restore {
    const nonces = new Map(this.nonces);
    return () => {
      this.nonces = nonces;
    };
  }
}
