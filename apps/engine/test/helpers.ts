/**
 * Shared fixtures: addresses, a manual clock, scripted entropy, and a
 * wired system with funding helpers.
 */

import { SCALE, tierForRoll, tierRoll, type TierId } from "@emberstake/emission";
import type { Clock } from "@emberstake/ledger-client";
import type { EntropySource } from "../src/entropy.js";
import { createSystem, type System } from "../src/system.js";

export const OWNER = `0x${"0f".repeat(20)}`;
export const ALICE = `0x${"aa".repeat(20)}`;
export const BOB = `0x${"bb".repeat(20)}`;
export const CAROL = `0x${"cc".repeat(20)}`;
export const STRANGER = `0x${"99".repeat(20)}`;

export const START = 1_700_000_000;
export const HOUR = 3600;
export const DAY = 24 * HOUR;

export const tokens = (n: bigint) => n * SCALE;

export class ManualClock implements Clock {
  constructor(public t: number = START) {}
  now(): number {
    return this.t;
  }
  advance(seconds: number): void {
    this.t += seconds;
  }
}

export class ScriptedEntropy implements EntropySource {
  next: Uint8Array = new Uint8Array(32);
  current(): Uint8Array {
    return this.next;
  }
}

/** Search entropy bytes that make the given draw land in `tier`. */
export function entropyForTier(
  tier: TierId,
  draw: { timestamp: number; account: string; nonce: bigint },
): Uint8Array {
  for (let i = 0; i < 100_000; i++) {
    const entropy = new Uint8Array(32);
    new DataView(entropy.buffer).setUint32(0, i, false);
    if (tierForRoll(tierRoll({ entropy, ...draw })).id === tier) return entropy;
  }
  throw new Error(`no entropy found for tier ${tier}`);
}

export interface Harness {
  system: System;
  clock: ManualClock;
  entropy: ScriptedEntropy;
  /** Owner → account transfer. */
  fund(account: string, amount: bigint): void;
  /** Fund, approve the engine, stake. */
  stake(account: string, amount: bigint): void;
  /** Script the next claim by `account` into `tier`. */
  nextTier(account: string, tier: TierId): void;
}

export function createHarness(): Harness {
  const clock = new ManualClock();
  const entropy = new ScriptedEntropy();
  const system = createSystem({ owner: OWNER, clock, entropy });
  const { ledger, engine } = system;

  return {
    system,
    clock,
    entropy,
    fund(account, amount) {
      ledger.transfer(OWNER, account, amount);
    },
    stake(account, amount) {
      ledger.transfer(OWNER, account, amount);
      ledger.approve(account, engine.address, amount);
      engine.stake(account, amount);
    },
    nextTier(account, tier) {
      entropy.next = entropyForTier(tier, {
        timestamp: clock.now(),
        account,
        nonce: engine.nonceOf(account) + 1n,
      });
    },
  };
}
