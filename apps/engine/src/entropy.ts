/**
 * Entropy for tier draws.
 *
 * Production reads fresh CSPRNG bytes per draw. Tests inject a scripted
 * source so a claim lands in a known tier.
 */

import { randomBytes } from "@noble/hashes/utils";

export interface EntropySource {
  /** Bytes mixed into the next draw's seed. */
  current(): Uint8Array;
}

export function createRandomEntropy(byteLength = 32): EntropySource {
  return { current: () => randomBytes(byteLength) };
}
