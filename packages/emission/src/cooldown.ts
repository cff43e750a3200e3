/**
 * Congestion-sensitive claim cooldown.
 * More active participants → shorter cooldown, never below the floor.
 */

import {
  COOLDOWN_BASE_SECONDS,
  COOLDOWN_MIN_SECONDS,
  COOLDOWN_PER_ACTIVE_SECONDS,
} from "./constants.js";

/** Cooldown in seconds, in [60, 900]. */
export function cooldownSeconds(activeCount: number): number {
  const reduction = COOLDOWN_PER_ACTIVE_SECONDS * Math.max(0, activeCount);
  return Math.max(COOLDOWN_MIN_SECONDS, COOLDOWN_BASE_SECONDS - reduction);
}

/** Earliest timestamp (seconds) at which the next claim is allowed. */
export function nextClaimAt(lastClaimTimestamp: number, activeCount: number): number {
  return lastClaimTimestamp + cooldownSeconds(activeCount);
}
