/**
 * Halving scheduler: periodically runs the halving check as the owner.
 *
 * checkAndApply() is a no-op until total minted reaches the threshold,
 * so ticking often is harmless. Errors are reported, never thrown out of
 * the timer.
 */

import type { System } from "./system.js";
import type { HalvingStatus } from "./halving-controller.js";

export interface HalvingSchedulerOptions {
  /** How often to check (ms). Default: 60_000 (1 min). */
  checkIntervalMs?: number;
  /** Called after each applied halving. */
  onHalving?: (status: HalvingStatus) => void;
  /** Called when a check fails. */
  onError?: (error: unknown) => void;
}

export interface HalvingScheduler {
  start(): void;
  stop(): void;
  /** Halvings applied by this scheduler. */
  halvingsApplied(): number;
  /** Run one check now. true if a halving fired, null on error. */
  tick(): boolean | null;
}

const DEFAULT_CHECK_INTERVAL_MS = 60_000;

export function createHalvingScheduler(
  system: Pick<System, "halving" | "owner">,
  options: HalvingSchedulerOptions = {},
): HalvingScheduler {
  const checkIntervalMs = options.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS;
  const onHalving = options.onHalving;
  const onError = options.onError ?? ((err) => console.error("[scheduler] error:", err));

  let timer: ReturnType<typeof setInterval> | null = null;
  let applied = 0;

  function tick(): boolean | null {
    try {
      const fired = system.halving.checkAndApply(system.owner);
      if (fired) {
        applied++;
        if (onHalving) onHalving(system.halving.status());
      }
      return fired;
    } catch (err) {
      onError(err);
      return null;
    }
  }

  return {
    start() {
      if (timer) return;
      timer = setInterval(tick, checkIntervalMs);
      tick();
    },

    stop() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },

    halvingsApplied() {
      return applied;
    },

    tick,
  };
}
