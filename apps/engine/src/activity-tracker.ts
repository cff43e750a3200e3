/**
 * Rolling 24h set of recently active claimants.
 *
 * activeCount() feeds the cooldown formula: the busier the engine, the
 * shorter the wait between claims.
 *
 * An identity is (re)stamped only when absent or stale, so a present
 * entry keeps its original timestamp until it ages out. Eviction is a
 * full linear scan on every refresh.
 */

import { ACTIVE_WINDOW_SECONDS, type Address } from "@emberstake/emission";
import type { Checkpointable, Restore } from "@emberstake/ledger-client";

export interface ActiveEntry {
  account: Address;
  lastActivityTimestamp: number;
}

export class ActivityTracker implements Checkpointable {
  private entries: ActiveEntry[] = [];

  constructor(private readonly windowSeconds: number = ACTIVE_WINDOW_SECONDS) {}

  refresh(account: Address, now: number): void {
    const pos = this.entries.findIndex((e) => e.account === account);
    const existing = this.entries[pos];
    if (!existing) {
      this.entries.push({ account, lastActivityTimestamp: now });
    } else if (now - existing.lastActivityTimestamp > this.windowSeconds) {
      this.entries[pos] = { account, lastActivityTimestamp: now };
    }
    this.evictStale(now);
  }

  activeCount(): number {
    return this.entries.length;
  }

  isActive(account: Address): boolean {
    return this.entries.some((e) => e.account === account);
  }

  snapshot(): readonly ActiveEntry[] {
    return [...this.entries];
  }

  checkpoint(): Restore {
    const entries = [...this.entries];
    return () => {
      this.entries = entries;
    };
  }

  private evictStale(now: number): void {
    let i = 0;
    while (i < this.entries.length) {
      const entry = this.entries[i];
      if (entry && now - entry.lastActivityTimestamp > this.windowSeconds) {
        // swap-with-last; re-check the slot we just filled
        const last = this.entries.pop();
        if (last && i < this.entries.length) this.entries[i] = last;
      } else {
        i++;
      }
    }
  }
}
