/**
 * Atomic operation runner with a non-reentrant guard.
 *
 * run() checkpoints every participant, executes the operation and, if it
 * throws, restores them all (newest checkpoint first) before rethrowing.
 * A run() started while another is in progress on the same runner fails
 * with StateError("reentrant_call") and touches nothing.
 */

import { StateError } from "@emberstake/emission";
import type { Checkpointable } from "@emberstake/ledger-client";

export class Transactor {
  private active = false;

  constructor(
    private readonly label: string,
    private readonly participants: () => readonly Checkpointable[],
  ) {}

  run<T>(operation: () => T): T {
    if (this.active) {
      throw new StateError("reentrant_call", `${this.label}: reentrant call rejected`);
    }
    this.active = true;
    const restores = this.participants().map((p) => p.checkpoint());
    try {
      return operation();
    } catch (err) {
      for (const restore of restores.reverse()) restore();
      throw err;
    } finally {
      this.active = false;
    }
  }

  get inProgress(): boolean {
    return this.active;
  }
}
