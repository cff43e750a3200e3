/**
 * One-time collaborator binding.
 *
 * bind(null)            → ValidationError
 * bind(same address)    → no-op
 * bind(other address)   → AlreadyConfiguredError
 */

import {
  AlreadyConfiguredError,
  StateError,
  ValidationError,
  ZERO_ADDRESS,
  isNullAddress,
  type Address,
} from "@emberstake/emission";
import type { Addressable } from "./types.js";

export class OneTimeBinding<T extends Addressable> {
  private target: T | null = null;

  constructor(private readonly label: string) {}

  bind(target: T | null | undefined): void {
    if (!target || isNullAddress(target.address)) {
      throw new ValidationError("null_address", `${this.label}: address must not be null`);
    }
    if (this.target) {
      if (this.target.address === target.address) return;
      throw new AlreadyConfiguredError(
        "already_configured",
        `${this.label}: already bound to ${this.target.address}`,
        { bound: this.target.address, requested: target.address },
      );
    }
    this.target = target;
  }

  get(): T | null {
    return this.target;
  }

  /** The bound target, or StateError("unconfigured"). */
  require(): T {
    if (!this.target) {
      throw new StateError("unconfigured", `${this.label}: not configured`);
    }
    return this.target;
  }

  /** Bound address, or the zero address when unset. */
  get address(): Address {
    return this.target?.address ?? ZERO_ADDRESS;
  }

  isBoundTo(address: Address): boolean {
    return this.target !== null && this.target.address === address;
  }
}
