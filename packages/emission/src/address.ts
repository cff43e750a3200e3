/**
 * Participant / component identities.
 * 20-byte lowercase hex with 0x prefix; the all-zero address means "unset".
 */

import { ValidationError } from "./errors.js";

export type Address = string;

export const ZERO_ADDRESS: Address = `0x${"00".repeat(20)}`;

const ADDRESS_RE = /^0x[0-9a-f]{40}$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_RE.test(value);
}

export function isNullAddress(value: Address | null | undefined): boolean {
  return value === null || value === undefined || value === "" || value === ZERO_ADDRESS;
}

/** Validate and return a non-null address. */
export function requireAddress(value: unknown, field = "address"): Address {
  if (typeof value === "string" && isNullAddress(value)) {
    throw new ValidationError("null_address", `${field} must not be the null address`);
  }
  if (!isAddress(value)) {
    throw new ValidationError("invalid_address", `${field} must be 0x-prefixed 40 hex chars`, {
      field,
    });
  }
  return value;
}

/** Validate a strictly positive amount. */
export function requirePositive(amount: bigint, field = "amount"): bigint {
  if (amount <= 0n) {
    throw new ValidationError("non_positive_amount", `${field} must be positive`, {
      field,
      value: amount.toString(),
    });
  }
  return amount;
}
