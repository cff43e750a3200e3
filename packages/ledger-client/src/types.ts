/**
 * Collaborator interfaces: the ledger and certificate registry the
 * engine drives. Wire behind these from day 1 so the impl can swap.
 *
 * The first identity argument on mutating calls is the acting identity
 * (the "sender"); collaborators authorize against it.
 */

import type { Address } from "@emberstake/emission";

/** Undo closure returned by {@link Checkpointable.checkpoint}. */
export type Restore = () => void;

/**
 * Anything that takes part in an engine transaction. `checkpoint()`
 * captures current state; calling the returned closure puts it back.
 */
export interface Checkpointable {
  checkpoint(): Restore;
}

/** Something bindable by address (engine, ledger, registry...). */
export interface Addressable {
  readonly address: Address;
}

/** Seconds since Unix epoch. Must not go backwards. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

// ── Ledger ─────────────────────────────────────────────────────────

export interface Ledger extends Addressable, Checkpointable {
  /** Pull `amount` from `from` into `custodian`, spending its allowance. */
  transferIn(custodian: Address, from: Address, amount: bigint): void;
  /** Send `amount` from `custodian` back to `to`. */
  transferOut(custodian: Address, to: Address, amount: bigint): void;
  /** Create new supply. Only the bound minter may call. */
  mint(caller: Address, to: Address, amount: bigint): void;
  /** Destroy `amount` of `from`'s balance, spending `spender`'s allowance. */
  burnFrom(spender: Address, from: Address, amount: bigint): void;
  /** Cumulative amount `account` has ever burned (wei). */
  burnedAmountOf(account: Address): bigint;
  totalMinted(): bigint;
  totalBurned(): bigint;
  totalSupply(): bigint;
}

// ── Certificate registry ───────────────────────────────────────────

export interface IssueCertificateParams {
  burner: Address;
  amountBurned: bigint;
  mintPowerBeforeBurn: bigint;
  daoPoints: bigint;
  airdropRights: bigint;
}

export interface BurnCertificate extends IssueCertificateParams {
  id: number;
  /** Seconds since Unix epoch. */
  createdAt: number;
}

export interface CertificateRegistry extends Addressable, Checkpointable {
  /** Persist a burn record. Only the bound engine may call. Returns the record id. */
  issue(caller: Address, params: IssueCertificateParams): number;
}
