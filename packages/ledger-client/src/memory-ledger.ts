/**
 * In-process fungible token ledger.
 *
 * Balances, allowances and burn statistics live in Maps. The full
 * initial supply is minted to the owner at construction and counts
 * toward totalMinted. After that only the bound minter (the reward
 * engine) can create supply.
 *
 * Every method validates before it mutates, so a failed call leaves
 * nothing half-applied. checkpoint() copies the maps; fine at the
 * participant counts this targets.
 */

import {
  AuthorizationError,
  INITIAL_SUPPLY,
  StateError,
  TOKEN_DECIMALS,
  ValidationError,
  requireAddress,
  type Address,
} from "@emberstake/emission";
import { OneTimeBinding } from "./binding.js";
import type { Addressable, Ledger, Restore } from "./types.js";

export interface MemoryLedgerOptions {
  address: Address;
  owner: Address;
  /** Minted to the owner at construction. Default: 21M tokens. */
  initialSupply?: bigint;
  name?: string;
  symbol?: string;
}

function requireNonNegative(amount: bigint): bigint {
  if (amount < 0n) {
    throw new ValidationError("negative_amount", "amount must not be negative", {
      value: amount.toString(),
    });
  }
  return amount;
}

export class MemoryLedger implements Ledger {
  readonly address: Address;
  readonly owner: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals = TOKEN_DECIMALS;

  private balances = new Map<Address, bigint>();
  private allowances = new Map<string, bigint>();
  private burnedBy = new Map<Address, bigint>();
  private minted = 0n;
  private burned = 0n;
  private supply = 0n;
  private readonly minter = new OneTimeBinding<Addressable>("ledger.minter");

  constructor(opts: MemoryLedgerOptions) {
    this.address = requireAddress(opts.address, "address");
    this.owner = requireAddress(opts.owner, "owner");
    this.name = opts.name ?? "Emberstake";
    this.symbol = opts.symbol ?? "EMB";
    this.credit(this.owner, opts.initialSupply ?? INITIAL_SUPPLY);
  }

  // ── Administration ───────────────────────────────────────────────

  /** Bind the only identity allowed to mint. Owner only, once. */
  setMinter(caller: Address, minter: Addressable | null): void {
    this.requireOwner(caller);
    this.minter.bind(minter);
  }

  minterAddress(): Address {
    return this.minter.address;
  }

  // ── Reads ────────────────────────────────────────────────────────

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  burnedAmountOf(account: Address): bigint {
    return this.burnedBy.get(account) ?? 0n;
  }

  totalMinted(): bigint {
    return this.minted;
  }

  totalBurned(): bigint {
    return this.burned;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  // ── Holder operations ────────────────────────────────────────────

  transfer(from: Address, to: Address, amount: bigint): void {
    requireNonNegative(amount);
    requireAddress(to, "to");
    this.requireBalance(from, amount);
    this.move(from, to, amount);
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    requireNonNegative(amount);
    requireAddress(spender, "spender");
    this.allowances.set(allowanceKey(owner, spender), amount);
  }

  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): void {
    requireNonNegative(amount);
    requireAddress(to, "to");
    this.requireAllowance(from, spender, amount);
    this.requireBalance(from, amount);
    this.spendAllowance(from, spender, amount);
    this.move(from, to, amount);
  }

  burn(from: Address, amount: bigint): void {
    requireNonNegative(amount);
    this.requireBalance(from, amount);
    this.destroy(from, amount);
  }

  // ── Ledger port ──────────────────────────────────────────────────

  transferIn(custodian: Address, from: Address, amount: bigint): void {
    this.transferFrom(custodian, from, custodian, amount);
  }

  transferOut(custodian: Address, to: Address, amount: bigint): void {
    this.transfer(custodian, to, amount);
  }

  mint(caller: Address, to: Address, amount: bigint): void {
    if (!this.minter.isBoundTo(caller)) {
      throw new AuthorizationError("not_minter", "ledger: caller is not the minter", { caller });
    }
    requireNonNegative(amount);
    requireAddress(to, "to");
    this.credit(to, amount);
  }

  burnFrom(spender: Address, from: Address, amount: bigint): void {
    requireNonNegative(amount);
    this.requireAllowance(from, spender, amount);
    this.requireBalance(from, amount);
    this.spendAllowance(from, spender, amount);
    this.destroy(from, amount);
  }

  // ── Transactions ─────────────────────────────────────────────────

  checkpoint(): Restore {
    const balances = new Map(this.balances);
    const allowances = new Map(this.allowances);
    const burnedBy = new Map(this.burnedBy);
    const { minted, burned, supply } = this;
    return () => {
      this.balances = balances;
      this.allowances = allowances;
      this.burnedBy = burnedBy;
      this.minted = minted;
      this.burned = burned;
      this.supply = supply;
    };
  }

  // ── Internals ────────────────────────────────────────────────────

  private requireOwner(caller: Address): void {
    if (caller !== this.owner) {
      throw new AuthorizationError("not_owner", "ledger: caller is not the owner", { caller });
    }
  }

  private requireBalance(account: Address, amount: bigint): void {
    const balance = this.balanceOf(account);
    if (balance < amount) {
      throw new StateError("insufficient_balance", "ledger: insufficient balance", {
        account,
        balance: balance.toString(),
        needed: amount.toString(),
      });
    }
  }

  private requireAllowance(owner: Address, spender: Address, amount: bigint): void {
    const allowed = this.allowance(owner, spender);
    if (allowed < amount) {
      throw new StateError("insufficient_allowance", "ledger: insufficient allowance", {
        owner,
        spender,
        allowance: allowed.toString(),
        needed: amount.toString(),
      });
    }
  }

  private spendAllowance(owner: Address, spender: Address, amount: bigint): void {
    const key = allowanceKey(owner, spender);
    this.allowances.set(key, (this.allowances.get(key) ?? 0n) - amount);
  }

  private move(from: Address, to: Address, amount: bigint): void {
    this.balances.set(from, this.balanceOf(from) - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  private credit(to: Address, amount: bigint): void {
    this.balances.set(to, this.balanceOf(to) + amount);
    this.minted += amount;
    this.supply += amount;
  }

  private destroy(from: Address, amount: bigint): void {
    this.balances.set(from, this.balanceOf(from) - amount);
    this.burnedBy.set(from, this.burnedAmountOf(from) + amount);
    this.burned += amount;
    this.supply -= amount;
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${owner}:${spender}`;
}
