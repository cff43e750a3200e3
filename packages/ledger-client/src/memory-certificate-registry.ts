/**
 * In-process burn certificate registry.
 *
 * Sequential ids from 1. Each certificate has a holder (initially the
 * burner) who can transfer it; the record content never changes.
 * Per-holder enumeration removes by swap-with-last, so index order is
 * not stable across transfers.
 */

import {
  AuthorizationError,
  StateError,
  requireAddress,
  type Address,
} from "@emberstake/emission";
import { OneTimeBinding } from "./binding.js";
import {
  systemClock,
  type Addressable,
  type BurnCertificate,
  type CertificateRegistry,
  type Clock,
  type IssueCertificateParams,
  type Restore,
} from "./types.js";

export interface MemoryCertificateRegistryOptions {
  address: Address;
  owner: Address;
  clock?: Clock;
}

export class MemoryCertificateRegistry implements CertificateRegistry {
  readonly address: Address;
  readonly owner: Address;

  private readonly clock: Clock;
  private records = new Map<number, BurnCertificate>();
  private holders = new Map<number, Address>();
  private byHolder = new Map<Address, number[]>();
  private nextId = 1;
  private readonly engine = new OneTimeBinding<Addressable>("certificates.engine");

  constructor(opts: MemoryCertificateRegistryOptions) {
    this.address = requireAddress(opts.address, "address");
    this.owner = requireAddress(opts.owner, "owner");
    this.clock = opts.clock ?? systemClock;
  }

  /** Bind the only identity allowed to issue. Owner only, once. */
  setRewardEngine(caller: Address, engine: Addressable | null): void {
    if (caller !== this.owner) {
      throw new AuthorizationError("not_owner", "certificates: caller is not the owner", { caller });
    }
    this.engine.bind(engine);
  }

  issue(caller: Address, params: IssueCertificateParams): number {
    if (!this.engine.isBoundTo(caller)) {
      throw new AuthorizationError("not_engine", "certificates: caller is not the reward engine", {
        caller,
      });
    }
    requireAddress(params.burner, "burner");

    const id = this.nextId++;
    this.records.set(id, { ...params, id, createdAt: this.clock.now() });
    this.holders.set(id, params.burner);
    this.byHolder.set(params.burner, [...this.heldBy(params.burner), id]);
    return id;
  }

  details(id: number): BurnCertificate {
    const record = this.records.get(id);
    if (!record) {
      throw new StateError("record_not_found", `certificates: no record ${id}`, { id });
    }
    return { ...record };
  }

  holderOf(id: number): Address {
    const holder = this.holders.get(id);
    if (holder === undefined) {
      throw new StateError("record_not_found", `certificates: no record ${id}`, { id });
    }
    return holder;
  }

  balanceOf(holder: Address): number {
    return this.heldBy(holder).length;
  }

  recordOfOwnerByIndex(holder: Address, index: number): number {
    const held = this.heldBy(holder);
    const id = held[index];
    if (!Number.isInteger(index) || id === undefined) {
      throw new StateError("index_out_of_range", "certificates: index out of range", {
        holder,
        index,
        balance: held.length,
      });
    }
    return id;
  }

  recordsOf(holder: Address): BurnCertificate[] {
    return this.heldBy(holder).map((id) => this.details(id));
  }

  totalIssued(): number {
    return this.nextId - 1;
  }

  /** Move a certificate. Only its current holder may call. */
  transfer(caller: Address, from: Address, to: Address, id: number): void {
    const holder = this.holderOf(id);
    if (holder !== from) {
      throw new StateError("wrong_holder", `certificates: ${from} does not hold record ${id}`, {
        id,
        holder,
      });
    }
    if (caller !== holder) {
      throw new AuthorizationError("not_holder", "certificates: caller does not hold the record", {
        id,
        caller,
      });
    }
    requireAddress(to, "to");

    const held = [...this.heldBy(from)];
    const pos = held.indexOf(id);
    const last = held.pop();
    if (last !== undefined && pos < held.length) held[pos] = last;
    this.byHolder.set(from, held);
    this.byHolder.set(to, [...this.heldBy(to), id]);
    this.holders.set(id, to);
  }

  checkpoint(): Restore {
    const records = new Map(this.records);
    const holders = new Map(this.holders);
    const byHolder = new Map(this.byHolder);
    const nextId = this.nextId;
    return () => {
      this.records = records;
      this.holders = holders;
      this.byHolder = byHolder;
      this.nextId = nextId;
    };
  }

  private heldBy(holder: Address): readonly number[] {
    return this.byHolder.get(holder) ?? [];
  }
}
