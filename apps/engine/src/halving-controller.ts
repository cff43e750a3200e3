/**
 * Adaptive halving controller.
 *
 * Holds the halving threshold, count and cumulative "key effect" (rate
 * reduction from Legendary draws), plus the set of shield holders.
 * Mutations are open to the owner and to the bound reward engine only.
 *
 * The reward engine doubles as the stake source for adjustedRate().
 */

import {
  AuthorizationError,
  INITIAL_HALVING_THRESHOLD,
  StateError,
  ValidationError,
  adjustedHalvingRate,
  isHalvingDue,
  nextHalvingThreshold,
  requireAddress,
  type Address,
} from "@emberstake/emission";
import {
  OneTimeBinding,
  type Addressable,
  type Checkpointable,
  type Ledger,
  type Restore,
} from "@emberstake/ledger-client";
import type { EventLog } from "./event-log/writer.js";
import {
  HALVING_TRIGGERED_EVENT,
  RATE_REDUCED_EVENT,
  SHIELD_CONSUMED_EVENT,
  SHIELD_GRANTED_EVENT,
} from "./event-log/schemas.js";
import { silentLogger, type Logger } from "./logger.js";
import { Transactor } from "./transaction.js";

/** Whatever reports the global staked total (the reward engine). */
export interface StakeSource extends Addressable {
  totalStaked(): bigint;
}

export interface HalvingControllerOptions {
  address: Address;
  owner: Address;
  ledger: Ledger;
  events: EventLog;
  logger?: Logger;
}

export interface HalvingStatus {
  currentThreshold: bigint;
  halvingCount: number;
  keyEffectPercent: number;
  shieldHolders: number;
}

interface HalvingState {
  currentThreshold: bigint;
  halvingCount: number;
  keyEffectPercent: bigint;
  shieldHolders: ReadonlySet<Address>;
}

export class HalvingController implements Checkpointable {
  readonly address: Address;
  readonly owner: Address;

  private readonly ledger: Ledger;
  private readonly events: EventLog;
  private readonly log: Logger;
  private readonly engine = new OneTimeBinding<StakeSource>("halving.engine");
  private readonly tx: Transactor;
  private state: HalvingState = {
    currentThreshold: INITIAL_HALVING_THRESHOLD,
    halvingCount: 0,
    keyEffectPercent: 0n,
    shieldHolders: new Set(),
  };

  constructor(opts: HalvingControllerOptions) {
    this.address = requireAddress(opts.address, "address");
    this.owner = requireAddress(opts.owner, "owner");
    this.ledger = opts.ledger;
    this.events = opts.events;
    this.log = opts.logger ?? silentLogger;
    this.tx = new Transactor("halving", () => [this, this.events]);
  }

  /** Bind the reward engine (authorized caller + stake source). Owner only, once. */
  setRewardEngine(caller: Address, engine: StakeSource | null): void {
    if (caller !== this.owner) {
      throw new AuthorizationError("not_owner", "halving: caller is not the owner", { caller });
    }
    this.engine.bind(engine);
  }

  /**
   * Apply a halving if total minted has reached the threshold.
   * Returns true when one fired.
   */
  checkAndApply(caller: Address): boolean {
    return this.tx.run(() => {
      this.requireAuthorized(caller);
      if (!isHalvingDue(this.ledger.totalMinted(), this.state.currentThreshold)) return false;

      const halvingCount = this.state.halvingCount + 1;
      const currentThreshold = nextHalvingThreshold(this.ledger.totalBurned());
      this.state = { ...this.state, halvingCount, currentThreshold };
      const rate = this.adjustedRate();

      this.events.append(HALVING_TRIGGERED_EVENT, {
        new_threshold: currentThreshold.toString(),
        new_rate_pct: rate,
        halving_count: halvingCount,
      });
      this.log.info(
        { halvingCount, threshold: currentThreshold.toString(), ratePct: rate },
        "halving applied",
      );
      return true;
    });
  }

  grantShield(caller: Address, account: Address): void {
    this.tx.run(() => {
      this.requireAuthorized(caller);
      requireAddress(account, "account");
      if (this.state.shieldHolders.has(account)) return;

      this.state = { ...this.state, shieldHolders: new Set([...this.state.shieldHolders, account]) };
      this.events.append(SHIELD_GRANTED_EVENT, { account });
      this.log.info({ account }, "shield granted");
    });
  }

  consumeShield(caller: Address, account: Address): void {
    this.tx.run(() => {
      this.requireAuthorized(caller);
      if (!this.state.shieldHolders.has(account)) {
        throw new StateError("shield_absent", "halving: account holds no shield", { account });
      }

      const shieldHolders = new Set(this.state.shieldHolders);
      shieldHolders.delete(account);
      this.state = { ...this.state, shieldHolders };
      this.events.append(SHIELD_CONSUMED_EVENT, { account });
      this.log.info({ account }, "shield consumed");
    });
  }

  /** Add `percent` to the cumulative key effect. */
  reduceRate(caller: Address, percent: number): void {
    this.tx.run(() => {
      this.requireAuthorized(caller);
      if (!Number.isInteger(percent) || percent <= 0) {
        throw new ValidationError("non_positive_percent", "halving: percent must be a positive integer", {
          percent,
        });
      }

      const keyEffectPercent = this.state.keyEffectPercent + BigInt(percent);
      this.state = { ...this.state, keyEffectPercent };
      this.events.append(RATE_REDUCED_EVENT, {
        delta_pct: percent,
        cumulative_pct: Number(keyEffectPercent),
      });
      this.log.info({ percent, cumulative: Number(keyEffectPercent) }, "halving rate reduced");
    });
  }

  /** Advisory halving rate in whole percent (0..80). Reported, never applied to emissions. */
  adjustedRate(): number {
    const engine = this.engine.require();
    return Number(
      adjustedHalvingRate({
        totalStaked: engine.totalStaked(),
        totalSupply: this.ledger.totalSupply(),
        keyEffectPercent: this.state.keyEffectPercent,
      }),
    );
  }

  hasShield(account: Address): boolean {
    return this.state.shieldHolders.has(account);
  }

  status(): HalvingStatus {
    return {
      currentThreshold: this.state.currentThreshold,
      halvingCount: this.state.halvingCount,
      keyEffectPercent: Number(this.state.keyEffectPercent),
      shieldHolders: this.state.shieldHolders.size,
    };
  }

  engineAddress(): Address {
    return this.engine.address;
  }

  checkpoint(): Restore {
    const state = this.state;
    return () => {
      this.state = state;
    };
  }

  private requireAuthorized(caller: Address): void {
    if (caller !== this.owner && !this.engine.isBoundTo(caller)) {
      throw new AuthorizationError("not_authorized", "halving: caller is neither owner nor engine", {
        caller,
      });
    }
  }
}
