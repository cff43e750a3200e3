/**
 * Reward engine: stake custody, cooldown-gated claims, burn boosts.
 *
 * claim:
 *   cooldown gate → activity refresh → time reward × stake boost × burn
 *   boost → tier draw → commit timestamp → mint → tier side effect → event
 *
 * Every public mutation runs through one Transactor: all participants
 * (accounts, activity, nonces, halving, ledger, certificates, event log)
 * are checkpointed on entry and restored together on any failure. Local
 * bookkeeping is written before the collaborator call it pays for.
 */

import {
  AuthorizationError,
  DEFAULT_BASE_RATE_PER_HOUR,
  LEGENDARY_RATE_REDUCTION_PCT,
  StateError,
  airdropRightsFor,
  computeMintPower,
  cooldownSeconds,
  daoPointsFor,
  mintPowerSnapshot,
  nextClaimAt,
  requireAddress,
  requirePositive,
  stakeBoostOf,
  timeReward,
  type Address,
  type TierBand,
} from "@emberstake/emission";
import {
  OneTimeBinding,
  systemClock,
  type CertificateRegistry,
  type Checkpointable,
  type Clock,
  type Ledger,
  type Restore,
} from "@emberstake/ledger-client";
import { ActivityTracker } from "./activity-tracker.js";
import type { EntropySource } from "./entropy.js";
import type { EventLog } from "./event-log/writer.js";
import {
  BURNED_FOR_BOOST_EVENT,
  REWARD_CLAIMED_EVENT,
  STAKED_EVENT,
  UNSTAKED_EVENT,
} from "./event-log/schemas.js";
import type { HalvingController, StakeSource } from "./halving-controller.js";
import { silentLogger, type Logger } from "./logger.js";
import { RandomTierSelector } from "./tier-selector.js";
import { Transactor } from "./transaction.js";

export interface ParticipantAccount {
  readonly stakedAmount: bigint;
  /** Seconds; 0 until the first claim. */
  readonly lastClaimTimestamp: number;
}

export interface RewardEngineOptions {
  address: Address;
  owner: Address;
  ledger: Ledger;
  halving: HalvingController;
  events: EventLog;
  entropy: EntropySource;
  clock?: Clock;
  /** Wei per hour of wait. Default: 1 token. */
  baseRatePerHour?: bigint;
  logger?: Logger;
}

export interface ClaimResult {
  elapsedSeconds: number;
  cooldownSeconds: number;
  stakeBoost: bigint;
  burnBoostScaled: bigint;
  effectiveMintPower: bigint;
  finalReward: bigint;
  tier: TierBand;
}

export class RewardEngine implements StakeSource, Checkpointable {
  readonly address: Address;
  readonly owner: Address;
  readonly baseRatePerHour: bigint;

  private readonly ledger: Ledger;
  private readonly halving: HalvingController;
  private readonly events: EventLog;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly tracker = new ActivityTracker();
  private readonly selector: RandomTierSelector;
  private readonly certificates = new OneTimeBinding<CertificateRegistry>("engine.certificates");
  private readonly tx: Transactor;

  private accounts = new Map<Address, ParticipantAccount>();
  private staked = 0n;

  constructor(opts: RewardEngineOptions) {
    this.address = requireAddress(opts.address, "address");
    this.owner = requireAddress(opts.owner, "owner");
    this.ledger = opts.ledger;
    this.halving = opts.halving;
    this.events = opts.events;
    this.clock = opts.clock ?? systemClock;
    this.log = opts.logger ?? silentLogger;
    this.baseRatePerHour = requirePositive(opts.baseRatePerHour ?? DEFAULT_BASE_RATE_PER_HOUR, "baseRatePerHour");
    this.selector = new RandomTierSelector(opts.entropy);
    this.tx = new Transactor("engine", () => this.participants());
  }

  // ── Administration ───────────────────────────────────────────────

  /** Bind the burn certificate registry. Owner only, once. */
  setCertificateRegistry(caller: Address, registry: CertificateRegistry | null): void {
    if (caller !== this.owner) {
      throw new AuthorizationError("not_owner", "engine: caller is not the owner", { caller });
    }
    this.certificates.bind(registry);
  }

  certificateRegistryAddress(): Address {
    return this.certificates.address;
  }

  // ── Staking ──────────────────────────────────────────────────────

  stake(account: Address, amount: bigint): void {
    this.tx.run(() => {
      requireAddress(account, "account");
      requirePositive(amount, "amount");

      const current = this.accountOf(account);
      this.accounts.set(account, { ...current, stakedAmount: current.stakedAmount + amount });
      this.staked += amount;
      this.ledger.transferIn(this.address, account, amount);

      this.events.append(STAKED_EVENT, { account, amount: amount.toString() });
      this.log.info({ account, amount: amount.toString() }, "staked");
    });
  }

  unstake(account: Address, amount: bigint): void {
    this.tx.run(() => {
      requireAddress(account, "account");
      requirePositive(amount, "amount");

      const current = this.accountOf(account);
      if (amount > current.stakedAmount) {
        throw new StateError("insufficient_stake", "engine: unstake exceeds staked amount", {
          account,
          staked: current.stakedAmount.toString(),
          requested: amount.toString(),
        });
      }
      this.accounts.set(account, { ...current, stakedAmount: current.stakedAmount - amount });
      this.staked -= amount;
      this.ledger.transferOut(this.address, account, amount);

      this.events.append(UNSTAKED_EVENT, { account, amount: amount.toString() });
      this.log.info({ account, amount: amount.toString() }, "unstaked");
    });
  }

  // ── Claims ───────────────────────────────────────────────────────

  claimReward(account: Address): ClaimResult {
    return this.tx.run(() => {
      requireAddress(account, "account");
      const now = this.clock.now();
      const current = this.accountOf(account);
      if (current.stakedAmount === 0n) {
        throw new StateError("no_active_stake", "engine: no active stake", { account });
      }

      const cooldown = this.cooldown();
      const readyAt = nextClaimAt(current.lastClaimTimestamp, this.tracker.activeCount());
      if (now < readyAt) {
        throw new StateError("cooldown_active", "engine: cooldown not yet passed", {
          account,
          readyAt,
          remaining: readyAt - now,
        });
      }

      this.tracker.refresh(account, now);
      const elapsedSeconds = now - current.lastClaimTimestamp;
      const power = computeMintPower({
        timeReward: timeReward(BigInt(elapsedSeconds), this.baseRatePerHour),
        stakedAmount: current.stakedAmount,
        cumulativeBurned: this.ledger.burnedAmountOf(account),
      });
      const { tier, finalReward } = this.selector.draw(account, power.effectiveMintPower, now);

      this.accounts.set(account, { ...current, lastClaimTimestamp: now });
      this.ledger.mint(this.address, account, finalReward);
      this.applyTierEffect(tier, account);

      this.events.append(REWARD_CLAIMED_EVENT, {
        account,
        elapsed_seconds: elapsedSeconds,
        staked_amount: current.stakedAmount.toString(),
        effective_mint_power: power.effectiveMintPower.toString(),
        final_reward: finalReward.toString(),
        tier_id: tier.id,
        cooldown_seconds: cooldown,
      });
      this.log.info(
        { account, tier: tier.name, reward: finalReward.toString(), elapsedSeconds },
        "reward claimed",
      );

      return {
        elapsedSeconds,
        cooldownSeconds: cooldown,
        stakeBoost: power.stakeBoost,
        burnBoostScaled: power.burnBoostScaled,
        effectiveMintPower: power.effectiveMintPower,
        finalReward,
        tier,
      };
    });
  }

  /** Current claim cooldown in seconds, from the active-participant count. */
  cooldown(): number {
    return cooldownSeconds(this.tracker.activeCount());
  }

  /** Earliest timestamp at which `account` may claim again. */
  nextClaimAt(account: Address): number {
    return nextClaimAt(this.accountOf(account).lastClaimTimestamp, this.tracker.activeCount());
  }

  // ── Burn boost ───────────────────────────────────────────────────

  /** Burn `amount` for a permanent boost. Returns the certificate id. */
  boostBurn(account: Address, amount: bigint): number {
    return this.tx.run(() => {
      requireAddress(account, "account");
      requirePositive(amount, "amount");
      const registry = this.certificates.require();

      this.ledger.burnFrom(this.address, account, amount);
      const cumulativeBefore = this.ledger.burnedAmountOf(account) - amount;
      const mintPowerBeforeBurn = mintPowerSnapshot(
        this.baseRatePerHour,
        this.accountOf(account).stakedAmount,
        cumulativeBefore,
      );

      const recordId = registry.issue(this.address, {
        burner: account,
        amountBurned: amount,
        mintPowerBeforeBurn,
        daoPoints: daoPointsFor(amount),
        airdropRights: airdropRightsFor(amount),
      });

      this.events.append(BURNED_FOR_BOOST_EVENT, {
        account,
        amount: amount.toString(),
        record_id: recordId,
      });
      this.log.info({ account, amount: amount.toString(), recordId }, "burned for boost");
      return recordId;
    });
  }

  // ── Reads ────────────────────────────────────────────────────────

  stakeBoostOf(stakedAmount: bigint): bigint {
    return stakeBoostOf(stakedAmount);
  }

  /** Copy of the account; a fresh zero account if never staked. */
  accountOf(account: Address): ParticipantAccount {
    const stored = this.accounts.get(account);
    return stored ? { ...stored } : { stakedAmount: 0n, lastClaimTimestamp: 0 };
  }

  totalStaked(): bigint {
    return this.staked;
  }

  activeCount(): number {
    return this.tracker.activeCount();
  }

  nonceOf(account: Address): bigint {
    return this.selector.nonceOf(account);
  }

  checkpoint(): Restore {
    const accounts = new Map(this.accounts);
    const staked = this.staked;
    return () => {
      this.accounts = accounts;
      this.staked = staked;
    };
  }

  // ── Internals ────────────────────────────────────────────────────

  private applyTierEffect(tier: TierBand, account: Address): void {
    switch (tier.effect) {
      case "shield":
        this.halving.grantShield(this.address, account);
        break;
      case "rate_reduction":
        this.halving.reduceRate(this.address, LEGENDARY_RATE_REDUCTION_PCT);
        break;
      case "none":
        break;
    }
  }

  private participants(): Checkpointable[] {
    const registry = this.certificates.get();
    return [
      this,
      this.tracker,
      this.selector,
      this.halving,
      this.ledger,
      this.events,
      ...(registry ? [registry] : []),
    ];
  }
}
