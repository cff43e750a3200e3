/**
 * Reward engine: staking, claims, cooldown, burn boost.
 *
 * Clock starts at START; nobody has claimed, so the first claim's
 * elapsed time is far past the 24h cap.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AuthorizationError, StateError, ValidationError } from "@emberstake/emission";
import {
  REWARD_CLAIMED_EVENT,
  SHIELD_GRANTED_EVENT,
  STAKED_EVENT,
  UNSTAKED_EVENT,
} from "../src/event-log/schemas.js";
import {
  ALICE,
  BOB,
  CAROL,
  DAY,
  OWNER,
  createHarness,
  tokens,
  type Harness,
} from "./helpers.js";

let h: Harness;

beforeEach(() => {
  h = createHarness();
});

describe("stake / unstake", () => {
  it("moves tokens into custody and tracks totals", () => {
    h.stake(ALICE, tokens(100n));
    const { engine, ledger } = h.system;

    expect(engine.accountOf(ALICE)).toEqual({ stakedAmount: tokens(100n), lastClaimTimestamp: 0 });
    expect(engine.totalStaked()).toBe(tokens(100n));
    expect(ledger.balanceOf(ALICE)).toBe(0n);
    expect(ledger.balanceOf(engine.address)).toBe(tokens(100n));

    const [staked] = h.system.events.getEventsByType(STAKED_EVENT);
    expect(staked?.payload).toEqual({ account: ALICE, amount: "100000000000000000000" });
  });

  it("unstake returns tokens and keeps lastClaimTimestamp", () => {
    h.stake(ALICE, tokens(100n));
    h.system.engine.claimReward(ALICE);
    const claimedAt = h.clock.now();

    h.system.engine.unstake(ALICE, tokens(40n));
    expect(h.system.engine.accountOf(ALICE)).toEqual({
      stakedAmount: tokens(60n),
      lastClaimTimestamp: claimedAt,
    });
    expect(h.system.ledger.balanceOf(h.system.engine.address)).toBe(tokens(60n));
    expect(h.system.events.getEventsByType(UNSTAKED_EVENT)).toHaveLength(1);
  });

  it("rejects non-positive amounts", () => {
    expect(() => h.system.engine.stake(ALICE, 0n)).toThrow(ValidationError);
    expect(() => h.system.engine.unstake(ALICE, -1n)).toThrow(ValidationError);
  });

  it("unstaking more than staked is a StateError", () => {
    h.stake(ALICE, tokens(10n));
    try {
      h.system.engine.unstake(ALICE, tokens(11n));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(StateError);
      expect(err).toMatchObject({ code: "insufficient_stake" });
    }
    expect(h.system.engine.totalStaked()).toBe(tokens(10n));
  });

  it("stake without allowance rolls back the bookkeeping", () => {
    h.fund(ALICE, tokens(10n));
    expect(() => h.system.engine.stake(ALICE, tokens(10n))).toThrow(StateError);
    expect(h.system.engine.accountOf(ALICE).stakedAmount).toBe(0n);
    expect(h.system.engine.totalStaked()).toBe(0n);
    expect(h.system.events.getEventCount()).toBe(0);
  });

  it("accountOf hands out copies", () => {
    h.stake(ALICE, tokens(10n));
    const { engine } = h.system;

    Object.assign(engine.accountOf(ALICE), { stakedAmount: tokens(99n) });
    Object.assign(engine.accountOf(BOB), { stakedAmount: tokens(5n) });

    expect(engine.accountOf(ALICE).stakedAmount).toBe(tokens(10n));
    expect(engine.accountOf(CAROL)).toEqual({ stakedAmount: 0n, lastClaimTimestamp: 0 });
    expect(engine.accountOf(BOB)).not.toBe(engine.accountOf(BOB));
    expect(engine.totalStaked()).toBe(tokens(10n));
  });

  it("sum of stakes equals totalStaked across mixed operations", () => {
    h.stake(ALICE, tokens(100n));
    h.stake(BOB, tokens(250n));
    h.stake(CAROL, tokens(7n));
    h.system.engine.unstake(BOB, tokens(50n));
    h.stake(ALICE, tokens(3n));
    h.system.engine.unstake(CAROL, tokens(7n));
    expect(() => h.system.engine.unstake(ALICE, tokens(1_000n))).toThrow(StateError);

    const { engine } = h.system;
    const sum = [ALICE, BOB, CAROL].reduce((acc, a) => acc + engine.accountOf(a).stakedAmount, 0n);
    expect(sum).toBe(engine.totalStaked());
    expect(engine.totalStaked()).toBe(tokens(303n));
  });
});

describe("claimReward", () => {
  it("stake 100, wait 24h, Common ⇒ 72 tokens", () => {
    h.stake(ALICE, tokens(100n));
    h.clock.advance(DAY);
    h.nextTier(ALICE, 0);

    const result = h.system.engine.claimReward(ALICE);
    expect(result.stakeBoost).toBe(3n);
    expect(result.effectiveMintPower).toBe(tokens(72n));
    expect(result.finalReward).toBe(tokens(72n));
    expect(result.tier.name).toBe("Common");
    expect(result.cooldownSeconds).toBe(900);
    expect(h.system.ledger.balanceOf(ALICE)).toBe(tokens(72n));
  });

  it("burn 100, stake 100, wait 24h, Common ⇒ 576 tokens", () => {
    h.fund(ALICE, tokens(100n));
    h.system.ledger.burn(ALICE, tokens(100n));
    h.stake(ALICE, tokens(100n));
    h.clock.advance(DAY);
    h.nextTier(ALICE, 0);

    const result = h.system.engine.claimReward(ALICE);
    expect(result.burnBoostScaled).toBe(80_000_000_000n);
    expect(result.effectiveMintPower).toBe(tokens(576n));
    expect(result.finalReward).toBe(tokens(576n));
  });

  it("Rare multiplies by 1.8", () => {
    h.stake(ALICE, tokens(100n));
    h.nextTier(ALICE, 1);
    expect(h.system.engine.claimReward(ALICE).finalReward).toBe(129_600_000_000_000_000_000n);
  });

  it("enforces the cooldown: fails at 887s, succeeds at 888s", () => {
    h.stake(ALICE, tokens(100n));
    h.nextTier(ALICE, 0);
    h.system.engine.claimReward(ALICE);
    expect(h.system.engine.cooldown()).toBe(888);

    try {
      h.system.engine.claimReward(ALICE);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(StateError);
      expect(err).toMatchObject({ code: "cooldown_active" });
    }

    h.clock.advance(887);
    expect(() => h.system.engine.claimReward(ALICE)).toThrow(StateError);

    h.clock.advance(1);
    h.nextTier(ALICE, 0);
    const second = h.system.engine.claimReward(ALICE);
    expect(second.elapsedSeconds).toBe(888);
    expect(second.cooldownSeconds).toBe(888);
    // 888s of a 1 token/h rate, ×3 stake boost
    expect(second.effectiveMintPower).toBe(739_999_999_999_999_998n);
    expect(h.system.engine.nonceOf(ALICE)).toBe(2n);
  });

  it("without stake is a StateError", () => {
    try {
      h.system.engine.claimReward(ALICE);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(StateError);
      expect(err).toMatchObject({ code: "no_active_stake" });
    }
  });

  it("records the claim", () => {
    h.stake(ALICE, tokens(100n));
    h.nextTier(ALICE, 0);
    h.system.engine.claimReward(ALICE);

    const [claimed] = h.system.events.getEventsByType(REWARD_CLAIMED_EVENT);
    expect(claimed?.payload).toEqual({
      account: ALICE,
      elapsed_seconds: h.clock.now(),
      staked_amount: "100000000000000000000",
      effective_mint_power: "72000000000000000000",
      final_reward: "72000000000000000000",
      tier_id: 0,
      cooldown_seconds: 900,
    });
  });

  it("more claimants shorten the cooldown", () => {
    for (const account of [ALICE, BOB, CAROL]) {
      h.stake(account, tokens(1n));
      h.system.engine.claimReward(account);
    }
    expect(h.system.engine.activeCount()).toBe(3);
    expect(h.system.engine.cooldown()).toBe(864);
  });

  it("Epic grants a shield once; a second Epic changes nothing", () => {
    h.stake(ALICE, tokens(100n));
    h.nextTier(ALICE, 2);
    expect(h.system.engine.claimReward(ALICE).finalReward).toBe(tokens(252n));
    expect(h.system.halving.hasShield(ALICE)).toBe(true);

    h.clock.advance(DAY);
    h.nextTier(ALICE, 2);
    h.system.engine.claimReward(ALICE);
    expect(h.system.halving.hasShield(ALICE)).toBe(true);
    expect(h.system.halving.status().shieldHolders).toBe(1);
    expect(h.system.events.getEventsByType(SHIELD_GRANTED_EVENT)).toHaveLength(1);
  });

  it("Legendary reduces the halving rate by 3", () => {
    h.stake(ALICE, tokens(100n));
    h.nextTier(ALICE, 3);
    expect(h.system.engine.claimReward(ALICE).finalReward).toBe(tokens(576n));
    expect(h.system.halving.status().keyEffectPercent).toBe(3);
    expect(h.system.halving.adjustedRate()).toBe(47);
  });
});

describe("boostBurn", () => {
  beforeEach(() => {
    h.stake(ALICE, tokens(100n));
    h.fund(ALICE, tokens(8n));
    h.system.ledger.approve(ALICE, h.system.engine.address, tokens(8n));
  });

  it("snapshots mint power from the cumulative burn before this burn", () => {
    const { engine, certificates, ledger } = h.system;

    const first = engine.boostBurn(ALICE, tokens(4n));
    const second = engine.boostBurn(ALICE, tokens(4n));
    expect([first, second]).toEqual([1, 2]);

    expect(certificates.details(first).mintPowerBeforeBurn).toBe(tokens(72n));
    expect(certificates.details(second).mintPowerBeforeBurn).toBe(172_800_000_000_000_000_000n);
    expect(certificates.details(second)).toMatchObject({
      burner: ALICE,
      amountBurned: tokens(4n),
      daoPoints: 16n,
      airdropRights: 4n,
      createdAt: h.clock.now(),
    });
    expect(ledger.burnedAmountOf(ALICE)).toBe(tokens(8n));
    expect(ledger.balanceOf(ALICE)).toBe(0n);
  });

  it("insufficient allowance propagates and burns nothing", () => {
    expect(() => h.system.engine.boostBurn(ALICE, tokens(9n))).toThrow(StateError);
    expect(h.system.ledger.totalBurned()).toBe(0n);
    expect(h.system.certificates.totalIssued()).toBe(0);
  });

  it("rejects zero", () => {
    expect(() => h.system.engine.boostBurn(ALICE, 0n)).toThrow(ValidationError);
  });
});

describe("setCertificateRegistry", () => {
  it("is owner-only and rebinding the same registry is a no-op", () => {
    const { engine, certificates } = h.system;
    expect(() => engine.setCertificateRegistry(ALICE, certificates)).toThrow(AuthorizationError);
    engine.setCertificateRegistry(OWNER, certificates);
    expect(engine.certificateRegistryAddress()).toBe(certificates.address);
  });
});

describe("stakeBoostOf", () => {
  it("maps decade brackets", () => {
    const { engine } = h.system;
    expect(engine.stakeBoostOf(0n)).toBe(1n);
    expect(engine.stakeBoostOf(tokens(8n))).toBe(1n);
    expect(engine.stakeBoostOf(tokens(9n))).toBe(2n);
    expect(engine.stakeBoostOf(tokens(100n))).toBe(3n);
  });
});
