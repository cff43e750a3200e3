/**
 * HTTP surface tests via app.inject.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { buildApp } from "../src/server.js";
import { ALICE, BOB, OWNER, STRANGER, DAY, createHarness, tokens, type Harness } from "./helpers.js";

type App = Awaited<ReturnType<typeof buildApp>>["app"];

let h: Harness;
let app: App;

beforeEach(async () => {
  h = createHarness();
  ({ app } = await buildApp({ system: h.system, logger: false }));
  h.fund(ALICE, tokens(110n));
  h.system.ledger.approve(ALICE, h.system.engine.address, tokens(110n));
});

afterEach(async () => {
  await app.close();
});

function post(url: string, payload: Record<string, unknown>) {
  return app.inject({ method: "POST", url, payload });
}

describe("staking routes", () => {
  it("stake → account view", async () => {
    const res = await post("/stake", { account: ALICE, amount: tokens(100n).toString() });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, account: ALICE, staked_amount: "100000000000000000000" });

    const view = await app.inject({ method: "GET", url: `/account/${ALICE}` });
    expect(view.json()).toEqual({
      account: ALICE,
      staked_amount: "100000000000000000000",
      last_claim_timestamp: 0,
      next_claim_at: 900,
      balance: "10000000000000000000",
      burned: "0",
      stake_boost: "3",
      has_shield: false,
    });
  });

  it("claim, then cooldown conflict", async () => {
    await post("/stake", { account: ALICE, amount: tokens(100n).toString() });
    h.clock.advance(DAY);
    h.nextTier(ALICE, 0);

    const res = await post("/claim", { account: ALICE });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      tier: "Common",
      tier_id: 0,
      final_reward: "72000000000000000000",
      cooldown_seconds: 900,
    });

    const again = await post("/claim", { account: ALICE });
    expect(again.statusCode).toBe(409);
    expect(again.json()).toEqual({ error: "cooldown_active", detail: "engine: cooldown not yet passed" });

    const cooldown = await app.inject({ method: "GET", url: "/cooldown" });
    expect(cooldown.json()).toEqual({ cooldown_seconds: 888, active_count: 1 });
  });

  it("zero amount is 422, malformed address is 400", async () => {
    const zero = await post("/stake", { account: ALICE, amount: "0" });
    expect(zero.statusCode).toBe(422);
    expect(zero.json()).toMatchObject({ error: "non_positive_amount" });

    const bad = await post("/stake", { account: "alice", amount: "1" });
    expect(bad.statusCode).toBe(400);
    expect(bad.json()).toMatchObject({ error: "invalid_request" });
  });

  it("burn-boost issues a certificate", async () => {
    await post("/stake", { account: ALICE, amount: tokens(100n).toString() });
    const res = await post("/burn-boost", { account: ALICE, amount: tokens(10n).toString() });
    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual({ ok: true, record_id: 1 });

    const list = await app.inject({ method: "GET", url: `/certificates/${ALICE}` });
    expect(list.json()).toMatchObject({ holder: ALICE, count: 1 });

    const one = await app.inject({ method: "GET", url: "/certificate/1" });
    expect(one.json()).toEqual({
      id: 1,
      burner: ALICE,
      holder: ALICE,
      amount_burned: "10000000000000000000",
      mint_power_before_burn: "72000000000000000000",
      dao_points: "40",
      airdrop_rights: "10",
      created_at: h.clock.now(),
    });
  });

  it("unknown certificate is 404", async () => {
    const res = await app.inject({ method: "GET", url: "/certificate/99" });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({ error: "record_not_found" });
  });
});

describe("halving routes", () => {
  it("check by a stranger is 403, by the owner applies", async () => {
    const denied = await post("/halving/check", { caller: STRANGER });
    expect(denied.statusCode).toBe(403);
    expect(denied.json()).toMatchObject({ error: "not_authorized" });

    const res = await post("/halving/check", { caller: OWNER });
    expect(res.json()).toEqual({
      applied: true,
      halving_count: 1,
      current_threshold: "21000000000000000000000000",
    });

    const status = await app.inject({ method: "GET", url: "/halving" });
    expect(status.json()).toMatchObject({ halving_count: 1, adjusted_rate_pct: 50, key_effect_pct: 0 });
  });

  it("consuming an absent shield is 409", async () => {
    const res = await post("/shield/consume", { caller: OWNER, account: ALICE });
    expect(res.statusCode).toBe(409);
    expect(res.json()).toMatchObject({ error: "shield_absent" });
  });
});

describe("events + health", () => {
  it("filters by type and seq", async () => {
    await post("/stake", { account: ALICE, amount: "5" });
    await post("/stake", { account: ALICE, amount: "7" });

    const all = await app.inject({ method: "GET", url: "/events?type=staked.v1" });
    expect(all.json()).toMatchObject({ count: 2 });

    const later = await app.inject({ method: "GET", url: "/events?from=2" });
    expect(later.json()).toMatchObject({ count: 1, events: [{ seq: 2, payload: { amount: "7" } }] });

    const bogus = await app.inject({ method: "GET", url: "/events?type=bogus" });
    expect(bogus.statusCode).toBe(422);
  });

  it("health reports the event count", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "ok", events: 0, engine: h.system.engine.address });
  });
});

describe("ledger routes", () => {
  it("transfer → approve → stake → claim over HTTP alone", async () => {
    const funded = await post("/transfer", { from: OWNER, to: BOB, amount: tokens(110n).toString() });
    expect(funded.statusCode).toBe(200);
    expect(funded.json()).toMatchObject({ ok: true, to: BOB, to_balance: "110000000000000000000" });

    const health = await app.inject({ method: "GET", url: "/health" });
    const spender: unknown = health.json().engine;
    expect(typeof spender).toBe("string");

    const approved = await post("/approve", { owner: BOB, spender, amount: tokens(100n).toString() });
    expect(approved.statusCode).toBe(200);
    expect(approved.json()).toEqual({ ok: true, owner: BOB, spender, allowance: "100000000000000000000" });

    const staked = await post("/stake", { account: BOB, amount: tokens(100n).toString() });
    expect(staked.statusCode).toBe(200);

    h.clock.advance(DAY);
    h.nextTier(BOB, 0);
    const claimed = await post("/claim", { account: BOB });
    expect(claimed.statusCode).toBe(200);
    expect(claimed.json()).toMatchObject({ tier: "Common", final_reward: "72000000000000000000" });

    const balance = await app.inject({ method: "GET", url: `/balance/${BOB}` });
    expect(balance.json()).toEqual({
      account: BOB,
      balance: "82000000000000000000",
      burned: "0",
      engine_allowance: "0",
    });
  });

  it("stake without an allowance is a conflict", async () => {
    await post("/transfer", { from: OWNER, to: BOB, amount: tokens(10n).toString() });
    const res = await post("/stake", { account: BOB, amount: tokens(10n).toString() });
    expect(res.statusCode).toBe(409);
    expect(res.json()).toMatchObject({ error: "insufficient_allowance" });
  });

  it("rejects a malformed transfer body", async () => {
    const res = await post("/transfer", { from: OWNER, to: "nope", amount: "1" });
    expect(res.statusCode).toBe(400);
  });
});
