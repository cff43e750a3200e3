/**
 * Staking routes.
 *
 *   POST /stake         lock tokens (engine must hold an allowance)
 *   POST /unstake       release staked tokens
 *   POST /claim         claim the time/stake/burn-boosted reward
 *   POST /burn-boost    burn for a permanent boost, issues a certificate
 *   GET  /account/:id   stake, claim timing, balances, shield
 *   GET  /cooldown      current cooldown and active count
 */

import type { FastifyInstance } from "fastify";
import type { System } from "../system.js";
import {
  AccountBody,
  AccountParams,
  AmountBody,
} from "./schemas.js";

export function stakingRoutes(app: FastifyInstance, system: System): void {
  const { engine, ledger, halving } = system;

  app.post<{ Body: AmountBody }>("/stake", { schema: { body: AmountBody } }, async (req, reply) => {
    const { account, amount } = req.body;
    engine.stake(account, BigInt(amount));
    return reply.send({
      ok: true,
      account,
      staked_amount: engine.accountOf(account).stakedAmount.toString(),
    });
  });

  app.post<{ Body: AmountBody }>("/unstake", { schema: { body: AmountBody } }, async (req, reply) => {
    const { account, amount } = req.body;
    engine.unstake(account, BigInt(amount));
    return reply.send({
      ok: true,
      account,
      staked_amount: engine.accountOf(account).stakedAmount.toString(),
    });
  });

  app.post<{ Body: AccountBody }>("/claim", { schema: { body: AccountBody } }, async (req, reply) => {
    const { account } = req.body;
    const result = engine.claimReward(account);
    return reply.send({
      ok: true,
      account,
      tier: result.tier.name,
      tier_id: result.tier.id,
      final_reward: result.finalReward.toString(),
      effective_mint_power: result.effectiveMintPower.toString(),
      elapsed_seconds: result.elapsedSeconds,
      cooldown_seconds: result.cooldownSeconds,
    });
  });

  app.post<{ Body: AmountBody }>(
    "/burn-boost",
    { schema: { body: AmountBody } },
    async (req, reply) => {
      const { account, amount } = req.body;
      const recordId = engine.boostBurn(account, BigInt(amount));
      return reply.status(201).send({ ok: true, record_id: recordId });
    },
  );

  app.get<{ Params: AccountParams }>(
    "/account/:id",
    { schema: { params: AccountParams } },
    async (req, reply) => {
      const { id } = req.params;
      const acct = engine.accountOf(id);
      return reply.send({
        account: id,
        staked_amount: acct.stakedAmount.toString(),
        last_claim_timestamp: acct.lastClaimTimestamp,
        next_claim_at: engine.nextClaimAt(id),
        balance: ledger.balanceOf(id).toString(),
        burned: ledger.burnedAmountOf(id).toString(),
        stake_boost: engine.stakeBoostOf(acct.stakedAmount).toString(),
        has_shield: halving.hasShield(id),
      });
    },
  );

  app.get("/cooldown", async (_req, reply) => {
    return reply.send({
      cooldown_seconds: engine.cooldown(),
      active_count: engine.activeCount(),
    });
  });
}
