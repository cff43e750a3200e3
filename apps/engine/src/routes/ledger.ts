/**
 * Token holder routes.
 *
 *   POST /transfer       move tokens from `from` to `to`
 *   POST /approve        set `spender`'s allowance over `owner`'s tokens
 *   GET  /balance/:id    balance, burned total, allowance granted to the engine
 *
 * Staking and burn boosts spend an allowance granted to the engine
 * address, so a holder approves the engine before POST /stake.
 */

import type { FastifyInstance } from "fastify";
import type { System } from "../system.js";
import { AccountParams, ApproveBody, TransferBody } from "./schemas.js";

export function ledgerRoutes(app: FastifyInstance, system: System): void {
  const { ledger, engine } = system;

  app.post<{ Body: TransferBody }>(
    "/transfer",
    { schema: { body: TransferBody } },
    async (req, reply) => {
      const { from, to, amount } = req.body;
      ledger.transfer(from, to, BigInt(amount));
      return reply.send({
        ok: true,
        from,
        to,
        from_balance: ledger.balanceOf(from).toString(),
        to_balance: ledger.balanceOf(to).toString(),
      });
    },
  );

  app.post<{ Body: ApproveBody }>(
    "/approve",
    { schema: { body: ApproveBody } },
    async (req, reply) => {
      const { owner, spender, amount } = req.body;
      ledger.approve(owner, spender, BigInt(amount));
      return reply.send({
        ok: true,
        owner,
        spender,
        allowance: ledger.allowance(owner, spender).toString(),
      });
    },
  );

  app.get<{ Params: AccountParams }>(
    "/balance/:id",
    { schema: { params: AccountParams } },
    async (req, reply) => {
      const { id } = req.params;
      return reply.send({
        account: id,
        balance: ledger.balanceOf(id).toString(),
        burned: ledger.burnedAmountOf(id).toString(),
        engine_allowance: ledger.allowance(id, engine.address).toString(),
      });
    },
  );
}
