/**
 * Halving routes.
 *
 *   GET  /halving           threshold, count, key effect, advisory rate, supply totals
 *   POST /halving/check     run checkAndApply as `caller`
 *   POST /shield/consume    consume `account`'s shield as `caller`
 */

import type { FastifyInstance } from "fastify";
import type { System } from "../system.js";
import { CallerBody, ShieldBody } from "./schemas.js";

export function halvingRoutes(app: FastifyInstance, system: System): void {
  const { halving, ledger, engine } = system;

  app.get("/halving", async (_req, reply) => {
    const status = halving.status();
    return reply.send({
      current_threshold: status.currentThreshold.toString(),
      halving_count: status.halvingCount,
      key_effect_pct: status.keyEffectPercent,
      adjusted_rate_pct: halving.adjustedRate(),
      shield_holders: status.shieldHolders,
      total_minted: ledger.totalMinted().toString(),
      total_burned: ledger.totalBurned().toString(),
      total_supply: ledger.totalSupply().toString(),
      total_staked: engine.totalStaked().toString(),
    });
  });

  app.post<{ Body: CallerBody }>(
    "/halving/check",
    { schema: { body: CallerBody } },
    async (req, reply) => {
      const applied = halving.checkAndApply(req.body.caller);
      const status = halving.status();
      return reply.send({
        applied,
        halving_count: status.halvingCount,
        current_threshold: status.currentThreshold.toString(),
      });
    },
  );

  app.post<{ Body: ShieldBody }>(
    "/shield/consume",
    { schema: { body: ShieldBody } },
    async (req, reply) => {
      const { caller, account } = req.body;
      halving.consumeShield(caller, account);
      return reply.send({ ok: true, account });
    },
  );
}
