/**
 * Burn certificate routes.
 *
 *   GET  /certificates/:holder   every record held, in enumeration order
 *   GET  /certificate/:id        one record plus its current holder
 */

import type { FastifyInstance } from "fastify";
import type { BurnBoostRecordV1 } from "@emberstake/emission";
import type { BurnCertificate } from "@emberstake/ledger-client";
import type { System } from "../system.js";
import { HolderParams, RecordParams } from "./schemas.js";

export function toCertificateRecord(cert: BurnCertificate): BurnBoostRecordV1 {
  return {
    id: cert.id,
    burner: cert.burner,
    amount_burned: cert.amountBurned.toString(),
    mint_power_before_burn: cert.mintPowerBeforeBurn.toString(),
    dao_points: cert.daoPoints.toString(),
    airdrop_rights: cert.airdropRights.toString(),
    created_at: cert.createdAt,
  };
}

export function certificateRoutes(app: FastifyInstance, system: System): void {
  const { certificates } = system;

  app.get<{ Params: HolderParams }>(
    "/certificates/:holder",
    { schema: { params: HolderParams } },
    async (req, reply) => {
      const { holder } = req.params;
      const records = certificates.recordsOf(holder).map(toCertificateRecord);
      return reply.send({ holder, count: records.length, records });
    },
  );

  app.get<{ Params: RecordParams }>(
    "/certificate/:id",
    { schema: { params: RecordParams } },
    async (req, reply) => {
      const { id } = req.params;
      const record = toCertificateRecord(certificates.details(id));
      return reply.send({ ...record, holder: certificates.holderOf(id) });
    },
  );
}
