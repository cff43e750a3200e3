/**
 * BurnBoostRecord: the certificate persisted for every boost burn.
 * Content is immutable once issued; only the holder can change.
 */

import { Type, type Static } from "@sinclair/typebox";
import { AddressSchema, AmountString } from "./records.js";

export const BurnBoostRecordV1 = Type.Object(
  {
    id: Type.Integer({ minimum: 1 }),
    burner: AddressSchema,
    amount_burned: AmountString,
    mint_power_before_burn: AmountString,
    /** amount_burned (whole tokens) × 4 */
    dao_points: AmountString,
    /** amount_burned (whole tokens) × 1 */
    airdrop_rights: AmountString,
    /** Seconds since Unix epoch. */
    created_at: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export type BurnBoostRecordV1 = Static<typeof BurnBoostRecordV1>;
