/**
 * Emitted records: what downstream observers and indexers consume.
 * Amounts travel as decimal wei strings (JSON has no bigint).
 */

import { Type, type Static } from "@sinclair/typebox";

export const AddressSchema = Type.String({ pattern: "^0x[0-9a-f]{40}$" });
export const AmountString = Type.String({ pattern: "^[0-9]+$" });

export const StakedRecord = Type.Object(
  { account: AddressSchema, amount: AmountString },
  { additionalProperties: false },
);
export type StakedRecord = Static<typeof StakedRecord>;

export const UnstakedRecord = Type.Object(
  { account: AddressSchema, amount: AmountString },
  { additionalProperties: false },
);
export type UnstakedRecord = Static<typeof UnstakedRecord>;

export const RewardClaimedRecord = Type.Object(
  {
    account: AddressSchema,
    elapsed_seconds: Type.Integer({ minimum: 0 }),
    staked_amount: AmountString,
    effective_mint_power: AmountString,
    final_reward: AmountString,
    tier_id: Type.Integer({ minimum: 0, maximum: 3 }),
    cooldown_seconds: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);
export type RewardClaimedRecord = Static<typeof RewardClaimedRecord>;

export const BurnedForBoostRecord = Type.Object(
  { account: AddressSchema, amount: AmountString, record_id: Type.Integer({ minimum: 1 }) },
  { additionalProperties: false },
);
export type BurnedForBoostRecord = Static<typeof BurnedForBoostRecord>;

export const HalvingTriggeredRecord = Type.Object(
  {
    new_threshold: AmountString,
    new_rate_pct: Type.Integer({ minimum: 0, maximum: 80 }),
    halving_count: Type.Integer({ minimum: 1 }),
  },
  { additionalProperties: false },
);
export type HalvingTriggeredRecord = Static<typeof HalvingTriggeredRecord>;

export const ShieldRecord = Type.Object(
  { account: AddressSchema },
  { additionalProperties: false },
);
export type ShieldRecord = Static<typeof ShieldRecord>;

export const RateReducedRecord = Type.Object(
  { delta_pct: Type.Integer({ minimum: 1 }), cumulative_pct: Type.Integer({ minimum: 0 }) },
  { additionalProperties: false },
);
export type RateReducedRecord = Static<typeof RateReducedRecord>;
