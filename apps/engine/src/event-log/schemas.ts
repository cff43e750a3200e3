/**
 * Event log schemas: append-only record of every committed operation.
 *
 * Each event carries one of the emission records from
 * @emberstake/emission as its payload. Replaying the log in seq order
 * reproduces the engine's observable history.
 */

import { Type, type Static } from "@sinclair/typebox";
import type {
  BurnedForBoostRecord,
  HalvingTriggeredRecord,
  RateReducedRecord,
  RewardClaimedRecord,
  ShieldRecord,
  StakedRecord,
  UnstakedRecord,
} from "@emberstake/emission";

/** Base envelope for all engine events. */
export const EventEnvelope = Type.Object({
  /** Event type discriminator. */
  type: Type.String(),
  /** Monotonic sequence number within the log, from 1. */
  seq: Type.Integer({ minimum: 1 }),
  /** Event timestamp (seconds since epoch). */
  timestamp: Type.Integer({ minimum: 0 }),
  /** Event-specific payload. */
  payload: Type.Unknown(),
});

export type EventEnvelope = Static<typeof EventEnvelope>;

// ── Event types ────────────────────────────────────────────────────

export const STAKED_EVENT = "staked.v1" as const;
export const UNSTAKED_EVENT = "unstaked.v1" as const;
export const REWARD_CLAIMED_EVENT = "reward.claimed.v1" as const;
export const BURNED_FOR_BOOST_EVENT = "burn.boost.v1" as const;
export const HALVING_TRIGGERED_EVENT = "halving.triggered.v1" as const;
export const SHIELD_GRANTED_EVENT = "shield.granted.v1" as const;
export const SHIELD_CONSUMED_EVENT = "shield.consumed.v1" as const;
export const RATE_REDUCED_EVENT = "rate.reduced.v1" as const;

export interface EventPayloads {
  [STAKED_EVENT]: StakedRecord;
  [UNSTAKED_EVENT]: UnstakedRecord;
  [REWARD_CLAIMED_EVENT]: RewardClaimedRecord;
  [BURNED_FOR_BOOST_EVENT]: BurnedForBoostRecord;
  [HALVING_TRIGGERED_EVENT]: HalvingTriggeredRecord;
  [SHIELD_GRANTED_EVENT]: ShieldRecord;
  [SHIELD_CONSUMED_EVENT]: ShieldRecord;
  [RATE_REDUCED_EVENT]: RateReducedRecord;
}

export type EventType = keyof EventPayloads;

export const EVENT_TYPES: readonly EventType[] = [
  STAKED_EVENT,
  UNSTAKED_EVENT,
  REWARD_CLAIMED_EVENT,
  BURNED_FOR_BOOST_EVENT,
  HALVING_TRIGGERED_EVENT,
  SHIELD_GRANTED_EVENT,
  SHIELD_CONSUMED_EVENT,
  RATE_REDUCED_EVENT,
];

export function isEventType(value: string): value is EventType {
  return EVENT_TYPES.some((t) => t === value);
}
