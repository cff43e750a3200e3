/**
 * Schema barrel export.
 */

export {
  AddressSchema,
  AmountString,
  StakedRecord,
  UnstakedRecord,
  RewardClaimedRecord,
  BurnedForBoostRecord,
  HalvingTriggeredRecord,
  ShieldRecord,
  RateReducedRecord,
} from "./records.js";

export { BurnBoostRecordV1 } from "./certificate.js";
