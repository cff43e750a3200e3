/**
 * @emberstake/emission: Frozen emission primitives.
 *
 * This package contains ONLY the reward and halving formulas, the error
 * taxonomy and the wire schemas. No I/O, no state.
 * Everything else in the monorepo imports from here, never the reverse.
 */

// Fixed-point primitives
export { isqrt, decadeBracket, mulDiv, minBig, maxBig } from "./fixed-point.js";

// Identities + input guards
export {
  ZERO_ADDRESS,
  isAddress,
  isNullAddress,
  requireAddress,
  requirePositive,
  type Address,
} from "./address.js";

// Errors
export {
  EmissionError,
  ValidationError,
  AuthorizationError,
  StateError,
  AlreadyConfiguredError,
  type ErrorKind,
} from "./errors.js";

// Mint power (time reward, stake boost, burn boost)
export {
  toBaseUnits,
  timeReward,
  stakeBoostOf,
  burnBoostScaled,
  computeMintPower,
  mintPowerSnapshot,
  daoPointsFor,
  airdropRightsFor,
  type MintPowerInput,
  type MintPower,
} from "./boost.js";

// Cooldown
export { cooldownSeconds, nextClaimAt } from "./cooldown.js";

// Reward tiers
export {
  TIER_BANDS,
  tierForRoll,
  tierById,
  applyTierMultiplier,
  tierSeed,
  tierRoll,
  type TierId,
  type TierName,
  type TierEffect,
  type TierBand,
  type TierSeedInput,
} from "./tier.js";

// Adaptive halving
export {
  nextHalvingThreshold,
  isHalvingDue,
  stakingRatio,
  adjustedHalvingRate,
  type AdjustedRateInput,
} from "./halving.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";
