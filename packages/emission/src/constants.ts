/**
 * Frozen emission constants.
 *
 * FROZEN values define the reward formula: changing one changes every
 * payout and every halving threshold.
 * TUNABLE values are read from engine config at startup.
 */

// ── Fixed-point scales ─────────────────────────────────────────────
export const TOKEN_DECIMALS = 18;
export const SCALE = 10n ** 18n; // 1 token in base-unit wei
export const PRECISION = 10n ** 10n; // ratio / multiplier scale

// ── Time ───────────────────────────────────────────────────────────
export const SECONDS_PER_HOUR = 3_600n;
export const MAX_REWARD_HOURS = 24n; // time reward stops growing after 24h
export const ACTIVE_WINDOW_SECONDS = 24 * 60 * 60;

// ── Cooldown (seconds) ─────────────────────────────────────────────
// cooldown = max(MIN, BASE − PER_ACTIVE × activeCount)
export const COOLDOWN_BASE_SECONDS = 900; // 15 min
export const COOLDOWN_MIN_SECONDS = 60;
export const COOLDOWN_PER_ACTIVE_SECONDS = 12; // 0.2 min per active participant

// ── Stake boost ────────────────────────────────────────────────────
export const STAKE_BOOST_MAX_BRACKET = 9; // ≥ 10^9 base units

// ── Burn boost ─────────────────────────────────────────────────────
// burnBoost = 1 + 0.7 × sqrt(cumulativeBurnedBase)
export const BURN_BOOST_NUMERATOR = 7n;
export const BURN_BOOST_DENOMINATOR = 10n;

// ── Burn certificate ───────────────────────────────────────────────
export const DAO_POINTS_PER_TOKEN = 4n;
export const AIRDROP_RIGHTS_PER_TOKEN = 1n;

// ── Tiers (roll ∈ [0, 100)) ────────────────────────────────────────
export const TIER_ROLL_MODULUS = 100n;
export const TIER_MULTIPLIER_DIVISOR = 10n; // multipliers are stored in tenths
export const LEGENDARY_RATE_REDUCTION_PCT = 3;

// ── Halving ────────────────────────────────────────────────────────
export const INITIAL_SUPPLY = 21_000_000n * SCALE;
export const INITIAL_HALVING_THRESHOLD = 21_000_000n * SCALE;
export const HALVING_BURN_SCALE = 2_100_000_000n * SCALE;
export const BASE_HALVING_RATE_PCT = 50n;
export const MAX_HALVING_RATE_PCT = 80n;
export const STAKING_RATIO_DIVISOR = 10n;

// ── Tunable defaults ───────────────────────────────────────────────
export const DEFAULT_BASE_RATE_PER_HOUR = 1n * SCALE; // 1 token / hour
