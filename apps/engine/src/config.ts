/**
 * Engine configuration.
 */

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

export const config = {
  port: parseInt(env("ENGINE_PORT", "3110"), 10),
  host: env("ENGINE_HOST", "0.0.0.0"),
  logLevel: env("LOG_LEVEL", "info"),
  /** Deployer identity: binds collaborators, may run halving checks. */
  ownerAddress: env("OWNER_ADDRESS", `0x${"0f".repeat(20)}`),
  engineAddress: env("ENGINE_ADDRESS", `0x${"e1".repeat(20)}`),
  ledgerAddress: env("LEDGER_ADDRESS", `0x${"e2".repeat(20)}`),
  certificatesAddress: env("CERTIFICATES_ADDRESS", `0x${"e3".repeat(20)}`),
  halvingAddress: env("HALVING_ADDRESS", `0x${"e4".repeat(20)}`),
  /** Reward per hour of wait, in wei. Default: 1 token. */
  baseRatePerHour: BigInt(env("BASE_RATE_PER_HOUR", "1000000000000000000")),
  /** Halving scheduler check interval (ms). 0 = disabled. Default: 60000. */
  halvingCheckIntervalMs: parseInt(env("HALVING_CHECK_INTERVAL_MS", "60000"), 10),
} as const;
