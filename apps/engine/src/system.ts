/**
 * Deployment wiring.
 *
 * Constructs the ledger, certificate registry, halving controller and
 * reward engine, then performs every one-time binding as the owner in
 * deployment order: minter, registry engine, engine registry, halving
 * engine.
 */

import type { Address } from "@emberstake/emission";
import {
  MemoryCertificateRegistry,
  MemoryLedger,
  systemClock,
  type Clock,
} from "@emberstake/ledger-client";
import { createRandomEntropy, type EntropySource } from "./entropy.js";
import { EventLog } from "./event-log/writer.js";
import { HalvingController } from "./halving-controller.js";
import { silentLogger, type Logger } from "./logger.js";
import { RewardEngine } from "./reward-engine.js";

export interface SystemAddresses {
  engine: Address;
  ledger: Address;
  certificates: Address;
  halving: Address;
}

export const DEFAULT_ADDRESSES: SystemAddresses = {
  engine: `0x${"e1".repeat(20)}`,
  ledger: `0x${"e2".repeat(20)}`,
  certificates: `0x${"e3".repeat(20)}`,
  halving: `0x${"e4".repeat(20)}`,
};

export interface SystemOptions {
  owner: Address;
  addresses?: Partial<SystemAddresses>;
  clock?: Clock;
  entropy?: EntropySource;
  baseRatePerHour?: bigint;
  /** Minted to the owner at ledger construction. */
  initialSupply?: bigint;
  logger?: Logger;
}

export interface System {
  owner: Address;
  clock: Clock;
  events: EventLog;
  ledger: MemoryLedger;
  certificates: MemoryCertificateRegistry;
  halving: HalvingController;
  engine: RewardEngine;
}

export function createSystem(options: SystemOptions): System {
  const { owner } = options;
  const addresses = { ...DEFAULT_ADDRESSES, ...options.addresses };
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? silentLogger;

  const events = new EventLog(clock);
  const ledger = new MemoryLedger({
    address: addresses.ledger,
    owner,
    initialSupply: options.initialSupply,
  });
  const certificates = new MemoryCertificateRegistry({
    address: addresses.certificates,
    owner,
    clock,
  });
  const halving = new HalvingController({
    address: addresses.halving,
    owner,
    ledger,
    events,
    logger,
  });
  const engine = new RewardEngine({
    address: addresses.engine,
    owner,
    ledger,
    halving,
    events,
    entropy: options.entropy ?? createRandomEntropy(),
    clock,
    baseRatePerHour: options.baseRatePerHour,
    logger,
  });

  ledger.setMinter(owner, engine);
  certificates.setRewardEngine(owner, engine);
  engine.setCertificateRegistry(owner, certificates);
  halving.setRewardEngine(owner, engine);

  logger.info(
    { owner, engine: engine.address, ledger: ledger.address, halving: halving.address },
    "system wired",
  );

  return { owner, clock, events, ledger, certificates, halving, engine };
}
