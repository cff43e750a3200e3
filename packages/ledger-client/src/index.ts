/**
 * @emberstake/ledger-client: token ledger + burn certificate collaborators.
 *
 * The engine only sees the Ledger and CertificateRegistry interfaces.
 * MemoryLedger / MemoryCertificateRegistry are the in-process stores
 * used by the engine app and by every test.
 */

export type {
  Addressable,
  BurnCertificate,
  CertificateRegistry,
  Checkpointable,
  Clock,
  IssueCertificateParams,
  Ledger,
  Restore,
} from "./types.js";

export { systemClock } from "./types.js";
export { OneTimeBinding } from "./binding.js";
export { MemoryLedger, type MemoryLedgerOptions } from "./memory-ledger.js";
export {
  MemoryCertificateRegistry,
  type MemoryCertificateRegistryOptions,
} from "./memory-certificate-registry.js";
