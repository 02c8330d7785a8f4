/**
 * @ledgerproof/ledger-client — Read-only access to the ledger and to
 * batch storage.
 *
 * Design rules:
 * - READ-ONLY: No signing, no submission, no anchoring
 * - Roots are read from the ledger only, never from storage
 * - Errors are surfaced as CollaboratorError, never swallowed
 * - Every call honours the caller's AbortSignal
 */

// Collaborator contracts
export type {
  CallOptions,
  BatchIndexFilter,
  LedgerClient,
  StorageClient,
} from "./client.js";
export { matchesIndexFilter, compareByRecency } from "./client.js";

// Implementations
export {
  EvmLedgerClient,
  BATCH_ANCHOR_ABI,
  SUPPORTED_CHAIN_IDS,
  normalizeRoot,
  toBatchDescriptor,
  toLedgerError,
} from "./evm/index.js";
export type { EvmLedgerConfig, AnchoredBatchRecord } from "./evm/index.js";
export { HttpStorageClient, StoredBatchSchema, toBatchContents } from "./http-storage.js";
export type { HttpStorageConfig, StoredBatch } from "./http-storage.js";
export { InMemoryLedger } from "./in-memory-ledger.js";
export type { AnchorOptions, InMemoryMethod, LatencyFn } from "./in-memory-ledger.js";

// Retry
export {
  RetryPolicy,
  withRetry,
  computeDelay,
  isTransientError,
  DEFAULT_RETRY_CONFIG,
} from "./retry.js";
export type { RetryConfig, RetryAttempt, RetryPolicyOptions } from "./retry.js";
export { RetryingLedgerClient, RetryingStorageClient } from "./retrying-clients.js";

// Signals
export { linkSignals, raceSignal, sleep } from "./signals.js";
export type { LinkedSignal } from "./signals.js";
