/**
 * @ledgerproof/verify — Transaction verification engine.
 *
 * Locates the batch holding a database transaction record and checks
 * its Merkle inclusion proof against the ledger-anchored root.
 *
 * Core exports:
 * - TransactionVerifier — one record, one verdict
 * - BatchVerificationOrchestrator — many records, bounded concurrency
 * - CandidateSearch — hint-driven batch search, listing and lookup
 * - BatchMetadataCache — single-flight TTL cache of batch descriptors
 * - resolveHint — hint validation
 */

// Cache
export { BatchMetadataCache } from "./batch-cache.js";
export type { BatchCacheOptions, BatchCacheStats } from "./batch-cache.js";

// Hints
export {
  resolveHint,
  isBatchId,
  parseTimestamp,
  constraintOperation,
  BATCH_ID_PATTERN,
} from "./hint-resolver.js";
export type {
  ConstraintFields,
  DirectConstraint,
  ScanConstraint,
  ResolvedConstraint,
} from "./hint-resolver.js";

// Search
export {
  CandidateSearch,
  scoreBatch,
  compareCandidates,
  MAX_PAGE_LIMIT,
  MAX_FIND_RESULTS,
} from "./candidate-search.js";
export type {
  ScoredCandidate,
  SearchResult,
  SearchOptions,
  CandidateSearchOptions,
  BatchOrder,
  BatchListFilter,
  PageRequest,
  BatchPage,
  FindCriteria,
  MatchReason,
  FoundBatch,
  LedgerSummary,
} from "./candidate-search.js";

// Verification
export { TransactionVerifier, advisoryConflicts } from "./transaction-verifier.js";
export type {
  TransactionVerifierDeps,
  TransactionVerifierOptions,
  VerifyOptions,
} from "./transaction-verifier.js";
export { BatchVerificationOrchestrator, summarizeVerdicts } from "./orchestrator.js";
export type {
  VerificationItem,
  VerifyManyOptions,
  VerdictSummary,
} from "./orchestrator.js";
