/**
 * @ledgerproof/types — Shared domain types for the verification stack.
 *
 * - Transaction records and operation kinds
 * - Batch descriptors, stored contents, Merkle proof material
 * - Hints and verdicts
 * - Error taxonomy
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 */

// Record types
export type {
  OperationKind,
  ColumnValue,
  TransactionRecord,
  Digest,
} from "./record.js";
export { OPERATION_KINDS } from "./record.js";

// Batch types
export type {
  StorageRef,
  BatchDescriptor,
  SiblingDirection,
  MerkleProofStep,
  MerkleProof,
  BatchLeaf,
  BatchContents,
} from "./batch.js";

// Verification types
export type {
  VerificationHint,
  VerdictOutcome,
  VerdictErrorCode,
  VerificationStage,
  VerificationVerdict,
} from "./verdict.js";

// Errors
export {
  VerificationError,
  InvalidHintError,
  EncodingError,
  CollaboratorError,
  RetryExhaustedError,
  CancelledError,
  throwIfAborted,
  isCancellation,
} from "./errors.js";
export type { VerificationErrorCode, HintIssue } from "./errors.js";

// Runtime type guards
export {
  isDigest,
  isOperationKind,
  isStorageRef,
  isMerkleProof,
  isBatchLeaf,
  isBatchDescriptor,
} from "./guards.js";
