/**
 * Verification Types
 *
 * Caller hints in, verdicts out.
 */

import type { BatchDescriptor, MerkleProof } from "./batch.js";
import type { Digest, OperationKind } from "./record.js";

/**
 * Optional constraints narrowing the batch search.
 * Every field is independently optional; an empty hint is valid.
 */
export interface VerificationHint {
  /** Direct batch lookup; other fields become advisory */
  readonly batchId?: string | undefined;

  /** Inclusive start of the creation-time window (ISO 8601 with offset) */
  readonly timeStart?: string | undefined;

  /** Exclusive end of the creation-time window (ISO 8601 with offset) */
  readonly timeEnd?: string | undefined;

  readonly databaseName?: string | undefined;
  readonly tableName?: string | undefined;
  readonly expectedOperation?: string | undefined;
}

/**
 * Terminal outcome of one verification attempt.
 */
export type VerdictOutcome =
  | "verified"
  | "tampered"
  | "not_found"
  | "ambiguous"
  | "error";

/**
 * Sub-classification of `error` verdicts.
 */
export type VerdictErrorCode =
  | "cancelled"
  | "collaborator"
  | "internal"
  | "invalid_hint"
  | "encoding";

/**
 * States of the transaction verification state machine.
 */
export type VerificationStage =
  | "start"
  | "hints_resolved"
  | "candidates_found"
  | "batch_fetched"
  | "proof_checked"
  | "done";

/**
 * Structured result of verifying one transaction record.
 */
export interface VerificationVerdict {
  readonly outcome: VerdictOutcome;

  /** Batch the record was matched (or checked) against */
  readonly batchId?: string | undefined;

  /** Canonical digest of the record ("" when it could not be computed) */
  readonly leafDigest: Digest;

  /** Root read from the ledger for the checked batch */
  readonly expectedRoot?: Digest | undefined;

  /** Inclusion proof, present when verified */
  readonly proof?: MerkleProof | undefined;

  /** Candidate batch identifiers considered, most relevant first */
  readonly candidates: readonly string[];

  /** Human-readable explanation */
  readonly reason: string;

  readonly errorCode?: VerdictErrorCode | undefined;

  /** Whether retrying the same request may produce a different outcome */
  readonly retryable: boolean;

  /** The candidate search hit its scan cap */
  readonly possiblyIncomplete: boolean;

  /** Descriptor of the checked batch */
  readonly batch?: BatchDescriptor | undefined;

  /** Operation of the verified record */
  readonly operation?: OperationKind | undefined;

  /** Advisory hints that disagree with the addressed batch */
  readonly warnings: readonly string[];

  /** States visited, in order */
  readonly trail: readonly VerificationStage[];

  readonly durationMs: number;
}
