/**
 * Batch Types
 *
 * Ledger-anchored batches and the proof material stored beside them.
 *
 * Rules:
 * - A descriptor is immutable after anchoring
 * - The Merkle root is only ever read from the ledger
 * - Storage locations are opaque to the verification core
 */

import type { Digest, OperationKind } from "./record.js";

/**
 * Location of a batch's full contents in object storage.
 */
export interface StorageRef {
  readonly bucket: string;
  readonly key: string;
  readonly region: string;
}

/**
 * Metadata of one anchored batch.
 */
export interface BatchDescriptor {
  /** Globally unique, sortable identifier (e.g. "BATCH-2025-07-01-abc123") */
  readonly batchId: string;

  /** Merkle root anchored on the ledger */
  readonly merkleRoot: Digest;

  /** Ledger-assigned creation time (ISO 8601, UTC) */
  readonly createdAt: string;

  /** Source database of every record in the batch */
  readonly databaseName: string;

  /** Tables touched by the batch */
  readonly tableNames: readonly string[];

  /** Number of leaves in the batch */
  readonly transactionCount: number;

  /** Where the batch contents live */
  readonly storageRef: StorageRef;

  /** Declared operation multiset, when the anchoring pipeline published one */
  readonly operationCounts?: Readonly<Partial<Record<OperationKind, number>>> | undefined;

  /** Size of the stored contents in bytes */
  readonly sizeBytes?: number | undefined;
}

// =============================================================================
// Merkle proof material
// =============================================================================

/**
 * Position of a sibling relative to the running node.
 * - "left": sibling is on the left, running node on the right
 * - "right": sibling is on the right, running node on the left
 */
export type SiblingDirection = "left" | "right";

/**
 * One step of a Merkle path.
 */
export interface MerkleProofStep {
  readonly hash: Digest;
  readonly direction: SiblingDirection;
}

/**
 * Merkle inclusion proof, ordered leaf → root.
 *
 * Carries no leaf or root of its own: it is only meaningful when paired
 * with a leaf digest and the root of the batch it claims to belong to.
 */
export interface MerkleProof {
  readonly leafIndex: number;
  readonly siblings: readonly MerkleProofStep[];
}

/**
 * A leaf of a stored batch.
 */
export interface BatchLeaf {
  readonly digest: Digest;
  readonly proof: MerkleProof;
}

/**
 * Full contents of a batch as held by object storage.
 */
export interface BatchContents {
  readonly batchId: string;
  readonly leaves: readonly BatchLeaf[];
}
