/**
 * Collaborator Contracts
 *
 * The verification core reads from two external systems: the ledger,
 * which is the only source of Merkle roots, and object storage, which
 * holds each batch's leaves and proofs.
 *
 * Design rules:
 * - All methods are read-only
 * - Every call accepts an AbortSignal and must honour it
 * - Failures are thrown as CollaboratorError with a transient flag
 * - "Not found" is a null result, never an error
 */

import type { BatchContents, BatchDescriptor, Digest, StorageRef } from "@ledgerproof/types";

// =============================================================================
// Call options
// =============================================================================

export interface CallOptions {
  readonly signal?: AbortSignal | undefined;
}

// =============================================================================
// Ledger
// =============================================================================

/**
 * Filter for the ledger's batch index.
 *
 * Time bounds are ISO 8601 instants; `createdFrom` is inclusive and
 * `createdTo` exclusive.
 */
export interface BatchIndexFilter {
  readonly databaseName?: string | undefined;
  readonly tableName?: string | undefined;
  readonly createdFrom?: string | undefined;
  readonly createdTo?: string | undefined;
  /** Maximum number of descriptors to return */
  readonly limit?: number | undefined;
}

export interface LedgerClient {
  /**
   * Query the batch index, most recently created first.
   */
  queryBatchIndex(
    filter: BatchIndexFilter,
    options?: CallOptions,
  ): Promise<readonly BatchDescriptor[]>;

  /** Descriptor of one batch, or null if the ledger does not know it. */
  getBatch(batchId: string, options?: CallOptions): Promise<BatchDescriptor | null>;

  /** Anchored root of one batch, or null if the ledger does not know it. */
  getBatchRoot(batchId: string, options?: CallOptions): Promise<Digest | null>;
}

// =============================================================================
// Storage
// =============================================================================

export interface StorageClient {
  /**
   * Fetch the full contents of a batch.
   * Any root the object store claims is ignored by callers.
   */
  fetchBatchContents(storageRef: StorageRef, options?: CallOptions): Promise<BatchContents>;
}

/**
 * Apply an index filter to a descriptor. Shared by every ledger
 * implementation so local and remote filtering agree.
 */
export function matchesIndexFilter(batch: BatchDescriptor, filter: BatchIndexFilter): boolean {
  if (filter.databaseName !== undefined && batch.databaseName !== filter.databaseName) {
    return false;
  }
  if (filter.tableName !== undefined && !batch.tableNames.includes(filter.tableName)) {
    return false;
  }
  const created = Date.parse(batch.createdAt);
  if (filter.createdFrom !== undefined && created < Date.parse(filter.createdFrom)) {
    return false;
  }
  if (filter.createdTo !== undefined && created >= Date.parse(filter.createdTo)) {
    return false;
  }
  return true;
}

/**
 * Most recent first; identifier descending breaks timestamp ties.
 */
export function compareByRecency(a: BatchDescriptor, b: BatchDescriptor): number {
  const delta = Date.parse(b.createdAt) - Date.parse(a.createdAt);
  if (delta !== 0) return delta;
  return a.batchId < b.batchId ? 1 : a.batchId > b.batchId ? -1 : 0;
}
