/**
 * Retry decorators for the collaborator contracts.
 */

import type { BatchContents, BatchDescriptor, Digest, StorageRef } from "@ledgerproof/types";
import type {
  BatchIndexFilter,
  CallOptions,
  LedgerClient,
  StorageClient,
} from "./client.js";
import type { RetryPolicy } from "./retry.js";

export class RetryingLedgerClient implements LedgerClient {
  constructor(
    private readonly inner: LedgerClient,
    private readonly policy: RetryPolicy,
  ) {}

  queryBatchIndex(filter: BatchIndexFilter, options?: CallOptions): Promise<readonly BatchDescriptor[]> {
    return this.policy.execute(() => this.inner.queryBatchIndex(filter, options), options?.signal);
  }

  getBatch(batchId: string, options?: CallOptions): Promise<BatchDescriptor | null> {
    return this.policy.execute(() => this.inner.getBatch(batchId, options), options?.signal);
  }

  getBatchRoot(batchId: string, options?: CallOptions): Promise<Digest | null> {
    return this.policy.execute(() => this.inner.getBatchRoot(batchId, options), options?.signal);
  }
}

export class RetryingStorageClient implements StorageClient {
  constructor(
    private readonly inner: StorageClient,
    private readonly policy: RetryPolicy,
  ) {}

  fetchBatchContents(storageRef: StorageRef, options?: CallOptions): Promise<BatchContents> {
    return this.policy.execute(
      () => this.inner.fetchBatchContents(storageRef, options),
      options?.signal,
    );
  }
}
