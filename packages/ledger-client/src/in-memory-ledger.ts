/**
 * In-Memory Ledger
 *
 * Serves both collaborator contracts from process memory. Anchors
 * records into Merkle batches exactly as the recording pipeline does, so
 * tests and local runs see honest proofs.
 *
 * Fault injection:
 * - `failNext(method, error)` queues a failure for the next call
 * - `setLatency(fn)` delays each call (abortable)
 * - `setRoot` / `putBatch` diverge the ledger from what storage holds
 */

import { CollaboratorError, throwIfAborted } from "@ledgerproof/types";
import type {
  BatchContents,
  BatchDescriptor,
  Digest,
  OperationKind,
  StorageRef,
  TransactionRecord,
} from "@ledgerproof/types";
import { MerkleTree, digestRecord } from "@ledgerproof/proof";
import type {
  BatchIndexFilter,
  CallOptions,
  LedgerClient,
  StorageClient,
} from "./client.js";
import { compareByRecency, matchesIndexFilter } from "./client.js";
import { sleep } from "./signals.js";

export type InMemoryMethod = "queryBatchIndex" | "getBatch" | "getBatchRoot" | "fetchBatchContents";

/**
 * Per-call latency in milliseconds. `key` is the batch identifier,
 * storage key or "index".
 */
export type LatencyFn = (method: InMemoryMethod, key: string) => number;

export interface AnchorOptions {
  /** Defaults to BATCH-<date>-<first 6 root hex chars> */
  readonly batchId?: string;
  /** ISO 8601 creation time. Default: now */
  readonly createdAt?: string;
  readonly bucket?: string;
  readonly region?: string;
  /** Publish the per-operation multiset. Default: true */
  readonly declareOperationCounts?: boolean;
}

function storageKey(ref: StorageRef): string {
  return `${ref.bucket}/${ref.key}`;
}

export class InMemoryLedger implements LedgerClient, StorageClient {
  private readonly batches = new Map<string, BatchDescriptor>();
  private readonly roots = new Map<string, Digest>();
  private readonly objects = new Map<string, BatchContents>();
  private readonly failures = new Map<InMemoryMethod, unknown[]>();
  private latency: LatencyFn | null = null;
  private readonly now: () => Date;

  /** Number of calls per method, for assertions. */
  readonly calls: Record<InMemoryMethod, number> = {
    queryBatchIndex: 0,
    getBatch: 0,
    getBatchRoot: 0,
    fetchBatchContents: 0,
  };

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  // ===========================================================================
  // Population
  // ===========================================================================

  /**
   * Anchor records as one batch: digest each, build the Merkle tree,
   * store contents with proofs and record the root on the ledger.
   */
  anchor(records: readonly TransactionRecord[], options: AnchorOptions = {}): BatchDescriptor {
    const first = records[0];
    if (first === undefined) {
      throw new Error("InMemoryLedger: cannot anchor an empty batch");
    }
    if (records.some((r) => r.databaseName !== first.databaseName)) {
      throw new Error("InMemoryLedger: a batch holds records of a single database");
    }

    const digests = records.map((r) => digestRecord(r));
    const tree = MerkleTree.build(digests);
    const root = tree.getRoot();
    if (root === null) {
      throw new Error("InMemoryLedger: empty tree");
    }

    const createdAt = new Date(options.createdAt ?? this.now().toISOString()).toISOString();
    const batchId = options.batchId ?? `BATCH-${createdAt.slice(0, 10)}-${root.slice(0, 6)}`;

    const tableNames = [...new Set(records.map((r) => r.tableName))].sort();
    const operationCounts: Partial<Record<OperationKind, number>> = {};
    for (const r of records) {
      operationCounts[r.operation] = (operationCounts[r.operation] ?? 0) + 1;
    }

    const leaves = digests.map((digest, index) => {
      const proof = tree.getProof(index);
      if (proof === null) {
        throw new Error(`InMemoryLedger: no proof for leaf ${index}`);
      }
      return { digest, proof };
    });

    const descriptor: BatchDescriptor = {
      batchId,
      merkleRoot: root,
      createdAt,
      databaseName: first.databaseName,
      tableNames,
      transactionCount: records.length,
      storageRef: {
        bucket: options.bucket ?? "ledger-batches",
        key: `${first.databaseName}/${batchId}.json`,
        region: options.region ?? "us-west-2",
      },
      operationCounts: options.declareOperationCounts === false ? undefined : operationCounts,
    };

    this.putBatch(descriptor, { batchId, leaves });
    return descriptor;
  }

  /**
   * Store a descriptor and its contents verbatim. The ledger root is
   * the descriptor's unless `ledgerRoot` overrides it.
   */
  putBatch(descriptor: BatchDescriptor, contents: BatchContents, ledgerRoot?: Digest): void {
    this.batches.set(descriptor.batchId, descriptor);
    this.roots.set(descriptor.batchId, ledgerRoot ?? descriptor.merkleRoot);
    this.objects.set(storageKey(descriptor.storageRef), contents);
  }

  /** Re-anchor a batch's root on the ledger side only. */
  setRoot(batchId: string, root: Digest): void {
    const descriptor = this.batches.get(batchId);
    if (descriptor === undefined) {
      throw new Error(`InMemoryLedger: unknown batch ${batchId}`);
    }
    this.roots.set(batchId, root);
    this.batches.set(batchId, { ...descriptor, merkleRoot: root });
  }

  /** Replace the stored contents of a batch. */
  setContents(ref: StorageRef, contents: BatchContents): void {
    this.objects.set(storageKey(ref), contents);
  }

  /** Queue an error to be thrown by the next call of `method`. */
  failNext(method: InMemoryMethod, error: unknown): void {
    const queue = this.failures.get(method) ?? [];
    queue.push(error);
    this.failures.set(method, queue);
  }

  setLatency(fn: LatencyFn | null): void {
    this.latency = fn;
  }

  get batchCount(): number {
    return this.batches.size;
  }

  // ===========================================================================
  // LedgerClient
  // ===========================================================================

  async queryBatchIndex(
    filter: BatchIndexFilter,
    options?: CallOptions,
  ): Promise<readonly BatchDescriptor[]> {
    await this.enter("queryBatchIndex", "index", options);
    const matches = [...this.batches.values()]
      .filter((b) => matchesIndexFilter(b, filter))
      .sort(compareByRecency);
    return filter.limit !== undefined ? matches.slice(0, filter.limit) : matches;
  }

  async getBatch(batchId: string, options?: CallOptions): Promise<BatchDescriptor | null> {
    await this.enter("getBatch", batchId, options);
    return this.batches.get(batchId) ?? null;
  }

  async getBatchRoot(batchId: string, options?: CallOptions): Promise<Digest | null> {
    await this.enter("getBatchRoot", batchId, options);
    return this.roots.get(batchId) ?? null;
  }

  // ===========================================================================
  // StorageClient
  // ===========================================================================

  async fetchBatchContents(storageRef: StorageRef, options?: CallOptions): Promise<BatchContents> {
    const key = storageKey(storageRef);
    await this.enter("fetchBatchContents", key, options);
    const contents = this.objects.get(key);
    if (contents === undefined) {
      throw new CollaboratorError("storage", `Object not found: ${key}`, false);
    }
    return contents;
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private async enter(method: InMemoryMethod, key: string, options: CallOptions | undefined): Promise<void> {
    this.calls[method]++;
    throwIfAborted(options?.signal);

    const delay = this.latency?.(method, key) ?? 0;
    if (delay > 0) {
      await sleep(delay, options?.signal);
    }

    const failure = this.failures.get(method)?.shift();
    if (failure !== undefined) {
      throw failure;
    }
  }
}
