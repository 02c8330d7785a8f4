/**
 * VerificationService — Composition root for the verification stack.
 *
 * Route handlers delegate to this service; they never wire the verify
 * packages themselves. One instance serves every request so the batch
 * metadata cache is shared.
 */

import type {
  BatchDescriptor,
  MerkleProof,
  TransactionRecord,
  VerificationHint,
  VerificationVerdict,
} from "@ledgerproof/types";
import type { LedgerClient, StorageClient } from "@ledgerproof/ledger-client";
import {
  BatchMetadataCache,
  BatchVerificationOrchestrator,
  CandidateSearch,
  TransactionVerifier,
  summarizeVerdicts,
} from "@ledgerproof/verify";
import type {
  BatchCacheOptions,
  BatchListFilter,
  BatchPage,
  FindCriteria,
  FoundBatch,
  LedgerSummary,
  PageRequest,
  VerdictSummary,
  VerificationItem,
} from "@ledgerproof/verify";

// =============================================================================
// Configuration
// =============================================================================

/**
 * Public description of the ledger this service reads.
 */
export interface LedgerInfo {
  readonly organization: string;
  readonly network: "mainnet" | "testnet";
  readonly backend: "evm" | "in-memory";
  readonly chainId: string;
  readonly contractAddress?: string | undefined;
}

export interface VerificationServiceConfig {
  readonly ledger: LedgerClient;
  readonly storage: StorageClient;
  readonly info: LedgerInfo;
  readonly cache?: BatchCacheOptions;
  readonly maxScanCandidates?: number;
  readonly tieMargin?: number;
  /** Largest tied scan group settled by fetching contents. Default: 8 */
  readonly maxTiedFetches?: number;
  readonly concurrency?: number;
  /** Deadline for a whole batch verification. Default: none */
  readonly batchTimeoutMs?: number;
  /** Called with every verdict produced */
  readonly onVerdict?: (verdict: VerificationVerdict) => void;
  /** Releases collaborator resources on stop */
  readonly onStop?: () => Promise<void>;
}

export interface BatchVerificationResult {
  readonly verdicts: readonly VerificationVerdict[];
  readonly summary: VerdictSummary;
}

export interface BatchVerificationOptions {
  readonly concurrency?: number | undefined;
  readonly timeoutMs?: number | undefined;
  readonly recordTimeoutMs?: number | undefined;
  readonly failFast?: boolean | undefined;
  readonly signal?: AbortSignal | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class VerificationService {
  readonly info: LedgerInfo;
  readonly cache: BatchMetadataCache;
  readonly search: CandidateSearch;
  readonly verifier: TransactionVerifier;
  readonly orchestrator: BatchVerificationOrchestrator;

  private readonly _config: VerificationServiceConfig;
  private _ready = false;

  constructor(config: VerificationServiceConfig) {
    this._config = config;
    this.info = config.info;
    this.cache = new BatchMetadataCache(config.ledger, config.cache);
    this.search = new CandidateSearch(config.ledger, this.cache, {
      maxScanCandidates: config.maxScanCandidates,
    });
    this.verifier = new TransactionVerifier(
      { ledger: config.ledger, storage: config.storage, cache: this.cache, search: this.search },
      { tieMargin: config.tieMargin, maxTiedFetches: config.maxTiedFetches },
    );
    this.orchestrator = new BatchVerificationOrchestrator(this.verifier, {
      concurrency: config.concurrency,
    });
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  start(): void {
    this.cache.startSweeper();
    this._ready = true;
  }

  isReady(): boolean {
    return this._ready;
  }

  async stop(): Promise<void> {
    this._ready = false;
    this.cache.stop();
    this.cache.clear();
    await this._config.onStop?.();
  }

  // ─── Verification ──────────────────────────────────────────────────

  async verifyTransaction(
    record: TransactionRecord,
    hint: VerificationHint,
    options: {
      timeoutMs?: number | undefined;
      signal?: AbortSignal | undefined;
      suppliedProof?: MerkleProof | undefined;
    } = {},
  ): Promise<VerificationVerdict> {
    const verdict = await this.verifier.verify(record, hint, options);
    this._config.onVerdict?.(verdict);
    return verdict;
  }

  async verifyBatch(
    items: readonly VerificationItem[],
    options: BatchVerificationOptions = {},
  ): Promise<BatchVerificationResult> {
    const verdicts = await this.orchestrator.verifyMany(items, {
      concurrency: options.concurrency,
      timeoutMs: options.timeoutMs ?? this._config.batchTimeoutMs,
      recordTimeoutMs: options.recordTimeoutMs,
      failFast: options.failFast,
      signal: options.signal,
    });
    for (const verdict of verdicts) {
      this._config.onVerdict?.(verdict);
    }
    return { verdicts, summary: summarizeVerdicts(verdicts) };
  }

  // ─── Batches ───────────────────────────────────────────────────────

  getBatch(batchId: string, signal?: AbortSignal): Promise<BatchDescriptor | null> {
    return this.cache.get(batchId, signal);
  }

  listBatches(filter: BatchListFilter, page: PageRequest, signal?: AbortSignal): Promise<BatchPage> {
    return this.search.list(filter, page, signal);
  }

  searchBatches(criteria: FindCriteria, signal?: AbortSignal): Promise<readonly FoundBatch[]> {
    return this.search.find(criteria, signal);
  }

  /**
   * Totals over every anchored batch. Reads the whole index.
   */
  ledgerSummary(signal?: AbortSignal): Promise<LedgerSummary> {
    return this.search.summarize(signal);
  }

  /**
   * Ledger description and the verification settings in effect.
   */
  describe(): Record<string, unknown> {
    return {
      organization: this.info.organization,
      network: this.info.network,
      backend: this.info.backend,
      chain_id: this.info.chainId,
      contract_address: this.info.contractAddress ?? null,
      max_scan_candidates: this.search.maxScanCandidates,
      ambiguity_tie_margin: this._config.tieMargin ?? 0,
      max_tied_fetches: this._config.maxTiedFetches ?? 8,
      verify_concurrency: this._config.concurrency ?? 8,
    };
  }
}
