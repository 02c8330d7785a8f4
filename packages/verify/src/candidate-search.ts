/**
 * @ledgerproof/verify — Candidate Batch Search.
 *
 * Turns a resolved constraint into an ordered, deduplicated list of
 * batches that may contain a record.
 *
 * Paths:
 * - Direct: cache lookup of the addressed batch
 * - Scan: ledger index query, capped at the `maxScanCandidates` most
 *   recent matches. The cap applies whether or not any hint is set, so
 *   adding a hint never grows the result nor drops a batch the broader
 *   search returned.
 *
 * Relevance scores:
 *   database match              +4
 *   table exact (single table)  +3, member of several +2
 *   expected operation declared +2, multiset unknown but non-empty +1
 * Ties: createdAt desc, then batchId desc.
 */

import { throwIfAborted } from "@ledgerproof/types";
import type { BatchDescriptor, OperationKind } from "@ledgerproof/types";
import type { BatchIndexFilter, LedgerClient } from "@ledgerproof/ledger-client";
import { compareByRecency, matchesIndexFilter } from "@ledgerproof/ledger-client";
import type { BatchMetadataCache } from "./batch-cache.js";
import type { ConstraintFields, ResolvedConstraint } from "./hint-resolver.js";

// =============================================================================
// Types
// =============================================================================

export interface ScoredCandidate {
  readonly batch: BatchDescriptor;
  readonly score: number;
}

export interface SearchResult {
  /** Most relevant first */
  readonly candidates: readonly ScoredCandidate[];
  /** The scan hit its cap; older matching batches were not considered */
  readonly possiblyIncomplete: boolean;
  /** Result of a direct identifier lookup */
  readonly direct: boolean;
}

export interface SearchOptions {
  readonly signal?: AbortSignal | undefined;
  /** Operation used for scoring when the constraint names none */
  readonly expectedOperation?: OperationKind | undefined;
}

export interface CandidateSearchOptions {
  /** Maximum batches considered by a scan. Default: 100 */
  readonly maxScanCandidates?: number;
}

export type BatchOrder = "timestamp_desc" | "timestamp_asc" | "count_desc" | "count_asc";

export interface BatchListFilter {
  readonly databaseName?: string | undefined;
  readonly tableName?: string | undefined;
  readonly createdFrom?: string | undefined;
  readonly createdTo?: string | undefined;
  readonly minTransactionCount?: number | undefined;
  readonly maxTransactionCount?: number | undefined;
}

export interface PageRequest {
  /** 1..1000. Default: 100 */
  readonly limit?: number | undefined;
  readonly offset?: number | undefined;
  readonly orderBy?: BatchOrder | undefined;
}

export interface BatchPage {
  readonly batches: readonly BatchDescriptor[];
  readonly total: number;
  readonly offset: number;
  readonly limit: number;
  readonly hasMore: boolean;
}

export interface FindCriteria {
  readonly merkleRoot?: string | undefined;
  /** Identifier glob; `*` matches any run of characters */
  readonly batchIdPattern?: string | undefined;
  readonly databaseName?: string | undefined;
  readonly tableName?: string | undefined;
  readonly minTransactionCount?: number | undefined;
  readonly createdFrom?: string | undefined;
  readonly createdTo?: string | undefined;
  /** 1..200. Default: 50 */
  readonly maxResults?: number | undefined;
}

export type MatchReason =
  | "merkle_root"
  | "batch_id_pattern"
  | "database_name"
  | "table_name"
  | "min_transaction_count"
  | "time_range";

export interface FoundBatch {
  readonly batch: BatchDescriptor;
  readonly matchReasons: readonly MatchReason[];
  /** Share of the requested criteria weight that matched, 0..1 */
  readonly relevance: number;
}

/** Totals over the whole batch index; timestamps are null when it is empty. */
export interface LedgerSummary {
  readonly totalBatches: number;
  readonly totalTransactions: number;
  readonly oldestBatchAt: string | null;
  readonly newestBatchAt: string | null;
  readonly databases: readonly string[];
}

export const MAX_PAGE_LIMIT = 1000;
export const MAX_FIND_RESULTS = 200;

const FIND_WEIGHTS: Record<MatchReason, number> = {
  merkle_root: 10,
  batch_id_pattern: 5,
  database_name: 3,
  table_name: 2,
  min_transaction_count: 1,
  time_range: 1,
};

// =============================================================================
// Scoring
// =============================================================================

export function scoreBatch(
  batch: BatchDescriptor,
  hints: Pick<ConstraintFields, "databaseName" | "tableName" | "expectedOperation">,
): number {
  let score = 0;

  if (hints.databaseName !== undefined && batch.databaseName === hints.databaseName) {
    score += 4;
  }

  if (hints.tableName !== undefined && batch.tableNames.includes(hints.tableName)) {
    score += batch.tableNames.length === 1 ? 3 : 2;
  }

  if (hints.expectedOperation !== undefined) {
    const declared = batch.operationCounts;
    if (declared !== undefined) {
      score += (declared[hints.expectedOperation] ?? 0) > 0 ? 2 : 0;
    } else if (batch.transactionCount > 0) {
      score += 1;
    }
  }

  return score;
}

/**
 * Score desc, createdAt desc, batchId desc.
 */
export function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.score !== b.score) return b.score - a.score;
  return compareByRecency(a.batch, b.batch);
}

function dedupe(batches: readonly BatchDescriptor[]): BatchDescriptor[] {
  const seen = new Set<string>();
  const unique: BatchDescriptor[] = [];
  for (const batch of batches) {
    if (seen.has(batch.batchId)) continue;
    seen.add(batch.batchId);
    unique.push(batch);
  }
  return unique;
}

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, "\\$&").replace(/\*/g, ".*");
  return new RegExp(`^${escaped}$`);
}

function orderBatches(batches: BatchDescriptor[], orderBy: BatchOrder): BatchDescriptor[] {
  const byTime = (a: BatchDescriptor, b: BatchDescriptor): number =>
    Date.parse(a.createdAt) - Date.parse(b.createdAt) ||
    (a.batchId < b.batchId ? -1 : a.batchId > b.batchId ? 1 : 0);

  switch (orderBy) {
    case "timestamp_asc":
      return batches.sort(byTime);
    case "timestamp_desc":
      return batches.sort((a, b) => byTime(b, a));
    case "count_asc":
      return batches.sort((a, b) => a.transactionCount - b.transactionCount || byTime(b, a));
    case "count_desc":
      return batches.sort((a, b) => b.transactionCount - a.transactionCount || byTime(b, a));
  }
}

// =============================================================================
// Candidate Search
// =============================================================================

export class CandidateSearch {
  readonly maxScanCandidates: number;

  constructor(
    private readonly ledger: LedgerClient,
    private readonly cache: BatchMetadataCache,
    options: CandidateSearchOptions = {},
  ) {
    this.maxScanCandidates = options.maxScanCandidates ?? 100;
    if (!Number.isInteger(this.maxScanCandidates) || this.maxScanCandidates < 1) {
      throw new Error(
        `CandidateSearch: maxScanCandidates must be a positive integer, got ${this.maxScanCandidates}`,
      );
    }
  }

  async search(constraint: ResolvedConstraint, options: SearchOptions = {}): Promise<SearchResult> {
    throwIfAborted(options.signal);

    if (constraint.kind === "direct") {
      const batch = await this.cache.get(constraint.batchId, options.signal);
      const hints = {
        ...constraint.advisory,
        expectedOperation: constraint.advisory.expectedOperation ?? options.expectedOperation,
      };
      return {
        candidates: batch !== null ? [{ batch, score: scoreBatch(batch, hints) }] : [],
        possiblyIncomplete: false,
        direct: true,
      };
    }

    const filter: BatchIndexFilter = {
      databaseName: constraint.databaseName,
      tableName: constraint.tableName,
      createdFrom: constraint.timeStart,
      createdTo: constraint.timeEnd,
    };
    const { batches, truncated } = await this.scan(filter, options.signal);

    const hints = {
      databaseName: constraint.databaseName,
      tableName: constraint.tableName,
      expectedOperation: constraint.expectedOperation ?? options.expectedOperation,
    };
    const candidates = batches
      .map((batch) => ({ batch, score: scoreBatch(batch, hints) }))
      .sort(compareCandidates);

    this.cache.prime(batches);
    return { candidates, possiblyIncomplete: truncated, direct: false };
  }

  /**
   * Browse the batch index with filters and offset pagination.
   */
  async list(
    filter: BatchListFilter = {},
    page: PageRequest = {},
    signal?: AbortSignal,
  ): Promise<BatchPage> {
    const limit = Math.min(Math.max(Math.trunc(page.limit ?? 100), 1), MAX_PAGE_LIMIT);
    const offset = Math.max(Math.trunc(page.offset ?? 0), 0);

    const indexed = await this.ledger.queryBatchIndex(
      {
        databaseName: filter.databaseName,
        tableName: filter.tableName,
        createdFrom: filter.createdFrom,
        createdTo: filter.createdTo,
      },
      { signal },
    );

    const matching = dedupe(indexed).filter(
      (b) =>
        matchesIndexFilter(b, filter) &&
        (filter.minTransactionCount === undefined || b.transactionCount >= filter.minTransactionCount) &&
        (filter.maxTransactionCount === undefined || b.transactionCount <= filter.maxTransactionCount),
    );
    const ordered = orderBatches(matching, page.orderBy ?? "timestamp_desc");
    const batches = ordered.slice(offset, offset + limit);

    this.cache.prime(batches);
    return {
      batches,
      total: ordered.length,
      offset,
      limit,
      hasMore: offset + batches.length < ordered.length,
    };
  }

  async summarize(signal?: AbortSignal): Promise<LedgerSummary> {
    const batches = dedupe(await this.ledger.queryBatchIndex({}, { signal }));
    const byRecency = [...batches].sort(compareByRecency);

    this.cache.prime(batches);
    return {
      totalBatches: batches.length,
      totalTransactions: batches.reduce((sum, b) => sum + b.transactionCount, 0),
      oldestBatchAt: byRecency[byRecency.length - 1]?.createdAt ?? null,
      newestBatchAt: byRecency[0]?.createdAt ?? null,
      databases: [...new Set(batches.map((b) => b.databaseName))].sort(),
    };
  }

  /**
   * Search batches by root, identifier pattern and metadata. Every
   * given criterion must match; results carry the reasons they matched.
   */
  async find(criteria: FindCriteria, signal?: AbortSignal): Promise<readonly FoundBatch[]> {
    const maxResults = Math.min(Math.max(Math.trunc(criteria.maxResults ?? 50), 1), MAX_FIND_RESULTS);
    const root = criteria.merkleRoot?.toLowerCase().replace(/^0x/, "");
    const pattern = criteria.batchIdPattern !== undefined ? globToRegExp(criteria.batchIdPattern) : undefined;
    const timed = criteria.createdFrom !== undefined || criteria.createdTo !== undefined;

    const requested: MatchReason[] = [];
    if (root !== undefined) requested.push("merkle_root");
    if (pattern !== undefined) requested.push("batch_id_pattern");
    if (criteria.databaseName !== undefined) requested.push("database_name");
    if (criteria.tableName !== undefined) requested.push("table_name");
    if (criteria.minTransactionCount !== undefined) requested.push("min_transaction_count");
    if (timed) requested.push("time_range");
    const totalWeight = requested.reduce((sum, r) => sum + FIND_WEIGHTS[r], 0);

    const indexed = await this.ledger.queryBatchIndex(
      {
        databaseName: criteria.databaseName,
        tableName: criteria.tableName,
        createdFrom: criteria.createdFrom,
        createdTo: criteria.createdTo,
      },
      { signal },
    );

    const found: FoundBatch[] = [];
    for (const batch of dedupe(indexed)) {
      const reasons = requested.filter((reason) => {
        switch (reason) {
          case "merkle_root":
            return batch.merkleRoot === root;
          case "batch_id_pattern":
            return pattern?.test(batch.batchId) === true;
          case "database_name":
            return batch.databaseName === criteria.databaseName;
          case "table_name":
            return criteria.tableName !== undefined && batch.tableNames.includes(criteria.tableName);
          case "min_transaction_count":
            return batch.transactionCount >= (criteria.minTransactionCount ?? 0);
          case "time_range":
            return matchesIndexFilter(batch, criteria);
        }
      });
      if (reasons.length !== requested.length) continue;

      const weight = reasons.reduce((sum, r) => sum + FIND_WEIGHTS[r], 0);
      found.push({
        batch,
        matchReasons: reasons,
        relevance: totalWeight === 0 ? 0 : weight / totalWeight,
      });
    }

    const results = found
      .sort((a, b) => b.relevance - a.relevance || compareByRecency(a.batch, b.batch))
      .slice(0, maxResults);
    this.cache.prime(results.map((r) => r.batch));
    return results;
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  /**
   * Most recent matching batches, at most `maxScanCandidates`. One more is
   * requested to detect truncation.
   */
  private async scan(
    filter: BatchIndexFilter,
    signal: AbortSignal | undefined,
  ): Promise<{ batches: BatchDescriptor[]; truncated: boolean }> {
    const cap = this.maxScanCandidates;
    const indexed = await this.ledger.queryBatchIndex({ ...filter, limit: cap + 1 }, { signal });

    // The index filters too; re-applying keeps the cap's window identical
    // for every collaborator.
    const matching = dedupe(indexed)
      .filter((b) => matchesIndexFilter(b, filter))
      .sort(compareByRecency);

    return {
      batches: matching.slice(0, cap),
      truncated: indexed.length > cap,
    };
  }
}
