/**
 * Test helpers for @ledgerproof/verify.
 *
 * Builds a verification stack over an InMemoryLedger; nothing leaves
 * the process.
 */

import type { OperationKind, TransactionRecord } from "@ledgerproof/types";
import { InMemoryLedger } from "@ledgerproof/ledger-client";
import { BatchMetadataCache } from "../src/batch-cache.js";
import { CandidateSearch } from "../src/candidate-search.js";
import { TransactionVerifier } from "../src/transaction-verifier.js";
import { BatchVerificationOrchestrator } from "../src/orchestrator.js";

export function invoice(
  id: number,
  operation: OperationKind = "INSERT",
  overrides: Partial<TransactionRecord> = {},
): TransactionRecord {
  return {
    databaseName: "billing",
    tableName: "invoices",
    operation,
    columns: { id, amount: id * 10, status: "open" },
    ...overrides,
  };
}

export interface Stack {
  readonly ledger: InMemoryLedger;
  readonly cache: BatchMetadataCache;
  readonly search: CandidateSearch;
  readonly verifier: TransactionVerifier;
  readonly orchestrator: BatchVerificationOrchestrator;
}

export function createStack(
  options: {
    maxScanCandidates?: number;
    tieMargin?: number;
    maxTiedFetches?: number;
    ledger?: InMemoryLedger;
  } = {},
): Stack {
  const ledger = options.ledger ?? new InMemoryLedger();
  const cache = new BatchMetadataCache(ledger);
  const search = new CandidateSearch(ledger, cache, {
    maxScanCandidates: options.maxScanCandidates ?? 100,
  });
  const verifier = new TransactionVerifier(
    { ledger, storage: ledger, cache, search },
    { tieMargin: options.tieMargin ?? 0, maxTiedFetches: options.maxTiedFetches },
  );
  const orchestrator = new BatchVerificationOrchestrator(verifier, { concurrency: 4 });
  return { ledger, cache, search, verifier, orchestrator };
}
