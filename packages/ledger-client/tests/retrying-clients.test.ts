import { describe, it, expect } from "vitest";
import { CollaboratorError, RetryExhaustedError } from "@ledgerproof/types";
import type { TransactionRecord } from "@ledgerproof/types";
import { InMemoryLedger } from "../src/in-memory-ledger.js";
import { RetryPolicy } from "../src/retry.js";
import { RetryingLedgerClient, RetryingStorageClient } from "../src/retrying-clients.js";

const policy = new RetryPolicy({
  config: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1, jitterMs: 0 },
  sleepFn: async () => {},
});

const record: TransactionRecord = {
  databaseName: "billing",
  tableName: "invoices",
  operation: "INSERT",
  columns: { id: 1 },
};

describe("RetryingLedgerClient", () => {
  it("retries transient failures until success", async () => {
    const ledger = new InMemoryLedger();
    const batch = ledger.anchor([record]);
    ledger.failNext("getBatchRoot", new CollaboratorError("ledger", "503", true));
    ledger.failNext("getBatchRoot", new CollaboratorError("ledger", "503", true));

    const client = new RetryingLedgerClient(ledger, policy);

    await expect(client.getBatchRoot(batch.batchId)).resolves.toBe(batch.merkleRoot);
    expect(ledger.calls.getBatchRoot).toBe(3);
  });

  it("gives up after the configured attempts", async () => {
    const ledger = new InMemoryLedger();
    for (let i = 0; i < 3; i++) {
      ledger.failNext("queryBatchIndex", new CollaboratorError("ledger", "timeout", true));
    }
    const client = new RetryingLedgerClient(ledger, policy);

    await expect(client.queryBatchIndex({})).rejects.toThrow(RetryExhaustedError);
    expect(ledger.calls.queryBatchIndex).toBe(3);
  });

  it("does not retry permanent failures", async () => {
    const ledger = new InMemoryLedger();
    ledger.failNext("getBatch", new CollaboratorError("ledger", "revert", false));
    const client = new RetryingLedgerClient(ledger, policy);

    await expect(client.getBatch("BATCH-2025-07-01-abc123")).rejects.toThrow("revert");
    expect(ledger.calls.getBatch).toBe(1);
  });
});

describe("RetryingStorageClient", () => {
  it("retries transient storage failures", async () => {
    const ledger = new InMemoryLedger();
    const batch = ledger.anchor([record]);
    ledger.failNext("fetchBatchContents", new CollaboratorError("storage", "HTTP 503", true));

    const client = new RetryingStorageClient(ledger, policy);
    const contents = await client.fetchBatchContents(batch.storageRef);

    expect(contents.batchId).toBe(batch.batchId);
    expect(ledger.calls.fetchBatchContents).toBe(2);
  });
});
