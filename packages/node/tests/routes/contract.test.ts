import { describe, it, expect } from "vitest";
import { createTestApp, invoice, seed } from "../setup.js";

describe("GET /api/v1/contract", () => {
  it("describes the contract with totals over every batch", async () => {
    const { app, ledger } = createTestApp();
    seed(ledger);
    ledger.anchor([invoice(4, { databaseName: "audit" }), invoice(5, { databaseName: "audit" })], {
      batchId: "BATCH-2025-07-02-def456",
      createdAt: "2025-07-02T08:00:00Z",
    });

    const res = await app.request("/api/v1/contract");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        organization: "test-org",
        network: "testnet",
        backend: "in-memory",
        chain_id: "eip155:11155111",
        contract_address: null,
        total_batches: 2,
        total_transactions: 5,
        oldest_batch_timestamp: "2025-07-01T09:55:00.000Z",
        newest_batch_timestamp: "2025-07-02T08:00:00.000Z",
        databases: ["audit", "billing"],
      },
    });
  });

  it("reports an empty ledger", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/contract");

    expect(await res.json()).toMatchObject({
      data: { total_batches: 0, total_transactions: 0, oldest_batch_timestamp: null, databases: [] },
    });
  });
});
