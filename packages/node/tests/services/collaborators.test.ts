import { describe, it, expect, vi } from "vitest";
import { InMemoryLedger } from "@ledgerproof/ledger-client";
import type { RetryAttempt } from "@ledgerproof/ledger-client";
import { loadConfig } from "../../src/config.js";
import { createCollaborators } from "../../src/services/collaborators.js";

const CONTRACT = "0x" + "ab".repeat(20);

const CHAIN_ENV = {
  LEDGER_ORGANIZATION: "test-org",
  LEDGER_RPC_URL: "http://rpc.local:8545",
  LEDGER_CONTRACT_ADDRESS: CONTRACT,
  STORAGE_BASE_URL: "http://store.local",
  RETRY_BASE_DELAY_MS: "0",
  RETRY_JITTER_MS: "0",
};

describe("createCollaborators", () => {
  it("serves an in-memory ledger without a chain configuration", async () => {
    const collaborators = createCollaborators(loadConfig({ LEDGER_ORGANIZATION: "test-org" }));

    expect(collaborators.ledger).toBeInstanceOf(InMemoryLedger);
    expect(collaborators.storage).toBe(collaborators.ledger);
    expect(collaborators.info).toEqual({
      organization: "test-org",
      network: "testnet",
      chainId: "eip155:11155111",
      backend: "in-memory",
    });
    await expect(collaborators.connect()).resolves.toBeUndefined();
    await expect(collaborators.disconnect()).resolves.toBeUndefined();
  });

  it("reads the anchor contract when RPC URL and address are set", () => {
    const collaborators = createCollaborators(loadConfig(CHAIN_ENV));

    expect(collaborators.ledger).not.toBeInstanceOf(InMemoryLedger);
    expect(collaborators.info).toEqual({
      organization: "test-org",
      network: "testnet",
      chainId: "eip155:11155111",
      backend: "evm",
      contractAddress: CONTRACT,
    });
  });

  it("retries transient storage failures and reports each retry", async () => {
    const stored = {
      batch_id: "BATCH-2025-07-01-abc123",
      leaves: [{ digest: "11".repeat(32), proof: { leaf_index: 0, siblings: [] } }],
    };
    const fetchFn = vi
      .fn()
      .mockResolvedValueOnce(new Response("", { status: 503 }))
      .mockResolvedValueOnce(new Response(JSON.stringify(stored), { status: 200 }));
    const retries: Array<{ collaborator: string; attempt: RetryAttempt }> = [];

    const { storage } = createCollaborators(loadConfig(CHAIN_ENV), {
      fetchFn,
      onRetry: (collaborator, attempt) => retries.push({ collaborator, attempt }),
    });

    const contents = await storage.fetchBatchContents({
      bucket: "ledger-batches",
      key: "billing/BATCH-2025-07-01-abc123.json",
      region: "",
    });

    expect(contents.batchId).toBe("BATCH-2025-07-01-abc123");
    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(retries).toHaveLength(1);
    expect(retries[0]?.collaborator).toBe("storage");
    expect(retries[0]?.attempt.attempt).toBe(1);
    expect(retries[0]?.attempt.delayMs).toBe(0);
  });
});
