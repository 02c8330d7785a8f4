/**
 * Ledger and storage collaborators built from configuration.
 *
 * With an RPC URL and a contract address the service reads the on-chain
 * anchor contract and fetches batch contents over HTTP, both behind one
 * shared retry policy. Without them it serves an empty in-memory ledger;
 * configuration only allows that outside production.
 */

import {
  EvmLedgerClient,
  HttpStorageClient,
  InMemoryLedger,
  RetryPolicy,
  RetryingLedgerClient,
  RetryingStorageClient,
} from "@ledgerproof/ledger-client";
import type { LedgerClient, RetryAttempt, StorageClient } from "@ledgerproof/ledger-client";
import type { AppConfig } from "../config.js";
import { hasChainLedger } from "../config.js";
import type { LedgerInfo } from "./verification-service.js";

export interface Collaborators {
  readonly ledger: LedgerClient;
  readonly storage: StorageClient;
  readonly info: LedgerInfo;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
}

export interface CollaboratorHooks {
  readonly onRetry?: (collaborator: "ledger" | "storage", attempt: RetryAttempt) => void;
  /** Custom fetch for the storage client (for testing) */
  readonly fetchFn?: typeof fetch;
}

export function createCollaborators(config: AppConfig, hooks: CollaboratorHooks = {}): Collaborators {
  const base = {
    organization: config.LEDGER_ORGANIZATION,
    network: config.LEDGER_NETWORK,
    chainId: config.LEDGER_CHAIN_ID,
  };

  if (!hasChainLedger(config)) {
    const memory = new InMemoryLedger();
    return {
      ledger: memory,
      storage: memory,
      info: { ...base, backend: "in-memory" },
      connect: async () => undefined,
      disconnect: async () => undefined,
    };
  }

  const retryConfig = {
    maxAttempts: config.RETRY_MAX_ATTEMPTS,
    baseDelayMs: config.RETRY_BASE_DELAY_MS,
    maxDelayMs: config.RETRY_MAX_DELAY_MS,
    jitterMs: config.RETRY_JITTER_MS,
  };
  const policy = (collaborator: "ledger" | "storage"): RetryPolicy =>
    new RetryPolicy({
      config: retryConfig,
      onRetry: (attempt) => hooks.onRetry?.(collaborator, attempt),
    });

  const evm = new EvmLedgerClient({
    chainId: config.LEDGER_CHAIN_ID,
    rpcUrl: config.LEDGER_RPC_URL,
    contractAddress: config.LEDGER_CONTRACT_ADDRESS,
    timeoutMs: config.REQUEST_TIMEOUT_MS,
  });
  const http = new HttpStorageClient({
    baseUrl: config.STORAGE_BASE_URL,
    defaultRegion: config.STORAGE_REGION,
    timeoutMs: config.REQUEST_TIMEOUT_MS,
    fetchFn: hooks.fetchFn,
  });

  return {
    ledger: new RetryingLedgerClient(evm, policy("ledger")),
    storage: new RetryingStorageClient(http, policy("storage")),
    info: { ...base, backend: "evm", contractAddress: config.LEDGER_CONTRACT_ADDRESS },
    connect: () => evm.connect(),
    disconnect: () => evm.disconnect(),
  };
}
