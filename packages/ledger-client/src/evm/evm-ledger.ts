/**
 * EVM Ledger Client — Read-only reader of the batch anchor contract.
 *
 * Uses viem for all chain interactions.
 * Supports any EVM-compatible chain the anchor contract is deployed on
 * (Ethereum, Sepolia, Base, Arbitrum, Optimism, Polygon).
 *
 * Capabilities:
 * - Batch descriptor lookup by identifier
 * - Batch index query (database, table, creation window)
 * - Anchored Merkle root lookup
 *
 * Non-capabilities:
 * - No signing
 * - No transaction submission
 * - No anchoring
 */

import {
  BaseError,
  HttpRequestError,
  TimeoutError,
  createPublicClient,
  http,
  isAddress,
  parseAbi,
  type Address,
  type Chain,
  type HttpTransport,
  type PublicClient,
} from "viem";
import { mainnet, sepolia, base, arbitrum, optimism, polygon } from "viem/chains";
import { CollaboratorError } from "@ledgerproof/types";
import type { BatchDescriptor, Digest, OperationKind } from "@ledgerproof/types";
import type { BatchIndexFilter, CallOptions, LedgerClient } from "../client.js";
import { compareByRecency, matchesIndexFilter } from "../client.js";
import { raceSignal } from "../signals.js";

// =============================================================================
// Chain ID to viem Chain mapping
// =============================================================================

const VIEM_CHAINS: Record<string, Chain> = {
  "eip155:1": mainnet,
  "eip155:11155111": sepolia,
  "eip155:8453": base,
  "eip155:42161": arbitrum,
  "eip155:10": optimism,
  "eip155:137": polygon,
};

/** Chain IDs the client can connect to. */
export const SUPPORTED_CHAIN_IDS: readonly string[] = Object.keys(VIEM_CHAINS);

// Anchor contract ABI (read-only)
export const BATCH_ANCHOR_ABI = parseAbi([
  "struct BatchRecord { string batchId; bytes32 merkleRoot; uint64 createdAt; string databaseName; string[] tableNames; uint32 transactionCount; string storageBucket; string storageKey; string storageRegion; uint32 insertCount; uint32 updateCount; uint32 deleteCount; uint64 sizeBytes; }",
  "function getBatch(string batchId) view returns (BatchRecord)",
  "function listBatches(string databaseName, string tableName, uint64 createdFrom, uint64 createdTo, uint32 limit) view returns (BatchRecord[])",
  "function getBatchRoot(string batchId) view returns (bytes32)",
]);

const ZERO_ROOT = "0".repeat(64);

// =============================================================================
// Configuration
// =============================================================================

export interface EvmLedgerConfig {
  /** CAIP-2 chain ID, e.g. "eip155:11155111" */
  readonly chainId: string;

  /** HTTP RPC endpoint */
  readonly rpcUrl: string;

  /** Address of the deployed anchor contract */
  readonly contractAddress: string;

  /** Per-request timeout in milliseconds. Default: 30000 */
  readonly timeoutMs?: number;
}

/**
 * Decoded anchor contract record.
 */
export interface AnchoredBatchRecord {
  readonly batchId: string;
  readonly merkleRoot: `0x${string}`;
  readonly createdAt: bigint;
  readonly databaseName: string;
  readonly tableNames: readonly string[];
  readonly transactionCount: number;
  readonly storageBucket: string;
  readonly storageKey: string;
  readonly storageRegion: string;
  readonly insertCount: number;
  readonly updateCount: number;
  readonly deleteCount: number;
  readonly sizeBytes: bigint;
}

// =============================================================================
// Conversions
// =============================================================================

/**
 * bytes32 → lowercase hex digest without prefix.
 */
export function normalizeRoot(value: string): Digest {
  const hex = value.startsWith("0x") || value.startsWith("0X") ? value.slice(2) : value;
  return hex.toLowerCase();
}

/**
 * Convert a decoded contract record to a descriptor.
 * An empty identifier is the contract's "no such batch" sentinel.
 */
export function toBatchDescriptor(record: AnchoredBatchRecord): BatchDescriptor | null {
  if (record.batchId === "") return null;

  const counts: Record<OperationKind, number> = {
    INSERT: record.insertCount,
    UPDATE: record.updateCount,
    DELETE: record.deleteCount,
  };
  const declaredTotal = counts.INSERT + counts.UPDATE + counts.DELETE;

  return {
    batchId: record.batchId,
    merkleRoot: normalizeRoot(record.merkleRoot),
    createdAt: new Date(Number(record.createdAt) * 1000).toISOString(),
    databaseName: record.databaseName,
    tableNames: [...record.tableNames],
    transactionCount: record.transactionCount,
    storageRef: {
      bucket: record.storageBucket,
      key: record.storageKey,
      region: record.storageRegion,
    },
    // Batches anchored before operation counts were published carry zeros.
    operationCounts: declaredTotal > 0 ? counts : undefined,
    sizeBytes: record.sizeBytes > 0n ? Number(record.sizeBytes) : undefined,
  };
}

/** ISO instant → unix seconds, rounding up so the bound stays exact. */
function toSeconds(iso: string | undefined): bigint {
  if (iso === undefined) return 0n;
  return BigInt(Math.ceil(Date.parse(iso) / 1000));
}

/**
 * Map a viem failure to a CollaboratorError.
 *
 * HTTP 5xx/429, transport errors and timeouts are transient; reverts and
 * decoding failures are permanent.
 */
export function toLedgerError(err: unknown, action: string): CollaboratorError {
  if (err instanceof CollaboratorError) return err;
  if (err instanceof BaseError) {
    const timeout = err.walk((e) => e instanceof TimeoutError);
    if (timeout !== null) {
      return new CollaboratorError("ledger", `${action}: RPC request timed out`, true, err);
    }
    const httpError = err.walk((e) => e instanceof HttpRequestError);
    if (httpError instanceof HttpRequestError) {
      const status = httpError.status;
      const transient = status === undefined || status >= 500 || status === 429;
      return new CollaboratorError("ledger", `${action}: ${err.shortMessage}`, transient, err);
    }
    return new CollaboratorError("ledger", `${action}: ${err.shortMessage}`, false, err);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new CollaboratorError("ledger", `${action}: ${message}`, false, err);
}

// =============================================================================
// EVM Ledger Client
// =============================================================================

export class EvmLedgerClient implements LedgerClient {
  readonly chainId: string;
  readonly contractAddress: Address;
  private client: PublicClient<HttpTransport, Chain> | null = null;
  private readonly config: EvmLedgerConfig;

  constructor(config: EvmLedgerConfig) {
    if (!config.chainId.startsWith("eip155:")) {
      throw new Error(
        `EvmLedgerClient: expected EVM chain ID (eip155:*), got '${config.chainId}'`,
      );
    }
    const address = config.contractAddress;
    if (!isAddress(address)) {
      throw new Error(`EvmLedgerClient: invalid contract address '${address}'`);
    }
    this.chainId = config.chainId;
    this.contractAddress = address;
    this.config = config;
  }

  async connect(): Promise<void> {
    const viemChain = VIEM_CHAINS[this.chainId];
    if (!viemChain) {
      throw new Error(
        `EvmLedgerClient: unsupported chain '${this.chainId}'. ` +
          `Supported: ${SUPPORTED_CHAIN_IDS.join(", ")}`,
      );
    }

    this.client = createPublicClient({
      chain: viemChain,
      transport: http(this.config.rpcUrl, {
        timeout: this.config.timeoutMs ?? 30_000,
        retryCount: 0,
      }),
    });
  }

  async disconnect(): Promise<void> {
    this.client = null;
  }

  get connected(): boolean {
    return this.client !== null;
  }

  async queryBatchIndex(
    filter: BatchIndexFilter,
    options?: CallOptions,
  ): Promise<readonly BatchDescriptor[]> {
    const client = this.requireClient();
    const limit = filter.limit ?? 0;

    let records: readonly AnchoredBatchRecord[];
    try {
      records = await raceSignal(
        client.readContract({
          address: this.contractAddress,
          abi: BATCH_ANCHOR_ABI,
          functionName: "listBatches",
          args: [
            filter.databaseName ?? "",
            filter.tableName ?? "",
            toSeconds(filter.createdFrom),
            toSeconds(filter.createdTo),
            limit,
          ],
        }),
        options?.signal,
      );
    } catch (err: unknown) {
      throw this.mapError(err, "listBatches", options);
    }

    // The contract filters too; re-applying keeps local and remote semantics equal.
    const batches = records
      .map(toBatchDescriptor)
      .filter((b): b is BatchDescriptor => b !== null && matchesIndexFilter(b, filter))
      .sort(compareByRecency);
    return limit > 0 ? batches.slice(0, limit) : batches;
  }

  async getBatch(batchId: string, options?: CallOptions): Promise<BatchDescriptor | null> {
    const client = this.requireClient();
    try {
      const record = await raceSignal(
        client.readContract({
          address: this.contractAddress,
          abi: BATCH_ANCHOR_ABI,
          functionName: "getBatch",
          args: [batchId],
        }),
        options?.signal,
      );
      return toBatchDescriptor(record);
    } catch (err: unknown) {
      throw this.mapError(err, `getBatch(${batchId})`, options);
    }
  }

  async getBatchRoot(batchId: string, options?: CallOptions): Promise<Digest | null> {
    const client = this.requireClient();
    try {
      const root = await raceSignal(
        client.readContract({
          address: this.contractAddress,
          abi: BATCH_ANCHOR_ABI,
          functionName: "getBatchRoot",
          args: [batchId],
        }),
        options?.signal,
      );
      const normalized = normalizeRoot(root);
      return normalized === ZERO_ROOT ? null : normalized;
    } catch (err: unknown) {
      throw this.mapError(err, `getBatchRoot(${batchId})`, options);
    }
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private requireClient(): PublicClient<HttpTransport, Chain> {
    if (!this.client) {
      throw new Error("EvmLedgerClient: not connected. Call connect() first.");
    }
    return this.client;
  }

  /** Cancellation passes through untouched; everything else is classified. */
  private mapError(err: unknown, action: string, options: CallOptions | undefined): unknown {
    if (options?.signal?.aborted === true) return err;
    return toLedgerError(err, action);
  }
}
