/**
 * HTTP Storage Client — reads batch contents from an object store.
 *
 * Wraps native fetch() with:
 * - Per-request timeout linked to the caller's signal, covering both
 *   the response headers and the body
 * - Response body validation (zod)
 * - Error classification (transient vs permanent)
 *
 * Object URL:
 * - `${baseUrl}/${bucket}/${key}` when a base URL is configured
 *   (S3-compatible gateways, local object stores)
 * - `https://${bucket}.s3.${region}.amazonaws.com/${key}` otherwise
 */

import { z } from "zod";
import { CancelledError, CollaboratorError } from "@ledgerproof/types";
import type { BatchContents, StorageRef } from "@ledgerproof/types";
import type { CallOptions, StorageClient } from "./client.js";
import { linkSignals, raceSignal } from "./signals.js";

// =============================================================================
// Wire format
// =============================================================================

const DigestSchema = z.string().regex(/^[0-9a-f]{64}$/, "expected lowercase SHA-256 hex digest");

const StoredLeafSchema = z.object({
  digest: DigestSchema,
  proof: z.object({
    leaf_index: z.number().int().nonnegative(),
    siblings: z.array(
      z.object({
        hash: DigestSchema,
        direction: z.enum(["left", "right"]),
      }),
    ),
  }),
});

/**
 * Stored batch document. Any `merkle_root` field is deliberately not
 * read: roots come from the ledger only.
 */
export const StoredBatchSchema = z.object({
  batch_id: z.string().min(1),
  leaves: z.array(StoredLeafSchema),
});

export type StoredBatch = z.infer<typeof StoredBatchSchema>;

export function toBatchContents(stored: StoredBatch): BatchContents {
  return {
    batchId: stored.batch_id,
    leaves: stored.leaves.map((leaf) => ({
      digest: leaf.digest,
      proof: {
        leafIndex: leaf.proof.leaf_index,
        siblings: leaf.proof.siblings.map((s) => ({ hash: s.hash, direction: s.direction })),
      },
    })),
  };
}

// =============================================================================
// Configuration
// =============================================================================

export interface HttpStorageConfig {
  /** Object store base URL; virtual-hosted S3 URLs are used when absent */
  readonly baseUrl?: string | undefined;

  /** Region used when a storage reference names none. Default: "us-west-2" */
  readonly defaultRegion?: string | undefined;

  /** Per-request timeout in milliseconds. Default: 30000 */
  readonly timeoutMs?: number | undefined;

  /** Extra request headers */
  readonly headers?: Readonly<Record<string, string>> | undefined;

  /** Custom fetch function (for testing) */
  readonly fetchFn?: typeof fetch | undefined;
}

// =============================================================================
// HTTP Storage Client
// =============================================================================

export class HttpStorageClient implements StorageClient {
  private readonly baseUrl: string | undefined;
  private readonly defaultRegion: string;
  private readonly timeout: number;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly fetchFn: typeof fetch;

  constructor(config: HttpStorageConfig = {}) {
    // Strip trailing slash
    this.baseUrl = config.baseUrl?.replace(/\/+$/, "");
    this.defaultRegion = config.defaultRegion ?? "us-west-2";
    this.timeout = config.timeoutMs ?? 30_000;
    this.headers = config.headers ?? {};
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  /**
   * Resolve the object URL for a storage reference.
   */
  objectUrl(ref: StorageRef): string {
    const key = ref.key.split("/").map(encodeURIComponent).join("/");
    if (this.baseUrl !== undefined) {
      return `${this.baseUrl}/${encodeURIComponent(ref.bucket)}/${key}`;
    }
    const region = ref.region !== "" ? ref.region : this.defaultRegion;
    return `https://${ref.bucket}.s3.${region}.amazonaws.com/${key}`;
  }

  async fetchBatchContents(storageRef: StorageRef, options?: CallOptions): Promise<BatchContents> {
    const url = this.objectUrl(storageRef);
    const text = await this.getText(url, options?.signal);

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err: unknown) {
      throw new CollaboratorError("storage", `GET ${url} returned a non-JSON body`, false, err);
    }

    const parsed = StoredBatchSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue !== undefined ? `${issue.path.join(".")}: ${issue.message}` : "invalid";
      throw new CollaboratorError(
        "storage",
        `GET ${url} returned malformed batch contents (${where})`,
        false,
        parsed.error,
      );
    }

    return toBatchContents(parsed.data);
  }

  /**
   * GET the object and read its body, all under one timeout; the caller's
   * abort wins over the timeout.
   */
  private async getText(url: string, signal: AbortSignal | undefined): Promise<string> {
    const timeoutController = new AbortController();
    const timeoutId = setTimeout(() => timeoutController.abort(), this.timeout);
    const linked = linkSignals(signal, timeoutController.signal);

    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers: { Accept: "application/json", ...this.headers },
        signal: linked.signal,
      });

      if (!response.ok) {
        await response.body?.cancel();
        const transient = response.status >= 500 || response.status === 429;
        throw new CollaboratorError("storage", `GET ${url} failed: HTTP ${response.status}`, transient);
      }

      // A mocked or misbehaving body may ignore the fetch signal.
      return await raceSignal(response.text(), linked.signal);
    } catch (error: unknown) {
      if (signal?.aborted === true) {
        throw new CancelledError();
      }
      if (timeoutController.signal.aborted) {
        throw new CollaboratorError(
          "storage",
          `GET ${url} timed out after ${this.timeout}ms`,
          true,
          error,
        );
      }
      if (error instanceof CollaboratorError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new CollaboratorError("storage", `GET ${url} failed: ${message}`, true, error);
    } finally {
      clearTimeout(timeoutId);
      linked.dispose();
    }
  }
}
