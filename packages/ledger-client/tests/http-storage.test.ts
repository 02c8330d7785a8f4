/**
 * Tests for HttpStorageClient.
 *
 * fetch is injected; no network access.
 */

import { describe, it, expect, vi } from "vitest";
import { CancelledError, CollaboratorError } from "@ledgerproof/types";
import type { StorageRef } from "@ledgerproof/types";
import { HttpStorageClient } from "../src/http-storage.js";

const REF: StorageRef = {
  bucket: "ledger-batches",
  key: "billing/BATCH-2025-07-01-abc123.json",
  region: "us-west-2",
};

const LEAF = "11".repeat(32);
const SIBLING = "22".repeat(32);

const STORED = {
  batch_id: "BATCH-2025-07-01-abc123",
  merkle_root: "ff".repeat(32),
  leaves: [
    {
      digest: LEAF,
      proof: { leaf_index: 0, siblings: [{ hash: SIBLING, direction: "right" }] },
    },
  ],
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

async function failure(promise: Promise<unknown>): Promise<CollaboratorError> {
  const err = await promise.catch((e: unknown) => e);
  if (!(err instanceof CollaboratorError)) {
    throw new Error(`expected CollaboratorError, got ${String(err)}`);
  }
  return err;
}

describe("HttpStorageClient", () => {
  describe("objectUrl", () => {
    it("uses the base URL when configured", () => {
      const client = new HttpStorageClient({ baseUrl: "http://store.local:9000/" });
      expect(client.objectUrl(REF)).toBe(
        "http://store.local:9000/ledger-batches/billing/BATCH-2025-07-01-abc123.json",
      );
    });

    it("falls back to the virtual-hosted S3 URL", () => {
      const client = new HttpStorageClient();
      expect(client.objectUrl(REF)).toBe(
        "https://ledger-batches.s3.us-west-2.amazonaws.com/billing/BATCH-2025-07-01-abc123.json",
      );
    });

    it("uses the default region when the reference names none", () => {
      const client = new HttpStorageClient({ defaultRegion: "eu-central-1" });
      expect(client.objectUrl({ ...REF, region: "" })).toBe(
        "https://ledger-batches.s3.eu-central-1.amazonaws.com/billing/BATCH-2025-07-01-abc123.json",
      );
    });

    it("encodes key segments", () => {
      const client = new HttpStorageClient({ baseUrl: "http://store.local" });
      expect(client.objectUrl({ ...REF, key: "a b/c?.json" })).toBe(
        "http://store.local/ledger-batches/a%20b/c%3F.json",
      );
    });
  });

  describe("fetchBatchContents", () => {
    it("parses stored contents and ignores any stored root", async () => {
      const fetchFn = vi.fn().mockResolvedValue(jsonResponse(STORED));
      const client = new HttpStorageClient({ baseUrl: "http://store.local", fetchFn });

      const contents = await client.fetchBatchContents(REF);

      expect(contents).toEqual({
        batchId: "BATCH-2025-07-01-abc123",
        leaves: [
          {
            digest: LEAF,
            proof: { leafIndex: 0, siblings: [{ hash: SIBLING, direction: "right" }] },
          },
        ],
      });
      expect(fetchFn).toHaveBeenCalledWith(
        "http://store.local/ledger-batches/billing/BATCH-2025-07-01-abc123.json",
        expect.objectContaining({ method: "GET" }),
      );
    });

    it("treats 5xx as transient", async () => {
      const fetchFn = vi.fn().mockResolvedValue(new Response("", { status: 503 }));
      const client = new HttpStorageClient({ baseUrl: "http://store.local", fetchFn });

      const err = await failure(client.fetchBatchContents(REF));
      expect(err.transient).toBe(true);
      expect(err.message).toContain("HTTP 503");
    });

    it("treats 429 as transient", async () => {
      const fetchFn = vi.fn().mockResolvedValue(new Response("", { status: 429 }));
      const client = new HttpStorageClient({ baseUrl: "http://store.local", fetchFn });
      expect((await failure(client.fetchBatchContents(REF))).transient).toBe(true);
    });

    it("treats 404 as permanent", async () => {
      const fetchFn = vi.fn().mockResolvedValue(new Response("", { status: 404 }));
      const client = new HttpStorageClient({ baseUrl: "http://store.local", fetchFn });
      expect((await failure(client.fetchBatchContents(REF))).transient).toBe(false);
    });

    it("treats network failures as transient", async () => {
      const fetchFn = vi.fn().mockRejectedValue(new TypeError("fetch failed"));
      const client = new HttpStorageClient({ baseUrl: "http://store.local", fetchFn });

      const err = await failure(client.fetchBatchContents(REF));
      expect(err.transient).toBe(true);
      expect(err.message).toBe(
        "GET http://store.local/ledger-batches/billing/BATCH-2025-07-01-abc123.json failed: fetch failed",
      );
    });

    it("rejects malformed contents as permanent", async () => {
      const bad = { ...STORED, leaves: [{ digest: "XYZ", proof: { leaf_index: 0, siblings: [] } }] };
      const fetchFn = vi.fn().mockResolvedValue(jsonResponse(bad));
      const client = new HttpStorageClient({ baseUrl: "http://store.local", fetchFn });

      const err = await failure(client.fetchBatchContents(REF));
      expect(err.transient).toBe(false);
      expect(err.message).toContain("malformed batch contents (leaves.0.digest:");
    });

    it("rejects non-JSON bodies as permanent", async () => {
      const fetchFn = vi.fn().mockResolvedValue(new Response("<html>", { status: 200 }));
      const client = new HttpStorageClient({ baseUrl: "http://store.local", fetchFn });

      const err = await failure(client.fetchBatchContents(REF));
      expect(err.message).toContain("non-JSON body");
    });

    it("times out as a transient failure", async () => {
      const fetchFn = vi.fn((_url: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            const abort = new Error("aborted");
            abort.name = "AbortError";
            reject(abort);
          });
        }),
      );
      const client = new HttpStorageClient({ baseUrl: "http://store.local", fetchFn, timeoutMs: 10 });

      const err = await failure(client.fetchBatchContents(REF));
      expect(err.transient).toBe(true);
      expect(err.message).toContain("timed out after 10ms");
    });

    it("cancels the body of a failed response", async () => {
      const onCancel = vi.fn();
      const body = new ReadableStream<Uint8Array>({ cancel: onCancel });
      const fetchFn = vi.fn().mockResolvedValue(new Response(body, { status: 404 }));
      const client = new HttpStorageClient({ baseUrl: "http://store.local", fetchFn });

      const err = await failure(client.fetchBatchContents(REF));

      expect(err.message).toContain("HTTP 404");
      expect(onCancel).toHaveBeenCalledTimes(1);
    });

    it("times out a body that stalls after the headers", async () => {
      const stalled = new ReadableStream<Uint8Array>({
        start: (controller) => controller.enqueue(new TextEncoder().encode('{"batch_id":')),
      });
      const fetchFn = vi.fn().mockResolvedValue(new Response(stalled, { status: 200 }));
      const client = new HttpStorageClient({ baseUrl: "http://store.local", fetchFn, timeoutMs: 10 });

      const err = await failure(client.fetchBatchContents(REF));

      expect(err.transient).toBe(true);
      expect(err.message).toBe(
        "GET http://store.local/ledger-batches/billing/BATCH-2025-07-01-abc123.json timed out after 10ms",
      );
    });

    it("cancels a stalled body when the caller aborts", async () => {
      const stalled = new ReadableStream<Uint8Array>({});
      const fetchFn = vi.fn().mockResolvedValue(new Response(stalled, { status: 200 }));
      const client = new HttpStorageClient({ baseUrl: "http://store.local", fetchFn });
      const controller = new AbortController();

      const pending = client.fetchBatchContents(REF, { signal: controller.signal });
      setTimeout(() => controller.abort(), 5);

      await expect(pending).rejects.toThrow(CancelledError);
    });

    it("surfaces caller aborts as CancelledError", async () => {
      const fetchFn = vi.fn((_url: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
      );
      const client = new HttpStorageClient({ baseUrl: "http://store.local", fetchFn });
      const controller = new AbortController();

      const pending = client.fetchBatchContents(REF, { signal: controller.signal });
      controller.abort();

      await expect(pending).rejects.toThrow(CancelledError);
    });
  });
});
