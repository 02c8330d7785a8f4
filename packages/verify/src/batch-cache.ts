/**
 * @ledgerproof/verify — Batch Metadata Cache.
 *
 * TTL cache of batch descriptors read from the ledger.
 *
 * Semantics:
 * - Single-flight: concurrent gets for one uncached key share a fetch
 * - The shared fetch is aborted only when every waiter has left
 * - Failed, cancelled and "not found" fetches are never stored
 * - Lazy expiry on access, plus an optional periodic sweep
 * - Bounded: the oldest entry is evicted first
 */

import { CancelledError, throwIfAborted } from "@ledgerproof/types";
import type { BatchDescriptor } from "@ledgerproof/types";
import type { LedgerClient } from "@ledgerproof/ledger-client";

export interface BatchCacheOptions {
  /** Entry lifetime in milliseconds. Default: 300000 */
  readonly ttlMs?: number;
  /** Maximum number of entries. Default: 10000 */
  readonly maxEntries?: number;
  /** Sweep period for startSweeper(). Default: 60000 */
  readonly sweepIntervalMs?: number;
  /** Clock in epoch milliseconds (injectable for testing) */
  readonly now?: () => number;
}

export interface BatchCacheStats {
  readonly hits: number;
  readonly misses: number;
  readonly fetches: number;
}

interface CacheEntry {
  readonly descriptor: BatchDescriptor;
  readonly expiresAt: number;
}

interface InFlight {
  readonly promise: Promise<BatchDescriptor | null>;
  readonly controller: AbortController;
  waiters: number;
}

export class BatchMetadataCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inflight = new Map<string, InFlight>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private sweeper: ReturnType<typeof setInterval> | null = null;
  private hits = 0;
  private misses = 0;
  private fetches = 0;

  constructor(
    private readonly ledger: LedgerClient,
    options: BatchCacheOptions = {},
  ) {
    this.ttlMs = options.ttlMs ?? 300_000;
    this.maxEntries = options.maxEntries ?? 10_000;
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60_000;
    this.now = options.now ?? Date.now;
    if (this.ttlMs <= 0) {
      throw new Error(`BatchMetadataCache: ttlMs must be positive, got ${this.ttlMs}`);
    }
    if (!Number.isInteger(this.maxEntries) || this.maxEntries < 1) {
      throw new Error(`BatchMetadataCache: maxEntries must be a positive integer, got ${this.maxEntries}`);
    }
  }

  /**
   * Descriptor of a batch, from cache or from the ledger.
   * Returns null when the ledger does not know the batch.
   */
  async get(batchId: string, signal?: AbortSignal): Promise<BatchDescriptor | null> {
    throwIfAborted(signal);

    const cached = this.lookup(batchId);
    if (cached !== null) {
      this.hits++;
      return cached;
    }
    this.misses++;

    let flight = this.inflight.get(batchId);
    if (flight === undefined) {
      flight = this.startFetch(batchId);
    }
    return this.await(batchId, flight, signal);
  }

  /** Drop an entry, and detach any in-flight fetch so its result is not stored. */
  invalidate(batchId: string): void {
    this.entries.delete(batchId);
    this.inflight.delete(batchId);
  }

  /** Store descriptors obtained elsewhere (e.g. from an index query). */
  prime(descriptors: readonly BatchDescriptor[]): void {
    for (const descriptor of descriptors) {
      this.store(descriptor.batchId, descriptor);
    }
  }

  /**
   * Remove every expired entry.
   * @returns Number of entries removed
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [batchId, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(batchId);
        removed++;
      }
    }
    return removed;
  }

  startSweeper(): void {
    if (this.sweeper !== null) return;
    this.sweeper = setInterval(() => this.sweep(), this.sweepIntervalMs);
    this.sweeper.unref();
  }

  stop(): void {
    if (this.sweeper !== null) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  clear(): void {
    this.entries.clear();
    this.inflight.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  get stats(): BatchCacheStats {
    return { hits: this.hits, misses: this.misses, fetches: this.fetches };
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private lookup(batchId: string): BatchDescriptor | null {
    const entry = this.entries.get(batchId);
    if (entry === undefined) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(batchId);
      return null;
    }
    return entry.descriptor;
  }

  private store(batchId: string, descriptor: BatchDescriptor): void {
    // Re-insert so Map order stays oldest-first
    this.entries.delete(batchId);
    this.entries.set(batchId, { descriptor, expiresAt: this.now() + this.ttlMs });
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done === true) break;
      this.entries.delete(oldest.value);
    }
  }

  private startFetch(batchId: string): InFlight {
    this.fetches++;
    const controller = new AbortController();
    const promise = this.ledger
      .getBatch(batchId, { signal: controller.signal })
      .then((descriptor) => {
        if (this.inflight.get(batchId) === flight) {
          this.inflight.delete(batchId);
          if (descriptor !== null && !controller.signal.aborted) {
            this.store(batchId, descriptor);
          }
        }
        return descriptor;
      })
      .catch((err: unknown) => {
        if (this.inflight.get(batchId) === flight) {
          this.inflight.delete(batchId);
        }
        throw err;
      });
    const flight: InFlight = { promise, controller, waiters: 0 };
    // Waiters observe the outcome; an abandoned fetch has none.
    promise.catch(() => undefined);
    this.inflight.set(batchId, flight);
    return flight;
  }

  private await(
    batchId: string,
    flight: InFlight,
    signal: AbortSignal | undefined,
  ): Promise<BatchDescriptor | null> {
    flight.waiters++;
    let left = false;
    const leave = (): void => {
      if (left) return;
      left = true;
      flight.waiters--;
    };

    return new Promise<BatchDescriptor | null>((resolve, reject) => {
      const onAbort = (): void => {
        leave();
        if (flight.waiters === 0) {
          flight.controller.abort();
          if (this.inflight.get(batchId) === flight) {
            this.inflight.delete(batchId);
          }
        }
        reject(new CancelledError());
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      flight.promise.then(
        (descriptor) => {
          signal?.removeEventListener("abort", onAbort);
          leave();
          resolve(descriptor);
        },
        (err: unknown) => {
          signal?.removeEventListener("abort", onAbort);
          leave();
          reject(err);
        },
      );
    });
  }
}
