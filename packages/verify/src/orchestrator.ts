/**
 * @ledgerproof/verify — Batch Verification Orchestrator.
 *
 * Verifies many records concurrently with a bounded worker pool.
 *
 * Guarantees:
 * - verdicts[i] belongs to items[i], whatever the completion order
 * - A failing record never fails the whole call; it yields an error verdict
 * - On overall timeout or abort, completed verdicts are kept and the
 *   rest are returned as cancelled
 */

import { EncodingError, InvalidHintError, VerificationError } from "@ledgerproof/types";
import type {
  TransactionRecord,
  VerdictOutcome,
  VerificationHint,
  VerificationVerdict,
} from "@ledgerproof/types";
import { digestRecord } from "@ledgerproof/proof";
import { linkSignals } from "@ledgerproof/ledger-client";
import type { TransactionVerifier } from "./transaction-verifier.js";

// =============================================================================
// Types
// =============================================================================

export interface VerificationItem {
  readonly record: TransactionRecord;
  readonly hint?: VerificationHint | undefined;
}

export interface VerifyManyOptions {
  /** Maximum records in flight. Default: 8 */
  readonly concurrency?: number | undefined;
  /** Deadline for the whole call, in milliseconds */
  readonly timeoutMs?: number | undefined;
  /** Deadline for each record, in milliseconds */
  readonly recordTimeoutMs?: number | undefined;
  readonly signal?: AbortSignal | undefined;
  /** Stop dispatching after the first verdict that is not `verified` */
  readonly failFast?: boolean | undefined;
  readonly onProgress?: ((completed: number, total: number) => void) | undefined;
}

export interface VerdictSummary {
  readonly total: number;
  readonly counts: Readonly<Record<VerdictOutcome, number>>;
  /** verified / total, 0 for an empty run */
  readonly successRate: number;
  readonly averageDurationMs: number;
}

// =============================================================================
// Helpers
// =============================================================================

function safeDigest(record: TransactionRecord): string {
  try {
    return digestRecord(record);
  } catch (err: unknown) {
    if (err instanceof EncodingError) return "";
    throw err;
  }
}

function cancelledVerdict(item: VerificationItem | undefined): VerificationVerdict {
  return {
    outcome: "error",
    errorCode: "cancelled",
    leafDigest: item !== undefined ? safeDigest(item.record) : "",
    candidates: [],
    reason: "cancelled",
    retryable: true,
    possiblyIncomplete: false,
    operation: item?.record.operation,
    warnings: [],
    trail: ["start", "done"],
    durationMs: 0,
  };
}

function requestErrorVerdict(
  item: VerificationItem,
  err: InvalidHintError | EncodingError,
  durationMs: number,
): VerificationVerdict {
  return {
    outcome: "error",
    errorCode: err instanceof InvalidHintError ? "invalid_hint" : "encoding",
    leafDigest: safeDigest(item.record),
    candidates: [],
    reason: err.message,
    retryable: false,
    possiblyIncomplete: false,
    operation: item.record.operation,
    warnings: [],
    trail: ["start", "done"],
    durationMs,
  };
}

/**
 * Counts per outcome, success rate and mean duration.
 */
export function summarizeVerdicts(verdicts: readonly VerificationVerdict[]): VerdictSummary {
  const counts: Record<VerdictOutcome, number> = {
    verified: 0,
    tampered: 0,
    not_found: 0,
    ambiguous: 0,
    error: 0,
  };
  let duration = 0;
  for (const v of verdicts) {
    counts[v.outcome]++;
    duration += v.durationMs;
  }
  const total = verdicts.length;
  return {
    total,
    counts,
    successRate: total === 0 ? 0 : counts.verified / total,
    averageDurationMs: total === 0 ? 0 : duration / total,
  };
}

// =============================================================================
// Orchestrator
// =============================================================================

export class BatchVerificationOrchestrator {
  constructor(
    private readonly verifier: TransactionVerifier,
    private readonly defaults: { readonly concurrency?: number; readonly now?: () => number } = {},
  ) {}

  /**
   * Verify every item; verdicts are returned in input order.
   */
  async verifyMany(
    items: readonly VerificationItem[],
    options: VerifyManyOptions = {},
  ): Promise<VerificationVerdict[]> {
    const total = items.length;
    if (total === 0) return [];
    const concurrency = Math.max(1, Math.trunc(options.concurrency ?? this.defaults.concurrency ?? 8));
    const results = new Array<VerificationVerdict | undefined>(total).fill(undefined);

    const timeout = new AbortController();
    const timer =
      options.timeoutMs !== undefined ? setTimeout(() => timeout.abort(), options.timeoutMs) : undefined;
    const linked = linkSignals(options.signal, timeout.signal);

    let next = 0;
    let completed = 0;
    let halted = false;

    const worker = async (): Promise<void> => {
      while (!halted && !linked.signal.aborted) {
        const index = next++;
        const item = items[index];
        if (item === undefined) return;

        const verdict = await this.verifyOne(item, linked.signal, options.recordTimeoutMs);
        if (linked.signal.aborted && verdict.errorCode === "cancelled") return;

        results[index] = verdict;
        completed++;
        options.onProgress?.(completed, total);
        if (options.failFast === true && verdict.outcome !== "verified") {
          halted = true;
        }
      }
    };

    let release: () => void = () => undefined;
    const aborted = new Promise<void>((resolve) => {
      release = resolve;
    });
    const onAbort = (): void => release();
    if (linked.signal.aborted) {
      onAbort();
    } else {
      linked.signal.addEventListener("abort", onAbort, { once: true });
    }

    try {
      const workers = Array.from({ length: Math.min(concurrency, total) }, () => worker());
      await Promise.race([Promise.all(workers), aborted]);
    } finally {
      clearTimeout(timer);
      linked.signal.removeEventListener("abort", onAbort);
      linked.dispose();
    }

    // Snapshot; workers may still settle after an abort.
    return results.map((verdict, i) => verdict ?? cancelledVerdict(items[i]));
  }

  private async verifyOne(
    item: VerificationItem,
    signal: AbortSignal,
    timeoutMs: number | undefined,
  ): Promise<VerificationVerdict> {
    const now = this.defaults.now ?? Date.now;
    const started = now();
    try {
      return await this.verifier.verify(item.record, item.hint, { signal, timeoutMs });
    } catch (err: unknown) {
      if (err instanceof InvalidHintError || err instanceof EncodingError) {
        return requestErrorVerdict(item, err, now() - started);
      }
      const reason = err instanceof Error ? err.message : String(err);
      return {
        outcome: "error",
        errorCode: err instanceof VerificationError && err.code === "CANCELLED" ? "cancelled" : "internal",
        leafDigest: safeDigest(item.record),
        candidates: [],
        reason,
        retryable: false,
        possiblyIncomplete: false,
        operation: item.record.operation,
        warnings: [],
        trail: ["start", "done"],
        durationMs: now() - started,
      };
    }
  }
}
