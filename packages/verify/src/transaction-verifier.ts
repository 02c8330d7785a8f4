/**
 * @ledgerproof/verify — Transaction Verifier.
 *
 * Verifies one transaction record against the ledger.
 *
 * State machine (one-directional, recorded in the verdict's trail):
 *   start → hints_resolved → candidates_found → batch_fetched
 *         → proof_checked → done
 * Any state may jump to done.
 *
 * Outcomes:
 * - verified   — a stored proof for the record's digest leads to the ledger root
 * - tampered   — the digest is stored but no proof reaches the ledger root
 * - not_found  — no candidate, or no candidate batch holds the digest
 * - ambiguous  — several scan candidates tie for the top score and the
 *                tie cannot be settled by their contents
 * - error      — collaborator failure, cancellation or an unexpected fault
 *
 * A tie on a hinted scan is settled by fetching the tied batches'
 * contents (at most `maxTiedFetches`) and keeping those holding the
 * digest. A tie on an unconstrained scan is reported as is.
 *
 * With a supplied proof the storage contents are never read: the proof
 * is checked against the root anchored on the ledger for the named
 * batch. Without the stored leaves a failing proof cannot tell
 * tampering from a wrong proof, so it is reported as not_found.
 *
 * Malformed hints and unencodable records are request errors and are
 * thrown before verification begins.
 */

import {
  CollaboratorError,
  InvalidHintError,
  RetryExhaustedError,
  isCancellation,
} from "@ledgerproof/types";
import type {
  BatchContents,
  BatchDescriptor,
  Digest,
  MerkleProof,
  TransactionRecord,
  VerificationHint,
  VerificationStage,
  VerificationVerdict,
} from "@ledgerproof/types";
import { digestRecord, verifyMerkleProof } from "@ledgerproof/proof";
import type { LedgerClient, StorageClient } from "@ledgerproof/ledger-client";
import { linkSignals, raceSignal } from "@ledgerproof/ledger-client";
import type { BatchMetadataCache } from "./batch-cache.js";
import type { CandidateSearch, ScoredCandidate } from "./candidate-search.js";
import { constraintOperation, resolveHint } from "./hint-resolver.js";
import type { ConstraintFields } from "./hint-resolver.js";

// =============================================================================
// Types
// =============================================================================

export interface TransactionVerifierDeps {
  readonly ledger: LedgerClient;
  readonly storage: StorageClient;
  readonly cache: BatchMetadataCache;
  readonly search: CandidateSearch;
}

export interface TransactionVerifierOptions {
  /**
   * Scan candidates scoring within this margin of the best are treated
   * as tied. Default: 0
   */
  readonly tieMargin?: number;
  /**
   * Largest tied group whose contents are fetched to settle the tie.
   * Default: 8
   */
  readonly maxTiedFetches?: number;
  /** Clock in epoch milliseconds (injectable for testing) */
  readonly now?: () => number;
}

export interface VerifyOptions {
  readonly signal?: AbortSignal | undefined;
  /** Deadline for this record, in milliseconds */
  readonly timeoutMs?: number | undefined;
  /** Caller-held inclusion proof; requires a batchId hint */
  readonly suppliedProof?: MerkleProof | undefined;
}

/** Mutable state threaded through one verification. */
interface Run {
  readonly started: number;
  readonly leafDigest: Digest;
  readonly record: TransactionRecord;
  readonly trail: VerificationStage[];
  candidates: readonly string[];
  possiblyIncomplete: boolean;
  warnings: string[];
}

type VerdictFields = Pick<VerificationVerdict, "outcome" | "reason"> &
  Partial<Omit<VerificationVerdict, "outcome" | "reason">>;

// =============================================================================
// Transaction Verifier
// =============================================================================

export class TransactionVerifier {
  private readonly tieMargin: number;
  private readonly maxTiedFetches: number;
  private readonly now: () => number;

  constructor(
    private readonly deps: TransactionVerifierDeps,
    options: TransactionVerifierOptions = {},
  ) {
    this.tieMargin = options.tieMargin ?? 0;
    this.maxTiedFetches = options.maxTiedFetches ?? 8;
    this.now = options.now ?? Date.now;
    if (this.tieMargin < 0) {
      throw new Error(`TransactionVerifier: tieMargin must not be negative, got ${this.tieMargin}`);
    }
    if (!Number.isInteger(this.maxTiedFetches) || this.maxTiedFetches < 0) {
      throw new Error(
        `TransactionVerifier: maxTiedFetches must be a non-negative integer, got ${this.maxTiedFetches}`,
      );
    }
  }

  /**
   * Verify one record.
   *
   * @throws EncodingError if a column value cannot be encoded
   * @throws InvalidHintError if the hints are malformed or contradict the record
   */
  async verify(
    record: TransactionRecord,
    hint: VerificationHint = {},
    options: VerifyOptions = {},
  ): Promise<VerificationVerdict> {
    const started = this.now();
    const leafDigest = digestRecord(record);
    const constraint = resolveHint(hint);

    const hinted = constraintOperation(constraint);
    if (hinted !== undefined && hinted !== record.operation) {
      throw new InvalidHintError([
        {
          field: "expectedOperation",
          message: `${hinted} contradicts the record's operation ${record.operation}`,
        },
      ]);
    }

    if (options.suppliedProof !== undefined && constraint.kind !== "direct") {
      throw new InvalidHintError([{ field: "batchId", message: "is required when a proof is supplied" }]);
    }

    const run: Run = {
      started,
      leafDigest,
      record,
      trail: ["start", "hints_resolved"],
      candidates: [],
      possiblyIncomplete: false,
      warnings: [],
    };

    const timeout = new AbortController();
    const timer =
      options.timeoutMs !== undefined ? setTimeout(() => timeout.abort(), options.timeoutMs) : undefined;
    const linked = linkSignals(options.signal, timeout.signal);

    try {
      // The deadline holds even if a collaborator ignores the signal.
      const found = await raceSignal(
        this.deps.search.search(constraint, {
          signal: linked.signal,
          expectedOperation: record.operation,
        }),
        linked.signal,
      );
      run.trail.push("candidates_found");
      run.candidates = found.candidates.map((c) => c.batch.batchId);
      run.possiblyIncomplete = found.possiblyIncomplete;

      const first = found.candidates[0];
      if (first === undefined) {
        return this.finish(run, {
          outcome: "not_found",
          reason:
            constraint.kind === "direct"
              ? `Batch ${constraint.batchId} is not known to the ledger`
              : "No batch matches the given hints",
        });
      }

      if (constraint.kind === "direct") {
        run.warnings = advisoryConflicts(first.batch, constraint.advisory);
        if (options.suppliedProof !== undefined) {
          return await raceSignal(
            this.checkSuppliedProof(run, first.batch, options.suppliedProof, linked.signal),
            linked.signal,
          );
        }
      } else {
        const tied = this.topGroup(found.candidates);
        if (tied.length > 1) {
          if (constraint.unconstrained || tied.length > this.maxTiedFetches) {
            const ids = tied.map((c) => c.batch.batchId);
            run.candidates = ids;
            return this.finish(run, {
              outcome: "ambiguous",
              reason: `${ids.length} batches are equally likely: ${ids.join(", ")}`,
            });
          }
          return await raceSignal(this.settleTie(run, tied, linked.signal), linked.signal);
        }
      }

      return await raceSignal(this.checkBatch(run, first.batch.batchId, linked.signal), linked.signal);
    } catch (err: unknown) {
      if (linked.signal.aborted || isCancellation(err)) {
        return this.finish(run, {
          outcome: "error",
          errorCode: "cancelled",
          retryable: true,
          reason: "cancelled",
        });
      }
      if (err instanceof CollaboratorError || err instanceof RetryExhaustedError) {
        return this.finish(run, {
          outcome: "error",
          errorCode: "collaborator",
          retryable: true,
          reason: err.message,
        });
      }
      return this.finish(run, {
        outcome: "error",
        errorCode: "internal",
        reason: err instanceof Error ? err.message : String(err),
      });
    } finally {
      clearTimeout(timer);
      linked.dispose();
    }
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private async checkBatch(run: Run, batchId: string, signal: AbortSignal): Promise<VerificationVerdict> {
    const batch = await this.deps.cache.get(batchId, signal);
    if (batch === null) {
      return this.finish(run, {
        outcome: "not_found",
        batchId,
        reason: `Batch ${batchId} is not known to the ledger`,
      });
    }

    const contents = await this.fetchContents(batch, signal);
    run.trail.push("batch_fetched");
    return this.checkContents(run, batch, contents, signal);
  }

  private async checkSuppliedProof(
    run: Run,
    batch: BatchDescriptor,
    proof: MerkleProof,
    signal: AbortSignal,
  ): Promise<VerificationVerdict> {
    const batchId = batch.batchId;
    const ledgerRoot = (await this.deps.ledger.getBatchRoot(batchId, { signal })) ?? batch.merkleRoot;
    run.trail.push("proof_checked");
    if (ledgerRoot !== batch.merkleRoot) {
      this.deps.cache.invalidate(batchId);
    }
    const anchored = ledgerRoot === batch.merkleRoot ? batch : { ...batch, merkleRoot: ledgerRoot };

    if (verifyMerkleProof(run.leafDigest, proof, ledgerRoot)) {
      return this.finish(run, {
        outcome: "verified",
        batchId,
        batch: anchored,
        expectedRoot: ledgerRoot,
        proof,
        reason: `Supplied proof leads to the anchored root of batch ${batchId}`,
      });
    }
    return this.finish(run, {
      outcome: "not_found",
      batchId,
      batch: anchored,
      expectedRoot: ledgerRoot,
      reason: `Supplied proof does not lead from the record digest to the anchored root of batch ${batchId}`,
    });
  }

  /**
   * Fetch every tied batch and keep those holding the digest. One holder
   * goes on to proof checking; none is not_found; several stay ambiguous.
   */
  private async settleTie(
    run: Run,
    tied: readonly ScoredCandidate[],
    signal: AbortSignal,
  ): Promise<VerificationVerdict> {
    const fetched = await Promise.all(
      tied.map(async ({ batch }) => ({ batch, contents: await this.fetchContents(batch, signal) })),
    );
    run.trail.push("batch_fetched");

    const holders = fetched.filter(({ contents }) =>
      contents.leaves.some((leaf) => leaf.digest === run.leafDigest),
    );
    const [only] = holders;
    if (only === undefined) {
      return this.finish(run, {
        outcome: "not_found",
        reason: `Record digest is not present in any of the ${tied.length} candidate batches`,
      });
    }
    if (holders.length > 1) {
      const ids = holders.map(({ batch }) => batch.batchId);
      run.candidates = ids;
      return this.finish(run, {
        outcome: "ambiguous",
        reason: `${ids.length} batches hold the record digest: ${ids.join(", ")}`,
      });
    }
    return this.checkContents(run, only.batch, only.contents, signal);
  }

  private async fetchContents(batch: BatchDescriptor, signal: AbortSignal): Promise<BatchContents> {
    const contents = await this.deps.storage.fetchBatchContents(batch.storageRef, { signal });
    if (contents.batchId !== batch.batchId) {
      throw new CollaboratorError(
        "storage",
        `Stored contents at ${batch.storageRef.key} belong to ${contents.batchId}, not ${batch.batchId}`,
        false,
      );
    }
    return contents;
  }

  private async checkContents(
    run: Run,
    batch: BatchDescriptor,
    contents: BatchContents,
    signal: AbortSignal,
  ): Promise<VerificationVerdict> {
    const batchId = batch.batchId;
    const matches = contents.leaves.filter((leaf) => leaf.digest === run.leafDigest);
    if (matches.length === 0) {
      return this.finish(run, {
        outcome: "not_found",
        batchId,
        batch,
        expectedRoot: batch.merkleRoot,
        reason: `Record digest is not present in batch ${batchId}`,
      });
    }

    const proven = matches.find((leaf) => verifyMerkleProof(run.leafDigest, leaf.proof, batch.merkleRoot));
    if (proven !== undefined) {
      run.trail.push("proof_checked");
      return this.finish(run, {
        outcome: "verified",
        batchId,
        batch,
        expectedRoot: batch.merkleRoot,
        proof: proven.proof,
        reason: `Record is included in batch ${batchId}`,
      });
    }

    // The cached root may be stale; only a fresh ledger read decides tampering.
    const ledgerRoot = await this.deps.ledger.getBatchRoot(batchId, { signal });
    run.trail.push("proof_checked");
    if (ledgerRoot !== null && ledgerRoot !== batch.merkleRoot) {
      this.deps.cache.invalidate(batchId);
      const reproven = matches.find((leaf) => verifyMerkleProof(run.leafDigest, leaf.proof, ledgerRoot));
      if (reproven !== undefined) {
        return this.finish(run, {
          outcome: "verified",
          batchId,
          batch: { ...batch, merkleRoot: ledgerRoot },
          expectedRoot: ledgerRoot,
          proof: reproven.proof,
          reason: `Record is included in batch ${batchId}`,
        });
      }
    }

    const expectedRoot = ledgerRoot ?? batch.merkleRoot;
    return this.finish(run, {
      outcome: "tampered",
      batchId,
      batch,
      expectedRoot,
      reason: `Record digest is stored in batch ${batchId} but its proof does not lead to the anchored root ${expectedRoot}`,
    });
  }

  /** Candidates scoring within tieMargin of the best. */
  private topGroup(candidates: readonly ScoredCandidate[]): ScoredCandidate[] {
    const best = candidates[0]?.score ?? 0;
    return candidates.filter((c) => best - c.score <= this.tieMargin);
  }

  private finish(run: Run, fields: VerdictFields): VerificationVerdict {
    if (run.trail[run.trail.length - 1] !== "done") {
      run.trail.push("done");
    }
    return {
      leafDigest: run.leafDigest,
      candidates: run.candidates,
      retryable: false,
      possiblyIncomplete: run.possiblyIncomplete,
      operation: run.record.operation,
      warnings: run.warnings,
      trail: [...run.trail],
      durationMs: this.now() - run.started,
      ...fields,
    };
  }
}

/**
 * Advisory hints that disagree with a directly addressed batch.
 */
export function advisoryConflicts(batch: BatchDescriptor, advisory: ConstraintFields): string[] {
  const warnings: string[] = [];
  if (advisory.databaseName !== undefined && advisory.databaseName !== batch.databaseName) {
    warnings.push(
      `databaseName hint "${advisory.databaseName}" differs from batch database "${batch.databaseName}"`,
    );
  }
  if (advisory.tableName !== undefined && !batch.tableNames.includes(advisory.tableName)) {
    warnings.push(`tableName hint "${advisory.tableName}" is not among the batch tables`);
  }
  const created = Date.parse(batch.createdAt);
  if (
    (advisory.timeStart !== undefined && created < Date.parse(advisory.timeStart)) ||
    (advisory.timeEnd !== undefined && created >= Date.parse(advisory.timeEnd))
  ) {
    warnings.push(`batch created at ${batch.createdAt} lies outside the hinted time window`);
  }
  const op = advisory.expectedOperation;
  if (op !== undefined && batch.operationCounts !== undefined && (batch.operationCounts[op] ?? 0) === 0) {
    warnings.push(`batch declares no ${op} operations`);
  }
  return warnings;
}
