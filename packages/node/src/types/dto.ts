/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Wire format is snake_case JSON; the verification packages speak
 * camelCase. Each request schema has a derived type and a mapper into
 * the domain, each response a mapper out of it.
 */

import { z } from "zod";
import type {
  BatchDescriptor,
  MerkleProof,
  TransactionRecord,
  VerificationHint,
  VerificationVerdict,
} from "@ledgerproof/types";
import type { BatchPage, FoundBatch, LedgerSummary } from "@ledgerproof/verify";

// =============================================================================
// Shared Schemas
// =============================================================================

const Timestamp = z.string().datetime({ offset: true });

export const OperationSchema = z.enum(["INSERT", "UPDATE", "DELETE"]);

/**
 * JSON numbers are doubles, so integers outside the safe range would be
 * rounded before hashing. Those travel as `{ "$int": "<digits>" }`;
 * timestamps travel as `{ "$ts": "<ISO 8601 with offset>" }`.
 */
const SafeNumberSchema = z
  .number()
  .refine((n) => !Number.isInteger(n) || Number.isSafeInteger(n), {
    message: 'integer outside the safe range; send it as { "$int": "<digits>" }',
  });

const BigIntValueSchema = z
  .object({ $int: z.string().regex(/^-?\d+$/, "expected a decimal integer") })
  .strict()
  .transform((value) => BigInt(value.$int));

const TimestampValueSchema = z
  .object({ $ts: Timestamp })
  .strict()
  .transform((value) => new Date(value.$ts));

export const ColumnValueSchema = z.union([
  z.null(),
  z.boolean(),
  SafeNumberSchema,
  z.string(),
  BigIntValueSchema,
  TimestampValueSchema,
]);

export const RecordSchema = z.object({
  database_name: z.string().min(1),
  table_name: z.string().min(1),
  operation: OperationSchema,
  columns: z.record(ColumnValueSchema),
  local_timestamp: z.string().optional(),
});

export type RecordDto = z.infer<typeof RecordSchema>;

/**
 * Hint fields are only shape-checked here; their meaning is checked by
 * the hint resolver so that every malformed field is reported together.
 */
export const HintSchema = z.object({
  batch_id: z.string().optional(),
  time_start: z.string().optional(),
  time_end: z.string().optional(),
  database_name: z.string().optional(),
  table_name: z.string().optional(),
  expected_operation: z.string().optional(),
});

export type HintDto = z.infer<typeof HintSchema>;

// =============================================================================
// Verification DTOs
// =============================================================================

const DigestSchema = z
  .string()
  .regex(/^(0x)?[0-9a-fA-F]{64}$/, "expected a 32-byte hex digest")
  .transform((hex) => hex.toLowerCase().replace(/^0x/, ""));

export const ProofSchema = z.object({
  leaf_index: z.number().int().min(0),
  siblings: z.array(z.object({ hash: DigestSchema, direction: z.enum(["left", "right"]) })),
});

export type ProofDto = z.infer<typeof ProofSchema>;

/**
 * `use_contract_verification` checks a caller-held proof against the
 * anchored root without reading batch storage.
 */
export const VerifyTransactionSchema = z
  .object({
    record: RecordSchema,
    hint: HintSchema.optional(),
    timeout_ms: z.number().int().min(1).optional(),
    use_contract_verification: z.boolean().default(false),
    proof: ProofSchema.optional(),
  })
  .superRefine((body, ctx) => {
    if (body.use_contract_verification && body.proof === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["proof"],
        message: "is required with use_contract_verification",
      });
    }
    if (!body.use_contract_verification && body.proof !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["proof"],
        message: "is only accepted with use_contract_verification",
      });
    }
  });

export type VerifyTransactionDto = z.infer<typeof VerifyTransactionSchema>;

export const MAX_BATCH_ITEMS = 1000;

export const VerifyBatchSchema = z.object({
  items: z
    .array(z.object({ record: RecordSchema, hint: HintSchema.optional() }))
    .min(1)
    .max(MAX_BATCH_ITEMS),
  concurrency: z.number().int().min(1).max(64).optional(),
  timeout_ms: z.number().int().min(1).optional(),
  record_timeout_ms: z.number().int().min(1).optional(),
  fail_fast: z.boolean().optional(),
});

export type VerifyBatchDto = z.infer<typeof VerifyBatchSchema>;

// =============================================================================
// Batch DTOs
// =============================================================================

export const ListBatchesQuerySchema = z.object({
  database_name: z.string().min(1).optional(),
  table_name: z.string().min(1).optional(),
  created_from: Timestamp.optional(),
  created_to: Timestamp.optional(),
  min_transaction_count: z.coerce.number().int().min(0).optional(),
  max_transaction_count: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0),
  order_by: z.enum(["timestamp_desc", "timestamp_asc", "count_desc", "count_asc"]).default("timestamp_desc"),
});

export type ListBatchesQuery = z.infer<typeof ListBatchesQuerySchema>;

export const SearchBatchesSchema = z.object({
  merkle_root: z
    .string()
    .regex(/^(0x)?[0-9a-fA-F]{64}$/, "expected a 32-byte hex digest")
    .optional(),
  batch_id_pattern: z.string().min(1).optional(),
  database_name: z.string().min(1).optional(),
  table_name: z.string().min(1).optional(),
  min_transaction_count: z.number().int().min(0).optional(),
  created_from: Timestamp.optional(),
  created_to: Timestamp.optional(),
  max_results: z.number().int().min(1).max(200).default(50),
});

export type SearchBatchesDto = z.infer<typeof SearchBatchesSchema>;

// =============================================================================
// Request Mappers
// =============================================================================

export function toRecord(dto: RecordDto): TransactionRecord {
  return {
    databaseName: dto.database_name,
    tableName: dto.table_name,
    operation: dto.operation,
    columns: dto.columns,
    localTimestamp: dto.local_timestamp,
  };
}

export function toHint(dto: HintDto | undefined): VerificationHint {
  if (dto === undefined) return {};
  return {
    batchId: dto.batch_id,
    timeStart: dto.time_start,
    timeEnd: dto.time_end,
    databaseName: dto.database_name,
    tableName: dto.table_name,
    expectedOperation: dto.expected_operation,
  };
}

export function toProof(dto: ProofDto): MerkleProof {
  return {
    leafIndex: dto.leaf_index,
    siblings: dto.siblings.map((s) => ({ hash: s.hash, direction: s.direction })),
  };
}

// =============================================================================
// Response Mappers
// =============================================================================

export function proofToDto(proof: MerkleProof): Record<string, unknown> {
  return {
    leaf_index: proof.leafIndex,
    siblings: proof.siblings.map((s) => ({ hash: s.hash, direction: s.direction })),
  };
}

export function batchToDto(batch: BatchDescriptor): Record<string, unknown> {
  return {
    batch_id: batch.batchId,
    merkle_root: batch.merkleRoot,
    created_at: batch.createdAt,
    database_name: batch.databaseName,
    table_names: batch.tableNames,
    transaction_count: batch.transactionCount,
    storage: {
      bucket: batch.storageRef.bucket,
      key: batch.storageRef.key,
      region: batch.storageRef.region,
    },
    operation_counts: batch.operationCounts ?? null,
    size_bytes: batch.sizeBytes ?? null,
  };
}

export function verdictToDto(verdict: VerificationVerdict): Record<string, unknown> {
  return {
    outcome: verdict.outcome,
    batch_id: verdict.batchId ?? null,
    leaf_digest: verdict.leafDigest,
    expected_root: verdict.expectedRoot ?? null,
    proof: verdict.proof !== undefined ? proofToDto(verdict.proof) : null,
    candidates: verdict.candidates,
    reason: verdict.reason,
    error_code: verdict.errorCode ?? null,
    retryable: verdict.retryable,
    possibly_incomplete: verdict.possiblyIncomplete,
    batch: verdict.batch !== undefined ? batchToDto(verdict.batch) : null,
    operation: verdict.operation ?? null,
    warnings: verdict.warnings,
    trail: verdict.trail,
    duration_ms: verdict.durationMs,
  };
}

export function summaryToDto(summary: LedgerSummary): Record<string, unknown> {
  return {
    total_batches: summary.totalBatches,
    total_transactions: summary.totalTransactions,
    oldest_batch_timestamp: summary.oldestBatchAt,
    newest_batch_timestamp: summary.newestBatchAt,
    databases: summary.databases,
  };
}

export function pageToDto(page: BatchPage): Record<string, unknown> {
  return {
    batches: page.batches.map(batchToDto),
    total: page.total,
    offset: page.offset,
    limit: page.limit,
    has_more: page.hasMore,
  };
}

export function foundToDto(found: FoundBatch): Record<string, unknown> {
  return {
    batch: batchToDto(found.batch),
    match_reasons: found.matchReasons,
    relevance: found.relevance,
  };
}
