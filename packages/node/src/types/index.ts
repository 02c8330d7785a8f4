/**
 * Type barrel — re-exports all public types from @ledgerproof/node.
 */

// DTOs
export {
  OperationSchema,
  ColumnValueSchema,
  RecordSchema,
  HintSchema,
  VerifyTransactionSchema,
  VerifyBatchSchema,
  ListBatchesQuerySchema,
  SearchBatchesSchema,
  MAX_BATCH_ITEMS,
  toRecord,
  toHint,
  proofToDto,
  batchToDto,
  verdictToDto,
  pageToDto,
  foundToDto,
} from "./dto.js";
export type {
  RecordDto,
  HintDto,
  VerifyTransactionDto,
  VerifyBatchDto,
  ListBatchesQuery,
  SearchBatchesDto,
} from "./dto.js";

// Error
export { API_ERROR_STATUS, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
