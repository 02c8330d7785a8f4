/**
 * EVM Ledger — Public API
 */
export {
  EvmLedgerClient,
  BATCH_ANCHOR_ABI,
  SUPPORTED_CHAIN_IDS,
  normalizeRoot,
  toBatchDescriptor,
  toLedgerError,
} from "./evm-ledger.js";
export type { EvmLedgerConfig, AnchoredBatchRecord } from "./evm-ledger.js";
