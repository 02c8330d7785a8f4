/**
 * @ledgerproof/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const positiveInt = (fallback: number) => z.coerce.number().int().min(1).default(fallback);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Ledger
  LEDGER_ORGANIZATION: z.string().trim().min(1, "LEDGER_ORGANIZATION is required"),
  LEDGER_NETWORK: z.enum(["mainnet", "testnet"]).default("testnet"),
  LEDGER_CHAIN_ID: z
    .string()
    .regex(/^eip155:\d+$/, "expected an EVM chain ID (eip155:<n>)")
    .default("eip155:11155111"),
  LEDGER_RPC_URL: z.string().url().optional(),
  LEDGER_CONTRACT_ADDRESS: z
    .string()
    .regex(/^0x[0-9a-fA-F]{40}$/, "expected a 20-byte hex address")
    .optional(),

  // Object storage
  STORAGE_BASE_URL: z.string().url().optional(),
  STORAGE_REGION: z.string().min(1).default("us-west-2"),

  // Collaborator calls
  REQUEST_TIMEOUT_MS: positiveInt(30_000),
  RETRY_MAX_ATTEMPTS: positiveInt(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(250),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(5_000),
  RETRY_JITTER_MS: z.coerce.number().int().min(0).default(100),

  // Batch metadata cache
  CACHE_TTL_MS: positiveInt(300_000),
  CACHE_MAX_ENTRIES: positiveInt(10_000),
  CACHE_SWEEP_INTERVAL_MS: positiveInt(60_000),

  // Verification
  VERIFY_CONCURRENCY: positiveInt(8),
  VERIFY_BATCH_TIMEOUT_MS: positiveInt(120_000),
  SEARCH_MAX_CANDIDATES: positiveInt(100),
  AMBIGUITY_TIE_MARGIN: z.coerce.number().min(0).default(0),
  VERIFY_MAX_TIED_FETCHES: z.coerce.number().int().min(0).default(8),
});

/**
 * Without an anchor contract the node serves an empty in-memory ledger,
 * which is only acceptable outside production.
 */
export const ConfigSchema = EnvSchema.superRefine((env, ctx) => {
  if (
    env.NODE_ENV === "production" &&
    (env.LEDGER_RPC_URL === undefined || env.LEDGER_CONTRACT_ADDRESS === undefined)
  ) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [env.LEDGER_RPC_URL === undefined ? "LEDGER_RPC_URL" : "LEDGER_CONTRACT_ADDRESS"],
      message: "LEDGER_RPC_URL and LEDGER_CONTRACT_ADDRESS are required in production",
    });
  }
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Whether the configuration names an on-chain anchor contract to read.
 */
export function hasChainLedger(
  config: AppConfig,
): config is AppConfig & { LEDGER_RPC_URL: string; LEDGER_CONTRACT_ADDRESS: string } {
  return config.LEDGER_RPC_URL !== undefined && config.LEDGER_CONTRACT_ADDRESS !== undefined;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
