/**
 * @ledgerproof/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, connects to the ledger, starts
 * the HTTP server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { createCollaborators } from "./services/collaborators.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const collaborators = createCollaborators(config, {
    onRetry: (collaborator, attempt) => {
      logger.warn(
        {
          collaborator,
          attempt: attempt.attempt,
          delayMs: attempt.delayMs,
          err: attempt.error,
        },
        `Retrying ${collaborator} call`,
      );
    },
  });

  if (collaborators.info.backend === "in-memory") {
    logger.warn(
      { env: config.NODE_ENV },
      "LEDGER_RPC_URL or LEDGER_CONTRACT_ADDRESS not set; serving an empty in-memory ledger",
    );
  }
  await collaborators.connect();

  const { app, service } = createApp({
    serviceConfig: {
      ledger: collaborators.ledger,
      storage: collaborators.storage,
      info: collaborators.info,
      cache: {
        ttlMs: config.CACHE_TTL_MS,
        maxEntries: config.CACHE_MAX_ENTRIES,
        sweepIntervalMs: config.CACHE_SWEEP_INTERVAL_MS,
      },
      maxScanCandidates: config.SEARCH_MAX_CANDIDATES,
      tieMargin: config.AMBIGUITY_TIE_MARGIN,
      maxTiedFetches: config.VERIFY_MAX_TIED_FETCHES,
      concurrency: config.VERIFY_CONCURRENCY,
      batchTimeoutMs: config.VERIFY_BATCH_TIMEOUT_MS,
      onVerdict: (verdict) => {
        logger.debug(
          {
            outcome: verdict.outcome,
            batchId: verdict.batchId,
            errorCode: verdict.errorCode,
            durationMs: verdict.durationMs,
          },
          `Verdict ${verdict.outcome}`,
        );
      },
      onStop: () => collaborators.disconnect(),
    },
    logFn: (entry) => {
      logger[entry.level](entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onServerError: (err, requestId) => {
      logger.error({ err, requestId }, "Unhandled error");
    },
  });
  service.start();

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      organization: config.LEDGER_ORGANIZATION,
      backend: collaborators.info.backend,
      chainId: config.LEDGER_CHAIN_ID,
    },
    "Verification node started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await service.stop();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
