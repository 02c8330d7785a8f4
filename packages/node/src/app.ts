/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability: tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { VerificationService } from "./services/verification-service.js";
import type { VerificationServiceConfig } from "./services/verification-service.js";
import { handleError, handleNotFound } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createVerifyRoutes } from "./routes/verify.js";
import { createBatchRoutes } from "./routes/batches.js";
import { createConfigRoutes } from "./routes/config.js";
import { createContractRoutes } from "./routes/contract.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: VerificationServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Called for errors answered with a 5xx, before the response is sent */
  readonly onServerError?: (err: Error, requestId: string) => void;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: VerificationService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new VerificationService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError((err, c) => {
    const response = handleError(err, c);
    if (response.status >= 500) {
      options.onServerError?.(err, c.get("requestId"));
    }
    return response;
  });
  app.notFound(handleNotFound);

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/verify", createVerifyRoutes());
  app.route("/api/v1/batches", createBatchRoutes());
  app.route("/api/v1/config", createConfigRoutes());
  app.route("/api/v1/contract", createContractRoutes());

  return { app, service };
}
