/**
 * Health check routes.
 *
 * GET /health — Liveness check (always 200 if server is running)
 * GET /ready  — Readiness check (503 until the service has started)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { VerificationService } from "../services/verification-service.js";

export function createHealthRoutes(service: VerificationService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const ready = service.isReady();
    const cache = service.cache.stats;

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        backend: service.info.backend,
        cache: { entries: service.cache.size, ...cache },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
