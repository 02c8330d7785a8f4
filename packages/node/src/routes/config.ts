/**
 * GET /api/v1/config — Ledger this server reads and the verification
 * settings in effect.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createConfigRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => c.json({ data: c.get("service").describe() }));

  return routes;
}
