/**
 * Verification routes.
 *
 * POST /api/v1/verify/transaction — Verify one transaction record
 * POST /api/v1/verify/batch       — Verify many records, in input order
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  VerifyBatchSchema,
  VerifyTransactionSchema,
  toHint,
  toProof,
  toRecord,
  verdictToDto,
} from "../types/dto.js";
import { parseJsonBody } from "../middleware/validate.js";

export function createVerifyRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/verify/transaction
  routes.post("/transaction", async (c) => {
    const service = c.get("service");
    const body = await parseJsonBody(c, VerifyTransactionSchema);

    const verdict = await service.verifyTransaction(toRecord(body.record), toHint(body.hint), {
      timeoutMs: body.timeout_ms,
      signal: c.req.raw.signal,
      suppliedProof: body.proof !== undefined ? toProof(body.proof) : undefined,
    });

    return c.json({
      data: {
        ...verdictToDto(verdict),
        verification_method: body.use_contract_verification ? "contract" : "storage",
      },
    });
  });

  // POST /api/v1/verify/batch
  routes.post("/batch", async (c) => {
    const service = c.get("service");
    const body = await parseJsonBody(c, VerifyBatchSchema);

    const { verdicts, summary } = await service.verifyBatch(
      body.items.map((item) => ({ record: toRecord(item.record), hint: toHint(item.hint) })),
      {
        concurrency: body.concurrency,
        timeoutMs: body.timeout_ms,
        recordTimeoutMs: body.record_timeout_ms,
        failFast: body.fail_fast,
        signal: c.req.raw.signal,
      },
    );

    return c.json({
      data: {
        verdicts: verdicts.map(verdictToDto),
        summary: {
          total: summary.total,
          counts: summary.counts,
          success_rate: summary.successRate,
          average_duration_ms: summary.averageDurationMs,
        },
      },
    });
  });

  return routes;
}
