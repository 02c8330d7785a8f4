/**
 * Batch routes.
 *
 * GET  /api/v1/batches          — Browse the batch index
 * POST /api/v1/batches/search   — Search by root, identifier pattern and metadata
 * GET  /api/v1/batches/:batchId — One batch descriptor
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ListBatchesQuerySchema,
  SearchBatchesSchema,
  batchToDto,
  foundToDto,
  pageToDto,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { parseJsonBody, parseQuery } from "../middleware/validate.js";

export function createBatchRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/batches
  routes.get("/", async (c) => {
    const service = c.get("service");
    const query = parseQuery(c, ListBatchesQuerySchema);

    const page = await service.listBatches(
      {
        databaseName: query.database_name,
        tableName: query.table_name,
        createdFrom: query.created_from,
        createdTo: query.created_to,
        minTransactionCount: query.min_transaction_count,
        maxTransactionCount: query.max_transaction_count,
      },
      { limit: query.limit, offset: query.offset, orderBy: query.order_by },
      c.req.raw.signal,
    );

    return c.json({ data: pageToDto(page) });
  });

  // POST /api/v1/batches/search
  routes.post("/search", async (c) => {
    const service = c.get("service");
    const body = await parseJsonBody(c, SearchBatchesSchema);

    const found = await service.searchBatches(
      {
        merkleRoot: body.merkle_root,
        batchIdPattern: body.batch_id_pattern,
        databaseName: body.database_name,
        tableName: body.table_name,
        minTransactionCount: body.min_transaction_count,
        createdFrom: body.created_from,
        createdTo: body.created_to,
        maxResults: body.max_results,
      },
      c.req.raw.signal,
    );

    return c.json({ data: found.map(foundToDto) });
  });

  // GET /api/v1/batches/:batchId
  routes.get("/:batchId", async (c) => {
    const service = c.get("service");
    const batchId = c.req.param("batchId");

    const batch = await service.getBatch(batchId, c.req.raw.signal);
    if (batch === null) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Batch ${batchId} not found`), 404);
    }

    return c.json({ data: batchToDto(batch) });
  });

  return routes;
}
