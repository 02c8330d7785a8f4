/**
 * GET /api/v1/contract — The anchor contract and totals over every
 * batch it has recorded.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { summaryToDto } from "../types/dto.js";

export function createContractRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", async (c) => {
    const service = c.get("service");
    const summary = await service.ledgerSummary(c.req.raw.signal);

    return c.json({
      data: {
        organization: service.info.organization,
        network: service.info.network,
        backend: service.info.backend,
        chain_id: service.info.chainId,
        contract_address: service.info.contractAddress ?? null,
        ...summaryToDto(summary),
      },
    });
  });

  return routes;
}
