/**
 * Custody route.
 *
 * GET  /api/v1/custody  Phase counters, held balance, conservation and
 * reconciliation against the value-transfer balance.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { toBalancesDto, toReconciliationDto } from "../types/dto.js";

export function createCustodyRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", async (c) => {
    const report = await c.get("service").custodyReport();
    return c.json({
      data: {
        balances: toBalancesDto(report.balances),
        held: report.held.toString(),
        conserved: report.conserved,
        reconciliation: toReconciliationDto(report.reconciliation),
      },
    });
  });

  return routes;
}
