/**
 * Health check routes.
 *
 * GET  /health  Liveness probe (always 200 if the server is running)
 * GET  /ready   Readiness: service started, journal chain intact, custody conserved
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

type CheckStatus = "ok" | "down";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const service = c.get("service");
    const integrity = service.verifyEvents();
    const checks: Record<"service" | "eventStore" | "custody", CheckStatus> = {
      service: service.isReady() ? "ok" : "down",
      eventStore: integrity.valid ? "ok" : "down",
      custody: service.isConserved() ? "ok" : "down",
    };
    const ready = Object.values(checks).every((s) => s === "ok");

    const body = {
      status: ready ? "ready" : "not_ready",
      checks,
      timestamp: new Date().toISOString(),
    };
    return ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
