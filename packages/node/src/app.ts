/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Separated from main.ts
 * so tests can drive the app without starting an HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { StakeService } from "./services/stake-service.js";
import type { StakeServiceConfig } from "./services/stake-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { createErrorEnvelope } from "./types/error.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
} from "./middleware/idempotency.js";
import {
  actorHeaderMiddleware,
  authMiddleware,
  requirePermission,
} from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import {
  createCustodyRoutes,
  createDepositRoutes,
  createEventRoutes,
  createHealthRoutes,
  createOperatorRoutes,
  createVaultRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Builds a fresh service; ignored when `service` is given */
  readonly serviceConfig?: StakeServiceConfig;
  readonly service?: StakeService;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Receives unhandled (500) errors */
  readonly logger?: Logger;
  readonly idempotencyTtlMs?: number;
  /** When provided, X-Api-Key auth is enforced; otherwise X-Actor is trusted. */
  readonly auth?: AuthConfig;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: StakeService;
  readonly idempotencyStore: InMemoryIdempotencyStore;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const service = resolveService(options);
  const idempotencyStore = new InMemoryIdempotencyStore(
    options.idempotencyTtlMs ?? 86400000,
  );

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.logger));
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes());

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    app.use("/api/*", actorHeaderMiddleware());
  }
  app.on("POST", "/api/*", requirePermission("write"));

  // Idempotency for POST /api/* requests
  app.use("/api/*", idempotencyMiddleware(idempotencyStore));

  app.route("/api/v1/deposits", createDepositRoutes());
  app.route("/api/v1/operators", createOperatorRoutes());
  app.route("/api/v1/vault", createVaultRoutes());
  app.route("/api/v1/custody", createCustodyRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service, idempotencyStore };
}

function resolveService(options: CreateAppOptions): StakeService {
  if (options.service !== undefined) {
    return options.service;
  }
  if (options.serviceConfig !== undefined) {
    return new StakeService(options.serviceConfig);
  }
  throw new Error("createApp needs a service or a serviceConfig");
}
