/**
 * Authentication middleware.
 *
 * Two modes:
 * 1. Secured: X-Api-Key is looked up in the configured key registry and
 *    resolves to a role and an address.
 * 2. Unsecured (no keys configured): X-Actor carries the caller's address
 *    and the caller acts as admin. Development and tests only.
 *
 * On success, sets `c.set("auth", authContext)`. On failure, returns 401.
 * Which address may perform which lifecycle step is decided by the
 * lifecycle package, not here.
 */

import type { MiddlewareHandler } from "hono";
import { normalizeAddress } from "@stakegate/types";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext, ApiKeyRecord, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const ACTOR_HEADER = "X-Actor";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    const auth: AuthContext = {
      type: "api-key",
      identity: record.key,
      role: record.role,
      address: record.address,
    };
    c.set("auth", auth);
    return next();
  };
}

/**
 * Resolve the caller from X-Actor. Read routes accept anonymous callers;
 * every mutation needs an address.
 */
export function actorHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = c.req.header(ACTOR_HEADER);
    if (header === undefined) {
      if (c.req.method === "GET") {
        return next();
      }
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `${ACTOR_HEADER} header required`),
        401,
      );
    }

    const address = normalizeAddress(header);
    if (address === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `${ACTOR_HEADER} must be a 0x-prefixed 20-byte address`),
        401,
      );
    }

    const auth: AuthContext = {
      type: "actor-header",
      identity: address,
      role: "admin",
      address,
    };
    c.set("auth", auth);
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Returns 403 when the resolved role lacks the permission. Must run after
 * one of the auth middlewares.
 */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}
