/**
 * Idempotency middleware.
 *
 * Caches successful POST responses by Idempotency-Key, scoped to the
 * caller's identity. A repeated key within the TTL replays the cached
 * response instead of running the transition again. Failed requests are
 * not cached, so a retry after a compensated failure runs for real.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Idempotency Store Interface
// =============================================================================

export interface CachedResponse {
  readonly status: 200 | 201;
  readonly body: string;
  readonly headers: Record<string, string>;
  readonly cachedAt: number;
}

export interface IdempotencyStore {
  get(key: string): CachedResponse | undefined;
  set(key: string, response: CachedResponse): void;
  /** Timestamp for a new entry, on the store's clock */
  now(): number;
}

// =============================================================================
// In-Memory Store
// =============================================================================

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _cache = new Map<string, CachedResponse>();
  private readonly _ttlMs: number;
  private readonly _now: () => number;

  constructor(ttlMs: number = 86400000, now: () => number = Date.now) {
    this._ttlMs = ttlMs;
    this._now = now;
  }

  get(key: string): CachedResponse | undefined {
    const entry = this._cache.get(key);
    if (entry === undefined) {
      return undefined;
    }

    if (this._now() - entry.cachedAt > this._ttlMs) {
      this._cache.delete(key);
      return undefined;
    }

    return entry;
  }

  set(key: string, response: CachedResponse): void {
    this._cache.set(key, response);
  }

  now(): number {
    return this._now();
  }

  get size(): number {
    return this._cache.size;
  }

  clear(): void {
    this._cache.clear();
  }
}

// =============================================================================
// Middleware
// =============================================================================

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const REPLAY_HEADER = "X-Idempotent-Replay";

export function idempotencyMiddleware(
  store: IdempotencyStore,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (c.req.method !== "POST") {
      return next();
    }

    const idempotencyKey = c.req.header(IDEMPOTENCY_HEADER);
    if (idempotencyKey === undefined) {
      return next();
    }
    const scopedKey = `${c.get("auth").identity}:${idempotencyKey}`;

    const cached = store.get(scopedKey);
    if (cached !== undefined) {
      for (const [key, value] of Object.entries(cached.headers)) {
        c.header(key, value);
      }
      c.header(REPLAY_HEADER, "true");
      return c.body(cached.body, cached.status);
    }

    await next();

    const status = c.res.status;
    if (status === 200 || status === 201) {
      const clonedRes = c.res.clone();
      const body = await clonedRes.text();
      const headers: Record<string, string> = {};
      clonedRes.headers.forEach((value, key) => {
        if (key !== "x-request-id") headers[key] = value;
      });

      store.set(scopedKey, { status, body, headers, cachedAt: store.now() });
    }
  };
}
