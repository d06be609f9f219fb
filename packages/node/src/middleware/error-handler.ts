/**
 * Global error handler.
 *
 * Maps domain error codes to HTTP statuses and renders the error
 * envelope. Lifecycle errors contribute structured details (required and
 * actual state, availableAt, computed and supplied roots, failed port).
 * Unknown errors become 500 with a generic message and are logged.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import { LifecycleError } from "@stakegate/lifecycle";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope, isErrorCode, statusForCode } from "../types/error.js";
import type { ErrorCode } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

/** The error's own code, when it carries one the envelope knows. */
function errorCode(err: Error): ErrorCode | undefined {
  if (!("code" in err) || typeof err.code !== "string") return undefined;
  return isErrorCode(err.code) ? err.code : undefined;
}

export function statusFor(code: string | undefined): ContentfulStatusCode {
  return code !== undefined && isErrorCode(code) ? statusForCode(code) : 500;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Create the onError handler. 500s are logged when a logger is given.
 */
export function createErrorHandler(
  log?: Logger,
): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    const code = errorCode(err);
    const status = statusFor(code);

    if (status === 500) {
      log?.error({ err, requestId: c.get("requestId") }, "Unhandled error");
      return c.json(
        createErrorEnvelope(code ?? "INTERNAL_ERROR", "Internal server error"),
        500,
      );
    }

    const details = err instanceof LifecycleError ? err.details() : undefined;
    return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message, details), status);
  };
}
