/**
 * Error envelope and the status of every code it can carry.
 *
 * All error responses follow the shape:
 * { error: { code: ErrorCode, message: string, details?: Record<string, unknown> } }
 *
 * Domain packages throw with their own codes; the envelope passes them
 * through unchanged, so a client sees ROOT_MISMATCH rather than a
 * generic 422.
 */

import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { CredentialErrorCode } from "@stakegate/credentials";
import type { CustodyErrorCode } from "@stakegate/custody";
import type { EventStoreErrorCode } from "@stakegate/event-store";
import type { LifecycleErrorCode } from "@stakegate/lifecycle";

// =============================================================================
// Error Codes
// =============================================================================

/** Raised by the HTTP layer itself. */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "INTERNAL_ERROR";

export type DomainErrorCode =
  | LifecycleErrorCode
  | CredentialErrorCode
  | CustodyErrorCode
  | EventStoreErrorCode;

export type ErrorCode = ApiErrorCode | DomainErrorCode;

/**
 * Status per code. Custody codes are 500: they only escape when an
 * invariant broke, never on caller input.
 */
const STATUS_BY_CODE: Readonly<Record<ErrorCode, ContentfulStatusCode>> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  INTERNAL_ERROR: 500,

  // Caller input (lifecycle, credentials)
  VALIDATION_FAILED: 400,
  INVALID_LENGTH: 400,
  INVALID_AMOUNT: 400,
  INVALID_ADDRESS: 400,
  INVALID_HEX: 400,
  INVALID_CREDENTIAL_TYPE: 400,

  // Lifecycle phase
  STATE_VIOLATION: 409,
  COOLDOWN_ACTIVE: 409,
  ALREADY_CLAIMED: 409,
  HANDLE_NOT_TRANSFERABLE: 409,

  UNAUTHORIZED_ACTOR: 403,
  ROOT_MISMATCH: 422,
  EXTERNAL_CALL_FAILED: 502,

  RECORD_NOT_FOUND: 404,
  REQUEST_NOT_FOUND: 404,
  VALIDATOR_NOT_FOUND: 404,
  HANDLE_NOT_FOUND: 404,

  // Event store
  CONCURRENCY_CONFLICT: 409,
  INVALID_STREAM_ID: 400,
  INVALID_VERSION: 400,
  EMPTY_APPEND: 500,

  // Custody invariants
  INSUFFICIENT_FUNDS: 500,
  CONSERVATION_BROKEN: 500,
  UNKNOWN_MOVEMENT: 500,
  ALREADY_REVERSED: 500,
  INVALID_SNAPSHOT: 500,
};

export function isErrorCode(value: string): value is ErrorCode {
  return Object.prototype.hasOwnProperty.call(STATUS_BY_CODE, value);
}

export function statusForCode(code: ErrorCode): ContentfulStatusCode {
  return STATUS_BY_CODE[code];
}

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details !== undefined ? { error: { code, message, details } } : { error: { code, message } };
}
