/**
 * Lifecycle error taxonomy.
 *
 * Every failure of a lifecycle operation is one of these classes. The
 * `code` is stable and is what the HTTP layer maps to a status.
 *
 * - ValidationError: malformed input, fixable by the caller
 * - StateViolation: wrong lifecycle phase; re-read state before retrying
 * - CooldownActive: not yet; retry at `availableAt`
 * - AuthorizationError: wrong actor
 * - AuthenticityError: recomputed deposit data root differs
 * - ExternalCallFailure: a port failed; all writes were compensated
 * - AlreadyClaimed / NotFoundError / HandleError
 */

export type LifecycleErrorCode =
  | "VALIDATION_FAILED"
  | "INVALID_LENGTH"
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "STATE_VIOLATION"
  | "COOLDOWN_ACTIVE"
  | "UNAUTHORIZED_ACTOR"
  | "ROOT_MISMATCH"
  | "EXTERNAL_CALL_FAILED"
  | "ALREADY_CLAIMED"
  | "RECORD_NOT_FOUND"
  | "REQUEST_NOT_FOUND"
  | "VALIDATOR_NOT_FOUND"
  | "HANDLE_NOT_TRANSFERABLE"
  | "HANDLE_NOT_FOUND";

export abstract class LifecycleError extends Error {
  public abstract readonly code: LifecycleErrorCode;

  /** Structured context for API error bodies. */
  details(): Record<string, unknown> | undefined {
    return undefined;
  }
}

// =============================================================================
// Caller errors
// =============================================================================

export type ValidationErrorCode =
  | "VALIDATION_FAILED"
  | "INVALID_LENGTH"
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS";

export class ValidationError extends LifecycleError {
  public readonly code: ValidationErrorCode;
  public readonly field: string | undefined;

  constructor(code: ValidationErrorCode, message: string, field?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ValidationError";
    this.code = code;
    this.field = field;
  }

  override details(): Record<string, unknown> | undefined {
    return this.field !== undefined ? { field: this.field } : undefined;
  }
}

export class AuthorizationError extends LifecycleError {
  public readonly code = "UNAUTHORIZED_ACTOR" as const;
  public readonly actor: string;

  constructor(actor: string, message: string) {
    super(message);
    this.name = "AuthorizationError";
    this.actor = actor;
  }
}

// =============================================================================
// Lifecycle phase errors
// =============================================================================

export class StateViolation extends LifecycleError {
  public readonly code = "STATE_VIOLATION" as const;
  public readonly required: readonly string[];
  public readonly actual: string;

  constructor(required: readonly string[], actual: string, message?: string) {
    super(
      message ??
        `Requires state ${required.map((s) => `"${s}"`).join(" or ")}, but state is "${actual}"`,
    );
    this.name = "StateViolation";
    this.required = required;
    this.actual = actual;
  }

  override details(): Record<string, unknown> {
    return { required: this.required, actual: this.actual };
  }
}

export class CooldownActive extends LifecycleError {
  public readonly code = "COOLDOWN_ACTIVE" as const;
  /** ISO 8601 time from which the operation is allowed */
  public readonly availableAt: string;

  constructor(availableAt: string, message?: string) {
    super(message ?? `Cancellation is not available until ${availableAt}`);
    this.name = "CooldownActive";
    this.availableAt = availableAt;
  }

  override details(): Record<string, unknown> {
    return { availableAt: this.availableAt };
  }
}

export class AlreadyClaimed extends LifecycleError {
  public readonly code = "ALREADY_CLAIMED" as const;
  public readonly requestId: number;

  constructor(requestId: number) {
    super(`Request ${String(requestId)} has already been claimed`);
    this.name = "AlreadyClaimed";
    this.requestId = requestId;
  }
}

// =============================================================================
// Integrity and collaborators
// =============================================================================

export class AuthenticityError extends LifecycleError {
  public readonly code = "ROOT_MISMATCH" as const;
  /** Root recomputed from the stored credentials */
  public readonly expected: string;
  /** Root supplied by the caller */
  public readonly actual: string;

  constructor(expected: string, actual: string) {
    super(`Deposit data root mismatch: computed ${expected}, supplied ${actual}`);
    this.name = "AuthenticityError";
    this.expected = expected;
    this.actual = actual;
  }

  override details(): Record<string, unknown> {
    return { expected: this.expected, actual: this.actual };
  }
}

export type ExternalTarget = "deposit-sink" | "value-transfer";

export class ExternalCallFailure extends LifecycleError {
  public readonly code = "EXTERNAL_CALL_FAILED" as const;
  public readonly target: ExternalTarget;

  constructor(target: ExternalTarget, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ExternalCallFailure";
    this.target = target;
  }

  override details(): Record<string, unknown> {
    return { target: this.target };
  }
}

// =============================================================================
// Lookup errors
// =============================================================================

export type NotFoundCode = "RECORD_NOT_FOUND" | "REQUEST_NOT_FOUND" | "VALIDATOR_NOT_FOUND";

export class NotFoundError extends LifecycleError {
  public readonly code: NotFoundCode;

  constructor(code: NotFoundCode, message: string) {
    super(message);
    this.name = "NotFoundError";
    this.code = code;
  }
}

export type HandleErrorCode = "HANDLE_NOT_TRANSFERABLE" | "HANDLE_NOT_FOUND";

export class HandleError extends LifecycleError {
  public readonly code: HandleErrorCode;

  constructor(code: HandleErrorCode, message: string) {
    super(message);
    this.name = "HandleError";
    this.code = code;
  }
}
