/**
 * @stakegate/credentials: Errors.
 */

export type CredentialErrorCode =
  | "INVALID_LENGTH"
  | "INVALID_HEX"
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "INVALID_CREDENTIAL_TYPE";

/**
 * Structured error from credential encoding and root computation.
 * Always thrown; nothing in this package returns error codes.
 */
export class CredentialError extends Error {
  public readonly code: CredentialErrorCode;
  public readonly field: string;

  constructor(code: CredentialErrorCode, field: string, message: string) {
    super(message);
    this.name = "CredentialError";
    this.code = code;
    this.field = field;
  }
}
