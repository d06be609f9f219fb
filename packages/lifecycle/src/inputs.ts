/**
 * Input normalization shared by the registry and the vault.
 *
 * Every failure is a ValidationError; byte-level failures from the
 * credential helpers are rethrown with their cause attached.
 */

import {
  bytesToHex,
  CredentialError,
  hexToBytes,
  assertLength,
} from "@stakegate/credentials";
import { normalizeAddress, STAKE_UNIT_WEI } from "@stakegate/types";
import type { Address, Hex, Wei } from "@stakegate/types";
import { ValidationError } from "./errors.js";

/**
 * @throws ValidationError INVALID_ADDRESS
 */
export function requireAddress(value: string, field: string): Address {
  const address = normalizeAddress(value);
  if (address === undefined) {
    throw new ValidationError(
      "INVALID_ADDRESS",
      `${field} must be a 0x-prefixed 20-byte address, got "${value}"`,
      field,
    );
  }
  return address;
}

/**
 * Decode, length-check and re-encode a byte string as lowercase hex.
 *
 * @throws ValidationError INVALID_LENGTH or VALIDATION_FAILED
 */
export function requireBytes(value: string, length: number, field: string): Hex {
  try {
    const bytes = hexToBytes(value, field);
    assertLength(bytes, length, field);
    return bytesToHex(bytes);
  } catch (err) {
    if (err instanceof CredentialError) {
      throw new ValidationError(
        err.code === "INVALID_LENGTH" ? "INVALID_LENGTH" : "VALIDATION_FAILED",
        err.message,
        field,
        { cause: err },
      );
    }
    throw err;
  }
}

/**
 * @throws ValidationError INVALID_AMOUNT unless `amount` is exactly one stake unit
 */
export function requireStakeUnit(amount: Wei): void {
  if (amount !== STAKE_UNIT_WEI) {
    throw new ValidationError(
      "INVALID_AMOUNT",
      `Amount must be exactly 32 ETH (${STAKE_UNIT_WEI.toString()} wei), got ${amount.toString()} wei`,
      "amount",
    );
  }
}
