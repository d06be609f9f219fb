/**
 * Withdrawal credentials.
 *
 * Canonical 32-byte layout for execution-address credentials:
 *
 *   [ type (1) | 0x00 × 11 | address (20) ]
 *
 * type 0x01 is the plain execution withdrawal address, 0x02 the
 * compounding variant. Both carry the address in the low 20 bytes.
 */

import type { Address, Hex, WithdrawalCredentialType } from "@stakegate/types";
import {
  ADDRESS_LENGTH,
  WITHDRAWAL_CREDENTIALS_LENGTH,
  isWithdrawalCredentialType,
} from "@stakegate/types";
import { bytesToHex, concatBytes, decodeFixed, zeroBytes } from "./bytes.js";
import { CredentialError } from "./errors.js";

const PADDING_LENGTH = WITHDRAWAL_CREDENTIALS_LENGTH - 1 - ADDRESS_LENGTH;

export interface DecodedWithdrawalCredentials {
  readonly type: WithdrawalCredentialType;
  readonly address: Address;
}

export function encodeWithdrawalCredentials(
  address: string,
  type: WithdrawalCredentialType = 0x01,
): Hex {
  if (!isWithdrawalCredentialType(type)) {
    throw new CredentialError(
      "INVALID_CREDENTIAL_TYPE",
      "type",
      `Unsupported withdrawal credential type ${String(type)}`,
    );
  }
  const addressBytes = decodeFixed(address, ADDRESS_LENGTH, "withdrawalAddress");
  return bytesToHex(
    concatBytes(Uint8Array.of(type), zeroBytes(PADDING_LENGTH), addressBytes),
  );
}

/**
 * Split credentials back into type and address.
 * Rejects BLS (0x00) credentials and non-zero padding.
 */
export function decodeWithdrawalCredentials(
  credentials: string,
): DecodedWithdrawalCredentials {
  const bytes = decodeFixed(
    credentials,
    WITHDRAWAL_CREDENTIALS_LENGTH,
    "withdrawalCredentials",
  );

  const type = bytes[0];
  if (!isWithdrawalCredentialType(type)) {
    throw new CredentialError(
      "INVALID_CREDENTIAL_TYPE",
      "withdrawalCredentials",
      `Withdrawal credentials must start with 0x01 or 0x02, got 0x${(type ?? 0).toString(16).padStart(2, "0")}`,
    );
  }

  const padding = bytes.subarray(1, 1 + PADDING_LENGTH);
  if (padding.some((b) => b !== 0)) {
    throw new CredentialError(
      "INVALID_ADDRESS",
      "withdrawalCredentials",
      "Withdrawal credentials padding must be zero",
    );
  }

  return {
    type,
    address: bytesToHex(bytes.subarray(1 + PADDING_LENGTH)),
  };
}
