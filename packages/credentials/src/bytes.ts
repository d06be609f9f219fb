/**
 * Byte helpers for fixed-width SSZ chunks.
 *
 * Hex strings are the exchange format; Uint8Array is used only while
 * hashing. Buffer.from(hex) silently stops at the first bad digit, so
 * every decode is preceded by a pattern check.
 */

import { createHash } from "node:crypto";
import type { Hex } from "@stakegate/types";
import { CredentialError } from "./errors.js";

const HEX_BODY = /^[0-9a-fA-F]*$/;
const MAX_UINT64 = (1n << 64n) - 1n;

export function hexToBytes(value: string, field: string = "value"): Uint8Array {
  if (!value.startsWith("0x")) {
    throw new CredentialError("INVALID_HEX", field, `${field} must be 0x-prefixed hex`);
  }
  const body = value.slice(2);
  if (body.length % 2 !== 0 || !HEX_BODY.test(body)) {
    throw new CredentialError(
      "INVALID_HEX",
      field,
      `${field} is not valid hex (odd length or non-hex characters)`,
    );
  }
  return new Uint8Array(Buffer.from(body, "hex"));
}

export function bytesToHex(bytes: Uint8Array): Hex {
  return `0x${Buffer.from(bytes).toString("hex")}`;
}

export function assertLength(bytes: Uint8Array, expected: number, field: string): void {
  if (bytes.length !== expected) {
    throw new CredentialError(
      "INVALID_LENGTH",
      field,
      `${field} must be ${expected} bytes, got ${bytes.length}`,
    );
  }
}

/** Decode hex and require an exact byte length. */
export function decodeFixed(value: string, length: number, field: string): Uint8Array {
  const bytes = hexToBytes(value, field);
  assertLength(bytes, length, field);
  return bytes;
}

export function zeroBytes(length: number): Uint8Array {
  return new Uint8Array(length);
}

export function concatBytes(...parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, p) => sum + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Encode an unsigned 64-bit integer little-endian, the SSZ layout
 * for uint64.
 */
export function toLittleEndian64(value: bigint): Uint8Array {
  if (value < 0n || value > MAX_UINT64) {
    throw new CredentialError(
      "INVALID_AMOUNT",
      "amount",
      `amount ${value.toString()} does not fit in an unsigned 64-bit integer`,
    );
  }
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigUint64(0, value, true);
  return out;
}

/** SHA-256, the only hash the deposit contract uses. */
export function sha256(...parts: readonly Uint8Array[]): Uint8Array {
  const hash = createHash("sha256");
  for (const part of parts) {
    hash.update(part);
  }
  return new Uint8Array(hash.digest());
}
