/**
 * @stakegate/credentials: Deposit data root.
 *
 * Recomputes hash_tree_root(DepositData) exactly as the beacon-chain
 * deposit contract does before it accepts funds:
 *
 *   pubkeyRoot    = H(pubkey ‖ 0×16)
 *   signatureRoot = H(H(sig[0:64]) ‖ H(sig[64:96] ‖ 0×32))
 *   amountLeaf    = le64(amountGwei) ‖ 0×24
 *   root          = H(H(pubkeyRoot ‖ withdrawalCredentials) ‖ H(amountLeaf ‖ signatureRoot))
 *
 * H is SHA-256. The amount leaf is the packed uint64 chunk and is not
 * hashed on its own.
 */

import type { Gwei, Hex } from "@stakegate/types";
import {
  PUBKEY_LENGTH,
  ROOT_LENGTH,
  SIGNATURE_LENGTH,
  WITHDRAWAL_CREDENTIALS_LENGTH,
} from "@stakegate/types";
import {
  bytesToHex,
  decodeFixed,
  sha256,
  toLittleEndian64,
  zeroBytes,
} from "./bytes.js";

export interface DepositData {
  /** 48-byte BLS public key */
  readonly pubkey: string;
  /** 32-byte withdrawal credentials */
  readonly withdrawalCredentials: string;
  /** 96-byte BLS signature over the deposit message */
  readonly signature: string;
  /** Deposit amount in gwei */
  readonly amountGwei: Gwei;
}

/**
 * Compute the deposit data root.
 *
 * @throws CredentialError INVALID_LENGTH / INVALID_HEX / INVALID_AMOUNT
 */
export function computeDepositDataRoot(data: DepositData): Hex {
  const pubkey = decodeFixed(data.pubkey, PUBKEY_LENGTH, "pubkey");
  const signature = decodeFixed(data.signature, SIGNATURE_LENGTH, "signature");
  const credentials = decodeFixed(
    data.withdrawalCredentials,
    WITHDRAWAL_CREDENTIALS_LENGTH,
    "withdrawalCredentials",
  );
  const amount = toLittleEndian64(data.amountGwei);

  const pubkeyRoot = sha256(pubkey, zeroBytes(16));
  const signatureRoot = sha256(
    sha256(signature.subarray(0, 64)),
    sha256(signature.subarray(64, 96), zeroBytes(32)),
  );
  const amountLeaf = [amount, zeroBytes(24)] as const;

  const left = sha256(pubkeyRoot, credentials);
  const right = sha256(...amountLeaf, signatureRoot);

  return bytesToHex(sha256(left, right));
}

/**
 * Compare a supplied root against the recomputed one.
 * The supplied root must itself be well-formed (32 bytes).
 */
export function verifyDepositDataRoot(data: DepositData, expectedRoot: string): boolean {
  const expected = bytesToHex(decodeFixed(expectedRoot, ROOT_LENGTH, "depositDataRoot"));
  return computeDepositDataRoot(data) === expected;
}
