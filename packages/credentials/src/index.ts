/**
 * @stakegate/credentials: Deposit data root and withdrawal credentials.
 *
 * Pure functions only: no state, no I/O, same input → same root.
 */

export {
  computeDepositDataRoot,
  verifyDepositDataRoot,
} from "./deposit-data-root.js";
export type { DepositData } from "./deposit-data-root.js";

export {
  encodeWithdrawalCredentials,
  decodeWithdrawalCredentials,
} from "./withdrawal-credentials.js";
export type { DecodedWithdrawalCredentials } from "./withdrawal-credentials.js";

export {
  hexToBytes,
  bytesToHex,
  assertLength,
  decodeFixed,
  concatBytes,
  zeroBytes,
  toLittleEndian64,
  sha256,
} from "./bytes.js";

export { CredentialError } from "./errors.js";
export type { CredentialErrorCode } from "./errors.js";
