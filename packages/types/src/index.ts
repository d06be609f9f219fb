/**
 * @stakegate/types: Shared domain types for the Stakegate stack.
 *
 * Used across all Stakegate packages:
 * - Byte strings, addresses and wei/gwei amounts
 * - Deposit record and vault request state unions
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Amounts are bigint; nothing here rounds
 */

// Primitives
export type { Hex, Address, Wei, Gwei } from "./primitives.js";
export {
  WEI_PER_GWEI,
  STAKE_UNIT_GWEI,
  STAKE_UNIT_WEI,
  PUBKEY_LENGTH,
  SIGNATURE_LENGTH,
  ROOT_LENGTH,
  WITHDRAWAL_CREDENTIALS_LENGTH,
  ADDRESS_LENGTH,
  DEFAULT_CANCEL_COOLDOWN_SECONDS,
  normalizeAddress,
  sameAddress,
  gweiToWei,
  weiToGwei,
} from "./primitives.js";

// Lifecycle
export type {
  DepositState,
  DepositAction,
  VaultRequestState,
  VaultRequestKind,
  ValidatorStatus,
  ValidatorSource,
  WithdrawalCredentialType,
} from "./lifecycle.js";

// Events
export type { DomainEvent, EventMetadata } from "./event.js";

// Runtime type guards
export {
  isHex,
  isHexOfLength,
  isAddress,
  isDepositState,
  isVaultRequestState,
  isVaultRequestKind,
  isValidatorStatus,
  isWithdrawalCredentialType,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
