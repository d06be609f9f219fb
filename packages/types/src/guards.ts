/**
 * Runtime Type Guards
 *
 * Narrowing functions for Stakegate domain types, used at system
 * boundaries (HTTP input, restored snapshots, adapter results).
 */

import type { Address, Hex } from "./primitives.js";
import { matchesAddress, matchesHex } from "./primitives.js";
import type {
  DepositState,
  VaultRequestKind,
  VaultRequestState,
  ValidatorStatus,
  WithdrawalCredentialType,
} from "./lifecycle.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Primitive guards
// =============================================================================

export function isHex(value: unknown): value is Hex {
  return typeof value === "string" && matchesHex(value);
}

/** Hex string that decodes to exactly `length` bytes. */
export function isHexOfLength(value: unknown, length: number): value is Hex {
  return isHex(value) && value.length === 2 + length * 2;
}

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && matchesAddress(value);
}

// =============================================================================
// Lifecycle guards
// =============================================================================

const DEPOSIT_STATES = new Set<string>([
  "none", "requested", "assigned", "confirmed", "finalized", "cancelled",
]);

const VAULT_REQUEST_STATES = new Set<string>([
  "pending", "processing", "claimable", "claimed", "cancelled",
]);

const VAULT_REQUEST_KINDS = new Set<string>(["deposit", "redeem"]);

const VALIDATOR_STATUSES = new Set<string>(["active", "exiting", "exited"]);

export function isDepositState(value: unknown): value is DepositState {
  return typeof value === "string" && DEPOSIT_STATES.has(value);
}

export function isVaultRequestState(value: unknown): value is VaultRequestState {
  return typeof value === "string" && VAULT_REQUEST_STATES.has(value);
}

export function isVaultRequestKind(value: unknown): value is VaultRequestKind {
  return typeof value === "string" && VAULT_REQUEST_KINDS.has(value);
}

export function isValidatorStatus(value: unknown): value is ValidatorStatus {
  return typeof value === "string" && VALIDATOR_STATUSES.has(value);
}

export function isWithdrawalCredentialType(
  value: unknown,
): value is WithdrawalCredentialType {
  return value === 0x01 || value === 0x02;
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["registry", "vault", "operators", "handles"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    v.type.length > 0 &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
