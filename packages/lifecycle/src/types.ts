/**
 * Record types for the deposit registry and the async vault.
 */

import type {
  Address,
  DepositState,
  Hex,
  VaultRequestKind,
  VaultRequestState,
  Wei,
} from "@stakegate/types";

// =============================================================================
// Deposit records
// =============================================================================

/** States a stored record can be in. "none" is never stored. */
export type StoredDepositState = Exclude<DepositState, "none">;

/**
 * One escrowed stake unit on its way to becoming a validator.
 *
 * pubkey and signature are fixed from "assigned" onward; committedRoot
 * and confirmedAt from "confirmed" onward.
 */
export interface DepositRecord {
  readonly id: number;
  readonly state: StoredDepositState;
  /** Depositor; receives the refund on cancel */
  readonly owner: Address;
  readonly withdrawalAddress: Address;
  readonly withdrawalCredentials: Hex;
  readonly amount: Wei;
  readonly createdAt: string;
  readonly pubkey?: Hex;
  readonly signature?: Hex;
  readonly assignedOperator?: Address;
  readonly assignedAt?: string;
  readonly committedRoot?: Hex;
  readonly confirmedAt?: string;
  readonly finalizedAt?: string;
  readonly validatorId?: number;
}

export interface AssignParams {
  readonly pubkey: string;
  readonly signature: string;
}

export interface CreateDepositParams {
  /** Defaults to the caller */
  readonly withdrawalAddress?: string;
  readonly amount: Wei;
}

// =============================================================================
// Vault requests
// =============================================================================

export interface ExitRequest {
  readonly id: number;
  readonly kind: VaultRequestKind;
  readonly state: VaultRequestState;
  readonly amount: Wei;
  /** Funds came from (deposit) or go to (redeem) this address */
  readonly owner: Address;
  /** May claim on the owner's behalf */
  readonly controller: Address;
  readonly validatorId?: number;
  readonly pubkey?: Hex;
  readonly signature?: Hex;
  readonly depositDataRoot?: Hex;
  readonly exitEpoch?: number;
  readonly createdAt: string;
  /** Deposit requests: when an operator attached credentials */
  readonly assignedAt?: string;
  readonly updatedAt: string;
}

export interface RequestDepositParams {
  /** Defaults to the caller */
  readonly controller?: string;
  readonly amount: Wei;
}

export interface RequestRedeemParams {
  readonly validatorId: number;
  /** Defaults to the caller */
  readonly controller?: string;
  /** Must equal the caller when given */
  readonly owner?: string;
}

export interface ListRequestsFilter {
  readonly kind?: VaultRequestKind;
  readonly state?: VaultRequestState;
}

// =============================================================================
// Snapshots
// =============================================================================

export interface SerializedDepositRecord extends Omit<DepositRecord, "amount"> {
  readonly amount: string;
}

export interface DepositRegistrySnapshot {
  readonly version: 1;
  readonly nextId: number;
  readonly records: readonly SerializedDepositRecord[];
  readonly handles: readonly { readonly id: number; readonly owner: Address; readonly locked: boolean }[];
}
