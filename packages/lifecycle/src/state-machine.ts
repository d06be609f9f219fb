/**
 * Declarative transition tables for deposit records and vault requests.
 *
 * Deposit records:
 *
 *   none ─create→ requested ─assign→ assigned ─confirm→ confirmed ─finalize→ finalized
 *                     │                  │                  │
 *                     └──────────────── cancel ─────────────┴→ cancelled
 *
 * Vault requests:
 *
 *   pending → processing → claimable → claimed
 *      └──────────┴─→ cancelled
 *
 * A processing deposit request cancels only after the cooldown; a
 * processing redeem request never does.
 *
 * No step can be skipped. Anything not listed raises StateViolation.
 */

import type { DepositAction, DepositState, VaultRequestState } from "@stakegate/types";
import { StateViolation } from "./errors.js";

// =============================================================================
// Deposit records
// =============================================================================

export interface DepositTransition {
  readonly from: readonly DepositState[];
  readonly to: Exclude<DepositState, "none">;
}

export const DEPOSIT_TRANSITIONS: Readonly<Record<DepositAction, DepositTransition>> = {
  create: { from: ["none"], to: "requested" },
  assign: { from: ["requested"], to: "assigned" },
  confirm: { from: ["assigned"], to: "confirmed" },
  finalize: { from: ["confirmed"], to: "finalized" },
  cancel: { from: ["requested", "assigned", "confirmed"], to: "cancelled" },
};

export const DEPOSIT_ACTIONS: readonly DepositAction[] = [
  "create",
  "assign",
  "confirm",
  "finalize",
  "cancel",
];

export const TERMINAL_DEPOSIT_STATES: readonly DepositState[] = ["finalized", "cancelled"];

export function canTransition(state: DepositState, action: DepositAction): boolean {
  return DEPOSIT_TRANSITIONS[action].from.includes(state);
}

/**
 * @returns The state the action leads to
 * @throws StateViolation when `action` is not declared for `state`
 */
export function assertTransition(
  state: DepositState,
  action: DepositAction,
): Exclude<DepositState, "none"> {
  const transition = DEPOSIT_TRANSITIONS[action];
  if (!transition.from.includes(state)) {
    throw new StateViolation(
      transition.from,
      state,
      `Cannot ${action} a deposit in state "${state}"; requires ${transition.from.map((s) => `"${s}"`).join(" or ")}`,
    );
  }
  return transition.to;
}

export function isTerminalDepositState(state: DepositState): boolean {
  return TERMINAL_DEPOSIT_STATES.includes(state);
}

// =============================================================================
// Vault requests
// =============================================================================

export const VAULT_TRANSITIONS: Readonly<Record<VaultRequestState, readonly VaultRequestState[]>> = {
  pending: ["processing", "cancelled"],
  processing: ["claimable", "cancelled"],
  claimable: ["claimed"],
  claimed: [],
  cancelled: [],
};

export const VAULT_STATES: readonly VaultRequestState[] = [
  "pending",
  "processing",
  "claimable",
  "claimed",
  "cancelled",
];

/**
 * @throws StateViolation when `next` does not directly follow `current`
 */
export function assertVaultTransition(
  current: VaultRequestState,
  next: VaultRequestState,
): void {
  if (!VAULT_TRANSITIONS[current].includes(next)) {
    const required = VAULT_STATES.filter((s) => VAULT_TRANSITIONS[s].includes(next));
    throw new StateViolation(
      required,
      current,
      `Cannot move a request from "${current}" to "${next}"; requires ${required.map((s) => `"${s}"`).join(" or ")}`,
    );
  }
}
