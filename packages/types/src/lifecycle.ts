/**
 * Lifecycle Types
 *
 * State unions for the two capital directions:
 * - Deposit records (individual escrow, one handle per record)
 * - Vault requests (async deposit and redemption, integer request ids)
 *
 * Both share one shape: open states advance one step at a time and
 * terminal states never change again.
 */

/**
 * Deposit record lifecycle.
 *
 * none → requested → assigned → confirmed → finalized
 *                ↘          ↘           ↘
 *                           cancelled
 */
export type DepositState =
  | "none"
  | "requested"
  | "assigned"
  | "confirmed"
  | "finalized"
  | "cancelled";

/** Actions that move a deposit record between states. */
export type DepositAction =
  | "create"
  | "assign"
  | "confirm"
  | "finalize"
  | "cancel";

/**
 * Vault request lifecycle (both directions).
 *
 * pending → processing → claimable → claimed
 *    ↘
 *   cancelled
 */
export type VaultRequestState =
  | "pending"
  | "processing"
  | "claimable"
  | "claimed"
  | "cancelled";

export type VaultRequestKind = "deposit" | "redeem";

export type ValidatorStatus = "active" | "exiting" | "exited";

/** Which component funded a validator. */
export type ValidatorSource = "registry" | "vault";

/** Version byte at the front of 32-byte withdrawal credentials. */
export type WithdrawalCredentialType = 0x01 | 0x02;
