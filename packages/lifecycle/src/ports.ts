/**
 * External collaborators.
 *
 * Both ports report success as a boolean. `false` is a failure exactly
 * like a rejected promise: the calling transition compensates and raises
 * ExternalCallFailure.
 */

import type { Address, Hex, Wei } from "@stakegate/types";

/** Arguments of one deposit-contract call. */
export interface DepositSinkCall {
  readonly pubkey: Hex;
  readonly withdrawalCredentials: Hex;
  readonly signature: Hex;
  readonly depositDataRoot: Hex;
  readonly amount: Wei;
}

/**
 * The external deposit contract. Called once per record, after the local
 * state write.
 */
export interface DepositSink {
  deposit(call: DepositSinkCall): Promise<boolean>;
}

/**
 * Sends value held in custody to an address.
 */
export interface ValueTransfer {
  send(to: Address, amount: Wei): Promise<boolean>;

  /** Balance actually held, for reconciliation against the custody ledger. */
  balance?(): Promise<Wei>;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
