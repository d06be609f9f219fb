/**
 * @stakegate/custody: Types for the custody ledger.
 *
 * Rules:
 * - All amounts are bigint wei
 * - Movements are append-only; corrections are reversal movements
 * - Fail-closed: an underflow throws, never clamps
 */

import type { Wei } from "@stakegate/types";

// ─── Counters ────────────────────────────────────────────────────────────

/**
 * Phase counters.
 *
 * - pending:  held for open records that have not reached the sink
 * - committed: sent to the deposit sink and still staked
 * - exited:   returned from exited validators, awaiting claim
 */
export type PhaseCounter = "pending" | "committed" | "exited";

/** Flow totals kept alongside the phase counters for conservation checks. */
export type FlowCounter = "received" | "paidOut" | "sentToSink" | "returnedFromSink";

export type CounterName = PhaseCounter | FlowCounter;

export type CustodyBalances = Readonly<Record<CounterName, Wei>>;

// ─── Movements ───────────────────────────────────────────────────────────

/**
 * - reserve: funds arrive with a new record (create / requestDeposit)
 * - release: funds leave for the deposit sink (finalize / processValidatorDeposit)
 * - refund:  funds go back to the depositor (cancel)
 * - exit:    a validator's stake comes back (processRedeem)
 * - payout:  exited funds are paid to the owner (claimRedeem)
 */
export type MovementKind = "reserve" | "release" | "refund" | "exit" | "payout";

export interface CustodyMovement {
  /** 1-based, contiguous */
  readonly sequence: number;
  readonly kind: MovementKind;
  readonly direction: "forward" | "reversal";
  readonly amount: Wei;
  /** Record or request the movement belongs to, e.g. "deposit-3" */
  readonly ref: string;
  readonly timestamp: string;
  /** Sequence of the movement this one reverses */
  readonly reversalOf?: number | undefined;
}

// ─── Reconciliation ──────────────────────────────────────────────────────

export interface ReconciliationResult {
  readonly matched: boolean;
  /** pending + exited according to the ledger */
  readonly expected: Wei;
  /** Balance reported by the value-transfer port */
  readonly actual: Wei;
  /** actual − expected */
  readonly difference: Wei;
}

// ─── Snapshot ────────────────────────────────────────────────────────────

export interface SerializedMovement {
  readonly sequence: number;
  readonly kind: MovementKind;
  readonly direction: "forward" | "reversal";
  readonly amount: string;
  readonly ref: string;
  readonly timestamp: string;
  readonly reversalOf?: number | undefined;
}

export interface CustodySnapshot {
  readonly version: 1;
  readonly movements: readonly SerializedMovement[];
  readonly createdAt: string;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type CustodyErrorCode =
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_FUNDS"
  | "CONSERVATION_BROKEN"
  | "UNKNOWN_MOVEMENT"
  | "ALREADY_REVERSED"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the custody ledger.
 * Always thrown; the ledger is unchanged when it is.
 */
export class CustodyError extends Error {
  public readonly code: CustodyErrorCode;

  constructor(code: CustodyErrorCode, message: string) {
    super(message);
    this.name = "CustodyError";
    this.code = code;
  }
}
