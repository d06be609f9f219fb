/**
 * In-memory port adapters.
 *
 * Used by the HTTP service and the tests. The value transfer keeps a
 * custody balance of its own so reconciliation has something to compare
 * against: funds arriving with a request are credited, funds leaving for
 * the deposit sink or a recipient are debited.
 */

import type { Address, Wei } from "@stakegate/types";
import type { DepositSink, DepositSinkCall, ValueTransfer } from "./ports.js";

export interface Transfer {
  readonly to: Address;
  readonly amount: Wei;
}

// =============================================================================
// Value transfer
// =============================================================================

export class InMemoryValueTransfer implements ValueTransfer {
  private _balance: Wei;
  private readonly _sent: Transfer[] = [];
  private readonly _failures: Array<"reject" | "false"> = [];

  constructor(initialBalance: Wei = 0n) {
    this._balance = initialBalance;
  }

  async send(to: Address, amount: Wei): Promise<boolean> {
    const failure = this._failures.shift();
    if (failure === "reject") {
      throw new Error(`Transfer of ${amount.toString()} wei to ${to} rejected`);
    }
    if (failure === "false" || amount > this._balance) {
      return false;
    }
    this._balance -= amount;
    this._sent.push({ to, amount });
    return true;
  }

  async balance(): Promise<Wei> {
    return this._balance;
  }

  /** Funds arriving in custody (a paid request, an exited validator's sweep). */
  credit(amount: Wei): void {
    this._balance += amount;
  }

  /** Funds leaving custody outside `send` (the deposit sink). */
  debit(amount: Wei): void {
    this._balance -= amount;
  }

  /** Make the next call reject, or resolve `false`. */
  failNext(mode: "reject" | "false" = "false"): void {
    this._failures.push(mode);
  }

  get sent(): readonly Transfer[] {
    return [...this._sent];
  }

  totalSentTo(to: Address): Wei {
    return this._sent
      .filter((t) => t.to === to)
      .reduce((sum, t) => sum + t.amount, 0n);
  }
}

// =============================================================================
// Deposit sink
// =============================================================================

export class RecordingDepositSink implements DepositSink {
  private readonly _calls: DepositSinkCall[] = [];
  private readonly _failures: Array<"reject" | "false"> = [];
  private readonly _funding: InMemoryValueTransfer | undefined;

  /**
   * @param funding - custody account debited by every accepted deposit
   */
  constructor(funding?: InMemoryValueTransfer) {
    this._funding = funding;
  }

  async deposit(call: DepositSinkCall): Promise<boolean> {
    const failure = this._failures.shift();
    if (failure === "reject") {
      throw new Error(`Deposit contract reverted for ${call.pubkey}`);
    }
    if (failure === "false") {
      return false;
    }
    this._calls.push(call);
    this._funding?.debit(call.amount);
    return true;
  }

  failNext(mode: "reject" | "false" = "false"): void {
    this._failures.push(mode);
  }

  get calls(): readonly DepositSinkCall[] {
    return [...this._calls];
  }
}
