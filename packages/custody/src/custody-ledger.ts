/**
 * @stakegate/custody: CustodyLedger.
 *
 * Tracks escrowed stake per lifecycle phase. Lifecycle transitions are
 * the only callers; each transition maps to exactly one movement kind.
 *
 * API surface:
 * - reserve() / release() / refund() / recordExit() / payout()
 * - revert(): compensating movement for a failed transition
 * - balances(), heldBalance(), movements()
 * - assertConserved(): runs after every mutation
 * - reconcile(): compare against an externally reported balance
 * - snapshot() / fromSnapshot()
 *
 * Conservation (checked on the candidate counters of every movement):
 *   received + returnedFromSink − sentToSink − paidOut == pending + exited
 *   sentToSink − returnedFromSink                      == committed
 */

import type { Wei } from "@stakegate/types";
import type {
  CounterName,
  CustodyBalances,
  CustodyMovement,
  CustodySnapshot,
  MovementKind,
  ReconciliationResult,
  SerializedMovement,
} from "./types.js";
import { CustodyError } from "./types.js";
import { formatEther, parseWei } from "./amounts.js";

type Effect = Readonly<Partial<Record<CounterName, 1 | -1>>>;

/** Counter deltas applied by each forward movement. Reversals negate them. */
export const MOVEMENT_EFFECTS: Readonly<Record<MovementKind, Effect>> = {
  reserve: { received: 1, pending: 1 },
  release: { pending: -1, committed: 1, sentToSink: 1 },
  refund: { pending: -1, paidOut: 1 },
  exit: { committed: -1, exited: 1, returnedFromSink: 1 },
  payout: { exited: -1, paidOut: 1 },
} as const;

const COUNTERS: readonly CounterName[] = [
  "pending",
  "committed",
  "exited",
  "received",
  "paidOut",
  "sentToSink",
  "returnedFromSink",
];

export interface CustodyLedgerOptions {
  readonly clock?: (() => Date) | undefined;
}

export class CustodyLedger {
  private readonly _counters = new Map<CounterName, Wei>(
    COUNTERS.map((c) => [c, 0n]),
  );
  private readonly _movements: CustodyMovement[] = [];
  private readonly _reversed = new Set<number>();
  private readonly _clock: () => Date;

  constructor(options?: CustodyLedgerOptions) {
    this._clock = options?.clock ?? (() => new Date());
  }

  // ─── Movements ──────────────────────────────────────────────────────

  /** Funds received for a new record. */
  reserve(amount: Wei, ref: string): CustodyMovement {
    return this._apply("reserve", amount, ref);
  }

  /** Funds leave custody for the deposit sink. */
  release(amount: Wei, ref: string): CustodyMovement {
    return this._apply("release", amount, ref);
  }

  /** Pending funds returned to the depositor. */
  refund(amount: Wei, ref: string): CustodyMovement {
    return this._apply("refund", amount, ref);
  }

  /** An exited validator's stake is back in custody. */
  recordExit(amount: Wei, ref: string): CustodyMovement {
    return this._apply("exit", amount, ref);
  }

  /** Exited funds paid to their owner. */
  payout(amount: Wei, ref: string): CustodyMovement {
    return this._apply("payout", amount, ref);
  }

  /**
   * Undo a movement by appending its reversal.
   * A movement can be reversed once; reversals cannot be reversed.
   */
  revert(movement: CustodyMovement): CustodyMovement {
    return this._revert(movement.sequence);
  }

  // ─── Queries ────────────────────────────────────────────────────────

  balances(): CustodyBalances {
    return {
      pending: this._get("pending"),
      committed: this._get("committed"),
      exited: this._get("exited"),
      received: this._get("received"),
      paidOut: this._get("paidOut"),
      sentToSink: this._get("sentToSink"),
      returnedFromSink: this._get("returnedFromSink"),
    };
  }

  /** Value that should physically sit in custody: pending + exited. */
  heldBalance(): Wei {
    return this._get("pending") + this._get("exited");
  }

  movements(ref?: string): readonly CustodyMovement[] {
    return ref === undefined
      ? [...this._movements]
      : this._movements.filter((m) => m.ref === ref);
  }

  get movementCount(): number {
    return this._movements.length;
  }

  // ─── Invariants ─────────────────────────────────────────────────────

  /**
   * @throws CustodyError CONSERVATION_BROKEN
   */
  assertConserved(): void {
    checkConservation((counter) => this._get(counter));
  }

  /**
   * Compare the ledger's held balance with the balance reported by the
   * value-transfer port. Does not throw; the caller decides.
   */
  reconcile(actual: Wei): ReconciliationResult {
    const expected = this.heldBalance();
    return {
      matched: expected === actual,
      expected,
      actual,
      difference: actual - expected,
    };
  }

  // ─── Snapshot ───────────────────────────────────────────────────────

  snapshot(): CustodySnapshot {
    return {
      version: 1,
      movements: this._movements.map(serializeMovement),
      createdAt: this._clock().toISOString(),
    };
  }

  /**
   * Rebuild a ledger by replaying every movement, with full validation.
   */
  static fromSnapshot(snapshot: CustodySnapshot, options?: CustodyLedgerOptions): CustodyLedger {
    const ledger = new CustodyLedger(options);

    for (const m of snapshot.movements) {
      let replayed: CustodyMovement;
      if (m.direction === "forward") {
        replayed = ledger._apply(m.kind, parseWei(m.amount), m.ref, m.timestamp);
      } else {
        if (m.reversalOf === undefined) {
          throw new CustodyError(
            "INVALID_SNAPSHOT",
            `Reversal ${String(m.sequence)} does not name the movement it reverses`,
          );
        }
        replayed = ledger._revert(m.reversalOf, m.timestamp);
      }

      if (replayed.sequence !== m.sequence) {
        throw new CustodyError(
          "INVALID_SNAPSHOT",
          `Snapshot sequence gap: expected ${String(replayed.sequence)}, found ${String(m.sequence)}`,
        );
      }
    }

    return ledger;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _apply(
    kind: MovementKind,
    amount: Wei,
    ref: string,
    timestamp?: string,
  ): CustodyMovement {
    if (amount <= 0n) {
      throw new CustodyError(
        "INVALID_AMOUNT",
        `Custody ${kind} amount must be positive, got ${amount.toString()}`,
      );
    }
    return this._write(kind, "forward", amount, ref, undefined, timestamp);
  }

  /**
   * Compute the candidate counters, check them, then write them and the
   * movement together. Nothing is written when any check fails.
   */
  private _write(
    kind: MovementKind,
    direction: "forward" | "reversal",
    amount: Wei,
    ref: string,
    reversalOf?: number,
    timestamp?: string,
  ): CustodyMovement {
    const sign = direction === "forward" ? 1n : -1n;
    const effect = MOVEMENT_EFFECTS[kind];

    const next = new Map<CounterName, Wei>();
    for (const counter of COUNTERS) {
      const delta = effect[counter];
      if (delta === undefined) continue;
      const value = this._get(counter) + BigInt(delta) * sign * amount;
      if (value < 0n) {
        throw new CustodyError(
          "INSUFFICIENT_FUNDS",
          `${direction === "forward" ? kind : `reversal of ${kind}`} of ${formatEther(amount)} ETH for ${ref} exceeds ${counter} balance of ${formatEther(this._get(counter))} ETH`,
        );
      }
      next.set(counter, value);
    }

    checkConservation((counter) => next.get(counter) ?? this._get(counter));

    const movement: CustodyMovement = {
      sequence: this._movements.length + 1,
      kind,
      direction,
      amount,
      ref,
      timestamp: timestamp ?? this._clock().toISOString(),
      ...(reversalOf !== undefined ? { reversalOf } : {}),
    };
    for (const [counter, value] of next) {
      this._counters.set(counter, value);
    }
    this._movements.push(movement);
    return movement;
  }

  private _revert(sequence: number, timestamp?: string): CustodyMovement {
    const original = this._movements[sequence - 1];
    if (original === undefined || original.direction !== "forward") {
      throw new CustodyError(
        "UNKNOWN_MOVEMENT",
        `No forward movement with sequence ${String(sequence)}`,
      );
    }
    if (this._reversed.has(original.sequence)) {
      throw new CustodyError(
        "ALREADY_REVERSED",
        `Movement ${String(original.sequence)} has already been reversed`,
      );
    }

    const reversal = this._write(
      original.kind,
      "reversal",
      original.amount,
      original.ref,
      original.sequence,
      timestamp,
    );
    this._reversed.add(original.sequence);
    return reversal;
  }

  private _get(counter: CounterName): Wei {
    return this._counters.get(counter) ?? 0n;
  }
}

/**
 * @throws CustodyError CONSERVATION_BROKEN
 */
function checkConservation(get: (counter: CounterName) => Wei): void {
  for (const counter of COUNTERS) {
    if (get(counter) < 0n) {
      throw new CustodyError(
        "CONSERVATION_BROKEN",
        `Counter "${counter}" is negative: ${get(counter).toString()}`,
      );
    }
  }

  const held = get("pending") + get("exited");
  const inCustody =
    get("received") + get("returnedFromSink") - get("sentToSink") - get("paidOut");
  if (inCustody !== held) {
    throw new CustodyError(
      "CONSERVATION_BROKEN",
      `received + returnedFromSink − sentToSink − paidOut (${inCustody.toString()}) != pending + exited (${held.toString()})`,
    );
  }

  const netStaked = get("sentToSink") - get("returnedFromSink");
  if (netStaked !== get("committed")) {
    throw new CustodyError(
      "CONSERVATION_BROKEN",
      `sentToSink − returnedFromSink (${netStaked.toString()}) != committed (${get("committed").toString()})`,
    );
  }
}

function serializeMovement(m: CustodyMovement): SerializedMovement {
  return {
    sequence: m.sequence,
    kind: m.kind,
    direction: m.direction,
    amount: m.amount.toString(),
    ref: m.ref,
    timestamp: m.timestamp,
    ...(m.reversalOf !== undefined ? { reversalOf: m.reversalOf } : {}),
  };
}
