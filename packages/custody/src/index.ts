/**
 * @stakegate/custody
 *
 * Phase-based custody ledger for escrowed stake.
 */

export { CustodyLedger, MOVEMENT_EFFECTS } from "./custody-ledger.js";
export type { CustodyLedgerOptions } from "./custody-ledger.js";

export { parseWei, parseEther, formatEther } from "./amounts.js";

export { CustodyError } from "./types.js";
export type {
  PhaseCounter,
  FlowCounter,
  CounterName,
  CustodyBalances,
  MovementKind,
  CustodyMovement,
  ReconciliationResult,
  SerializedMovement,
  CustodySnapshot,
  CustodyErrorCode,
} from "./types.js";
