/**
 * Shared wiring for lifecycle tests.
 *
 * Key material and roots match the roots pinned in the credentials tests:
 * a registry deposit from DEPOSITOR uses PUBKEY_A / SIGNATURE_A and
 * commits ROOT_A; a vault deposit uses PUBKEY_B / SIGNATURE_B against
 * VAULT and commits ROOT_B.
 */

import { computeDepositDataRoot } from "@stakegate/credentials";
import { CustodyLedger } from "@stakegate/custody";
import { InMemoryEventStore } from "@stakegate/event-store";
import { STAKE_UNIT_GWEI } from "@stakegate/types";
import type { Hex } from "@stakegate/types";
import { InMemoryValueTransfer, RecordingDepositSink } from "../src/adapters.js";
import { CancellationPolicy } from "../src/cancellation-policy.js";
import type { CompensationEvent } from "../src/compensation.js";
import { DepositRegistry } from "../src/deposit-registry.js";
import { ExitTracker } from "../src/exit-tracker.js";
import { OperatorPolicy } from "../src/operator-policy.js";
import type { DepositRecord, ExitRequest } from "../src/types.js";
import { ValidatorSet } from "../src/validator-set.js";

export const ETH = 10n ** 18n;
export const STAKE = 32n * ETH;

export const OWNER = "0x" + "0a".repeat(20);
export const OPERATOR = "0x" + "0b".repeat(20);
export const DEPOSITOR = "0x" + "12".repeat(20);
export const OTHER = "0x" + "56".repeat(20);
export const VAULT = "0x" + "34".repeat(20);

export const PUBKEY_A = "0x" + "ab".repeat(48);
export const SIGNATURE_A = "0x" + "cd".repeat(96);
export const ROOT_A = "0x8e2319ecb45be320ee66ba00751942c1637fff53103deb1ad02eea886924fd84";

export const PUBKEY_B = "0x" + "9f".repeat(48);
export const SIGNATURE_B = "0x" + "e1".repeat(96);
export const ROOT_B = "0x16f0cc502723a78a446de1fd518f6a1e5216c9f619ed818d117bef4fcd76e70a";

export const PUBKEY_C = "0x" + "c3".repeat(48);
export const SIGNATURE_C = "0x" + "5a".repeat(96);

export const T0 = "2024-03-01T12:00:00.000Z";

export class ManualClock {
  private _now: number;

  constructor(start: string = T0) {
    this._now = Date.parse(start);
  }

  readonly read = (): Date => new Date(this._now);

  advance(seconds: number): void {
    this._now += seconds * 1000;
  }
}

export interface Harness {
  readonly clock: ManualClock;
  readonly custody: CustodyLedger;
  readonly operators: OperatorPolicy;
  readonly validators: ValidatorSet;
  readonly transfer: InMemoryValueTransfer;
  readonly sink: RecordingDepositSink;
  readonly events: InMemoryEventStore;
  readonly registry: DepositRegistry;
  readonly vault: ExitTracker;
  readonly compensations: CompensationEvent[];
}

export function createHarness(cooldownSeconds?: number): Harness {
  const clock = new ManualClock();
  const custody = new CustodyLedger({ clock: clock.read });
  const operators = new OperatorPolicy(OWNER, [OPERATOR]);
  const validators = new ValidatorSet();
  const transfer = new InMemoryValueTransfer();
  const sink = new RecordingDepositSink(transfer);
  const events = new InMemoryEventStore({ clock: clock.read });
  const compensations: CompensationEvent[] = [];
  const onCompensate = (event: CompensationEvent): void => {
    compensations.push(event);
  };

  const cancellation = new CancellationPolicy(cooldownSeconds !== undefined ? { cooldownSeconds } : {});
  const registry = new DepositRegistry({
    custody,
    operators,
    validators,
    sink,
    transfer,
    cancellation,
    events,
    clock: clock.read,
    onCompensate,
  });
  const vault = new ExitTracker({
    registry,
    custody,
    operators,
    validators,
    sink,
    transfer,
    vaultAddress: VAULT,
    cancellation,
    events,
    clock: clock.read,
    onCompensate,
  });

  return { clock, custody, operators, validators, transfer, sink, events, registry, vault, compensations };
}

// ─── Flows ───────────────────────────────────────────────────────────────

/** Pay in one stake unit and open a record. */
export function createDeposit(h: Harness, caller: string = DEPOSITOR): DepositRecord {
  h.transfer.credit(STAKE);
  return h.registry.create(caller, { amount: STAKE });
}

export function confirmedDeposit(h: Harness): DepositRecord {
  const record = createDeposit(h);
  h.registry.assign(OPERATOR, record.id, { pubkey: PUBKEY_A, signature: SIGNATURE_A });
  return h.registry.confirm(DEPOSITOR, record.id, ROOT_A);
}

export async function finalizedDeposit(h: Harness): Promise<DepositRecord> {
  const record = confirmedDeposit(h);
  return h.registry.finalize(OPERATOR, record.id);
}

export function vaultDeposit(h: Harness, caller: string = DEPOSITOR): ExitRequest {
  h.transfer.credit(STAKE);
  return h.vault.requestDeposit(caller, { amount: STAKE });
}

/** A vault deposit carried through claim; shares belong to `caller`. */
export async function claimedVaultDeposit(
  h: Harness,
  caller: string = DEPOSITOR,
): Promise<ExitRequest> {
  const request = vaultDeposit(h, caller);
  h.vault.assignDeposit(OPERATOR, request.id, { pubkey: PUBKEY_B, signature: SIGNATURE_B });
  await h.vault.processValidatorDeposit(OPERATOR, request.id, { depositDataRoot: ROOT_B });
  return h.vault.claimDeposit(caller, request.id);
}

/** Root of a stake-unit deposit for key material not pinned above. */
export function rootFor(withdrawalCredentials: string, pubkey: string, signature: string): Hex {
  return computeDepositDataRoot({ pubkey, withdrawalCredentials, signature, amountGwei: STAKE_UNIT_GWEI });
}

/** A registry record that withdraws to the vault, finalized on PUBKEY_A. */
export async function vaultWithdrawingDeposit(h: Harness): Promise<DepositRecord> {
  h.transfer.credit(STAKE);
  const record = h.registry.create(DEPOSITOR, { amount: STAKE, withdrawalAddress: VAULT });
  h.registry.assign(OPERATOR, record.id, { pubkey: PUBKEY_A, signature: SIGNATURE_A });
  const root = rootFor(record.withdrawalCredentials, PUBKEY_A, SIGNATURE_A);
  h.registry.confirm(DEPOSITOR, record.id, root);
  return h.registry.finalize(OPERATOR, record.id);
}

export async function heldBalanceMatches(h: Harness): Promise<boolean> {
  return h.custody.reconcile(await h.transfer.balance()).matched;
}
