/**
 * Deposit Registry: individual escrow lifecycle.
 *
 * create → assign → confirm → finalize, with cancel from any open state.
 *
 * Rules:
 * - Every record holds exactly one stake unit
 * - No step can be skipped; guards come from DEPOSIT_TRANSITIONS
 * - confirm recomputes the deposit data root locally and refuses a mismatch
 * - finalize and cancel write state before calling a port; a failed call
 *   compensates every write and raises ExternalCallFailure
 * - cancel deletes the record and burns its handle; the id is never reused
 * - Events are journaled only after a transition succeeded
 */

import { computeDepositDataRoot, encodeWithdrawalCredentials } from "@stakegate/credentials";
import type { DepositData } from "@stakegate/credentials";
import { parseWei } from "@stakegate/custody";
import type { CustodyLedger } from "@stakegate/custody";
import type { EventStore } from "@stakegate/event-store";
import {
  normalizeAddress,
  PUBKEY_LENGTH,
  ROOT_LENGTH,
  SIGNATURE_LENGTH,
  STAKE_UNIT_WEI,
  weiToGwei,
} from "@stakegate/types";
import type {
  DepositAction,
  DepositState,
  Hex,
  WithdrawalCredentialType,
} from "@stakegate/types";
import { CancellationPolicy } from "./cancellation-policy.js";
import type { CancellationDecision } from "./cancellation-policy.js";
import { callPort, runLocalTransition, runTransition } from "./compensation.js";
import type { CompensationListener } from "./compensation.js";
import {
  AuthenticityError,
  AuthorizationError,
  NotFoundError,
  StateViolation,
  ValidationError,
} from "./errors.js";
import { HandleRegistry } from "./handle-registry.js";
import type { Handle } from "./handle-registry.js";
import { requireAddress, requireBytes, requireStakeUnit } from "./inputs.js";
import { depositStream, LifecycleJournal } from "./journal.js";
import type { OperatorPolicy } from "./operator-policy.js";
import { systemClock } from "./ports.js";
import type { Clock, DepositSink, ValueTransfer } from "./ports.js";
import { assertTransition, isTerminalDepositState } from "./state-machine.js";
import type {
  AssignParams,
  CreateDepositParams,
  DepositRecord,
  DepositRegistrySnapshot,
  SerializedDepositRecord,
  StoredDepositState,
} from "./types.js";
import type { ValidatorSet } from "./validator-set.js";

export interface DepositRegistryOptions {
  readonly custody: CustodyLedger;
  readonly operators: OperatorPolicy;
  readonly validators: ValidatorSet;
  readonly sink: DepositSink;
  readonly transfer: ValueTransfer;
  readonly cancellation?: CancellationPolicy | undefined;
  readonly events?: EventStore | undefined;
  readonly clock?: Clock | undefined;
  /** Prefix for new withdrawal credentials. Default: 0x01 */
  readonly credentialType?: WithdrawalCredentialType | undefined;
  readonly onCompensate?: CompensationListener | undefined;
}

export class DepositRegistry {
  private readonly _records = new Map<number, DepositRecord>();
  private readonly _handles: HandleRegistry;
  private readonly _custody: CustodyLedger;
  private readonly _operators: OperatorPolicy;
  private readonly _validators: ValidatorSet;
  private readonly _sink: DepositSink;
  private readonly _transfer: ValueTransfer;
  private readonly _cancellation: CancellationPolicy;
  private readonly _journal: LifecycleJournal;
  private readonly _clock: Clock;
  private readonly _credentialType: WithdrawalCredentialType;
  private readonly _onCompensate: CompensationListener | undefined;
  private readonly _pubkeyChecks: Array<(pubkey: Hex) => boolean> = [];
  private _nextId = 1;

  constructor(options: DepositRegistryOptions) {
    this._custody = options.custody;
    this._operators = options.operators;
    this._validators = options.validators;
    this._sink = options.sink;
    this._transfer = options.transfer;
    this._cancellation = options.cancellation ?? new CancellationPolicy();
    this._clock = options.clock ?? systemClock;
    this._journal = new LifecycleJournal(options.events, this._clock);
    this._credentialType = options.credentialType ?? 0x01;
    this._onCompensate = options.onCompensate;
    this._handles = new HandleRegistry((id) => {
      const record = this._records.get(id);
      return record !== undefined && isTerminalDepositState(record.state);
    });
  }

  get handles(): HandleRegistry {
    return this._handles;
  }

  get cancellation(): CancellationPolicy {
    return this._cancellation;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transitions
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Open a record for one stake unit paid by `caller`.
   * The caller receives the record's handle.
   */
  create(caller: string, params: CreateDepositParams): DepositRecord {
    const owner = requireAddress(caller, "caller");
    requireStakeUnit(params.amount);
    const withdrawalAddress = requireAddress(
      params.withdrawalAddress ?? caller,
      "withdrawalAddress",
    );
    const state = assertTransition("none", "create");

    const id = this._nextId++;
    const ref = depositStream(id);
    const record: DepositRecord = {
      id,
      state,
      owner,
      withdrawalAddress,
      withdrawalCredentials: encodeWithdrawalCredentials(withdrawalAddress, this._credentialType),
      amount: params.amount,
      createdAt: this._now(),
    };

    runLocalTransition(
      "create",
      ref,
      (c) => {
        const movement = this._custody.reserve(record.amount, ref);
        c.add("custody", () => this._custody.revert(movement));
        this._handles.issue(id, owner);
        c.add("handle", () => this._handles.burn(id));
        this._records.set(id, record);
      },
      this._onCompensate,
    );

    this._journal.record({
      streamId: ref,
      type: "deposit.created",
      actor: owner,
      source: "registry",
      expectedVersion: "no_stream",
      payload: {
        id,
        owner,
        withdrawalAddress,
        withdrawalCredentials: record.withdrawalCredentials,
        amount: record.amount.toString(),
      },
    });
    return record;
  }

  /**
   * Operator attaches the validator key and deposit signature.
   */
  assign(caller: string, id: number, params: AssignParams): DepositRecord {
    const { record, next } = this._requireFor(id, "assign");
    this._operators.assertOperator(caller, "assign deposits");

    const pubkey = requireBytes(params.pubkey, PUBKEY_LENGTH, "pubkey");
    const signature = requireBytes(params.signature, SIGNATURE_LENGTH, "signature");
    this._assertPubkeyUnused(pubkey, id);

    const updated: DepositRecord = {
      ...record,
      state: next,
      pubkey,
      signature,
      assignedOperator: requireAddress(caller, "caller"),
      assignedAt: this._now(),
    };
    this._records.set(id, updated);

    this._journal.record({
      streamId: depositStream(id),
      type: "deposit.assigned",
      actor: caller,
      source: "registry",
      payload: { id, pubkey, operator: updated.assignedOperator },
    });
    return updated;
  }

  /**
   * Withdrawal holder or handle owner approves the operator's credentials
   * by supplying the deposit data root they expect.
   *
   * @throws AuthenticityError when the recomputed root differs
   */
  confirm(caller: string, id: number, depositDataRoot: string): DepositRecord {
    const { record, next } = this._requireFor(id, "confirm");
    this._assertHolderOrOwner(caller, record, "confirm");

    const supplied = requireBytes(depositDataRoot, ROOT_LENGTH, "depositDataRoot");
    const computed = computeDepositDataRoot(depositDataOf(record));
    if (computed !== supplied) {
      throw new AuthenticityError(computed, supplied);
    }

    const updated: DepositRecord = {
      ...record,
      state: next,
      committedRoot: computed,
      confirmedAt: this._now(),
    };
    this._records.set(id, updated);

    this._journal.record({
      streamId: depositStream(id),
      type: "deposit.confirmed",
      actor: caller,
      source: "registry",
      payload: { id, depositDataRoot: computed },
    });
    return updated;
  }

  /**
   * Operator sends the stake unit to the deposit contract. Irrevocable.
   */
  async finalize(caller: string, id: number): Promise<DepositRecord> {
    const { record, next } = this._requireFor(id, "finalize");
    this._operators.assertOperator(caller, "finalize deposits");

    const data = depositDataOf(record);
    const depositDataRoot = record.committedRoot;
    if (depositDataRoot === undefined) {
      throw new StateViolation(["confirmed"], record.state, `Deposit ${String(id)} has no committed root`);
    }
    const ref = depositStream(id);

    const { finalized, validatorId } = await runTransition(
      "finalize",
      ref,
      async (c) => {
        const now = this._clock();
        const validator = this._validators.register(
          {
            pubkey: data.pubkey,
            withdrawalCredentials: data.withdrawalCredentials,
            source: "registry",
            sourceId: id,
          },
          now,
        );
        c.add("validator", () => this._validators.remove(validator.id));

        const updated: DepositRecord = {
          ...record,
          state: next,
          finalizedAt: now.toISOString(),
          validatorId: validator.id,
        };
        this._records.set(id, updated);
        c.add("state", () => this._records.set(id, record));

        const movement = this._custody.release(record.amount, ref);
        c.add("custody", () => this._custody.revert(movement));

        await callPort("deposit-sink", `Deposit contract call for ${ref}`, () =>
          this._sink.deposit({
            pubkey: data.pubkey,
            withdrawalCredentials: data.withdrawalCredentials,
            signature: data.signature,
            depositDataRoot,
            amount: record.amount,
          }),
        );
        return { finalized: updated, validatorId: validator.id };
      },
      this._onCompensate,
    );

    this._journal.record({
      streamId: ref,
      type: "deposit.finalized",
      actor: caller,
      source: "registry",
      payload: { id, validatorId, depositDataRoot },
    });
    return finalized;
  }

  /**
   * Refund the stake unit to the depositor and delete the record.
   *
   * @throws StateViolation for finalized or unknown records
   * @throws CooldownActive for a confirmed record inside the cooldown
   */
  async cancel(caller: string, id: number): Promise<DepositRecord> {
    const { record, next } = this._requireFor(id, "cancel");
    this._assertHolderOrOwner(caller, record, "cancel");
    this._cancellation.assertCancellable(record, this._clock());

    const ref = depositStream(id);
    await runTransition(
      "cancel",
      ref,
      async (c) => {
        this._records.delete(id);
        c.add("record", () => this._records.set(id, record));

        const handle = this._handles.burn(id);
        c.add("handle", () => this._handles.restore(handle));

        const movement = this._custody.refund(record.amount, ref);
        c.add("custody", () => this._custody.revert(movement));

        await callPort("value-transfer", `Refund for ${ref}`, () =>
          this._transfer.send(record.owner, record.amount),
        );
      },
      this._onCompensate,
    );

    this._journal.record({
      streamId: ref,
      type: "deposit.cancelled",
      actor: caller,
      source: "registry",
      payload: { id, refundedTo: record.owner, amount: record.amount.toString() },
    });
    return { ...record, state: next };
  }

  /**
   * Hand a finalized record's claim to another address.
   */
  transferHandle(caller: string, id: number, to: string): Handle {
    const from = this._handles.get(id).owner;
    const handle = this._handles.transfer(caller, id, to);

    this._journal.record({
      streamId: depositStream(id),
      type: "handle.transferred",
      actor: caller,
      source: "handles",
      payload: { id, from, to: handle.owner },
    });
    return handle;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getRecord(id: number): DepositRecord {
    const record = this._records.get(id);
    if (record === undefined) {
      throw new NotFoundError("RECORD_NOT_FOUND", `Deposit ${String(id)} does not exist`);
    }
    return record;
  }

  findRecord(id: number): DepositRecord | undefined {
    return this._records.get(id);
  }

  /** "none" for ids never issued and for cancelled (deleted) records. */
  getState(id: number): DepositState {
    return this._records.get(id)?.state ?? "none";
  }

  listRecords(state?: StoredDepositState): readonly DepositRecord[] {
    const all = [...this._records.values()];
    return state === undefined ? all : all.filter((r) => r.state === state);
  }

  cancellationDecision(id: number): CancellationDecision {
    return this._cancellation.evaluate(this._records.get(id), this._clock());
  }

  /** True while an open or finalized record, a validator or another holder uses this pubkey. */
  isPubkeyInUse(pubkey: Hex, exceptId?: number): boolean {
    for (const record of this._records.values()) {
      if (record.id !== exceptId && record.pubkey === pubkey) return true;
    }
    return this._validators.hasPubkey(pubkey) || this._pubkeyChecks.some((check) => check(pubkey));
  }

  /** Register another source of assigned pubkeys, such as the vault. */
  addPubkeyCheck(check: (pubkey: Hex) => boolean): void {
    this._pubkeyChecks.push(check);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): DepositRegistrySnapshot {
    return {
      version: 1,
      nextId: this._nextId,
      records: [...this._records.values()].map(serializeRecord),
      handles: this._handles.all().map((h) => ({ id: h.id, owner: h.owner, locked: h.locked })),
    };
  }

  /**
   * Load a snapshot into an empty registry.
   */
  restore(snapshot: DepositRegistrySnapshot): void {
    if (this._records.size > 0 || this._nextId !== 1) {
      throw new ValidationError("VALIDATION_FAILED", "Can only restore into an empty registry");
    }
    for (const serialized of snapshot.records) {
      const record: DepositRecord = { ...serialized, amount: parseWei(serialized.amount) };
      if (record.amount !== STAKE_UNIT_WEI) {
        throw new ValidationError(
          "INVALID_AMOUNT",
          `Snapshot record ${String(record.id)} holds ${serialized.amount} wei`,
          "amount",
        );
      }
      if (record.id >= snapshot.nextId) {
        throw new ValidationError(
          "VALIDATION_FAILED",
          `Snapshot record ${String(record.id)} is not below nextId ${String(snapshot.nextId)}`,
        );
      }
      this._records.set(record.id, record);
    }
    for (const handle of snapshot.handles) {
      this._handles.restore(handle);
    }
    this._nextId = snapshot.nextId;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private _requireFor(
    id: number,
    action: DepositAction,
  ): { record: DepositRecord; next: StoredDepositState } {
    const record = this._records.get(id);
    const next = assertTransition(record?.state ?? "none", action);
    if (record === undefined) {
      // only "create" starts from none, and create takes no id
      throw new StateViolation(["none"], "none");
    }
    return { record, next };
  }

  private _assertHolderOrOwner(caller: string, record: DepositRecord, action: string): void {
    const address = normalizeAddress(caller);
    if (address === record.withdrawalAddress || this._handles.isOwner(record.id, caller)) {
      return;
    }
    throw new AuthorizationError(
      caller,
      `Only the withdrawal address or the handle owner can ${action} deposit ${String(record.id)}`,
    );
  }

  private _assertPubkeyUnused(pubkey: Hex, id: number): void {
    if (this.isPubkeyInUse(pubkey, id)) {
      throw new ValidationError(
        "VALIDATION_FAILED",
        `Pubkey ${pubkey} is already in use by another deposit`,
        "pubkey",
      );
    }
  }

  private _now(): string {
    return this._clock().toISOString();
  }
}

// =============================================================================
// Helpers
// =============================================================================

interface RecordDepositData extends DepositData {
  readonly pubkey: Hex;
  readonly withdrawalCredentials: Hex;
  readonly signature: Hex;
}

function depositDataOf(record: DepositRecord): RecordDepositData {
  if (record.pubkey === undefined || record.signature === undefined) {
    throw new StateViolation(
      ["assigned", "confirmed"],
      record.state,
      `Deposit ${String(record.id)} has no validator credentials`,
    );
  }
  return {
    pubkey: record.pubkey,
    withdrawalCredentials: record.withdrawalCredentials,
    signature: record.signature,
    amountGwei: weiToGwei(record.amount).gwei,
  };
}

function serializeRecord(record: DepositRecord): SerializedDepositRecord {
  return { ...record, amount: record.amount.toString() };
}
