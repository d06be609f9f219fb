/**
 * Exit Tracker: the async vault.
 *
 * Two directions over integer request ids:
 *
 * Deposit:  requestDeposit → assignDeposit → processValidatorDeposit → claimDeposit
 *           (cancelDeposit while pending, or once processing has outlasted
 *           the cancellation cooldown counted from assignment)
 * Redeem:   requestRedeem → acknowledgeRedeem → processRedeem → claimRedeem
 *           (cancelRedeem while pending; processRedeem may skip acknowledge)
 *
 * Vault deposits create validators whose withdrawal credentials point at
 * the vault and mint shares (1 share = 1 wei of claim) to the controller.
 * A redeem request references one validator whose withdrawal credentials
 * point at the vault: vault validators are redeemed against a stake unit
 * of locked shares, registry validators by the owner of the record's
 * handle, which stays locked until the request resolves. A validator has
 * at most one open redeem request.
 */

import { computeDepositDataRoot, encodeWithdrawalCredentials } from "@stakegate/credentials";
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
  Address,
  Hex,
  VaultRequestKind,
  Wei,
  WithdrawalCredentialType,
} from "@stakegate/types";
import { CancellationPolicy } from "./cancellation-policy.js";
import { callPort, runLocalTransition, runTransition } from "./compensation.js";
import type { CompensationListener } from "./compensation.js";
import type { DepositRegistry } from "./deposit-registry.js";
import {
  AlreadyClaimed,
  AuthenticityError,
  AuthorizationError,
  NotFoundError,
  StateViolation,
  ValidationError,
} from "./errors.js";
import { requireAddress, requireBytes, requireStakeUnit } from "./inputs.js";
import { LifecycleJournal, vaultStream } from "./journal.js";
import type { OperatorPolicy } from "./operator-policy.js";
import { systemClock } from "./ports.js";
import type { Clock, DepositSink, ValueTransfer } from "./ports.js";
import { assertVaultTransition } from "./state-machine.js";
import type {
  AssignParams,
  ExitRequest,
  ListRequestsFilter,
  RequestDepositParams,
  RequestRedeemParams,
} from "./types.js";
import type { Validator, ValidatorSet } from "./validator-set.js";

export interface ExitTrackerOptions {
  readonly registry: DepositRegistry;
  readonly custody: CustodyLedger;
  readonly operators: OperatorPolicy;
  readonly validators: ValidatorSet;
  readonly sink: DepositSink;
  readonly transfer: ValueTransfer;
  /** Withdrawal address of every vault-created validator */
  readonly vaultAddress: string;
  readonly events?: EventStore | undefined;
  readonly clock?: Clock | undefined;
  readonly credentialType?: WithdrawalCredentialType | undefined;
  /** Cooldown for cancelling a processing deposit request */
  readonly cancellation?: CancellationPolicy | undefined;
  readonly onCompensate?: CompensationListener | undefined;
}

export class ExitTracker {
  private readonly _requests = new Map<number, ExitRequest>();
  private readonly _shares = new Map<Address, Wei>();
  private readonly _locked = new Map<Address, Wei>();
  /** validatorId → open redeem request id */
  private readonly _openRedeems = new Map<number, number>();
  private readonly _registry: DepositRegistry;
  private readonly _custody: CustodyLedger;
  private readonly _operators: OperatorPolicy;
  private readonly _validators: ValidatorSet;
  private readonly _sink: DepositSink;
  private readonly _transfer: ValueTransfer;
  private readonly _cancellation: CancellationPolicy;
  private readonly _withdrawalCredentials: Hex;
  private readonly _journal: LifecycleJournal;
  private readonly _clock: Clock;
  private readonly _onCompensate: CompensationListener | undefined;
  private _nextId = 1;

  constructor(options: ExitTrackerOptions) {
    this._registry = options.registry;
    this._custody = options.custody;
    this._operators = options.operators;
    this._validators = options.validators;
    this._sink = options.sink;
    this._transfer = options.transfer;
    this._cancellation = options.cancellation ?? new CancellationPolicy();
    this._withdrawalCredentials = encodeWithdrawalCredentials(
      requireAddress(options.vaultAddress, "vaultAddress"),
      options.credentialType ?? 0x01,
    );
    this._clock = options.clock ?? systemClock;
    this._journal = new LifecycleJournal(options.events, this._clock);
    this._onCompensate = options.onCompensate;
    this._registry.addPubkeyCheck((pubkey) => this._holdsPubkey(pubkey));
  }

  /** Credentials every vault validator is created with. */
  get withdrawalCredentials(): Hex {
    return this._withdrawalCredentials;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deposit direction
  // ───────────────────────────────────────────────────────────────────────

  requestDeposit(caller: string, params: RequestDepositParams): ExitRequest {
    const owner = requireAddress(caller, "caller");
    requireStakeUnit(params.amount);
    const controller = requireAddress(params.controller ?? caller, "controller");

    const id = this._nextId++;
    const ref = vaultStream(id);
    const now = this._now();
    const request: ExitRequest = {
      id,
      kind: "deposit",
      state: "pending",
      amount: params.amount,
      owner,
      controller,
      createdAt: now,
      updatedAt: now,
    };

    runLocalTransition(
      "requestDeposit",
      ref,
      (c) => {
        const movement = this._custody.reserve(request.amount, ref);
        c.add("custody", () => this._custody.revert(movement));
        this._requests.set(id, request);
      },
      this._onCompensate,
    );

    this._record(request, "vault.deposit.requested", owner, {
      owner,
      controller,
      amount: request.amount.toString(),
    });
    return request;
  }

  assignDeposit(caller: string, id: number, params: AssignParams): ExitRequest {
    const request = this._require(id, "deposit");
    assertVaultTransition(request.state, "processing");
    this._operators.assertOperator(caller, "assign vault deposits");

    const pubkey = requireBytes(params.pubkey, PUBKEY_LENGTH, "pubkey");
    const signature = requireBytes(params.signature, SIGNATURE_LENGTH, "signature");
    if (this._registry.isPubkeyInUse(pubkey)) {
      throw new ValidationError(
        "VALIDATION_FAILED",
        `Pubkey ${pubkey} is already in use by another deposit`,
        "pubkey",
      );
    }

    const now = this._now();
    const updated = this._put({
      ...request,
      state: "processing",
      pubkey,
      signature,
      assignedAt: now,
      updatedAt: now,
    });
    this._record(updated, "vault.deposit.assigned", caller, { pubkey });
    return updated;
  }

  /**
   * Re-verify the deposit data root, then fund the validator.
   *
   * @throws AuthenticityError when the supplied root differs; the request
   *   stays in "processing"
   */
  async processValidatorDeposit(
    caller: string,
    id: number,
    params: { readonly depositDataRoot: string },
  ): Promise<ExitRequest> {
    const request = this._require(id, "deposit");
    assertVaultTransition(request.state, "claimable");
    this._operators.assertOperator(caller, "process vault deposits");

    const { pubkey, signature } = request;
    if (pubkey === undefined || signature === undefined) {
      throw new StateViolation(["processing"], request.state, `Request ${String(id)} has no validator credentials`);
    }
    const supplied = requireBytes(params.depositDataRoot, ROOT_LENGTH, "depositDataRoot");
    const computed = computeDepositDataRoot({
      pubkey,
      withdrawalCredentials: this._withdrawalCredentials,
      signature,
      amountGwei: weiToGwei(request.amount).gwei,
    });
    if (computed !== supplied) {
      throw new AuthenticityError(computed, supplied);
    }

    const ref = vaultStream(id);
    const updated = await runTransition(
      "processValidatorDeposit",
      ref,
      async (c) => {
        const now = this._clock();
        const validator = this._validators.register(
          {
            pubkey,
            withdrawalCredentials: this._withdrawalCredentials,
            source: "vault",
            sourceId: id,
          },
          now,
        );
        c.add("validator", () => this._validators.remove(validator.id));

        const next = this._put({
          ...request,
          state: "claimable",
          validatorId: validator.id,
          depositDataRoot: computed,
          updatedAt: now.toISOString(),
        });
        c.add("state", () => this._put(request));

        const movement = this._custody.release(request.amount, ref);
        c.add("custody", () => this._custody.revert(movement));

        await callPort("deposit-sink", `Deposit contract call for ${ref}`, () =>
          this._sink.deposit({
            pubkey,
            withdrawalCredentials: this._withdrawalCredentials,
            signature,
            depositDataRoot: computed,
            amount: request.amount,
          }),
        );
        return next;
      },
      this._onCompensate,
    );

    this._record(updated, "vault.deposit.processed", caller, {
      validatorId: linkedValidator(updated),
      depositDataRoot: computed,
    });
    return updated;
  }

  /**
   * Mint shares for a processed deposit to its controller.
   */
  claimDeposit(caller: string, id: number): ExitRequest {
    const request = this._require(id, "deposit");
    if (request.state === "claimed") {
      throw new AlreadyClaimed(id);
    }
    assertVaultTransition(request.state, "claimed");
    if (normalizeAddress(caller) !== request.controller) {
      throw new AuthorizationError(
        caller,
        `Only the controller ${request.controller} can claim request ${String(id)}`,
      );
    }

    this._shares.set(request.controller, this.sharesOf(request.controller) + request.amount);
    const updated = this._put({ ...request, state: "claimed", updatedAt: this._now() });

    this._record(updated, "vault.deposit.claimed", caller, {
      controller: request.controller,
      shares: request.amount.toString(),
    });
    return updated;
  }

  /**
   * Refund the owner. A processing request waits out the cancellation
   * cooldown from its assignment.
   *
   * @throws CooldownActive while a processing request is inside the cooldown
   */
  async cancelDeposit(caller: string, id: number): Promise<ExitRequest> {
    const request = this._require(id, "deposit");
    assertVaultTransition(request.state, "cancelled");
    this._assertOwnerOrController(caller, request, "cancel");
    if (request.state === "processing") {
      this._cancellation.assertCooldownElapsed(request.assignedAt, this._clock());
    }

    const ref = vaultStream(id);
    const updated = await runTransition(
      "cancelDeposit",
      ref,
      async (c) => {
        const next = this._put({ ...request, state: "cancelled", updatedAt: this._now() });
        c.add("state", () => this._put(request));

        const movement = this._custody.refund(request.amount, ref);
        c.add("custody", () => this._custody.revert(movement));

        await callPort("value-transfer", `Refund for ${ref}`, () =>
          this._transfer.send(request.owner, request.amount),
        );
        return next;
      },
      this._onCompensate,
    );

    this._record(updated, "vault.deposit.cancelled", caller, {
      refundedTo: request.owner,
      amount: request.amount.toString(),
    });
    return updated;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Redemption direction
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Open a redeem request against an active validator. The caller is
   * the owner and receives the payout.
   */
  requestRedeem(caller: string, params: RequestRedeemParams): ExitRequest {
    const owner = requireAddress(caller, "caller");
    if (params.owner !== undefined && requireAddress(params.owner, "owner") !== owner) {
      throw new AuthorizationError(caller, `${caller} cannot redeem on behalf of ${params.owner}`);
    }
    const controller = requireAddress(params.controller ?? caller, "controller");

    const target = this._validators.get(params.validatorId);
    if (target.status !== "active") {
      throw new StateViolation(["active"], target.status, `Validator ${String(target.id)} is ${target.status}`);
    }
    const open = this._openRedeems.get(target.id);
    if (open !== undefined) {
      throw new StateViolation(
        ["active"],
        target.status,
        `Validator ${String(target.id)} already has open redeem request ${String(open)}`,
      );
    }

    if (target.withdrawalCredentials !== this._withdrawalCredentials) {
      throw new ValidationError(
        "VALIDATION_FAILED",
        `Validator ${String(target.id)} does not withdraw to the vault`,
        "validatorId",
      );
    }

    const amount = STAKE_UNIT_WEI;
    this._assertCanRedeem(caller, owner, target, amount);

    const id = this._nextId++;
    const now = this._now();
    const request: ExitRequest = {
      id,
      kind: "redeem",
      state: "pending",
      amount,
      owner,
      controller,
      validatorId: target.id,
      pubkey: target.pubkey,
      createdAt: now,
      updatedAt: now,
    };

    runLocalTransition(
      "requestRedeem",
      vaultStream(id),
      (c) => {
        this._lockClaim(target, owner, amount);
        c.add("lock", () => this._unlockClaim(target, owner, amount));
        this._openRedeems.set(target.id, id);
        this._requests.set(id, request);
      },
      this._onCompensate,
    );

    this._record(request, "vault.redeem.requested", owner, {
      validatorId: target.id,
      owner,
      controller,
      amount: amount.toString(),
    });
    return request;
  }

  /**
   * Keeper has broadcast the exit; the request can no longer be cancelled.
   */
  acknowledgeRedeem(caller: string, id: number): ExitRequest {
    const request = this._require(id, "redeem");
    assertVaultTransition(request.state, "processing");
    this._operators.assertOperator(caller, "acknowledge redeem requests");
    const target = this._validators.get(linkedValidator(request));

    const updated = runLocalTransition(
      "acknowledgeRedeem",
      vaultStream(id),
      (c) => {
        this._validators.markExiting(target.id);
        c.add("validator", () => this._validators.restore(target));
        return this._put({ ...request, state: "processing", updatedAt: this._now() });
      },
      this._onCompensate,
    );

    this._record(updated, "vault.redeem.acknowledged", caller, { validatorId: target.id });
    return updated;
  }

  /**
   * The validator has exited at `exitEpoch` and its stake is back in custody.
   */
  processRedeem(caller: string, id: number, exitEpoch: number): ExitRequest {
    const request = this._require(id, "redeem");
    if (request.state === "pending") {
      assertVaultTransition("pending", "processing");
      assertVaultTransition("processing", "claimable");
    } else {
      assertVaultTransition(request.state, "claimable");
    }
    this._operators.assertOperator(caller, "process redeem requests");
    if (!Number.isSafeInteger(exitEpoch) || exitEpoch < 0) {
      throw new ValidationError(
        "VALIDATION_FAILED",
        `exitEpoch must be a non-negative integer, got ${String(exitEpoch)}`,
        "exitEpoch",
      );
    }
    const target = this._validators.get(linkedValidator(request));
    const ref = vaultStream(id);

    const updated = runLocalTransition(
      "processRedeem",
      ref,
      (c) => {
        const now = this._clock();
        this._validators.markExited(target.id, exitEpoch, now);
        c.add("validator", () => this._validators.restore(target));

        const movement = this._custody.recordExit(request.amount, ref);
        c.add("custody", () => this._custody.revert(movement));

        return this._put({
          ...request,
          state: "claimable",
          exitEpoch,
          updatedAt: now.toISOString(),
        });
      },
      this._onCompensate,
    );

    this._record(updated, "vault.redeem.processed", caller, {
      validatorId: target.id,
      exitEpoch,
    });
    return updated;
  }

  /**
   * Pay the stake unit to the original owner, once.
   *
   * @throws AlreadyClaimed on a second call
   */
  async claimRedeem(caller: string, id: number): Promise<ExitRequest> {
    const request = this._require(id, "redeem");
    if (request.state === "claimed") {
      throw new AlreadyClaimed(id);
    }
    assertVaultTransition(request.state, "claimed");
    this._assertOwnerOrController(caller, request, "claim");
    const target = this._validators.get(linkedValidator(request));

    const ref = vaultStream(id);
    const updated = await runTransition(
      "claimRedeem",
      ref,
      async (c) => {
        const next = this._put({ ...request, state: "claimed", updatedAt: this._now() });
        c.add("state", () => this._put(request));

        this._openRedeems.delete(target.id);
        c.add("open", () => this._openRedeems.set(target.id, id));

        this._spendClaim(target, request.owner, request.amount, c.add.bind(c));

        const movement = this._custody.payout(request.amount, ref);
        c.add("custody", () => this._custody.revert(movement));

        await callPort("value-transfer", `Payout for ${ref}`, () =>
          this._transfer.send(request.owner, request.amount),
        );
        return next;
      },
      this._onCompensate,
    );

    this._record(updated, "vault.redeem.claimed", caller, {
      paidTo: request.owner,
      amount: request.amount.toString(),
    });
    return updated;
  }

  cancelRedeem(caller: string, id: number): ExitRequest {
    const request = this._require(id, "redeem");
    if (request.state !== "pending") {
      throw new StateViolation(
        ["pending"],
        request.state,
        `Cannot cancel a redeem request in state "${request.state}"; requires "pending"`,
      );
    }
    this._assertOwnerOrController(caller, request, "cancel");
    const target = this._validators.get(linkedValidator(request));

    this._unlockClaim(target, request.owner, request.amount);
    this._openRedeems.delete(target.id);
    const updated = this._put({ ...request, state: "cancelled", updatedAt: this._now() });

    this._record(updated, "vault.redeem.cancelled", caller, { validatorId: target.id });
    return updated;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getRequest(id: number): ExitRequest {
    const request = this._requests.get(id);
    if (request === undefined) {
      throw new NotFoundError("REQUEST_NOT_FOUND", `Request ${String(id)} does not exist`);
    }
    return request;
  }

  findRequest(id: number): ExitRequest | undefined {
    return this._requests.get(id);
  }

  listRequests(filter?: ListRequestsFilter): readonly ExitRequest[] {
    return [...this._requests.values()].filter(
      (r) =>
        (filter?.kind === undefined || r.kind === filter.kind) &&
        (filter?.state === undefined || r.state === filter.state),
    );
  }

  sharesOf(address: string): Wei {
    const normalized = normalizeAddress(address);
    return normalized === undefined ? 0n : (this._shares.get(normalized) ?? 0n);
  }

  lockedShares(address: string): Wei {
    const normalized = normalizeAddress(address);
    return normalized === undefined ? 0n : (this._locked.get(normalized) ?? 0n);
  }

  totalShares(): Wei {
    let total = 0n;
    for (const balance of this._shares.values()) total += balance;
    return total;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private _require(id: number, kind: VaultRequestKind): ExitRequest {
    const request = this.getRequest(id);
    if (request.kind !== kind) {
      throw new NotFoundError("REQUEST_NOT_FOUND", `Request ${String(id)} is not a ${kind} request`);
    }
    return request;
  }

  private _put(request: ExitRequest): ExitRequest {
    this._requests.set(request.id, request);
    return request;
  }

  private _assertOwnerOrController(caller: string, request: ExitRequest, action: string): void {
    const address = normalizeAddress(caller);
    if (address !== request.owner && address !== request.controller) {
      throw new AuthorizationError(
        caller,
        `Only the owner or controller can ${action} request ${String(request.id)}`,
      );
    }
  }

  private _assertCanRedeem(caller: string, owner: Address, target: Validator, amount: Wei): void {
    if (target.source === "vault") {
      const available = this.sharesOf(owner) - this.lockedShares(owner);
      if (available < amount) {
        throw new ValidationError(
          "INVALID_AMOUNT",
          `Redeeming validator ${String(target.id)} needs ${amount.toString()} unlocked shares; ${owner} has ${available.toString()}`,
          "shares",
        );
      }
      return;
    }
    if (!this._registry.handles.isOwner(target.sourceId, caller)) {
      throw new AuthorizationError(
        caller,
        `Only the handle owner of deposit ${String(target.sourceId)} can redeem validator ${String(target.id)}`,
      );
    }
  }

  private _lockClaim(target: Validator, owner: Address, amount: Wei): void {
    if (target.source === "vault") {
      this._locked.set(owner, this.lockedShares(owner) + amount);
    } else {
      this._registry.handles.lock(target.sourceId);
    }
  }

  private _unlockClaim(target: Validator, owner: Address, amount: Wei): void {
    if (target.source === "vault") {
      this._locked.set(owner, this.lockedShares(owner) - amount);
    } else {
      this._registry.handles.unlock(target.sourceId);
    }
  }

  /** Burn locked shares or the record's handle, registering the undo. */
  private _spendClaim(
    target: Validator,
    owner: Address,
    amount: Wei,
    undo: (label: string, fn: () => void) => void,
  ): void {
    if (target.source === "vault") {
      this._shares.set(owner, this.sharesOf(owner) - amount);
      this._locked.set(owner, this.lockedShares(owner) - amount);
      // relative, so mints and locks made while a payout is in flight survive
      undo("shares", () => {
        this._shares.set(owner, this.sharesOf(owner) + amount);
        this._locked.set(owner, this.lockedShares(owner) + amount);
      });
    } else {
      const handle = this._registry.handles.burn(target.sourceId);
      undo("handle", () => this._registry.handles.restore(handle));
    }
  }

  /** Deposit requests between assign and cancel hold their pubkey. */
  private _holdsPubkey(pubkey: Hex): boolean {
    for (const request of this._requests.values()) {
      if (request.kind === "deposit" && request.state !== "cancelled" && request.pubkey === pubkey) {
        return true;
      }
    }
    return false;
  }

  private _record(
    request: ExitRequest,
    type: string,
    actor: string,
    payload: Record<string, unknown>,
  ): void {
    this._journal.record({
      streamId: vaultStream(request.id),
      type,
      actor,
      source: "vault",
      ...(type.endsWith(".requested") ? { expectedVersion: "no_stream" as const } : {}),
      payload: { id: request.id, kind: request.kind, state: request.state, ...payload },
    });
  }

  private _now(): string {
    return this._clock().toISOString();
  }
}

// =============================================================================
// Helpers
// =============================================================================

function linkedValidator(request: ExitRequest): number {
  if (request.validatorId === undefined) {
    throw new StateViolation(
      ["claimable"],
      request.state,
      `Request ${String(request.id)} has no linked validator`,
    );
  }
  return request.validatorId;
}

