/**
 * StakeService: Composition root for the lifecycle packages.
 *
 * Route handlers delegate to this service; they never build domain
 * components themselves. One instance owns one registry, one vault, one
 * custody ledger and one journal.
 *
 * The ports are in-memory: value arriving with a paid call (create,
 * requestDeposit) and stake swept back from an exited validator are
 * credited to the value-transfer balance so the custody ledger always
 * reconciles against it.
 */

import type { Logger } from "pino";
import { CustodyError, CustodyLedger } from "@stakegate/custody";
import type { CustodyBalances, ReconciliationResult } from "@stakegate/custody";
import { InMemoryEventStore } from "@stakegate/event-store";
import type {
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "@stakegate/event-store";
import {
  CancellationPolicy,
  DepositRegistry,
  ExitTracker,
  InMemoryValueTransfer,
  LifecycleJournal,
  OPERATORS_STREAM,
  OperatorPolicy,
  RecordingDepositSink,
  ValidatorSet,
  systemClock,
} from "@stakegate/lifecycle";
import type {
  AssignParams,
  CancellationDecision,
  Clock,
  CompensationEvent,
  CreateDepositParams,
  DepositRecord,
  ExitRequest,
  Handle,
  ListRequestsFilter,
  RequestDepositParams,
  RequestRedeemParams,
  StoredDepositState,
  Validator,
} from "@stakegate/lifecycle";
import type { Address, Wei, WithdrawalCredentialType } from "@stakegate/types";

// =============================================================================
// Configuration
// =============================================================================

export interface StakeServiceConfig {
  /** Sole address allowed to change the operator set */
  readonly ownerAddress: string;
  readonly operators?: readonly string[] | undefined;
  /** Withdrawal address of vault-created validators. Default: ownerAddress */
  readonly vaultAddress?: string | undefined;
  readonly cancelCooldownSeconds?: number | undefined;
  readonly credentialType?: WithdrawalCredentialType | undefined;
  readonly clock?: Clock | undefined;
  readonly logger?: Logger | undefined;
}

export interface CustodyReport {
  readonly balances: CustodyBalances;
  readonly held: Wei;
  readonly conserved: boolean;
  readonly reconciliation: ReconciliationResult;
}

export interface SharesReport {
  readonly address: Address;
  readonly shares: Wei;
  readonly locked: Wei;
}

// =============================================================================
// Service
// =============================================================================

export class StakeService {
  readonly events: InMemoryEventStore;
  readonly custody: CustodyLedger;
  readonly operators: OperatorPolicy;
  readonly validators: ValidatorSet;
  readonly transfer: InMemoryValueTransfer;
  readonly sink: RecordingDepositSink;
  readonly registry: DepositRegistry;
  readonly vault: ExitTracker;

  private readonly _journal: LifecycleJournal;
  private readonly _logger: Logger | undefined;
  private _ready = false;

  constructor(config: StakeServiceConfig) {
    const clock = config.clock ?? systemClock;
    this._logger = config.logger;

    this.events = new InMemoryEventStore({ clock });
    this.custody = new CustodyLedger({ clock });
    this.operators = new OperatorPolicy(config.ownerAddress, config.operators ?? []);
    this.validators = new ValidatorSet();
    this.transfer = new InMemoryValueTransfer();
    this.sink = new RecordingDepositSink(this.transfer);
    this._journal = new LifecycleJournal(this.events, clock);

    const onCompensate = (event: CompensationEvent): void => {
      this._logger?.warn(
        {
          transition: event.transition,
          ref: event.ref,
          undone: event.undone,
          err: event.error instanceof Error ? event.error.message : String(event.error),
        },
        "Transition compensated",
      );
    };

    const cancellation = new CancellationPolicy(
      config.cancelCooldownSeconds !== undefined
        ? { cooldownSeconds: config.cancelCooldownSeconds }
        : {},
    );
    this.registry = new DepositRegistry({
      custody: this.custody,
      operators: this.operators,
      validators: this.validators,
      sink: this.sink,
      transfer: this.transfer,
      cancellation,
      events: this.events,
      clock,
      credentialType: config.credentialType,
      onCompensate,
    });
    this.vault = new ExitTracker({
      registry: this.registry,
      custody: this.custody,
      operators: this.operators,
      validators: this.validators,
      sink: this.sink,
      transfer: this.transfer,
      vaultAddress: config.vaultAddress ?? config.ownerAddress,
      cancellation,
      events: this.events,
      clock,
      credentialType: config.credentialType,
      onCompensate,
    });

    this.events.subscribeAll((stored) => {
      const { event } = stored;
      this._logger?.info(
        {
          ref: stored.streamId,
          id: event.payload["id"],
          actor: event.metadata.actor,
          event: event.type,
        },
        "Transition applied",
      );
    });

    this._ready = this.events.verifyIntegrity().valid;
  }

  // ─── Deposit registry ────────────────────────────────────────────

  createDeposit(caller: string, params: CreateDepositParams): DepositRecord {
    const record = this.registry.create(caller, params);
    this.transfer.credit(record.amount);
    return record;
  }

  assignDeposit(caller: string, id: number, params: AssignParams): DepositRecord {
    return this.registry.assign(caller, id, params);
  }

  confirmDeposit(caller: string, id: number, depositDataRoot: string): DepositRecord {
    return this.registry.confirm(caller, id, depositDataRoot);
  }

  finalizeDeposit(caller: string, id: number): Promise<DepositRecord> {
    return this.registry.finalize(caller, id);
  }

  cancelDeposit(caller: string, id: number): Promise<DepositRecord> {
    return this.registry.cancel(caller, id);
  }

  cancellationDecision(id: number): CancellationDecision {
    return this.registry.cancellationDecision(id);
  }

  transferHandle(caller: string, id: number, to: string): Handle {
    return this.registry.transferHandle(caller, id, to);
  }

  getDeposit(id: number): DepositRecord {
    return this.registry.getRecord(id);
  }

  listDeposits(state?: StoredDepositState): readonly DepositRecord[] {
    return this.registry.listRecords(state);
  }

  getValidator(id: number): Validator {
    return this.validators.get(id);
  }

  // ─── Operators ───────────────────────────────────────────────────

  listOperators(): { readonly owner: Address; readonly operators: readonly Address[] } {
    return { owner: this.operators.owner, operators: this.operators.listOperators() };
  }

  /**
   * @returns true when the set changed; only changes are journaled
   */
  setOperator(caller: string, operator: string, enabled: boolean): boolean {
    const changed = this.operators.setOperator(caller, operator, enabled);
    if (changed) {
      this._journal.record({
        streamId: OPERATORS_STREAM,
        type: "operator.updated",
        actor: caller,
        source: "operators",
        payload: { operator: operator.toLowerCase(), enabled },
      });
    }
    return changed;
  }

  // ─── Vault ───────────────────────────────────────────────────────

  requestVaultDeposit(caller: string, params: RequestDepositParams): ExitRequest {
    const request = this.vault.requestDeposit(caller, params);
    this.transfer.credit(request.amount);
    return request;
  }

  assignVaultDeposit(caller: string, id: number, params: AssignParams): ExitRequest {
    return this.vault.assignDeposit(caller, id, params);
  }

  processVaultDeposit(caller: string, id: number, depositDataRoot: string): Promise<ExitRequest> {
    return this.vault.processValidatorDeposit(caller, id, { depositDataRoot });
  }

  claimVaultDeposit(caller: string, id: number): ExitRequest {
    return this.vault.claimDeposit(caller, id);
  }

  cancelVaultDeposit(caller: string, id: number): Promise<ExitRequest> {
    return this.vault.cancelDeposit(caller, id);
  }

  requestRedeem(caller: string, params: RequestRedeemParams): ExitRequest {
    return this.vault.requestRedeem(caller, params);
  }

  acknowledgeRedeem(caller: string, id: number): ExitRequest {
    return this.vault.acknowledgeRedeem(caller, id);
  }

  processRedeem(caller: string, id: number, exitEpoch: number): ExitRequest {
    const request = this.vault.processRedeem(caller, id, exitEpoch);
    // the exited validator's stake is swept back into custody
    this.transfer.credit(request.amount);
    return request;
  }

  claimRedeem(caller: string, id: number): Promise<ExitRequest> {
    return this.vault.claimRedeem(caller, id);
  }

  cancelRedeem(caller: string, id: number): ExitRequest {
    return this.vault.cancelRedeem(caller, id);
  }

  getRequest(id: number): ExitRequest {
    return this.vault.getRequest(id);
  }

  listRequests(filter?: ListRequestsFilter): readonly ExitRequest[] {
    return this.vault.listRequests(filter);
  }

  shares(address: Address): SharesReport {
    return {
      address,
      shares: this.vault.sharesOf(address),
      locked: this.vault.lockedShares(address),
    };
  }

  // ─── Custody ─────────────────────────────────────────────────────

  async custodyReport(): Promise<CustodyReport> {
    return {
      balances: this.custody.balances(),
      held: this.custody.heldBalance(),
      conserved: this.isConserved(),
      reconciliation: this.custody.reconcile(await this.transfer.balance()),
    };
  }

  isConserved(): boolean {
    try {
      this.custody.assertConserved();
      return true;
    } catch (err) {
      if (err instanceof CustodyError && err.code === "CONSERVATION_BROKEN") {
        return false;
      }
      throw err;
    }
  }

  // ─── Event Store ─────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.events.readAll(options);
  }

  readStreamEvents(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    return this.events.read(streamId, options);
  }

  verifyEvents(): EventStoreIntegrityResult {
    return this.events.verifyIntegrity();
  }

  // ─── Lifecycle ───────────────────────────────────────────────────

  isReady(): boolean {
    return this._ready;
  }

  stop(): void {
    this._ready = false;
  }
}
