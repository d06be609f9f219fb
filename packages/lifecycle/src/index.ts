/**
 * @stakegate/lifecycle
 *
 * Deposit records, the async vault and the rules around them.
 *
 * - DepositRegistry: create → assign → confirm → finalize / cancel
 * - ExitTracker: vault deposits and redemptions
 * - CancellationPolicy: cooldown after confirmation
 * - OperatorPolicy, HandleRegistry, ValidatorSet
 * - Ports (DepositSink, ValueTransfer) with in-memory adapters
 */

// Errors
export {
  LifecycleError,
  ValidationError,
  AuthorizationError,
  StateViolation,
  CooldownActive,
  AlreadyClaimed,
  AuthenticityError,
  ExternalCallFailure,
  NotFoundError,
  HandleError,
} from "./errors.js";
export type {
  LifecycleErrorCode,
  ValidationErrorCode,
  ExternalTarget,
  NotFoundCode,
  HandleErrorCode,
} from "./errors.js";

// Records
export type {
  StoredDepositState,
  DepositRecord,
  AssignParams,
  CreateDepositParams,
  ExitRequest,
  RequestDepositParams,
  RequestRedeemParams,
  ListRequestsFilter,
  SerializedDepositRecord,
  DepositRegistrySnapshot,
} from "./types.js";

// State machine
export {
  DEPOSIT_TRANSITIONS,
  DEPOSIT_ACTIONS,
  TERMINAL_DEPOSIT_STATES,
  VAULT_TRANSITIONS,
  VAULT_STATES,
  canTransition,
  assertTransition,
  isTerminalDepositState,
  assertVaultTransition,
} from "./state-machine.js";
export type { DepositTransition } from "./state-machine.js";

// Components
export { DepositRegistry } from "./deposit-registry.js";
export type { DepositRegistryOptions } from "./deposit-registry.js";
export { ExitTracker } from "./exit-tracker.js";
export type { ExitTrackerOptions } from "./exit-tracker.js";
export { CancellationPolicy } from "./cancellation-policy.js";
export type {
  CancellationDecision,
  CancellableRecord,
  CancellationPolicyOptions,
} from "./cancellation-policy.js";
export { OperatorPolicy } from "./operator-policy.js";
export { HandleRegistry } from "./handle-registry.js";
export type { Handle, TransferHook } from "./handle-registry.js";
export { ValidatorSet } from "./validator-set.js";
export type { Validator, ValidatorRegistration } from "./validator-set.js";

// Transitions and journal
export { Compensations, runTransition, runLocalTransition, callPort } from "./compensation.js";
export type { CompensationEvent, CompensationListener } from "./compensation.js";
export { LifecycleJournal, depositStream, vaultStream, OPERATORS_STREAM } from "./journal.js";
export type { JournalEntry } from "./journal.js";

// Inputs
export { requireAddress, requireBytes, requireStakeUnit } from "./inputs.js";

// Ports
export { systemClock } from "./ports.js";
export type { Clock, DepositSink, DepositSinkCall, ValueTransfer } from "./ports.js";
export { InMemoryValueTransfer, RecordingDepositSink } from "./adapters.js";
export type { Transfer } from "./adapters.js";
