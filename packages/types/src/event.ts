/**
 * Event Types
 *
 * Every successful lifecycle transition is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which subsystem)
 * - Payloads are JSON-safe: amounts are decimal strings, bytes are hex
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Address (or service identity) that caused this event */
  readonly actor: string;

  /** ID for grouping the events of one record or request */
  readonly correlationId: string;

  /** Which Stakegate subsystem emitted this event */
  readonly source: "registry" | "vault" | "operators" | "handles";
}

/**
 * A domain event. Discriminated by `type`
 * (e.g. "deposit.confirmed", "vault.redeem.claimed").
 */
export interface DomainEvent {
  readonly type: string;
  readonly metadata: EventMetadata;
  readonly payload: Readonly<Record<string, unknown>>;
}
