/**
 * Append lifecycle events to the event store.
 *
 * Streams: `deposit-<id>`, `vault-<id>`, `operators`.
 * Called only after a transition has fully succeeded.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventMetadata } from "@stakegate/types";
import type { EventStore, ExpectedVersion } from "@stakegate/event-store";

export function depositStream(id: number): string {
  return `deposit-${String(id)}`;
}

export function vaultStream(id: number): string {
  return `vault-${String(id)}`;
}

export const OPERATORS_STREAM = "operators";

export interface JournalEntry {
  readonly streamId: string;
  readonly type: string;
  readonly actor: string;
  readonly source: EventMetadata["source"];
  readonly payload: Readonly<Record<string, unknown>>;
  readonly expectedVersion?: ExpectedVersion;
}

export class LifecycleJournal {
  constructor(
    private readonly store: EventStore | undefined,
    private readonly clock: () => Date,
  ) {}

  record(entry: JournalEntry): void {
    if (this.store === undefined) return;

    const event: DomainEvent = {
      type: entry.type,
      metadata: {
        eventId: randomUUID(),
        timestamp: this.clock().toISOString(),
        actor: entry.actor.toLowerCase(),
        correlationId: entry.streamId,
        source: entry.source,
      },
      payload: entry.payload,
    };
    this.store.append(
      entry.streamId,
      [event],
      entry.expectedVersion !== undefined ? { expectedVersion: entry.expectedVersion } : undefined,
    );
  }
}
