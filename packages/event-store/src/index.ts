/**
 * @stakegate/event-store: Append-only, hash-chained lifecycle journal.
 *
 * @packageDocumentation
 */

export type {
  EventRecord,
  StoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  IntegrityError,
  EventStoreIntegrityResult,
  EventStore,
  EventStoreErrorCode,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

export { GENESIS_HASH, computeEventHash, verifyHashChain } from "./hash-chain.js";
