/**
 * Tests for InMemoryEventStore.
 *
 * Verifies:
 * - Append: single event, batch, ordering, global position
 * - Concurrency: expected version, no_stream, any
 * - Read: forward, backward, from version, max count
 * - Subscriptions: stream-specific, global, unsubscribe
 * - Errors: empty append, invalid stream ID, concurrency conflicts
 */

import { describe, it, expect, vi } from "vitest";
import type { DomainEvent } from "@stakegate/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { EventStoreError } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

const TS = "2024-05-01T09:30:00.000Z";
const clock = (): Date => new Date(TS);

function makeEvent(type: string, correlationId = "deposit-1"): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${type}`,
      timestamp: TS,
      actor: "0x" + "aa".repeat(20),
      correlationId,
      source: "registry",
    },
    payload: { type },
  };
}

function expectStoreError(fn: () => unknown, code: string): void {
  try {
    fn();
    expect.unreachable(`expected EventStoreError ${code}`);
  } catch (err) {
    expect(err).toBeInstanceOf(EventStoreError);
    if (err instanceof EventStoreError) expect(err.code).toBe(code);
  }
}

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("appends a single event to a new stream", () => {
    const store = new InMemoryEventStore({ clock });

    const result = store.append("deposit-1", [makeEvent("deposit.created")]);

    expect(result).toEqual({ streamId: "deposit-1", fromVersion: 1, toVersion: 1, count: 1 });
    const [stored] = store.read("deposit-1");
    expect(stored?.version).toBe(1);
    expect(stored?.globalPosition).toBe(1);
    expect(stored?.appendedAt).toBe(TS);
    expect(stored?.previousHash).toBe("genesis");
    expect(stored?.hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("assigns versions per stream and positions globally", () => {
    const store = new InMemoryEventStore({ clock });
    store.append("deposit-1", [makeEvent("deposit.created"), makeEvent("deposit.assigned")]);
    store.append("deposit-2", [makeEvent("deposit.created", "deposit-2")]);
    const result = store.append("deposit-1", [makeEvent("deposit.confirmed")]);

    expect(result.fromVersion).toBe(3);
    expect(store.streamVersion("deposit-1")).toBe(3);
    expect(store.streamVersion("deposit-2")).toBe(1);
    expect(store.globalPosition()).toBe(4);
    expect(store.readAll().map((e) => `${e.streamId}@${String(e.version)}`)).toEqual([
      "deposit-1@1",
      "deposit-1@2",
      "deposit-2@1",
      "deposit-1@3",
    ]);
  });

  it("links every event to its predecessor", () => {
    const store = new InMemoryEventStore({ clock });
    store.append("deposit-1", [makeEvent("deposit.created")]);
    store.append("operators", [makeEvent("operator.updated", "operators")]);

    const [first, second] = store.readAll();
    expect(second?.previousHash).toBe(first?.hash);
  });

  it("rejects an empty batch", () => {
    const store = new InMemoryEventStore();
    expectStoreError(() => store.append("deposit-1", []), "EMPTY_APPEND");
  });

  it("rejects an empty stream id", () => {
    const store = new InMemoryEventStore();
    expectStoreError(() => store.append("", [makeEvent("x")]), "INVALID_STREAM_ID");
  });
});

// =============================================================================
// Concurrency
// =============================================================================

describe("expected version", () => {
  it("accepts no_stream for a new stream and rejects it afterwards", () => {
    const store = new InMemoryEventStore();
    store.append("deposit-1", [makeEvent("deposit.created")], { expectedVersion: "no_stream" });

    expectStoreError(
      () =>
        store.append("deposit-1", [makeEvent("deposit.created")], {
          expectedVersion: "no_stream",
        }),
      "CONCURRENCY_CONFLICT",
    );
  });

  it("checks an exact version", () => {
    const store = new InMemoryEventStore();
    store.append("deposit-1", [makeEvent("deposit.created")]);

    store.append("deposit-1", [makeEvent("deposit.assigned")], { expectedVersion: 1 });
    expectStoreError(
      () => store.append("deposit-1", [makeEvent("deposit.confirmed")], { expectedVersion: 1 }),
      "CONCURRENCY_CONFLICT",
    );
    expect(store.streamVersion("deposit-1")).toBe(2);
  });

  it("skips the check for any", () => {
    const store = new InMemoryEventStore();
    store.append("deposit-1", [makeEvent("a")]);
    store.append("deposit-1", [makeEvent("b")], { expectedVersion: "any" });
    expect(store.streamVersion("deposit-1")).toBe(2);
  });
});

// =============================================================================
// Read
// =============================================================================

describe("read", () => {
  function seeded(): InMemoryEventStore {
    const store = new InMemoryEventStore({ clock });
    store.append("vault-1", ["a", "b", "c", "d"].map((t) => makeEvent(t, "vault-1")));
    return store;
  }

  it("returns an empty list for an unknown stream", () => {
    expect(new InMemoryEventStore().read("deposit-9")).toEqual([]);
  });

  it("reads forward from a version", () => {
    expect(seeded().read("vault-1", { fromVersion: 3 }).map((e) => e.event.type)).toEqual([
      "c",
      "d",
    ]);
  });

  it("reads backward from the head by default", () => {
    expect(
      seeded()
        .read("vault-1", { direction: "backward", maxCount: 2 })
        .map((e) => e.event.type),
    ).toEqual(["d", "c"]);
  });

  it("rejects a version below 1", () => {
    expectStoreError(() => seeded().read("vault-1", { fromVersion: 0 }), "INVALID_VERSION");
  });

  it("reads all streams from a position", () => {
    const store = seeded();
    store.append("operators", [makeEvent("operator.updated", "operators")]);

    expect(store.readAll({ fromPosition: 4 }).map((e) => e.event.type)).toEqual([
      "d",
      "operator.updated",
    ]);
    expect(store.readAll({ direction: "backward", maxCount: 1 })[0]?.event.type).toBe(
      "operator.updated",
    );
  });

  it("lists stream ids in creation order", () => {
    const store = seeded();
    store.append("deposit-1", [makeEvent("deposit.created")]);
    expect(store.streamIds()).toEqual(["vault-1", "deposit-1"]);
    expect(store.streamExists("deposit-1")).toBe(true);
    expect(store.streamExists("deposit-2")).toBe(false);
  });
});

// =============================================================================
// Subscriptions
// =============================================================================

describe("subscriptions", () => {
  it("delivers stream events to stream subscribers only", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    store.subscribe("deposit-1", handler);

    store.append("deposit-1", [makeEvent("deposit.created")]);
    store.append("deposit-2", [makeEvent("deposit.created", "deposit-2")]);

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("delivers every event to global subscribers in order", () => {
    const store = new InMemoryEventStore();
    const seen: string[] = [];
    store.subscribeAll((e) => seen.push(e.event.type));

    store.append("deposit-1", [makeEvent("a"), makeEvent("b")]);
    store.append("operators", [makeEvent("c", "operators")]);

    expect(seen).toEqual(["a", "b", "c"]);
  });

  it("stops delivering after unsubscribe", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    const streamHandler = vi.fn();
    const sub = store.subscribeAll(handler);
    const streamSub = store.subscribe("deposit-1", streamHandler);

    sub.unsubscribe();
    streamSub.unsubscribe();
    store.append("deposit-1", [makeEvent("a")]);

    expect(handler).not.toHaveBeenCalled();
    expect(streamHandler).not.toHaveBeenCalled();
  });
});
