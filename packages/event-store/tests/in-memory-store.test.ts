/**
 * Tests for InMemoryEventStore.
 *
 * Verifies:
 * - Append: ordering, per-stream versions, global positions
 * - Concurrency: expected version, no_stream, any
 * - Read / readAll: from version or position, max count
 * - Subscriptions: stream-specific, global, unsubscribe
 * - Payload normalisation: stored events read back as JSON
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent } from "@multiledger/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { EventStoreError } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

let counter = 0;

function makeEvent(type: string, payload: Record<string, unknown> = { type }): DomainEvent {
  counter += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "alice",
      correlationId: `corr-${counter}`,
      source: "transfer",
    },
    payload,
  };
}

function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`));
}

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("appends a single event to a new stream", () => {
    const store = new InMemoryEventStore();

    const result = store.append("stream-1", [makeEvent("mt.transfer")]);

    expect(result).toEqual({ streamId: "stream-1", fromVersion: 1, toVersion: 1, count: 1 });
  });

  it("assigns contiguous versions within a stream", () => {
    const store = new InMemoryEventStore();

    store.append("stream-1", makeEvents(2));
    store.append("stream-1", makeEvents(3));

    expect(store.read("stream-1").map((e) => e.version)).toEqual([1, 2, 3, 4, 5]);
  });

  it("assigns global positions across streams", () => {
    const store = new InMemoryEventStore();

    store.append("stream-1", makeEvents(2));
    store.append("stream-2", makeEvents(2));
    store.append("stream-1", [makeEvent("late")]);

    expect(store.readAll().map((e) => e.globalPosition)).toEqual([1, 2, 3, 4, 5]);
    expect(store.streamVersion("stream-1")).toBe(3);
    expect(store.streamVersion("stream-2")).toBe(2);
  });

  it("stores the event data", () => {
    const store = new InMemoryEventStore();
    store.append("stream-1", [makeEvent("mt.token.minted", { ownerId: "alice" })]);

    const [stored] = store.read("stream-1");

    expect(stored?.event.type).toBe("mt.token.minted");
    expect(stored?.event.metadata.actor).toBe("alice");
    expect(stored?.event.payload).toEqual({ ownerId: "alice" });
    expect(stored?.streamId).toBe("stream-1");
    expect(stored?.previousHash).toBe("genesis");
  });

  it("rejects an empty batch", () => {
    const store = new InMemoryEventStore();

    expect(() => store.append("stream-1", [])).toThrow("Cannot append zero events");
  });

  it("rejects an empty stream id", () => {
    const store = new InMemoryEventStore();

    expect(() => store.append("", [makeEvent("x")])).toThrow(EventStoreError);
  });

  it("drops undefined payload fields", () => {
    const store = new InMemoryEventStore();
    store.append("stream-1", [makeEvent("x", { kept: "1", dropped: undefined })]);

    expect(store.read("stream-1")[0]?.event.payload).toEqual({ kept: "1" });
  });

  it("rejects payloads that cannot be serialised", () => {
    const store = new InMemoryEventStore();

    try {
      store.append("stream-1", [makeEvent("x", { amount: 5n })]);
      expect.fail("expected append to throw");
    } catch (err) {
      expect(err).toBeInstanceOf(EventStoreError);
      if (err instanceof EventStoreError) {
        expect(err.code).toBe("INVALID_EVENT");
      }
    }
    expect(store.globalPosition()).toBe(0);
  });
});

// =============================================================================
// Concurrency Control
// =============================================================================

describe("concurrency control", () => {
  it("accepts the current version", () => {
    const store = new InMemoryEventStore();
    store.append("stream-1", makeEvents(3));

    const result = store.append("stream-1", [makeEvent("next")], { expectedVersion: 3 });

    expect(result.fromVersion).toBe(4);
  });

  it("rejects a stale version", () => {
    const store = new InMemoryEventStore();
    store.append("stream-1", makeEvents(3));

    expect(() =>
      store.append("stream-1", [makeEvent("next")], { expectedVersion: 2 }),
    ).toThrow('Stream "stream-1" is at version 3, expected 2');
  });

  it("no_stream only succeeds on a new stream", () => {
    const store = new InMemoryEventStore();
    store.append("existing", [makeEvent("first")]);

    expect(store.append("fresh", [makeEvent("first")], { expectedVersion: "no_stream" }).fromVersion).toBe(1);
    expect(() =>
      store.append("existing", [makeEvent("second")], { expectedVersion: "no_stream" }),
    ).toThrow("already exists");
  });

  it("conflict carries the code and stream id", () => {
    const store = new InMemoryEventStore();
    store.append("settlement-1", [makeEvent("first")]);

    try {
      store.append("settlement-1", [makeEvent("second")], { expectedVersion: 0 });
      expect.fail("expected append to throw");
    } catch (err) {
      expect(err).toBeInstanceOf(EventStoreError);
      if (err instanceof EventStoreError) {
        expect(err.code).toBe("CONCURRENCY_CONFLICT");
        expect(err.streamId).toBe("settlement-1");
      }
    }
  });
});

// =============================================================================
// Read
// =============================================================================

describe("read", () => {
  it("returns an empty array for an unknown stream", () => {
    expect(new InMemoryEventStore().read("missing")).toEqual([]);
  });

  it("reads from a version with a limit", () => {
    const store = new InMemoryEventStore();
    store.append("stream-1", makeEvents(5));

    const events = store.read("stream-1", { fromVersion: 2, maxCount: 2 });

    expect(events.map((e) => e.version)).toEqual([2, 3]);
  });

  it("rejects fromVersion below 1", () => {
    const store = new InMemoryEventStore();

    expect(() => store.read("stream-1", { fromVersion: 0 })).toThrow("fromVersion must be >= 1");
  });

  it("readAll honours fromPosition", () => {
    const store = new InMemoryEventStore();
    store.append("stream-a", makeEvents(3, "a"));
    store.append("stream-b", makeEvents(2, "b"));

    const events = store.readAll({ fromPosition: 4 });

    expect(events.map((e) => e.event.type)).toEqual(["b.1", "b.2"]);
  });

  it("lists streams by prefix in creation order", () => {
    const store = new InMemoryEventStore();
    store.append("settlement-b", [makeEvent("x")]);
    store.append("ledger", [makeEvent("x")]);
    store.append("settlement-a", [makeEvent("x")]);

    expect(store.listStreams("settlement-")).toEqual(["settlement-b", "settlement-a"]);
    expect(store.listStreams()).toEqual(["settlement-b", "ledger", "settlement-a"]);
  });
});

// =============================================================================
// Subscriptions
// =============================================================================

describe("subscriptions", () => {
  it("stream subscribers only see their stream", () => {
    const store = new InMemoryEventStore();
    const received: string[] = [];
    store.subscribe("stream-1", (e) => received.push(e.event.type));

    store.append("stream-1", [makeEvent("mine")]);
    store.append("stream-2", [makeEvent("not-mine")]);

    expect(received).toEqual(["mine"]);
  });

  it("global subscribers see every stream in order", () => {
    const store = new InMemoryEventStore();
    const received: string[] = [];
    store.subscribeAll((e) => received.push(`${e.streamId}:${e.event.type}`));

    store.append("stream-1", [makeEvent("a")]);
    store.append("stream-2", [makeEvent("b"), makeEvent("c")]);

    expect(received).toEqual(["stream-1:a", "stream-2:b", "stream-2:c"]);
  });

  it("unsubscribe stops delivery", () => {
    const store = new InMemoryEventStore();
    const received: string[] = [];
    const sub = store.subscribe("stream-1", (e) => received.push(e.event.type));

    store.append("stream-1", [makeEvent("before")]);
    sub.unsubscribe();
    store.append("stream-1", [makeEvent("after")]);

    expect(received).toEqual(["before"]);
  });
});

// =============================================================================
// Integrity
// =============================================================================

describe("verifyIntegrity", () => {
  it("is valid for an empty store", () => {
    expect(new InMemoryEventStore().verifyIntegrity()).toEqual({
      valid: true,
      lastVerifiedPosition: 0,
      errors: [],
    });
  });

  it("verifies every appended event", () => {
    const store = new InMemoryEventStore();
    store.append("stream-1", makeEvents(3));
    store.append("stream-2", makeEvents(2));

    const result = store.verifyIntegrity();

    expect(result.valid).toBe(true);
    expect(result.lastVerifiedPosition).toBe(5);
  });
});
