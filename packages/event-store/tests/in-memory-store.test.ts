/**
 * Tests for InMemoryEventStore.
 *
 * Verifies:
 * - Append: single event, batch, ordering, global position
 * - Concurrency: expected version, no_stream, any
 * - Read: forward, backward, from version, max count
 * - ReadAll: global ordering, from position, max count
 * - Subscriptions: stream-specific, global, unsubscribe
 * - Errors: empty append, invalid stream ID, concurrency conflicts
 */

import { describe, it, expect, vi } from "vitest";
import type { DomainEvent } from "@accrual/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { EventStoreError } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

let seq = 0;

function makeEvent(type: string): DomainEvent {
  seq += 1;
  return {
    type,
    metadata: {
      eventId: `op-${seq}:0`,
      timestamp: "2024-01-01T00:00:00.000Z",
      actor: "0xalice",
      correlationId: `op-${seq}`,
      source: "subscriptions",
    },
    payload: { type },
  };
}

function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`));
}

function fixedStore(): InMemoryEventStore {
  return new InMemoryEventStore({ now: () => "2024-01-01T00:00:00.000Z" });
}

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("appends a single event to a new stream", () => {
    const store = fixedStore();
    const result = store.append("stream-1", [makeEvent("test.created")]);

    expect(result).toEqual({ streamId: "stream-1", fromVersion: 1, toVersion: 1, count: 1 });
  });

  it("appends a batch with contiguous versions", () => {
    const store = fixedStore();
    store.append("s", makeEvents(2));
    const result = store.append("s", makeEvents(3));

    expect(result.fromVersion).toBe(3);
    expect(result.toVersion).toBe(5);
    expect(store.read("s").map((e) => e.version)).toEqual([1, 2, 3, 4, 5]);
  });

  it("assigns global positions across streams", () => {
    const store = fixedStore();
    store.append("a", makeEvents(2));
    store.append("b", makeEvents(1));

    expect(store.readAll().map((e) => [e.streamId, e.globalPosition])).toEqual([
      ["a", 1],
      ["a", 2],
      ["b", 3],
    ]);
    expect(store.globalPosition()).toBe(3);
  });

  it("stores the event data and appendedAt", () => {
    const store = fixedStore();
    const event = makeEvent("test.stored");
    store.append("s", [event]);

    const [stored] = store.read("s");
    expect(stored?.event).toEqual(event);
    expect(stored?.appendedAt).toBe("2024-01-01T00:00:00.000Z");
  });

  it("rejects an empty append", () => {
    const store = fixedStore();
    expect(() => store.append("s", [])).toThrow(EventStoreError);
  });

  it("rejects an empty stream ID", () => {
    const store = fixedStore();
    expect(() => store.append("", [makeEvent("x")])).toThrow(/non-empty/);
  });
});

// =============================================================================
// Concurrency
// =============================================================================

describe("optimistic concurrency", () => {
  it("accepts a matching expected version", () => {
    const store = fixedStore();
    store.append("s", makeEvents(2));
    expect(store.append("s", makeEvents(1), { expectedVersion: 2 }).toVersion).toBe(3);
  });

  it("rejects a stale expected version", () => {
    const store = fixedStore();
    store.append("s", makeEvents(2));

    let caught: unknown;
    try {
      store.append("s", makeEvents(1), { expectedVersion: 1 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(EventStoreError);
    expect(caught).toMatchObject({ code: "CONCURRENCY_CONFLICT", streamId: "s" });
    expect(store.streamVersion("s")).toBe(2);
  });

  it("enforces no_stream on the first write only", () => {
    const store = fixedStore();
    store.append("s", makeEvents(1), { expectedVersion: "no_stream" });
    expect(() => store.append("s", makeEvents(1), { expectedVersion: "no_stream" })).toThrow(
      /already exists/,
    );
  });

  it("skips the check with any", () => {
    const store = fixedStore();
    store.append("s", makeEvents(1));
    expect(store.append("s", makeEvents(1), { expectedVersion: "any" }).toVersion).toBe(2);
  });
});

// =============================================================================
// Read
// =============================================================================

describe("read", () => {
  it("returns an empty list for an unknown stream", () => {
    expect(fixedStore().read("missing")).toEqual([]);
  });

  it("reads forward from a version with a max count", () => {
    const store = fixedStore();
    store.append("s", makeEvents(5));
    expect(store.read("s", { fromVersion: 2, maxCount: 2 }).map((e) => e.version)).toEqual([2, 3]);
  });

  it("reads backward from a version", () => {
    const store = fixedStore();
    store.append("s", makeEvents(5));
    expect(store.read("s", { fromVersion: 3, direction: "backward" }).map((e) => e.version)).toEqual(
      [3, 2, 1],
    );
  });

  it("rejects a version below 1", () => {
    const store = fixedStore();
    store.append("s", makeEvents(1));
    expect(() => store.read("s", { fromVersion: 0 })).toThrow(/fromVersion must be >= 1/);
  });

  it("reads all events from a global position", () => {
    const store = fixedStore();
    store.append("a", makeEvents(2));
    store.append("b", makeEvents(2));
    expect(store.readAll({ fromPosition: 3 }).map((e) => e.globalPosition)).toEqual([3, 4]);
    expect(
      store.readAll({ fromPosition: 4, direction: "backward", maxCount: 2 }).map((e) => e.globalPosition),
    ).toEqual([4, 3]);
  });
});

// =============================================================================
// Subscriptions
// =============================================================================

describe("subscriptions", () => {
  it("delivers stream events to stream subscribers only", () => {
    const store = fixedStore();
    const handler = vi.fn();
    store.subscribe("a", handler);

    store.append("a", makeEvents(2));
    store.append("b", makeEvents(1));

    expect(handler).toHaveBeenCalledTimes(2);
  });

  it("delivers every event to global subscribers", () => {
    const store = fixedStore();
    const seen: number[] = [];
    store.subscribeAll((e) => seen.push(e.globalPosition));

    store.append("a", makeEvents(1));
    store.append("b", makeEvents(2));

    expect(seen).toEqual([1, 2, 3]);
  });

  it("stops delivering after unsubscribe", () => {
    const store = fixedStore();
    const handler = vi.fn();
    const sub = store.subscribe("a", handler);
    const all = store.subscribeAll(handler);

    sub.unsubscribe();
    all.unsubscribe();
    store.append("a", makeEvents(1));

    expect(handler).not.toHaveBeenCalled();
  });
});

// =============================================================================
// Query
// =============================================================================

describe("query", () => {
  it("reports stream existence and version", () => {
    const store = fixedStore();
    expect(store.streamExists("s")).toBe(false);
    expect(store.streamVersion("s")).toBe(0);

    store.append("s", makeEvents(3));

    expect(store.streamExists("s")).toBe(true);
    expect(store.streamVersion("s")).toBe(3);
  });
});
