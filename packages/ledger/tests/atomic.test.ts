/**
 * Tests for transaction boundaries: checkpoints and the re-entrancy guard.
 */

import { describe, it, expect } from "vitest";
import { checkpointAll, runAtomically, ReentrancyGuard } from "../src/atomic.js";
import { InMemoryAssetBook } from "../src/asset-book.js";
import type { Checkpointable } from "../src/types.js";
import { StateConflictError } from "../src/types.js";

class Counter implements Checkpointable {
  value = 0;

  checkpoint(): () => void {
    const saved = this.value;
    return () => {
      this.value = saved;
    };
  }
}

describe("checkpointAll", () => {
  it("restores participants last-first", () => {
    const order: string[] = [];
    const a: Checkpointable = { checkpoint: () => () => order.push("a") };
    const b: Checkpointable = { checkpoint: () => () => order.push("b") };

    checkpointAll([a, b])();

    expect(order).toEqual(["b", "a"]);
  });
});

describe("runAtomically", () => {
  it("keeps changes when the operation succeeds", () => {
    const counter = new Counter();
    const result = runAtomically([counter], () => {
      counter.value = 5;
      return "done";
    });
    expect(result).toBe("done");
    expect(counter.value).toBe(5);
  });

  it("restores every participant and rethrows on failure", () => {
    const counter = new Counter();
    const book = new InMemoryAssetBook();
    book.mint("0xa", 10n);

    expect(() =>
      runAtomically([counter, book], () => {
        counter.value = 9;
        book.transfer("0xa", "0xb", 10n);
        throw new Error("boom");
      }),
    ).toThrow("boom");

    expect(counter.value).toBe(0);
    expect(book.balanceOf("0xa")).toBe(10n);
  });
});

describe("ReentrancyGuard", () => {
  it("runs an operation and releases the lock", () => {
    const guard = new ReentrancyGuard();
    expect(guard.run("purchase", () => guard.active)).toBe("purchase");
    expect(guard.locked).toBe(false);
  });

  it("rejects a nested entry", () => {
    const guard = new ReentrancyGuard();
    let caught: unknown;
    guard.run("purchase", () => {
      try {
        guard.run("yieldRewards", () => 1);
      } catch (err) {
        caught = err;
      }
    });
    expect(caught).toBeInstanceOf(StateConflictError);
    expect(caught).toMatchObject({ code: "REENTRANT_CALL" });
    expect(caught instanceof Error ? caught.message : "").toBe(
      'Cannot enter "yieldRewards" while "purchase" is in progress',
    );
  });

  it("releases the lock when the operation throws", () => {
    const guard = new ReentrancyGuard();
    expect(() =>
      guard.run("purchase", () => {
        throw new Error("fail");
      }),
    ).toThrow("fail");
    expect(guard.locked).toBe(false);
  });
});
