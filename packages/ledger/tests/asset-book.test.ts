/**
 * Tests for InMemoryAssetBook.
 */

import { describe, it, expect, vi } from "vitest";
import { InMemoryAssetBook } from "../src/asset-book.js";
import { ValidationError } from "../src/types.js";

describe("InMemoryAssetBook", () => {
  it("mints and reports balances", () => {
    const book = new InMemoryAssetBook();
    book.mint("0xa", 50n);
    expect(book.balanceOf("0xa")).toBe(50n);
    expect(book.balanceOf("0xnobody")).toBe(0n);
  });

  it("refuses transfers above the balance", () => {
    const book = new InMemoryAssetBook();
    book.mint("0xa", 50n);
    expect(book.transfer("0xa", "0xb", 51n)).toBe(false);
    expect(book.balanceOf("0xa")).toBe(50n);
  });

  it("burns the transfer fee", () => {
    const book = new InMemoryAssetBook({ transferFeeBps: 250 });
    book.mint("0xa", 1_000n);
    expect(book.transfer("0xa", "0xb", 1_000n)).toBe(true);
    expect(book.balanceOf("0xb")).toBe(975n);
    expect(book.totalHeld).toBe(975n);
  });

  it("can stop rejecting a recipient", () => {
    const book = new InMemoryAssetBook();
    book.mint("0xa", 10n);
    book.rejectIncoming("0xb");
    expect(book.transfer("0xa", "0xb", 5n)).toBe(false);
    book.rejectIncoming("0xb", false);
    expect(book.transfer("0xa", "0xb", 5n)).toBe(true);
  });

  it("invokes the transfer hook after balances move", () => {
    const book = new InMemoryAssetBook();
    book.mint("0xa", 10n);
    const seen: bigint[] = [];
    const hook = vi.fn(() => {
      seen.push(book.balanceOf("0xb"));
    });
    book.onTransfer(hook);

    book.transfer("0xa", "0xb", 4n);

    expect(hook).toHaveBeenCalledWith("0xa", "0xb", 4n);
    expect(seen).toEqual([4n]);
  });

  it("rolls back to a checkpoint", () => {
    const book = new InMemoryAssetBook();
    book.mint("0xa", 10n);
    const rollback = book.checkpoint();

    book.transfer("0xa", "0xb", 7n);
    rollback();

    expect(book.balanceOf("0xa")).toBe(10n);
    expect(book.balanceOf("0xb")).toBe(0n);
  });

  it("rejects an out-of-range fee", () => {
    expect(() => new InMemoryAssetBook({ transferFeeBps: 10_001 })).toThrow(ValidationError);
  });
});
