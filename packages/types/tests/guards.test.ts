/**
 * Runtime type guard tests for @accrual/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAccountId,
  isMoney,
  isCurrencyRef,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";
import { ZERO_ACCOUNT } from "../src/financial.js";

// =============================================================================
// Financial guards
// =============================================================================

describe("isAccountId", () => {
  it("accepts a non-empty address", () => {
    expect(isAccountId("0xabc")).toBe(true);
  });

  it("rejects the zero account", () => {
    expect(isAccountId(ZERO_ACCOUNT)).toBe(false);
  });

  it("rejects empty and non-string values", () => {
    expect(isAccountId("")).toBe(false);
    expect(isAccountId(42)).toBe(false);
    expect(isAccountId(undefined)).toBe(false);
  });
});

describe("isMoney", () => {
  it("accepts valid Money", () => {
    expect(isMoney({ amount: "0.001", currency: "ETH", decimals: 18 })).toBe(true);
  });

  it("accepts zero decimals", () => {
    expect(isMoney({ amount: "1", currency: "PTS", decimals: 0 })).toBe(true);
  });

  it("rejects null and non-objects", () => {
    expect(isMoney(null)).toBe(false);
    expect(isMoney("100")).toBe(false);
  });

  it("rejects numeric amount (must be string)", () => {
    expect(isMoney({ amount: 100, currency: "USDC", decimals: 6 })).toBe(false);
  });

  it("rejects negative decimals", () => {
    expect(isMoney({ amount: "1", currency: "X", decimals: -1 })).toBe(false);
  });
});

describe("isCurrencyRef", () => {
  it("accepts a native currency", () => {
    expect(isCurrencyRef({ kind: "native", symbol: "ETH", decimals: 18 })).toBe(true);
  });

  it("accepts a token currency with an address", () => {
    expect(
      isCurrencyRef({ kind: "token", address: "0xtoken", symbol: "USDC", decimals: 6 }),
    ).toBe(true);
  });

  it("rejects a token currency without an address", () => {
    expect(isCurrencyRef({ kind: "token", symbol: "USDC", decimals: 6 })).toBe(false);
  });

  it("rejects a token currency at the zero account", () => {
    expect(
      isCurrencyRef({ kind: "token", address: ZERO_ACCOUNT, symbol: "USDC", decimals: 6 }),
    ).toBe(false);
  });

  it("rejects an unknown kind", () => {
    expect(isCurrencyRef({ kind: "nft", symbol: "X", decimals: 0 })).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

const METADATA = {
  eventId: "op-1:0",
  timestamp: "2024-01-01T00:00:00.000Z",
  actor: "0xalice",
  correlationId: "op-1",
  source: "subscriptions",
};

describe("isEventSource", () => {
  it("accepts known sources", () => {
    expect(isEventSource("rewards")).toBe(true);
    expect(isEventSource("fees")).toBe(true);
  });

  it("rejects unknown sources", () => {
    expect(isEventSource("vault")).toBe(false);
  });
});

describe("isEventMetadata", () => {
  it("accepts valid metadata", () => {
    expect(isEventMetadata(METADATA)).toBe(true);
  });

  it("rejects metadata with an unknown source", () => {
    expect(isEventMetadata({ ...METADATA, source: "observer" })).toBe(false);
  });

  it("rejects metadata without a correlation ID", () => {
    const { correlationId: _omit, ...rest } = METADATA;
    expect(isEventMetadata(rest)).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a valid event", () => {
    expect(
      isDomainEvent({
        type: "subscriptions.subscription.purchased",
        metadata: METADATA,
        payload: { account: "0xalice" },
      }),
    ).toBe(true);
  });

  it("rejects an event with a null payload", () => {
    expect(isDomainEvent({ type: "x", metadata: METADATA, payload: null })).toBe(false);
  });
});
