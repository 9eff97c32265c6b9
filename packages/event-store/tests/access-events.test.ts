/**
 * Tests for the access ledger event catalog.
 */

import { describe, it, expect } from "vitest";
import { ACCESS_EVENTS, createAccessCatalog } from "../src/access-events.js";

const catalog = createAccessCatalog();

describe("createAccessCatalog", () => {
  it("registers every ACCESS_EVENTS constant", () => {
    const types = Object.values(ACCESS_EVENTS);
    expect(catalog.size).toBe(types.length);
    for (const type of types) {
      expect(catalog.has(type)).toBe(true);
    }
  });

  it("names every type <source>.<entity>.<action> with a matching source", () => {
    for (const schema of catalog.listSchemas()) {
      const parts = schema.type.split(".");
      expect(parts).toHaveLength(3);
      expect(parts[0]).toBe(schema.source);
    }
  });

  it("keeps every schema at version 1", () => {
    expect(catalog.listSchemas().every((s) => s.version === 1)).toBe(true);
  });

  it("groups events by source", () => {
    expect(catalog.listBySource("fees").map((s) => s.type).sort()).toEqual([
      "fees.fee.transferred",
      "fees.recipient.updated",
      "fees.referral.paid",
    ]);
  });
});

describe("payload validation", () => {
  it("accepts a purchase with a decimal amount", () => {
    expect(
      catalog.validate(ACCESS_EVENTS.SUBSCRIPTION_PURCHASED, {
        account: "0xalice",
        tokenId: 1,
        tierId: 1,
        amount: "1000",
        secondsAdded: 2_592_000,
        expiresAt: 1_702_592_000,
      }),
    ).toBe(true);
  });

  it("rejects a purchase with a bigint or fractional amount", () => {
    const base = { account: "0xalice", secondsAdded: 10 };
    expect(catalog.validate(ACCESS_EVENTS.SUBSCRIPTION_PURCHASED, { ...base, amount: 1000n })).toBe(
      false,
    );
    expect(catalog.validate(ACCESS_EVENTS.SUBSCRIPTION_PURCHASED, { ...base, amount: "1.5" })).toBe(
      false,
    );
  });

  it("accepts a null fee recipient", () => {
    expect(
      catalog.validate(ACCESS_EVENTS.FEE_RECIPIENT_UPDATED, { role: "client", recipient: null }),
    ).toBe(true);
    expect(
      catalog.validate(ACCESS_EVENTS.FEE_RECIPIENT_UPDATED, { role: "client", recipient: 7 }),
    ).toBe(false);
  });

  it("requires a boolean permanent flag on referral codes", () => {
    expect(
      catalog.validate(ACCESS_EVENTS.REFERRAL_CODE_SET, {
        referralCode: 7,
        basisPoints: 250,
        permanent: false,
        referrer: null,
      }),
    ).toBe(true);
    expect(
      catalog.validate(ACCESS_EVENTS.REFERRAL_CODE_SET, {
        referralCode: 7,
        basisPoints: 250,
        permanent: "no",
      }),
    ).toBe(false);
  });

  it("validates a slash payout failure", () => {
    expect(
      catalog.validate(ACCESS_EVENTS.SLASH_PAYOUT_FAILED, {
        account: "0xbob",
        amount: "40",
        reason: "transfer rejected",
      }),
    ).toBe(true);
  });
});
