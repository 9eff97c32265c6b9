/**
 * Tests for TierRegistry — creation, updates, pause and supply accounting.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { CapacityExceededError, StateConflictError, ValidationError } from "@accrual/ledger";
import { TierRegistry } from "../src/tiers.js";
import { T0, tierParams, thrown } from "./fixtures.js";

describe("TierRegistry", () => {
  let tiers: TierRegistry;

  beforeEach(() => {
    tiers = new TierRegistry({ numCurves: 2 });
  });

  // ─── Creation ──────────────────────────────────────────────────────

  describe("createTier", () => {
    it("assigns sequential ids starting at 1", () => {
      expect(tiers.createTier(tierParams()).id).toBe(1);
      expect(tiers.createTier(tierParams({ rewardCurveId: 1 })).id).toBe(2);
      expect(tiers.count).toBe(2);
    });

    it("starts unpaused with no subscribers", () => {
      const tier = tiers.createTier(tierParams());
      expect(tier.paused).toBe(false);
      expect(tier.subCount).toBe(0);
    });

    it("rejects a zero period", () => {
      expect(thrown(() => tiers.createTier(tierParams({ periodDurationSeconds: 0 })))).toMatchObject({
        code: "INVALID_TIER_PARAMS",
      });
    });

    it("rejects an unknown curve", () => {
      const err = thrown(() => tiers.createTier(tierParams({ rewardCurveId: 2 })));
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({ code: "UNKNOWN_CURVE" });
    });

    it("rejects reward basis points above 10000", () => {
      expect(thrown(() => tiers.createTier(tierParams({ rewardBasisPoints: 10_001 })))).toMatchObject({
        code: "INVALID_BASIS_POINTS",
      });
    });

    it("rejects a window that closes before it opens", () => {
      expect(
        thrown(() => tiers.createTier(tierParams({ startTimestamp: T0, endTimestamp: T0 }))),
      ).toMatchObject({ code: "INVALID_TIER_PARAMS" });
    });

    it("rejects a negative price", () => {
      expect(thrown(() => tiers.createTier(tierParams({ pricePerPeriod: -1n })))).toMatchObject({
        code: "INVALID_AMOUNT",
      });
    });
  });

  // ─── Updates ───────────────────────────────────────────────────────

  describe("updateTier", () => {
    it("overwrites parameters and keeps the subscriber count", () => {
      tiers.createTier(tierParams());
      tiers.join(1, T0, { privileged: false });

      const updated = tiers.updateTier(1, tierParams({ pricePerPeriod: 5n, maxSupply: 10 }));

      expect(updated.pricePerPeriod).toBe(5n);
      expect(updated.maxSupply).toBe(10);
      expect(updated.subCount).toBe(1);
    });

    it("rejects a cap below the current subscriber count", () => {
      tiers.createTier(tierParams());
      tiers.join(1, T0, { privileged: false });
      tiers.join(1, T0, { privileged: false });

      expect(thrown(() => tiers.updateTier(1, tierParams({ maxSupply: 1 })))).toMatchObject({
        code: "INVALID_TIER_PARAMS",
      });
    });

    it("rejects an unknown tier", () => {
      expect(thrown(() => tiers.updateTier(9, tierParams()))).toMatchObject({ code: "UNKNOWN_TIER" });
    });
  });

  // ─── Supply ────────────────────────────────────────────────────────

  describe("join and leave", () => {
    it("fails once the cap is reached", () => {
      tiers.createTier(tierParams({ maxSupply: 2 }));
      tiers.join(1, T0, { privileged: false });
      tiers.join(1, T0, { privileged: false });

      const err = thrown(() => tiers.join(1, T0, { privileged: true }));
      expect(err).toBeInstanceOf(CapacityExceededError);
      expect(err).toMatchObject({ code: "TIER_SUPPLY_EXCEEDED" });
      expect(tiers.get(1).subCount).toBe(2);
    });

    it("frees a slot on leave", () => {
      tiers.createTier(tierParams({ maxSupply: 1 }));
      tiers.join(1, T0, { privileged: false });
      tiers.leave(1);

      expect(tiers.join(1, T0, { privileged: false }).subCount).toBe(1);
    });

    it("blocks unprivileged joins while paused", () => {
      tiers.createTier(tierParams());
      tiers.pause(1);

      const err = thrown(() => tiers.join(1, T0, { privileged: false }));
      expect(err).toBeInstanceOf(StateConflictError);
      expect(err).toMatchObject({ code: "TIER_PAUSED" });
      expect(tiers.join(1, T0, { privileged: true }).subCount).toBe(1);

      tiers.unpause(1);
      expect(tiers.join(1, T0, { privileged: false }).subCount).toBe(2);
    });

    it("enforces the join window", () => {
      tiers.createTier(tierParams({ startTimestamp: T0, endTimestamp: T0 + 100 }));

      expect(thrown(() => tiers.join(1, T0 - 1, { privileged: false }))).toMatchObject({
        code: "TIER_NOT_STARTED",
      });
      expect(thrown(() => tiers.join(1, T0 + 100, { privileged: false }))).toMatchObject({
        code: "TIER_ENDED",
      });
      expect(tiers.join(1, T0 + 99, { privileged: false }).subCount).toBe(1);
    });
  });

  // ─── Checkpoint ────────────────────────────────────────────────────

  it("restores tiers on rollback", () => {
    tiers.createTier(tierParams());
    const rollback = tiers.checkpoint();
    tiers.createTier(tierParams());
    tiers.join(1, T0, { privileged: false });
    rollback();

    expect(tiers.count).toBe(1);
    expect(tiers.get(1).subCount).toBe(0);
  });
});
