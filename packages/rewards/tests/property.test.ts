/**
 * Property-Based Tests for @accrual/rewards
 *
 * 1. Share conservation: Σ numShares == totalShares after any sequence
 * 2. Solvency: Σ rewardBalanceOf ≤ pool balance
 * 3. Monotonic curves: later issuance never yields more shares per unit
 * 4. No double-claim: a second claim with no allocation in between pays 0
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { RewardPool } from "../src/reward-pool.js";
import { curveMultiplier } from "../src/curves.js";
import type { CurveParams } from "../src/types.js";

// =============================================================================
// Arbitraries
// =============================================================================

const ACCOUNTS = ["0xa", "0xb", "0xc", "0xd"] as const;

const arbAccount = fc.constantFrom(...ACCOUNTS);
const arbAmount = fc.bigInt({ min: 0n, max: 10n ** 24n });

type Op =
  | { readonly kind: "issue"; readonly account: string; readonly amount: bigint }
  | { readonly kind: "allocate"; readonly amount: bigint }
  | { readonly kind: "claim"; readonly account: string }
  | { readonly kind: "burn"; readonly account: string }
  | { readonly kind: "transfer"; readonly from: string; readonly to: string };

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({ kind: fc.constant("issue" as const), account: arbAccount, amount: arbAmount }),
  fc.record({ kind: fc.constant("allocate" as const), amount: arbAmount }),
  fc.record({ kind: fc.constant("claim" as const), account: arbAccount }),
  fc.record({ kind: fc.constant("burn" as const), account: arbAccount }),
  fc.record({ kind: fc.constant("transfer" as const), from: arbAccount, to: arbAccount }),
);

const arbCurve: fc.Arbitrary<CurveParams> = fc.oneof(
  fc.record({
    startTimestamp: fc.integer({ min: 0, max: 1_000_000 }),
    policy: fc.record({
      kind: fc.constant("exponential" as const),
      base: fc.integer({ min: 1, max: 10 }),
      numPeriods: fc.integer({ min: 0, max: 20 }),
      periodSeconds: fc.integer({ min: 1, max: 100_000 }),
      minMultiplier: fc.integer({ min: 0, max: 1_000 }),
    }),
  }),
  fc
    .record({
      startTimestamp: fc.integer({ min: 0, max: 1_000_000 }),
      a: fc.integer({ min: 0, max: 1_000_000 }),
      b: fc.integer({ min: 0, max: 1_000_000 }),
      windowSeconds: fc.integer({ min: 1, max: 1_000_000 }),
    })
    .map(
      ({ startTimestamp, a, b, windowSeconds }): CurveParams => ({
        startTimestamp,
        policy: {
          kind: "linear",
          startMultiplier: Math.max(a, b),
          endMultiplier: Math.min(a, b),
          windowSeconds,
        },
      }),
    ),
);

function apply(pool: RewardPool, op: Op): void {
  switch (op.kind) {
    case "issue":
      pool.issueWithCurve(op.account, op.amount, 0, 0);
      return;
    case "allocate":
      pool.allocate(op.amount);
      return;
    case "claim":
      pool.claim(op.account);
      return;
    case "burn":
      pool.burn(op.account);
      return;
    case "transfer":
      pool.transferHolder(op.from, op.to);
      return;
  }
}

function freshPool(): RewardPool {
  const pool = new RewardPool();
  pool.createCurve({
    startTimestamp: 0,
    policy: { kind: "linear", startMultiplier: 3, endMultiplier: 3, windowSeconds: 1 },
  });
  return pool;
}

// =============================================================================
// Properties
// =============================================================================

describe("property: share conservation and solvency", () => {
  it("holds after every operation", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
        const pool = freshPool();
        for (const op of ops) {
          apply(pool, op);

          const shares = ACCOUNTS.reduce((sum, a) => sum + pool.sharesOf(a), 0n);
          const owed = ACCOUNTS.reduce((sum, a) => sum + pool.rewardBalanceOf(a), 0n);
          expect(shares).toBe(pool.totalShares);
          expect(owed).toBeLessThanOrEqual(pool.balance());
          expect(pool.balance()).toBeGreaterThanOrEqual(0n);
        }
      }),
      { numRuns: 200 },
    );
  });
});

describe("property: monotonic curves", () => {
  it("never yields more shares per unit at a later time", () => {
    fc.assert(
      fc.property(
        arbCurve,
        fc.integer({ min: 0, max: 5_000_000 }),
        fc.integer({ min: 0, max: 5_000_000 }),
        (curve, t1, t2) => {
          const earlier = Math.min(t1, t2);
          const later = Math.max(t1, t2);
          expect(curveMultiplier(curve, later)).toBeLessThanOrEqual(curveMultiplier(curve, earlier));
        },
      ),
      { numRuns: 500 },
    );
  });
});

describe("property: no double-claim", () => {
  it("pays out once per allocation", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: 1n, max: 10n ** 18n }),
        fc.bigInt({ min: 1n, max: 10n ** 18n }),
        fc.bigInt({ min: 0n, max: 10n ** 18n }),
        (mine, theirs, extra) => {
          const pool = freshPool();
          pool.issueWithCurve("0xa", mine, 0, 0);
          pool.issueWithCurve("0xb", theirs, 0, 0);
          // Large enough that 0xa's share rounds to at least 1.
          pool.allocate(3n * (mine + theirs) + extra);

          expect(pool.claim("0xa")).toBeGreaterThan(0n);
          expect(pool.claim("0xa")).toBe(0n);
        },
      ),
      { numRuns: 200 },
    );
  });
});
