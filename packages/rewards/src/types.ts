/**
 * @accrual/rewards — Core types.
 *
 * Curves convert a monetary reward into shares; the pool pays allocated
 * value out to share holders in proportion to their shares.
 */

import type { AccountId, Amount, Timestamp } from "@accrual/types";

// =============================================================================
// Curves
// =============================================================================

/**
 * Geometric decay: `base^(numPeriods − periodsElapsed)`, floored at
 * `minMultiplier`, and `minMultiplier` once every period has elapsed.
 */
export interface ExponentialDecay {
  readonly kind: "exponential";
  readonly base: number;
  readonly numPeriods: number;
  readonly periodSeconds: number;
  readonly minMultiplier: number;
}

/**
 * Straight-line decay from `startMultiplier` to `endMultiplier` across
 * `windowSeconds`, rounded down.
 */
export interface LinearDecay {
  readonly kind: "linear";
  readonly startMultiplier: number;
  readonly endMultiplier: number;
  readonly windowSeconds: number;
}

export type DecayPolicy = ExponentialDecay | LinearDecay;

export interface CurveParams {
  /** Decay is measured from this instant; earlier issuance sees the full multiplier */
  readonly startTimestamp: Timestamp;
  readonly policy: DecayPolicy;
}

export interface Curve extends CurveParams {
  /** 0-based, append-only */
  readonly id: number;
}

// =============================================================================
// Holders
// =============================================================================

export interface Holder {
  readonly numShares: bigint;
  /** Signed offset that keeps past allocations out of newly issued shares */
  readonly pointsCorrection: bigint;
  readonly rewardsWithdrawn: Amount;
}

// =============================================================================
// Results
// =============================================================================

export interface IssueResult {
  readonly account: AccountId;
  readonly curveId: number;
  readonly multiplier: bigint;
  readonly shares: bigint;
}

export interface AllocationResult {
  /** Value spread across holders by this call (includes released undistributed value) */
  readonly distributed: Amount;
  /** Value held back because no shares existed */
  readonly held: Amount;
}

export interface BurnResult {
  readonly shares: bigint;
  /** Unclaimed entitlement, removed from the pool balance */
  readonly amount: Amount;
}

export interface PoolDetail {
  readonly totalShares: bigint;
  readonly balance: Amount;
  readonly undistributed: Amount;
  readonly pointsPerShare: bigint;
  readonly numCurves: number;
}

export interface PoolSnapshot extends PoolDetail {
  readonly curves: readonly Curve[];
  readonly holders: Readonly<Record<AccountId, Holder>>;
}
