/**
 * @accrual/rewards — Reward curves.
 *
 * Rules:
 * - Multipliers are non-negative integers computed in bigint
 * - Decay is non-increasing in time
 * - Before `startTimestamp` the full multiplier applies
 */

import { ValidationError } from "@accrual/ledger";
import type { Timestamp } from "@accrual/types";
import type { CurveParams, DecayPolicy } from "./types.js";

/** Upper bound on exponential periods; keeps `base^numPeriods` tractable. */
export const MAX_DECAY_PERIODS = 255;

function isNonNegativeInteger(n: number): boolean {
  return Number.isSafeInteger(n) && n >= 0;
}

function invalid(message: string): never {
  throw new ValidationError("INVALID_CURVE_PARAMS", message);
}

/**
 * Reject decay parameters that could grow over time or divide by zero.
 */
export function validateCurveParams(params: CurveParams): void {
  if (!isNonNegativeInteger(params.startTimestamp)) {
    invalid(`Curve start must be a non-negative integer timestamp, got ${params.startTimestamp}`);
  }

  const policy = params.policy;
  switch (policy.kind) {
    case "exponential":
      if (!Number.isSafeInteger(policy.base) || policy.base < 1) {
        invalid(`Exponential base must be an integer >= 1, got ${policy.base}`);
      }
      if (!isNonNegativeInteger(policy.numPeriods) || policy.numPeriods > MAX_DECAY_PERIODS) {
        invalid(`numPeriods must be an integer between 0 and ${MAX_DECAY_PERIODS}, got ${policy.numPeriods}`);
      }
      if (!Number.isSafeInteger(policy.periodSeconds) || policy.periodSeconds <= 0) {
        invalid(`periodSeconds must be a positive integer, got ${policy.periodSeconds}`);
      }
      if (!isNonNegativeInteger(policy.minMultiplier)) {
        invalid(`minMultiplier must be a non-negative integer, got ${policy.minMultiplier}`);
      }
      return;
    case "linear":
      if (!isNonNegativeInteger(policy.startMultiplier) || !isNonNegativeInteger(policy.endMultiplier)) {
        invalid("Linear multipliers must be non-negative integers");
      }
      if (policy.startMultiplier < policy.endMultiplier) {
        invalid(
          `startMultiplier ${policy.startMultiplier} is below endMultiplier ${policy.endMultiplier}`,
        );
      }
      if (!Number.isSafeInteger(policy.windowSeconds) || policy.windowSeconds <= 0) {
        invalid(`windowSeconds must be a positive integer, got ${policy.windowSeconds}`);
      }
      return;
  }
}

function decayMultiplier(policy: DecayPolicy, elapsed: number): bigint {
  switch (policy.kind) {
    case "exponential": {
      const periodsElapsed = Math.floor(elapsed / policy.periodSeconds);
      const floor = BigInt(policy.minMultiplier);
      if (periodsElapsed >= policy.numPeriods) {
        return floor;
      }
      const decayed = BigInt(policy.base) ** BigInt(policy.numPeriods - periodsElapsed);
      return decayed > floor ? decayed : floor;
    }
    case "linear": {
      if (elapsed >= policy.windowSeconds) {
        return BigInt(policy.endMultiplier);
      }
      const start = BigInt(policy.startMultiplier);
      const drop = BigInt(policy.startMultiplier - policy.endMultiplier);
      return start - (drop * BigInt(elapsed) + BigInt(policy.windowSeconds) - 1n) / BigInt(policy.windowSeconds);
    }
  }
}

/**
 * Multiplier of `curve` at `now`.
 */
export function curveMultiplier(curve: CurveParams, now: Timestamp): bigint {
  const elapsed = Math.max(0, now - curve.startTimestamp);
  return decayMultiplier(curve.policy, elapsed);
}
