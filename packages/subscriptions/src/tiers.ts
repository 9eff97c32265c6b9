/**
 * @accrual/subscriptions — Tier registry.
 *
 * Rules:
 * - Ids start at 1 and are never reused; tier 0 means "no tier"
 * - subCount ≤ maxSupply whenever maxSupply > 0
 * - Updates overwrite parameters but keep subCount
 * - Pausing blocks joins and renewals, never existing expiry
 */

import {
  assertAmount,
  assertBasisPoints,
  CapacityExceededError,
  StateConflictError,
  ValidationError,
} from "@accrual/ledger";
import type { Checkpointable, Rollback } from "@accrual/ledger";
import type { Timestamp } from "@accrual/types";
import type { Tier, TierParams } from "./types.js";

export const MAX_TIER_ID = 65_535;

/** Anything that knows how many reward curves exist. */
export interface CurveCount {
  readonly numCurves: number;
}

export interface JoinOptions {
  /** Privileged joins skip the pause and window checks */
  readonly privileged: boolean;
}

function isNonNegativeInteger(n: number): boolean {
  return Number.isSafeInteger(n) && n >= 0;
}

export class TierRegistry implements Checkpointable {
  private tiers = new Map<number, Tier>();

  constructor(private readonly curves: CurveCount) {}

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  createTier(params: TierParams): Tier {
    this.validate(params);
    const id = this.tiers.size + 1;
    if (id > MAX_TIER_ID) {
      throw new ValidationError("TIER_LIMIT_REACHED", `Cannot create more than ${MAX_TIER_ID} tiers`);
    }

    const tier: Tier = { ...params, paused: params.paused ?? false, id, subCount: 0 };
    this.tiers.set(id, tier);
    return tier;
  }

  updateTier(id: number, params: TierParams): Tier {
    const current = this.get(id);
    this.validate(params);
    if (params.maxSupply !== 0 && params.maxSupply < current.subCount) {
      throw new ValidationError(
        "INVALID_TIER_PARAMS",
        `maxSupply ${params.maxSupply} is below the ${current.subCount} current subscribers of tier ${id}`,
      );
    }

    const tier: Tier = {
      ...params,
      paused: params.paused ?? current.paused,
      id,
      subCount: current.subCount,
    };
    this.tiers.set(id, tier);
    return tier;
  }

  pause(id: number): Tier {
    return this.replace(id, { paused: true });
  }

  unpause(id: number): Tier {
    return this.replace(id, { paused: false });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Supply
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Add a subscriber to tier `id`.
   */
  join(id: number, now: Timestamp, options: JoinOptions): Tier {
    const tier = this.get(id);
    if (!options.privileged) {
      this.assertOpen(id, now);
    }
    if (tier.maxSupply !== 0 && tier.subCount >= tier.maxSupply) {
      throw new CapacityExceededError(
        "TIER_SUPPLY_EXCEEDED",
        `Tier ${id} is full (${tier.maxSupply} subscribers)`,
      );
    }
    return this.replace(id, { subCount: tier.subCount + 1 });
  }

  leave(id: number): Tier {
    const tier = this.get(id);
    return this.replace(id, { subCount: Math.max(0, tier.subCount - 1) });
  }

  /**
   * Fail unless tier `id` accepts purchases at `now`.
   */
  assertOpen(id: number, now: Timestamp): void {
    const tier = this.get(id);
    if (tier.paused) {
      throw new StateConflictError("TIER_PAUSED", `Tier ${id} is paused`);
    }
    if (now < tier.startTimestamp) {
      throw new StateConflictError("TIER_NOT_STARTED", `Tier ${id} opens at ${tier.startTimestamp}`);
    }
    if (tier.endTimestamp !== 0 && now >= tier.endTimestamp) {
      throw new StateConflictError("TIER_ENDED", `Tier ${id} closed at ${tier.endTimestamp}`);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(id: number): Tier {
    const tier = this.tiers.get(id);
    if (tier === undefined) {
      throw new ValidationError("UNKNOWN_TIER", `Tier ${id} does not exist`);
    }
    return tier;
  }

  has(id: number): boolean {
    return this.tiers.has(id);
  }

  get count(): number {
    return this.tiers.size;
  }

  list(): readonly Tier[] {
    return [...this.tiers.values()];
  }

  checkpoint(): Rollback {
    const tiers = new Map(this.tiers);
    return () => {
      this.tiers = tiers;
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private replace(id: number, changes: Partial<Pick<Tier, "paused" | "subCount">>): Tier {
    const tier: Tier = { ...this.get(id), ...changes };
    this.tiers.set(id, tier);
    return tier;
  }

  private validate(params: TierParams): void {
    if (!Number.isSafeInteger(params.periodDurationSeconds) || params.periodDurationSeconds <= 0) {
      throw new ValidationError(
        "INVALID_TIER_PARAMS",
        `periodDurationSeconds must be a positive integer, got ${params.periodDurationSeconds}`,
      );
    }
    assertAmount(params.pricePerPeriod, "pricePerPeriod");
    assertAmount(params.initialMintPrice, "initialMintPrice");
    assertBasisPoints(params.rewardBasisPoints, undefined, "rewardBasisPoints");

    if (!isNonNegativeInteger(params.maxSupply)) {
      throw new ValidationError("INVALID_TIER_PARAMS", `maxSupply must be a non-negative integer, got ${params.maxSupply}`);
    }
    if (!isNonNegativeInteger(params.maxCommitmentSeconds)) {
      throw new ValidationError(
        "INVALID_TIER_PARAMS",
        `maxCommitmentSeconds must be a non-negative integer, got ${params.maxCommitmentSeconds}`,
      );
    }
    if (!isNonNegativeInteger(params.startTimestamp) || !isNonNegativeInteger(params.endTimestamp)) {
      throw new ValidationError("INVALID_TIER_PARAMS", "Tier timestamps must be non-negative integers");
    }
    if (params.endTimestamp !== 0 && params.endTimestamp <= params.startTimestamp) {
      throw new ValidationError(
        "INVALID_TIER_PARAMS",
        `endTimestamp ${params.endTimestamp} must be after startTimestamp ${params.startTimestamp}`,
      );
    }
    if (!isNonNegativeInteger(params.rewardCurveId) || params.rewardCurveId >= this.curves.numCurves) {
      throw new ValidationError("UNKNOWN_CURVE", `Curve ${params.rewardCurveId} does not exist`);
    }
  }
}
