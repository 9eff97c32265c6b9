/**
 * @accrual/rewards — Reward curves and the share-based reward pool.
 *
 * @packageDocumentation
 */

export { RewardPool, MAGNITUDE } from "./reward-pool.js";
export { curveMultiplier, validateCurveParams, MAX_DECAY_PERIODS } from "./curves.js";

export type {
  ExponentialDecay,
  LinearDecay,
  DecayPolicy,
  CurveParams,
  Curve,
  Holder,
  IssueResult,
  AllocationResult,
  BurnResult,
  PoolDetail,
  PoolSnapshot,
} from "./types.js";
