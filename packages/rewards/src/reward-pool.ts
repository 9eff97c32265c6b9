/**
 * @accrual/rewards — Share-based reward pool.
 *
 * Value per share is tracked with a points-per-share accumulator scaled by
 * 2^128. A holder's accumulated rewards are
 *
 *   (pointsPerShare × numShares + pointsCorrection) / MAGNITUDE
 *
 * and their withdrawable balance is that minus `rewardsWithdrawn`.
 *
 * Rules:
 * - Σ numShares == totalShares
 * - Σ rewardBalanceOf ≤ balance (every division rounds down)
 * - Issuing shares never changes anyone's existing entitlement
 * - Allocations made while totalShares == 0, and whatever is left once
 *   the last shares burn, are held and released at the next allocation
 *   that finds shares
 * - The pool moves no funds; callers settle claim and burn amounts
 */

import { assertAmount, ValidationError } from "@accrual/ledger";
import type { Checkpointable, Rollback } from "@accrual/ledger";
import type { AccountId, Amount, Timestamp } from "@accrual/types";
import { curveMultiplier, validateCurveParams } from "./curves.js";
import type {
  AllocationResult,
  BurnResult,
  Curve,
  CurveParams,
  Holder,
  IssueResult,
  PoolDetail,
  PoolSnapshot,
} from "./types.js";

export const MAGNITUDE = 2n ** 128n;

const EMPTY_HOLDER: Holder = {
  numShares: 0n,
  pointsCorrection: 0n,
  rewardsWithdrawn: 0n,
};

export class RewardPool implements Checkpointable {
  private _curves: Curve[] = [];
  private _holders = new Map<AccountId, Holder>();
  private _totalShares = 0n;
  private _pointsPerShare = 0n;
  private _balance = 0n;
  private _undistributed = 0n;

  // ─── Curves ──────────────────────────────────────────────────────────

  /**
   * Append an immutable curve and return it.
   */
  createCurve(params: CurveParams): Curve {
    validateCurveParams(params);
    const curve: Curve = {
      id: this._curves.length,
      startTimestamp: params.startTimestamp,
      policy: { ...params.policy },
    };
    this._curves.push(curve);
    return curve;
  }

  getCurve(curveId: number): Curve {
    const curve = this._curves[curveId];
    if (curve === undefined) {
      throw new ValidationError("UNKNOWN_CURVE", `Curve ${curveId} does not exist`);
    }
    return curve;
  }

  get numCurves(): number {
    return this._curves.length;
  }

  listCurves(): readonly Curve[] {
    return [...this._curves];
  }

  multiplierOf(curveId: number, now: Timestamp): bigint {
    return curveMultiplier(this.getCurve(curveId), now);
  }

  // ─── Shares ──────────────────────────────────────────────────────────

  /**
   * Issue `amount × multiplier` shares to `account`. Zero shares is a no-op.
   */
  issueWithCurve(account: AccountId, amount: Amount, curveId: number, now: Timestamp): IssueResult {
    assertAmount(amount);
    const multiplier = this.multiplierOf(curveId, now);
    const shares = amount * multiplier;

    if (shares > 0n) {
      const holder = this.holderOf(account);
      this._holders.set(account, {
        ...holder,
        numShares: holder.numShares + shares,
        pointsCorrection: holder.pointsCorrection - this._pointsPerShare * shares,
      });
      this._totalShares += shares;
    }

    return { account, curveId, multiplier, shares };
  }

  /**
   * Remove every share `account` holds and crystallize its unclaimed
   * entitlement. The amount leaves the pool balance; the caller pays it.
   */
  burn(account: AccountId): BurnResult {
    const holder = this._holders.get(account);
    if (holder === undefined) {
      return { shares: 0n, amount: 0n };
    }

    const amount = this.rewardBalanceOf(account);
    this._holders.delete(account);
    this._totalShares -= holder.numShares;
    this._balance -= amount;
    if (this._totalShares === 0n) {
      // Rounding dust goes back to the next allocation
      this._undistributed = this._balance;
    }

    return { shares: holder.numShares, amount };
  }

  /**
   * Move a holder record to another account, merging with any record there.
   */
  transferHolder(from: AccountId, to: AccountId): void {
    const source = this._holders.get(from);
    if (source === undefined || from === to) {
      return;
    }

    const target = this.holderOf(to);
    this._holders.delete(from);
    this._holders.set(to, {
      numShares: target.numShares + source.numShares,
      pointsCorrection: target.pointsCorrection + source.pointsCorrection,
      rewardsWithdrawn: target.rewardsWithdrawn + source.rewardsWithdrawn,
    });
  }

  // ─── Allocation & claims ─────────────────────────────────────────────

  /**
   * Spread `amount` across current holders by share count.
   */
  allocate(amount: Amount): AllocationResult {
    assertAmount(amount);
    this._balance += amount;

    if (this._totalShares === 0n) {
      this._undistributed += amount;
      return { distributed: 0n, held: amount };
    }

    const distributed = amount + this._undistributed;
    this._undistributed = 0n;
    this._pointsPerShare += (distributed * MAGNITUDE) / this._totalShares;
    return { distributed, held: 0n };
  }

  rewardBalanceOf(account: AccountId): Amount {
    const holder = this._holders.get(account);
    if (holder === undefined) {
      return 0n;
    }
    const accumulated =
      (this._pointsPerShare * holder.numShares + holder.pointsCorrection) / MAGNITUDE;
    const withdrawable = accumulated - holder.rewardsWithdrawn;
    return withdrawable > 0n ? withdrawable : 0n;
  }

  /**
   * Advance `account`'s withdrawn checkpoint by its entitlement and return
   * the amount to pay. Zero is a no-op.
   */
  claim(account: AccountId): Amount {
    const amount = this.rewardBalanceOf(account);
    const holder = this._holders.get(account);
    if (amount === 0n || holder === undefined) {
      return 0n;
    }

    this._holders.set(account, {
      ...holder,
      rewardsWithdrawn: holder.rewardsWithdrawn + amount,
    });
    this._balance -= amount;
    return amount;
  }

  // ─── Views ───────────────────────────────────────────────────────────

  holderOf(account: AccountId): Holder {
    return this._holders.get(account) ?? EMPTY_HOLDER;
  }

  sharesOf(account: AccountId): bigint {
    return this.holderOf(account).numShares;
  }

  get totalShares(): bigint {
    return this._totalShares;
  }

  /** Allocated, unpaid value (includes undistributed value). */
  balance(): Amount {
    return this._balance;
  }

  detail(): PoolDetail {
    return {
      totalShares: this._totalShares,
      balance: this._balance,
      undistributed: this._undistributed,
      pointsPerShare: this._pointsPerShare,
      numCurves: this._curves.length,
    };
  }

  snapshot(): PoolSnapshot {
    return {
      ...this.detail(),
      curves: this.listCurves(),
      holders: Object.fromEntries(this._holders),
    };
  }

  // ─── Checkpoint ──────────────────────────────────────────────────────

  checkpoint(): Rollback {
    const curves = [...this._curves];
    const holders = new Map(this._holders);
    const totalShares = this._totalShares;
    const pointsPerShare = this._pointsPerShare;
    const balance = this._balance;
    const undistributed = this._undistributed;

    return () => {
      this._curves = curves;
      this._holders = holders;
      this._totalShares = totalShares;
      this._pointsPerShare = pointsPerShare;
      this._balance = balance;
      this._undistributed = undistributed;
    };
  }
}
