/**
 * @accrual/subscriptions — Referral registry.
 *
 * Maps integer codes to a referral rate, an optional restricted referrer
 * and a permanence flag. Permanent codes are immutable.
 */

import { assertBasisPoints, StateConflictError, ValidationError } from "@accrual/ledger";
import type { Checkpointable, Rollback } from "@accrual/ledger";
import type { AccountId, BasisPoints } from "@accrual/types";
import type { ReferralCode } from "./types.js";

export class ReferralRegistry implements Checkpointable {
  private codes = new Map<number, ReferralCode>();

  /**
   * Create or replace a referral code. `maxBps` is the current client fee rate.
   */
  set(code: number, params: ReferralCode, maxBps: BasisPoints): ReferralCode {
    if (!Number.isSafeInteger(code) || code < 0) {
      throw new ValidationError("INVALID_FEE_PARAMS", `Referral code must be a non-negative integer, got ${code}`);
    }
    assertBasisPoints(params.basisPoints, maxBps, "referral basis points");

    if (this.codes.get(code)?.permanent === true) {
      throw new StateConflictError("REFERRAL_LOCKED", `Referral code ${code} is permanent`);
    }

    const entry: ReferralCode = { ...params };
    this.codes.set(code, entry);
    return entry;
  }

  get(code: number): ReferralCode | undefined {
    return this.codes.get(code);
  }

  /**
   * Rate `code` pays to `referrer`, or 0 if the code is unknown or
   * restricted to someone else.
   */
  resolve(code: number, referrer: AccountId | null): BasisPoints {
    const entry = this.codes.get(code);
    if (entry === undefined || referrer === null) {
      return 0;
    }
    if (entry.referrer !== null && entry.referrer !== referrer) {
      return 0;
    }
    return entry.basisPoints;
  }

  checkpoint(): Rollback {
    const codes = new Map(this.codes);
    return () => {
      this.codes = codes;
    };
  }
}
