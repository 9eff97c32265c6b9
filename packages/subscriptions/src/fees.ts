/**
 * @accrual/subscriptions — Fee schedule.
 *
 * Rules:
 * - protocolBps + clientBps ≤ MAX_FEE_BPS
 * - A recipient is null exactly when its rate is 0
 * - clientReferralBps ≤ clientBps
 * - Protocol and client fees are taken from the gross amount
 * - The referral is taken from the amount after the protocol fee and comes
 *   out of the client fee
 * - Every leg rounds down
 */

import { applyBps, assertBasisPoints, NotEligibleError, ValidationError } from "@accrual/ledger";
import type { Checkpointable, Rollback } from "@accrual/ledger";
import type { AccountId, Amount, BasisPoints } from "@accrual/types";
import type { FeeParams, FeeSplit } from "./types.js";

/** 12.5% */
export const MAX_FEE_BPS = 1_250;

export function validateFeeParams(params: FeeParams): void {
  assertBasisPoints(params.protocolBps, MAX_FEE_BPS, "protocolBps");
  assertBasisPoints(params.clientBps, MAX_FEE_BPS, "clientBps");
  assertBasisPoints(params.clientReferralBps, params.clientBps, "clientReferralBps");

  if (params.protocolBps + params.clientBps > MAX_FEE_BPS) {
    throw new ValidationError(
      "INVALID_FEE_PARAMS",
      `Combined fees of ${params.protocolBps + params.clientBps} bps exceed ${MAX_FEE_BPS}`,
    );
  }
  if ((params.protocolRecipient === null) !== (params.protocolBps === 0)) {
    throw new ValidationError("INVALID_FEE_PARAMS", "protocolRecipient must be set exactly when protocolBps > 0");
  }
  if ((params.clientRecipient === null) !== (params.clientBps === 0)) {
    throw new ValidationError("INVALID_FEE_PARAMS", "clientRecipient must be set exactly when clientBps > 0");
  }
}

export class FeeSchedule implements Checkpointable {
  private current: FeeParams;

  constructor(params: FeeParams) {
    validateFeeParams(params);
    this.current = { ...params };
  }

  get params(): FeeParams {
    return this.current;
  }

  /**
   * Split a captured amount. A referral is paid only when `referrer` is set;
   * `codeBps` (from the referral registry) wins when non-zero, otherwise
   * the client referral rate applies.
   */
  split(gross: Amount, codeBps: BasisPoints, referrer: AccountId | null): FeeSplit {
    const { protocolBps, clientBps, clientReferralBps } = this.current;
    const protocolFee = applyBps(gross, protocolBps);
    const clientGross = applyBps(gross, clientBps);

    const referralBps =
      referrer === null ? 0 : Math.min(codeBps > 0 ? codeBps : clientReferralBps, clientBps);
    const referralFee = applyBps(gross - protocolFee, referralBps);

    return {
      gross,
      protocolFee,
      clientFee: clientGross - referralFee,
      referralFee,
      referralBps,
      net: gross - protocolFee - clientGross,
    };
  }

  /**
   * Only the current protocol recipient may move or drop the protocol fee.
   */
  updateProtocolRecipient(caller: AccountId, recipient: AccountId | null): FeeParams {
    if (this.current.protocolRecipient === null || caller !== this.current.protocolRecipient) {
      throw new NotEligibleError("NOT_FEE_RECIPIENT", `${caller} is not the protocol fee recipient`);
    }
    if (recipient !== null && this.current.protocolBps === 0) {
      throw new ValidationError("INVALID_FEE_PARAMS", "Cannot set a recipient for a zero protocol fee");
    }

    this.current =
      recipient === null
        ? { ...this.current, protocolRecipient: null, protocolBps: 0 }
        : { ...this.current, protocolRecipient: recipient };
    return this.current;
  }

  /**
   * The current client recipient, or a manager, may move or drop the client
   * fee. Dropping it also drops the client referral rate.
   */
  updateClientRecipient(caller: AccountId, recipient: AccountId | null, callerIsManager: boolean): FeeParams {
    if (!callerIsManager && caller !== this.current.clientRecipient) {
      throw new NotEligibleError("NOT_FEE_RECIPIENT", `${caller} is not the client fee recipient`);
    }
    if (recipient !== null && this.current.clientBps === 0) {
      throw new ValidationError("INVALID_FEE_PARAMS", "Cannot set a recipient for a zero client fee");
    }

    this.current =
      recipient === null
        ? { ...this.current, clientRecipient: null, clientBps: 0, clientReferralBps: 0 }
        : { ...this.current, clientRecipient: recipient };
    return this.current;
  }

  checkpoint(): Rollback {
    const params = this.current;
    return () => {
      this.current = params;
    };
  }
}
