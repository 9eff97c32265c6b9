/**
 * @accrual/subscriptions — Core types.
 *
 * Tiers, subscriptions, referral codes and fee parameters, plus the narrow
 * collaborator interfaces the ledger consumes from the identity and
 * authorization layers.
 */

import type { Checkpointable } from "@accrual/ledger";
import type { AccountId, Amount, BasisPoints, Timestamp } from "@accrual/types";

// =============================================================================
// Collaborators
// =============================================================================

export type Role = "manager" | "agent" | "issuer";

/** Yes/no gate consulted before privileged operations. */
export interface Authorizer {
  isAuthorized(caller: AccountId, role: Role): boolean;
}

/** Issues identity tokens. Ids are opaque positive integers, never reused. */
export interface IdentityRegistry extends Checkpointable {
  mint(account: AccountId): number;
}

/** Unix seconds. */
export interface Clock {
  now(): Timestamp;
}

// =============================================================================
// Tiers
// =============================================================================

export interface TierParams {
  readonly periodDurationSeconds: number;
  readonly pricePerPeriod: Amount;
  /** Charged once, on an account's first purchase */
  readonly initialMintPrice: Amount;
  /** 0 = unlimited */
  readonly maxSupply: number;
  readonly transferable: boolean;
  readonly rewardBasisPoints: BasisPoints;
  readonly rewardCurveId: number;
  /** Joins open at this instant (0 = immediately) */
  readonly startTimestamp: Timestamp;
  /** Joins and renewals close at this instant (0 = open-ended) */
  readonly endTimestamp: Timestamp;
  /** Upper bound on remaining time after a purchase (0 = unlimited) */
  readonly maxCommitmentSeconds: number;
  readonly paused?: boolean;
}

export interface Tier extends Required<TierParams> {
  /** 1-based, monotonic */
  readonly id: number;
  readonly subCount: number;
}

// =============================================================================
// Subscriptions
// =============================================================================

export interface Subscription {
  /** 0 = none */
  readonly tokenId: number;
  /** 0 = no active tier */
  readonly tierId: number;
  readonly expiresAt: Timestamp;
  /** Outstanding time added without payment */
  readonly grantedSeconds: number;
  /** End bound of paid time; 0 means no purchase history */
  readonly purchaseExpires: Timestamp;
}

export interface TierSwitch {
  readonly fromTierId: number;
  readonly toTierId: number;
  /** Remaining seconds after conversion into the new tier */
  readonly remainingSeconds: number;
}

export interface TimeExtension {
  readonly tokenId: number;
  readonly tierId: number;
  readonly secondsAdded: number;
  readonly expiresAt: Timestamp;
  readonly switched?: TierSwitch;
}

export interface TimeReduction {
  readonly secondsRemoved: number;
  readonly expiresAt: Timestamp;
}

export interface SupplyDetail {
  readonly subscriberCount: number;
  /** 0 = unlimited */
  readonly supplyCap: number;
}

// =============================================================================
// Referrals & fees
// =============================================================================

export interface ReferralCode {
  readonly basisPoints: BasisPoints;
  /** Once true, the code can never change */
  readonly permanent: boolean;
  /** Only this account may use the code (null = anyone) */
  readonly referrer: AccountId | null;
}

export interface FeeParams {
  readonly protocolRecipient: AccountId | null;
  readonly protocolBps: BasisPoints;
  readonly clientRecipient: AccountId | null;
  readonly clientBps: BasisPoints;
  /** Referral rate used when no code resolves */
  readonly clientReferralBps: BasisPoints;
}

export interface FeeSplit {
  readonly gross: Amount;
  readonly protocolFee: Amount;
  /** Client fee after the referral carve-out */
  readonly clientFee: Amount;
  readonly referralFee: Amount;
  readonly referralBps: BasisPoints;
  /** gross − protocol fee − client fee before the carve-out */
  readonly net: Amount;
}

export interface RewardParams {
  readonly slashable: boolean;
  /** Seconds after expiry before a holder can be slashed */
  readonly slashGracePeriod: number;
}

// =============================================================================
// Orchestrator
// =============================================================================

export interface CallContext {
  readonly caller: AccountId;
  /** Native value attached to the call */
  readonly value?: Amount;
}

export interface PurchaseRequest {
  readonly account: AccountId;
  /** 0 = keep the current tier (tier 1 for new accounts) */
  readonly tierId: number;
  readonly amount: Amount;
  /** 0 = no code */
  readonly referralCode: number;
  readonly referrer: AccountId | null;
}

export interface PurchaseReceipt {
  readonly tokenId: number;
  readonly tierId: number;
  readonly secondsAdded: number;
  readonly expiresAt: Timestamp;
  readonly amount: Amount;
  readonly net: Amount;
  readonly protocolFee: Amount;
  readonly clientFee: Amount;
  readonly referralFee: Amount;
  readonly rewardsAllocated: Amount;
  readonly sharesIssued: bigint;
}

export interface SlashResult {
  readonly shares: bigint;
  readonly amount: Amount;
  /** False when the payout failed and the amount went back to the pool */
  readonly paid: boolean;
}
