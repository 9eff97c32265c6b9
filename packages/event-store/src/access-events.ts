/**
 * @accrual/event-store — Access ledger domain event definitions.
 *
 * Naming convention: `<source>.<entity>.<action>`
 * Examples:
 * - subscriptions.subscription.purchased
 * - fees.referral.paid
 * - rewards.holder.slashed
 *
 * Amounts are decimal strings of base units; ids and timestamps are
 * numbers; accounts are strings.
 */

import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Subscription Events
// =============================================================================

export type SubscriptionMintedPayload = {
  readonly account: string;
  readonly tokenId: number;
};

export type SubscriptionPurchasedPayload = {
  readonly account: string;
  readonly tokenId: number;
  readonly tierId: number;
  readonly amount: string;
  readonly secondsAdded: number;
  readonly expiresAt: number;
};

export type SubscriptionGrantedPayload = {
  readonly account: string;
  readonly tokenId: number;
  readonly tierId: number;
  readonly secondsGranted: number;
  readonly expiresAt: number;
};

export type GrantRevokedPayload = {
  readonly account: string;
  readonly secondsRevoked: number;
  readonly expiresAt: number;
};

export type SubscriptionRefundedPayload = {
  readonly account: string;
  readonly amount: string;
  readonly secondsRemoved: number;
  readonly expiresAt: number;
};

export type SubscriptionSwitchedPayload = {
  readonly account: string;
  readonly fromTierId: number;
  readonly toTierId: number;
  readonly remainingSeconds: number;
};

export type SubscriptionDeactivatedPayload = {
  readonly account: string;
  readonly tierId: number;
};

export type SubscriptionTransferredPayload = {
  readonly from: string;
  readonly to: string;
  readonly tokenId: number;
};

export type FundsWithdrawnPayload = {
  readonly recipient: string;
  readonly amount: string;
};

export type SupplyCapUpdatedPayload = {
  readonly supplyCap: number;
};

// =============================================================================
// Fee Events
// =============================================================================

export type FeeTransferredPayload = {
  readonly recipient: string;
  readonly role: "protocol" | "client";
  readonly amount: string;
};

export type ReferralPaidPayload = {
  readonly referrer: string;
  readonly referralCode: number;
  readonly amount: string;
};

export type FeeRecipientUpdatedPayload = {
  readonly role: "protocol" | "client";
  readonly recipient: string | null;
};

// =============================================================================
// Tier & Referral Events
// =============================================================================

export type TierChangedPayload = {
  readonly tierId: number;
  readonly maxSupply: number;
};

export type TierPauseChangedPayload = {
  readonly tierId: number;
};

export type ReferralCodeSetPayload = {
  readonly referralCode: number;
  readonly basisPoints: number;
  readonly permanent: boolean;
  readonly referrer: string | null;
};

// =============================================================================
// Reward Events
// =============================================================================

export type CurveCreatedPayload = {
  readonly curveId: number;
  readonly kind: string;
};

export type SharesIssuedPayload = {
  readonly account: string;
  readonly curveId: number;
  readonly amount: string;
  readonly shares: string;
};

export type PoolAllocatedPayload = {
  readonly amount: string;
  readonly totalShares: string;
};

export type RewardsClaimedPayload = {
  readonly account: string;
  readonly amount: string;
};

export type HolderSlashedPayload = {
  readonly account: string;
  readonly shares: string;
  readonly amount: string;
};

export type SlashPayoutFailedPayload = {
  readonly account: string;
  readonly amount: string;
  readonly reason: string;
};

// =============================================================================
// Event Type Constants
// =============================================================================

export const ACCESS_EVENTS = {
  // Subscriptions
  SUBSCRIPTION_MINTED: "subscriptions.subscription.minted",
  SUBSCRIPTION_PURCHASED: "subscriptions.subscription.purchased",
  SUBSCRIPTION_GRANTED: "subscriptions.subscription.granted",
  GRANT_REVOKED: "subscriptions.grant.revoked",
  SUBSCRIPTION_REFUNDED: "subscriptions.subscription.refunded",
  SUBSCRIPTION_SWITCHED: "subscriptions.subscription.switched",
  SUBSCRIPTION_DEACTIVATED: "subscriptions.subscription.deactivated",
  SUBSCRIPTION_TRANSFERRED: "subscriptions.subscription.transferred",
  FUNDS_WITHDRAWN: "subscriptions.funds.withdrawn",
  SUPPLY_CAP_UPDATED: "subscriptions.supply-cap.updated",

  // Fees
  FEE_TRANSFERRED: "fees.fee.transferred",
  REFERRAL_PAID: "fees.referral.paid",
  FEE_RECIPIENT_UPDATED: "fees.recipient.updated",

  // Tiers
  TIER_CREATED: "tiers.tier.created",
  TIER_UPDATED: "tiers.tier.updated",
  TIER_PAUSED: "tiers.tier.paused",
  TIER_UNPAUSED: "tiers.tier.unpaused",

  // Referrals
  REFERRAL_CODE_SET: "referrals.code.set",

  // Rewards
  CURVE_CREATED: "rewards.curve.created",
  SHARES_ISSUED: "rewards.shares.issued",
  POOL_ALLOCATED: "rewards.pool.allocated",
  REWARDS_CLAIMED: "rewards.rewards.claimed",
  HOLDER_SLASHED: "rewards.holder.slashed",
  SLASH_PAYOUT_FAILED: "rewards.slash.payout-failed",
} as const;

export type AccessEventType = (typeof ACCESS_EVENTS)[keyof typeof ACCESS_EVENTS];

/** Payload shape of each event type. */
export type AccessEventPayloads = {
  [ACCESS_EVENTS.SUBSCRIPTION_MINTED]: SubscriptionMintedPayload;
  [ACCESS_EVENTS.SUBSCRIPTION_PURCHASED]: SubscriptionPurchasedPayload;
  [ACCESS_EVENTS.SUBSCRIPTION_GRANTED]: SubscriptionGrantedPayload;
  [ACCESS_EVENTS.GRANT_REVOKED]: GrantRevokedPayload;
  [ACCESS_EVENTS.SUBSCRIPTION_REFUNDED]: SubscriptionRefundedPayload;
  [ACCESS_EVENTS.SUBSCRIPTION_SWITCHED]: SubscriptionSwitchedPayload;
  [ACCESS_EVENTS.SUBSCRIPTION_DEACTIVATED]: SubscriptionDeactivatedPayload;
  [ACCESS_EVENTS.SUBSCRIPTION_TRANSFERRED]: SubscriptionTransferredPayload;
  [ACCESS_EVENTS.FUNDS_WITHDRAWN]: FundsWithdrawnPayload;
  [ACCESS_EVENTS.SUPPLY_CAP_UPDATED]: SupplyCapUpdatedPayload;
  [ACCESS_EVENTS.FEE_TRANSFERRED]: FeeTransferredPayload;
  [ACCESS_EVENTS.REFERRAL_PAID]: ReferralPaidPayload;
  [ACCESS_EVENTS.FEE_RECIPIENT_UPDATED]: FeeRecipientUpdatedPayload;
  [ACCESS_EVENTS.TIER_CREATED]: TierChangedPayload;
  [ACCESS_EVENTS.TIER_UPDATED]: TierChangedPayload;
  [ACCESS_EVENTS.TIER_PAUSED]: TierPauseChangedPayload;
  [ACCESS_EVENTS.TIER_UNPAUSED]: TierPauseChangedPayload;
  [ACCESS_EVENTS.REFERRAL_CODE_SET]: ReferralCodeSetPayload;
  [ACCESS_EVENTS.CURVE_CREATED]: CurveCreatedPayload;
  [ACCESS_EVENTS.SHARES_ISSUED]: SharesIssuedPayload;
  [ACCESS_EVENTS.POOL_ALLOCATED]: PoolAllocatedPayload;
  [ACCESS_EVENTS.REWARDS_CLAIMED]: RewardsClaimedPayload;
  [ACCESS_EVENTS.HOLDER_SLASHED]: HolderSlashedPayload;
  [ACCESS_EVENTS.SLASH_PAYOUT_FAILED]: SlashPayoutFailedPayload;
};

// =============================================================================
// Schema Definitions
// =============================================================================

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function hasString(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "string";
}

function hasNumber(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "number";
}

/** Decimal string of base units. */
function hasAmount(obj: Record<string, unknown>, key: string): boolean {
  const value = obj[key];
  return typeof value === "string" && /^\d+$/.test(value);
}

const SUBSCRIPTION_SCHEMAS: readonly EventSchema[] = [
  {
    type: ACCESS_EVENTS.SUBSCRIPTION_MINTED,
    version: 1,
    description: "A subscription record and identity token were created for an account",
    source: "subscriptions",
    validate: (p) => isObject(p) && hasString(p, "account") && hasNumber(p, "tokenId"),
  },
  {
    type: ACCESS_EVENTS.SUBSCRIPTION_PURCHASED,
    version: 1,
    description: "Paid time was added to a subscription",
    source: "subscriptions",
    validate: (p) =>
      isObject(p) && hasString(p, "account") && hasAmount(p, "amount") && hasNumber(p, "secondsAdded"),
  },
  {
    type: ACCESS_EVENTS.SUBSCRIPTION_GRANTED,
    version: 1,
    description: "Time was granted to a subscription without payment",
    source: "subscriptions",
    validate: (p) => isObject(p) && hasString(p, "account") && hasNumber(p, "secondsGranted"),
  },
  {
    type: ACCESS_EVENTS.GRANT_REVOKED,
    version: 1,
    description: "Outstanding granted time was revoked",
    source: "subscriptions",
    validate: (p) => isObject(p) && hasString(p, "account") && hasNumber(p, "secondsRevoked"),
  },
  {
    type: ACCESS_EVENTS.SUBSCRIPTION_REFUNDED,
    version: 1,
    description: "Funds were returned to a subscriber and the matching time removed",
    source: "subscriptions",
    validate: (p) =>
      isObject(p) && hasString(p, "account") && hasAmount(p, "amount") && hasNumber(p, "secondsRemoved"),
  },
  {
    type: ACCESS_EVENTS.SUBSCRIPTION_SWITCHED,
    version: 1,
    description: "A subscription moved to another tier with its remaining time converted",
    source: "subscriptions",
    validate: (p) =>
      isObject(p) && hasString(p, "account") && hasNumber(p, "fromTierId") && hasNumber(p, "toTierId"),
  },
  {
    type: ACCESS_EVENTS.SUBSCRIPTION_DEACTIVATED,
    version: 1,
    description: "An expired subscription left its tier",
    source: "subscriptions",
    validate: (p) => isObject(p) && hasString(p, "account") && hasNumber(p, "tierId"),
  },
  {
    type: ACCESS_EVENTS.SUBSCRIPTION_TRANSFERRED,
    version: 1,
    description: "A subscription and its reward holding moved to another account",
    source: "subscriptions",
    validate: (p) => isObject(p) && hasString(p, "from") && hasString(p, "to") && hasNumber(p, "tokenId"),
  },
  {
    type: ACCESS_EVENTS.FUNDS_WITHDRAWN,
    version: 1,
    description: "Creator funds were withdrawn",
    source: "subscriptions",
    validate: (p) => isObject(p) && hasString(p, "recipient") && hasAmount(p, "amount"),
  },
  {
    type: ACCESS_EVENTS.SUPPLY_CAP_UPDATED,
    version: 1,
    description: "The global subscriber cap changed",
    source: "subscriptions",
    validate: (p) => isObject(p) && hasNumber(p, "supplyCap"),
  },
];

const FEE_SCHEMAS: readonly EventSchema[] = [
  {
    type: ACCESS_EVENTS.FEE_TRANSFERRED,
    version: 1,
    description: "A protocol or client fee was paid out",
    source: "fees",
    validate: (p) =>
      isObject(p) && hasString(p, "recipient") && hasString(p, "role") && hasAmount(p, "amount"),
  },
  {
    type: ACCESS_EVENTS.REFERRAL_PAID,
    version: 1,
    description: "A referral reward was carved out of the client fee",
    source: "fees",
    validate: (p) =>
      isObject(p) && hasString(p, "referrer") && hasNumber(p, "referralCode") && hasAmount(p, "amount"),
  },
  {
    type: ACCESS_EVENTS.FEE_RECIPIENT_UPDATED,
    version: 1,
    description: "A fee recipient changed (null zeroes its basis points)",
    source: "fees",
    validate: (p) =>
      isObject(p) && hasString(p, "role") && (p.recipient === null || hasString(p, "recipient")),
  },
];

const TIER_SCHEMAS: readonly EventSchema[] = [
  {
    type: ACCESS_EVENTS.TIER_CREATED,
    version: 1,
    description: "A tier was created",
    source: "tiers",
    validate: (p) => isObject(p) && hasNumber(p, "tierId") && hasNumber(p, "maxSupply"),
  },
  {
    type: ACCESS_EVENTS.TIER_UPDATED,
    version: 1,
    description: "A tier's parameters were overwritten",
    source: "tiers",
    validate: (p) => isObject(p) && hasNumber(p, "tierId") && hasNumber(p, "maxSupply"),
  },
  {
    type: ACCESS_EVENTS.TIER_PAUSED,
    version: 1,
    description: "A tier stopped accepting purchases",
    source: "tiers",
    validate: (p) => isObject(p) && hasNumber(p, "tierId"),
  },
  {
    type: ACCESS_EVENTS.TIER_UNPAUSED,
    version: 1,
    description: "A tier resumed accepting purchases",
    source: "tiers",
    validate: (p) => isObject(p) && hasNumber(p, "tierId"),
  },
];

const REFERRAL_SCHEMAS: readonly EventSchema[] = [
  {
    type: ACCESS_EVENTS.REFERRAL_CODE_SET,
    version: 1,
    description: "A referral code was created or changed",
    source: "referrals",
    validate: (p) =>
      isObject(p) &&
      hasNumber(p, "referralCode") &&
      hasNumber(p, "basisPoints") &&
      typeof p.permanent === "boolean",
  },
];

const REWARD_SCHEMAS: readonly EventSchema[] = [
  {
    type: ACCESS_EVENTS.CURVE_CREATED,
    version: 1,
    description: "A reward curve was appended",
    source: "rewards",
    validate: (p) => isObject(p) && hasNumber(p, "curveId") && hasString(p, "kind"),
  },
  {
    type: ACCESS_EVENTS.SHARES_ISSUED,
    version: 1,
    description: "Reward shares were issued to a holder",
    source: "rewards",
    validate: (p) => isObject(p) && hasString(p, "account") && hasAmount(p, "shares"),
  },
  {
    type: ACCESS_EVENTS.POOL_ALLOCATED,
    version: 1,
    description: "Value was allocated to the reward pool",
    source: "rewards",
    validate: (p) => isObject(p) && hasAmount(p, "amount") && hasAmount(p, "totalShares"),
  },
  {
    type: ACCESS_EVENTS.REWARDS_CLAIMED,
    version: 1,
    description: "A holder's rewards were paid out",
    source: "rewards",
    validate: (p) => isObject(p) && hasString(p, "account") && hasAmount(p, "amount"),
  },
  {
    type: ACCESS_EVENTS.HOLDER_SLASHED,
    version: 1,
    description: "A lapsed holder's shares were burned and their entitlement crystallized",
    source: "rewards",
    validate: (p) => isObject(p) && hasString(p, "account") && hasAmount(p, "shares"),
  },
  {
    type: ACCESS_EVENTS.SLASH_PAYOUT_FAILED,
    version: 1,
    description: "A slash payout failed; the amount stayed in the pool",
    source: "rewards",
    validate: (p) => isObject(p) && hasString(p, "account") && hasString(p, "reason"),
  },
];

// =============================================================================
// Factory
// =============================================================================

/**
 * Create an EventCatalog with every access ledger event registered.
 */
export function createAccessCatalog(): EventCatalog {
  const catalog = new EventCatalog();

  for (const schema of [
    ...SUBSCRIPTION_SCHEMAS,
    ...FEE_SCHEMAS,
    ...TIER_SCHEMAS,
    ...REFERRAL_SCHEMAS,
    ...REWARD_SCHEMAS,
  ]) {
    catalog.register(schema);
  }

  return catalog;
}
