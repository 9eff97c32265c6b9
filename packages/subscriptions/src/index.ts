/**
 * @accrual/subscriptions — Time-metered access ledger.
 *
 * Provides:
 * - TierRegistry, SubscriptionLedger, ReferralRegistry and FeeSchedule
 * - AccessLedger, which runs them as one transactional ledger
 * - In-process collaborators (roles, identity tokens, clocks)
 * - Zod configuration and pino logging
 *
 * @packageDocumentation
 */

export { AccessLedger, DEFAULT_SLASH_GRACE_PERIOD } from "./access-ledger.js";
export type { AccessLedgerOptions, ContractDetail, LedgerSnapshot } from "./access-ledger.js";

export { TierRegistry, MAX_TIER_ID } from "./tiers.js";
export type { CurveCount, JoinOptions } from "./tiers.js";
export { SubscriptionLedger, convertTime } from "./subscription-ledger.js";
export type { SubscriptionLedgerOptions } from "./subscription-ledger.js";
export { ReferralRegistry } from "./referrals.js";
export { FeeSchedule, validateFeeParams, MAX_FEE_BPS } from "./fees.js";

export { RoleTable, SequentialIdentityRegistry, ManualClock, systemClock } from "./collaborators.js";

export {
  AccessLedgerConfigSchema,
  RuntimeConfigSchema,
  parseAccessLedgerConfig,
  createAccessLedger,
  loadRuntimeConfig,
} from "./config.js";
export type {
  AccessLedgerConfig,
  AccessLedgerConfigInput,
  AccessLedgerEnvironment,
  RuntimeConfig,
} from "./config.js";
export { createLogger } from "./logger.js";

export type {
  Role,
  Authorizer,
  IdentityRegistry,
  Clock,
  TierParams,
  Tier,
  Subscription,
  TierSwitch,
  TimeExtension,
  TimeReduction,
  SupplyDetail,
  ReferralCode,
  FeeParams,
  FeeSplit,
  RewardParams,
  CallContext,
  PurchaseRequest,
  PurchaseReceipt,
  SlashResult,
} from "./types.js";
