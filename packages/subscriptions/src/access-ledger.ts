/**
 * @accrual/subscriptions — AccessLedger.
 *
 * Composes the currency, tier registry, subscription ledger, fee schedule,
 * referral registry and reward pool into one ledger. Every mutating entry
 * point is a transaction:
 *
 * 1. The re-entrancy guard admits one operation at a time
 * 2. Every component and the asset book are checkpointed
 * 3. The operation runs, buffering its events
 * 4. On error everything is rolled back and no event is published
 * 5. On success the events are validated and appended to the store
 *
 * The one failure that does not abort is a slash payout: the amount stays
 * in the pool and a fallback event is published instead.
 */

import pino from "pino";
import type { Logger } from "pino";
import {
  ACCESS_EVENTS,
  createAccessCatalog,
  createVersionedEvent,
  InMemoryEventStore,
} from "@accrual/event-store";
import type {
  AccessEventPayloads,
  AccessEventType,
  EventCatalog,
  EventStore,
} from "@accrual/event-store";
import {
  applyBps,
  assertAmount,
  AuthorizationError,
  checkpointAll,
  InsufficientFundsError,
  NotEligibleError,
  ReentrancyGuard,
  ValidationError,
} from "@accrual/ledger";
import type { Checkpointable, Currency } from "@accrual/ledger";
import { RewardPool } from "@accrual/rewards";
import type { Curve, CurveParams, Holder, PoolDetail, PoolSnapshot } from "@accrual/rewards";
import { isAccountId } from "@accrual/types";
import type { AccountId, Amount, CurrencyRef, DomainEvent } from "@accrual/types";
import { SequentialIdentityRegistry, systemClock } from "./collaborators.js";
import { FeeSchedule } from "./fees.js";
import { ReferralRegistry } from "./referrals.js";
import { SubscriptionLedger } from "./subscription-ledger.js";
import { TierRegistry } from "./tiers.js";
import type {
  Authorizer,
  CallContext,
  Clock,
  FeeParams,
  IdentityRegistry,
  PurchaseReceipt,
  PurchaseRequest,
  ReferralCode,
  RewardParams,
  Role,
  SlashResult,
  Subscription,
  Tier,
  TierParams,
  TimeExtension,
  TimeReduction,
} from "./types.js";

export const DEFAULT_SLASH_GRACE_PERIOD = 7 * 86_400;

// =============================================================================
// Options & views
// =============================================================================

export interface AccessLedgerOptions {
  readonly currency: Currency;
  readonly authorizer: Authorizer;
  readonly fees: FeeParams;
  /** Becomes curve 0 */
  readonly initialCurve: CurveParams;
  /** Becomes tier 1 */
  readonly initialTier: TierParams;
  readonly rewards?: Partial<RewardParams>;
  /** 0 = unlimited */
  readonly globalSupplyCap?: number;
  readonly identities?: IdentityRegistry;
  readonly clock?: Clock;
  readonly eventStore?: EventStore;
  readonly logger?: Logger;
}

export interface ContractDetail {
  readonly currency: CurrencyRef;
  readonly balance: Amount;
  readonly creatorBalance: Amount;
  readonly subscriberCount: number;
  readonly supplyCap: number;
  readonly numTiers: number;
  readonly numCurves: number;
  readonly rewardParams: RewardParams;
}

export interface LedgerSnapshot {
  readonly subscriptions: Readonly<Record<AccountId, Subscription>>;
  readonly tiers: readonly Tier[];
  readonly fees: FeeParams;
  readonly rewardParams: RewardParams;
  readonly subscriberCount: number;
  readonly supplyCap: number;
  readonly pool: PoolSnapshot;
}

interface PendingEvent {
  readonly type: AccessEventType;
  readonly payload: Readonly<Record<string, unknown>>;
}

type Emit = <T extends AccessEventType>(type: T, payload: AccessEventPayloads[T]) => void;

// =============================================================================
// AccessLedger
// =============================================================================

export class AccessLedger {
  readonly events: EventStore;

  private readonly currency: Currency;
  private readonly authorizer: Authorizer;
  private readonly identities: IdentityRegistry;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly catalog: EventCatalog;
  private readonly guard = new ReentrancyGuard();

  private readonly pool = new RewardPool();
  private readonly tiers: TierRegistry;
  private readonly subscriptions: SubscriptionLedger;
  private readonly referrals = new ReferralRegistry();
  private readonly fees: FeeSchedule;
  private readonly rewardParams: RewardParams;
  private readonly participants: readonly Checkpointable[];
  private operationSeq = 0;

  constructor(options: AccessLedgerOptions) {
    this.currency = options.currency;
    this.authorizer = options.authorizer;
    this.identities = options.identities ?? new SequentialIdentityRegistry();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? pino({ level: "silent" });
    this.events = options.eventStore ?? new InMemoryEventStore();
    this.catalog = createAccessCatalog();

    const grace = options.rewards?.slashGracePeriod ?? DEFAULT_SLASH_GRACE_PERIOD;
    if (!Number.isSafeInteger(grace) || grace < 0) {
      throw new ValidationError("INVALID_DURATION", `slashGracePeriod must be a non-negative integer, got ${grace}`);
    }
    this.rewardParams = { slashable: options.rewards?.slashable ?? true, slashGracePeriod: grace };

    this.fees = new FeeSchedule(options.fees);
    this.tiers = new TierRegistry(this.pool);
    this.subscriptions = new SubscriptionLedger({
      tiers: this.tiers,
      identities: this.identities,
      clock: this.clock,
      supplyCap: options.globalSupplyCap ?? 0,
    });
    this.participants = [
      this.currency,
      this.identities,
      this.pool,
      this.tiers,
      this.subscriptions,
      this.referrals,
      this.fees,
    ];

    this.pool.createCurve(options.initialCurve);
    this.tiers.createTier(options.initialTier);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Purchases
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Capture payment from the caller, add time to `account`, pay the fee
   * legs, issue reward shares on the net amount and allocate the tier's
   * reward cut to the pool.
   */
  purchase(ctx: CallContext, request: PurchaseRequest): PurchaseReceipt {
    return this.execute("purchase", ctx.caller, (emit) => {
      const { account } = request;
      this.assertAccount(account);
      if (request.referrer !== null) {
        this.assertAccount(request.referrer);
      }

      const gross = this.currency.capture(ctx.caller, request.amount, ctx.value ?? 0n);
      this.ensureMinted(account, emit);

      const time = this.subscriptions.purchase(account, ctx.caller, gross, request.tierId);
      emit(ACCESS_EVENTS.SUBSCRIPTION_PURCHASED, {
        account,
        tokenId: time.tokenId,
        tierId: time.tierId,
        amount: gross.toString(),
        secondsAdded: time.secondsAdded,
        expiresAt: time.expiresAt,
      });
      this.emitSwitch(account, time, emit);

      const codeBps = this.referrals.resolve(request.referralCode, request.referrer);
      const split = this.fees.split(gross, codeBps, request.referrer);
      const { protocolRecipient, clientRecipient } = this.fees.params;
      this.payFee(protocolRecipient, "protocol", split.protocolFee, emit);
      this.payFee(clientRecipient, "client", split.clientFee, emit);
      if (request.referrer !== null && split.referralFee > 0n) {
        this.currency.transfer(request.referrer, split.referralFee);
        emit(ACCESS_EVENTS.REFERRAL_PAID, {
          referrer: request.referrer,
          referralCode: request.referralCode,
          amount: split.referralFee.toString(),
        });
      }

      const tier = this.tiers.get(time.tierId);
      const issued = this.pool.issueWithCurve(account, split.net, tier.rewardCurveId, this.clock.now());
      if (issued.shares > 0n) {
        emit(ACCESS_EVENTS.SHARES_ISSUED, {
          account,
          curveId: issued.curveId,
          amount: split.net.toString(),
          shares: issued.shares.toString(),
        });
      }

      const rewards = applyBps(split.net, tier.rewardBasisPoints);
      this.allocate(rewards, emit);

      return {
        tokenId: time.tokenId,
        tierId: time.tierId,
        secondsAdded: time.secondsAdded,
        expiresAt: time.expiresAt,
        amount: gross,
        net: split.net,
        protocolFee: split.protocolFee,
        clientFee: split.clientFee,
        referralFee: split.referralFee,
        rewardsAllocated: rewards,
        sharesIssued: issued.shares,
      };
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Grants & refunds
  // ───────────────────────────────────────────────────────────────────────

  grantTime(ctx: CallContext, account: AccountId, seconds: number, tierId: number): TimeExtension {
    return this.execute("grantTime", ctx.caller, (emit) => {
      this.requireRole(ctx.caller, "agent");
      this.assertAccount(account);
      this.ensureMinted(account, emit);

      const time = this.subscriptions.grant(account, seconds, tierId);
      emit(ACCESS_EVENTS.SUBSCRIPTION_GRANTED, {
        account,
        tokenId: time.tokenId,
        tierId: time.tierId,
        secondsGranted: seconds,
        expiresAt: time.expiresAt,
      });
      this.emitSwitch(account, time, emit);
      return time;
    });
  }

  revokeTime(ctx: CallContext, account: AccountId): TimeReduction {
    return this.execute("revokeTime", ctx.caller, (emit) => {
      this.requireRole(ctx.caller, "agent");
      const reduction = this.subscriptions.revoke(account);
      emit(ACCESS_EVENTS.GRANT_REVOKED, {
        account,
        secondsRevoked: reduction.secondsRemoved,
        expiresAt: reduction.expiresAt,
      });
      return reduction;
    });
  }

  /**
   * Return `amount` from the creator balance to `account` and remove the
   * time it paid for.
   */
  refund(ctx: CallContext, account: AccountId, amount: Amount): TimeReduction {
    return this.execute("refund", ctx.caller, (emit) => {
      this.requireRole(ctx.caller, "manager");
      assertAmount(amount);
      this.assertCreatorBalance(amount);

      const reduction = this.subscriptions.refund(account, amount);
      this.currency.transfer(account, amount);
      emit(ACCESS_EVENTS.SUBSCRIPTION_REFUNDED, {
        account,
        amount: amount.toString(),
        secondsRemoved: reduction.secondsRemoved,
        expiresAt: reduction.expiresAt,
      });
      return reduction;
    });
  }

  /**
   * Drop an expired subscription's tier. Anyone may call; returns whether
   * anything changed.
   */
  deactivateSubscription(ctx: CallContext, account: AccountId): boolean {
    return this.execute("deactivateSubscription", ctx.caller, (emit) => {
      const tierId = this.subscriptions.get(account).tierId;
      const changed = this.subscriptions.deactivate(account);
      if (changed) {
        emit(ACCESS_EVENTS.SUBSCRIPTION_DEACTIVATED, { account, tierId });
      }
      return changed;
    });
  }

  withdraw(ctx: CallContext, to: AccountId, amount: Amount): void {
    this.execute("withdraw", ctx.caller, (emit) => {
      this.requireRole(ctx.caller, "manager");
      this.assertAccount(to);
      assertAmount(amount);
      this.assertCreatorBalance(amount);

      this.currency.transfer(to, amount);
      emit(ACCESS_EVENTS.FUNDS_WITHDRAWN, { recipient: to, amount: amount.toString() });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Rewards
  // ───────────────────────────────────────────────────────────────────────

  /** Permissionless top-up of the reward pool. */
  yieldRewards(ctx: CallContext, amount: Amount): void {
    this.execute("yieldRewards", ctx.caller, (emit) => {
      const captured = this.currency.capture(ctx.caller, amount, ctx.value ?? 0n);
      this.allocate(captured, emit);
    });
  }

  /** Pay `account` its rewards. Anyone may trigger it. */
  claimRewards(ctx: CallContext, account: AccountId): Amount {
    return this.execute("claimRewards", ctx.caller, (emit) => {
      const amount = this.pool.claim(account);
      if (amount > 0n) {
        this.currency.transfer(account, amount);
        emit(ACCESS_EVENTS.REWARDS_CLAIMED, { account, amount: amount.toString() });
      }
      return amount;
    });
  }

  /**
   * Burn a lapsed holder's shares and pay out their unclaimed entitlement.
   */
  slash(ctx: CallContext, account: AccountId): SlashResult {
    return this.execute("slash", ctx.caller, (emit) => {
      const { slashable, slashGracePeriod } = this.rewardParams;
      const expiresAt = this.subscriptions.get(account).expiresAt;
      if (!slashable) {
        throw new NotEligibleError("NOT_SLASHABLE", "The reward pool is not slashable");
      }
      if (this.pool.sharesOf(account) === 0n) {
        throw new NotEligibleError("NOT_SLASHABLE", `${account} holds no shares`);
      }
      if (this.clock.now() <= expiresAt + slashGracePeriod) {
        throw new NotEligibleError(
          "NOT_SLASHABLE",
          `${account} cannot be slashed before ${expiresAt + slashGracePeriod}`,
        );
      }

      const burned = this.pool.burn(account);
      emit(ACCESS_EVENTS.HOLDER_SLASHED, {
        account,
        shares: burned.shares.toString(),
        amount: burned.amount.toString(),
      });

      const outcome = this.currency.tryTransfer(account, burned.amount);
      if (outcome.ok) {
        return { shares: burned.shares, amount: burned.amount, paid: true };
      }

      this.logger.warn(
        { account, amount: burned.amount.toString(), reason: outcome.reason },
        "Slash payout failed; amount returned to the pool",
      );
      emit(ACCESS_EVENTS.SLASH_PAYOUT_FAILED, {
        account,
        amount: burned.amount.toString(),
        reason: outcome.reason,
      });
      this.allocate(burned.amount, emit);
      return { shares: burned.shares, amount: burned.amount, paid: false };
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  createTier(ctx: CallContext, params: TierParams): Tier {
    return this.execute("createTier", ctx.caller, (emit) => {
      this.requireRole(ctx.caller, "manager");
      const tier = this.tiers.createTier(params);
      emit(ACCESS_EVENTS.TIER_CREATED, { tierId: tier.id, maxSupply: tier.maxSupply });
      return tier;
    });
  }

  updateTier(ctx: CallContext, tierId: number, params: TierParams): Tier {
    return this.execute("updateTier", ctx.caller, (emit) => {
      this.requireRole(ctx.caller, "manager");
      const tier = this.tiers.updateTier(tierId, params);
      emit(ACCESS_EVENTS.TIER_UPDATED, { tierId: tier.id, maxSupply: tier.maxSupply });
      return tier;
    });
  }

  pauseTier(ctx: CallContext, tierId: number): Tier {
    return this.execute("pauseTier", ctx.caller, (emit) => {
      this.requireRole(ctx.caller, "manager");
      const tier = this.tiers.pause(tierId);
      emit(ACCESS_EVENTS.TIER_PAUSED, { tierId });
      return tier;
    });
  }

  unpauseTier(ctx: CallContext, tierId: number): Tier {
    return this.execute("unpauseTier", ctx.caller, (emit) => {
      this.requireRole(ctx.caller, "manager");
      const tier = this.tiers.unpause(tierId);
      emit(ACCESS_EVENTS.TIER_UNPAUSED, { tierId });
      return tier;
    });
  }

  createRewardCurve(ctx: CallContext, params: CurveParams): Curve {
    return this.execute("createRewardCurve", ctx.caller, (emit) => {
      this.requireRole(ctx.caller, "manager");
      const curve = this.pool.createCurve(params);
      emit(ACCESS_EVENTS.CURVE_CREATED, { curveId: curve.id, kind: curve.policy.kind });
      return curve;
    });
  }

  setGlobalSupplyCap(ctx: CallContext, supplyCap: number): void {
    this.execute("setGlobalSupplyCap", ctx.caller, (emit) => {
      this.requireRole(ctx.caller, "manager");
      this.subscriptions.setSupplyCap(supplyCap);
      emit(ACCESS_EVENTS.SUPPLY_CAP_UPDATED, { supplyCap });
    });
  }

  setReferralCode(ctx: CallContext, code: number, params: ReferralCode): ReferralCode {
    return this.execute("setReferralCode", ctx.caller, (emit) => {
      this.requireRole(ctx.caller, "issuer");
      if (params.referrer !== null) {
        this.assertAccount(params.referrer);
      }
      const entry = this.referrals.set(code, params, this.fees.params.clientBps);
      emit(ACCESS_EVENTS.REFERRAL_CODE_SET, {
        referralCode: code,
        basisPoints: entry.basisPoints,
        permanent: entry.permanent,
        referrer: entry.referrer,
      });
      return entry;
    });
  }

  updateProtocolFeeRecipient(ctx: CallContext, recipient: AccountId | null): FeeParams {
    return this.execute("updateProtocolFeeRecipient", ctx.caller, (emit) => {
      if (recipient !== null) {
        this.assertAccount(recipient);
      }
      const params = this.fees.updateProtocolRecipient(ctx.caller, recipient);
      emit(ACCESS_EVENTS.FEE_RECIPIENT_UPDATED, { role: "protocol", recipient });
      return params;
    });
  }

  updateClientFeeRecipient(ctx: CallContext, recipient: AccountId | null): FeeParams {
    return this.execute("updateClientFeeRecipient", ctx.caller, (emit) => {
      if (recipient !== null) {
        this.assertAccount(recipient);
      }
      const isManager = this.authorizer.isAuthorized(ctx.caller, "manager");
      const params = this.fees.updateClientRecipient(ctx.caller, recipient, isManager);
      emit(ACCESS_EVENTS.FEE_RECIPIENT_UPDATED, { role: "client", recipient });
      return params;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Identity layer hook
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Called by the identity layer before it moves a token from `from` to
   * `to`. Moves the subscription and the reward holding with it.
   */
  beforeTransfer(from: AccountId, to: AccountId): void {
    this.execute("beforeTransfer", from, (emit) => {
      this.assertAccount(to);
      const record = this.subscriptions.transfer(from, to);
      this.pool.transferHolder(from, to);
      emit(ACCESS_EVENTS.SUBSCRIPTION_TRANSFERRED, { from, to, tokenId: record.tokenId });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Views
  // ───────────────────────────────────────────────────────────────────────

  subscriptionOf(account: AccountId): Subscription {
    return this.subscriptions.get(account);
  }

  remainingSeconds(account: AccountId): number {
    return this.subscriptions.remainingSeconds(account);
  }

  tierDetail(tierId: number): Tier {
    return this.tiers.get(tierId);
  }

  listTiers(): readonly Tier[] {
    return this.tiers.list();
  }

  feeDetail(): FeeParams {
    return this.fees.params;
  }

  curveDetail(curveId: number): Curve {
    return this.pool.getCurve(curveId);
  }

  poolDetail(): PoolDetail {
    return this.pool.detail();
  }

  holderDetail(account: AccountId): Holder {
    return this.pool.holderOf(account);
  }

  referralCodeDetail(code: number): ReferralCode | undefined {
    return this.referrals.get(code);
  }

  rewardBalanceOf(account: AccountId): Amount {
    return this.pool.rewardBalanceOf(account);
  }

  /** Held funds not owed to the reward pool. */
  creatorBalance(): Amount {
    return this.currency.balance() - this.pool.balance();
  }

  contractDetail(): ContractDetail {
    const supply = this.subscriptions.detail();
    return {
      currency: this.currency.ref,
      balance: this.currency.balance(),
      creatorBalance: this.creatorBalance(),
      subscriberCount: supply.subscriberCount,
      supplyCap: supply.supplyCap,
      numTiers: this.tiers.count,
      numCurves: this.pool.numCurves,
      rewardParams: this.rewardParams,
    };
  }

  snapshot(): LedgerSnapshot {
    const supply = this.subscriptions.detail();
    return {
      subscriptions: Object.fromEntries(this.subscriptions.entries()),
      tiers: this.tiers.list(),
      fees: this.fees.params,
      rewardParams: this.rewardParams,
      subscriberCount: supply.subscriberCount,
      supplyCap: supply.supplyCap,
      pool: this.pool.snapshot(),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private execute<T>(operation: string, caller: AccountId, fn: (emit: Emit) => T): T {
    return this.guard.run(operation, () => {
      const rollback = checkpointAll(this.participants);
      const pending: PendingEvent[] = [];
      const emit: Emit = (type, payload) => {
        pending.push({ type, payload });
      };

      let result: T;
      let events: DomainEvent[];
      try {
        result = fn(emit);
        events = this.buildEvents(caller, pending);
      } catch (err) {
        rollback();
        this.logger.warn({ operation, caller, err }, `${operation} rolled back`);
        throw err;
      }

      for (const event of events) {
        this.events.append(event.metadata.source, [event]);
      }
      this.operationSeq += 1;
      this.logger.debug({ operation, caller, events: events.length }, `${operation} committed`);
      return result;
    });
  }

  private buildEvents(actor: AccountId, pending: readonly PendingEvent[]): DomainEvent[] {
    const correlationId = `op-${this.operationSeq + 1}`;
    const timestamp = new Date(this.clock.now() * 1000).toISOString();

    return pending.map((entry, i) => {
      const schema = this.catalog.getSchema(entry.type);
      if (schema === undefined || !schema.validate(entry.payload)) {
        throw new Error(`Invalid payload for event "${entry.type}"`);
      }
      return createVersionedEvent(
        entry.type,
        { eventId: `${correlationId}:${i}`, timestamp, actor, correlationId, source: schema.source },
        entry.payload,
        schema.version,
      );
    });
  }

  private requireRole(caller: AccountId, role: Role): void {
    if (!this.authorizer.isAuthorized(caller, role)) {
      throw new AuthorizationError("UNAUTHORIZED", `${caller} lacks the "${role}" role`);
    }
  }

  private assertAccount(account: AccountId): void {
    if (!isAccountId(account)) {
      throw new ValidationError("INVALID_ACCOUNT", `Invalid account "${account}"`);
    }
  }

  private assertCreatorBalance(amount: Amount): void {
    const available = this.creatorBalance();
    if (available < amount) {
      throw new InsufficientFundsError(
        "INSUFFICIENT_BALANCE",
        `Creator balance ${available} is below ${amount}`,
      );
    }
  }

  private ensureMinted(account: AccountId, emit: Emit): void {
    if (this.subscriptions.get(account).tokenId !== 0) {
      return;
    }
    const record = this.subscriptions.mint(account);
    emit(ACCESS_EVENTS.SUBSCRIPTION_MINTED, { account, tokenId: record.tokenId });
  }

  private emitSwitch(account: AccountId, time: TimeExtension, emit: Emit): void {
    if (time.switched !== undefined) {
      emit(ACCESS_EVENTS.SUBSCRIPTION_SWITCHED, { account, ...time.switched });
    }
  }

  private payFee(recipient: AccountId | null, role: "protocol" | "client", amount: Amount, emit: Emit): void {
    if (recipient === null || amount === 0n) {
      return;
    }
    this.currency.transfer(recipient, amount);
    emit(ACCESS_EVENTS.FEE_TRANSFERRED, { recipient, role, amount: amount.toString() });
  }

  private allocate(amount: Amount, emit: Emit): void {
    if (amount === 0n) {
      return;
    }
    this.pool.allocate(amount);
    emit(ACCESS_EVENTS.POOL_ALLOCATED, {
      amount: amount.toString(),
      totalShares: this.pool.totalShares.toString(),
    });
  }
}
