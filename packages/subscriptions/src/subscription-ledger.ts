/**
 * @accrual/subscriptions — Subscription ledger.
 *
 * Per-account time accounting:
 *
 *   NoSubscription → Active ⇄ Expired → Deactivated (tierId 0)
 *
 * Active is reachable again from Expired or Deactivated through a purchase
 * or a grant.
 *
 * Rules:
 * - Token ids come from the identity registry and are never reused
 * - Time extends from max(now, expiresAt)
 * - Paid time is never revoked; only outstanding granted seconds are
 * - A tier switch converts remaining time by value
 * - Second counts and expiries stay safe integers
 * - Checks run before any state changes
 */

import {
  CapacityExceededError,
  InsufficientFundsError,
  mulDiv,
  mulDivUp,
  StateConflictError,
  ValidationError,
} from "@accrual/ledger";
import type { Checkpointable, Rollback } from "@accrual/ledger";
import type { AccountId, Amount, Timestamp } from "@accrual/types";
import type { TierRegistry } from "./tiers.js";
import type {
  Clock,
  IdentityRegistry,
  Subscription,
  SupplyDetail,
  Tier,
  TierSwitch,
  TimeExtension,
  TimeReduction,
} from "./types.js";

const NO_SUBSCRIPTION: Subscription = {
  tokenId: 0,
  tierId: 0,
  expiresAt: 0,
  grantedSeconds: 0,
  purchaseExpires: 0,
};

/**
 * Narrow a bigint second count to a safe integer.
 *
 * @throws {ValidationError} INVALID_DURATION beyond Number.MAX_SAFE_INTEGER
 */
function toSeconds(value: bigint, what: string): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new ValidationError("INVALID_DURATION", `${what} of ${value} seconds is out of range`);
  }
  return Number(value);
}

function assertExpiry(expiresAt: number): void {
  if (!Number.isSafeInteger(expiresAt)) {
    throw new ValidationError("INVALID_DURATION", `Expiry ${expiresAt} is out of range`);
  }
}

/**
 * Seconds of `to` worth the same as `seconds` of `from`, rounded down.
 * Free destination tiers keep the time; free source tiers are worth nothing.
 */
export function convertTime(seconds: number, from: Tier, to: Tier): number {
  if (to.pricePerPeriod === 0n) {
    return seconds;
  }
  if (from.pricePerPeriod === 0n || seconds === 0) {
    return 0;
  }
  const converted = mulDiv(
    BigInt(seconds) * from.pricePerPeriod,
    BigInt(to.periodDurationSeconds),
    BigInt(from.periodDurationSeconds) * to.pricePerPeriod,
  );
  return toSeconds(converted, "Converted time");
}

interface Placement {
  readonly tier: Tier;
  readonly switched?: TierSwitch;
  readonly joins: boolean;
  /** expiresAt after any conversion, before the new time is added */
  readonly expiresAt: Timestamp;
  readonly grantedSeconds: number;
}

export interface SubscriptionLedgerOptions {
  readonly tiers: TierRegistry;
  readonly identities: IdentityRegistry;
  readonly clock: Clock;
  /** 0 = unlimited */
  readonly supplyCap?: number;
}

export class SubscriptionLedger implements Checkpointable {
  private subscriptions = new Map<AccountId, Subscription>();
  private subscriberCount = 0;
  private supplyCap: number;
  private readonly tiers: TierRegistry;
  private readonly identities: IdentityRegistry;
  private readonly clock: Clock;

  constructor(options: SubscriptionLedgerOptions) {
    this.tiers = options.tiers;
    this.identities = options.identities;
    this.clock = options.clock;
    this.supplyCap = 0;
    this.setSupplyCap(options.supplyCap ?? 0);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Minting
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create the account's identity token and an empty record.
   */
  mint(account: AccountId): Subscription {
    if (this.get(account).tokenId !== 0) {
      throw new StateConflictError("DESTINATION_HAS_SUBSCRIPTION", `${account} already holds a subscription`);
    }
    if (this.supplyCap !== 0 && this.subscriberCount >= this.supplyCap) {
      throw new CapacityExceededError(
        "GLOBAL_SUPPLY_EXCEEDED",
        `Global supply cap of ${this.supplyCap} subscriptions reached`,
      );
    }

    const record: Subscription = { ...NO_SUBSCRIPTION, tokenId: this.identities.mint(account) };
    this.subscriptions.set(account, record);
    this.subscriberCount += 1;
    return record;
  }

  setSupplyCap(cap: number): void {
    if (!Number.isSafeInteger(cap) || cap < 0) {
      throw new ValidationError("INVALID_SUPPLY_CAP", `Supply cap must be a non-negative integer, got ${cap}`);
    }
    if (cap !== 0 && cap < this.subscriberCount) {
      throw new ValidationError(
        "INVALID_SUPPLY_CAP",
        `Supply cap ${cap} is below the ${this.subscriberCount} existing subscriptions`,
      );
    }
    this.supplyCap = cap;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Time
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Convert a captured payment into time on `tierId`.
   */
  purchase(account: AccountId, caller: AccountId, tokensIn: Amount, tierId: number): TimeExtension {
    const record = this.require(account);
    const now = this.clock.now();
    const placement = this.place(record, tierId, now, { caller, account, privileged: false });
    const tier = placement.tier;

    let tokensForTime = tokensIn;
    if (record.purchaseExpires === 0) {
      if (tokensIn < tier.initialMintPrice) {
        throw new InsufficientFundsError(
          "INSUFFICIENT_PURCHASE",
          `Payment of ${tokensIn} does not cover the mint price of ${tier.initialMintPrice}`,
        );
      }
      tokensForTime -= tier.initialMintPrice;
    }

    let secondsAdded: number;
    if (tier.pricePerPeriod === 0n) {
      if (tokensForTime > 0n) {
        throw new ValidationError("INVALID_PURCHASE", `Tier ${tier.id} takes no payment beyond the mint price`);
      }
      secondsAdded = tier.periodDurationSeconds;
    } else {
      if (tokensForTime < tier.pricePerPeriod) {
        throw new InsufficientFundsError(
          "INSUFFICIENT_PURCHASE",
          `Payment of ${tokensForTime} is below one period of tier ${tier.id} (${tier.pricePerPeriod})`,
        );
      }
      secondsAdded = toSeconds(
        mulDiv(tokensForTime, BigInt(tier.periodDurationSeconds), tier.pricePerPeriod),
        "Purchased time",
      );
    }

    const expiresAt = Math.max(now, placement.expiresAt) + secondsAdded;
    assertExpiry(expiresAt);
    if (tier.maxCommitmentSeconds !== 0 && expiresAt - now > tier.maxCommitmentSeconds) {
      throw new ValidationError(
        "MAX_COMMITMENT_EXCEEDED",
        `Tier ${tier.id} allows at most ${tier.maxCommitmentSeconds} seconds of remaining time`,
      );
    }

    this.commitPlacement(record, placement, now, false);
    this.subscriptions.set(account, {
      ...record,
      tierId: tier.id,
      expiresAt,
      grantedSeconds: placement.grantedSeconds,
      purchaseExpires: Math.max(record.purchaseExpires, expiresAt),
    });

    return this.extension(record.tokenId, tier.id, secondsAdded, expiresAt, placement.switched);
  }

  /**
   * Add unpaid time. Ignores pause and the join window but not supply caps.
   */
  grant(account: AccountId, seconds: number, tierId: number): TimeExtension {
    if (!Number.isSafeInteger(seconds) || seconds <= 0) {
      throw new ValidationError("INVALID_DURATION", `Granted seconds must be a positive integer, got ${seconds}`);
    }

    const record = this.require(account);
    const now = this.clock.now();
    const placement = this.place(record, tierId, now, { caller: account, account, privileged: true });
    const expiresAt = Math.max(now, placement.expiresAt) + seconds;
    assertExpiry(expiresAt);

    this.commitPlacement(record, placement, now, true);
    this.subscriptions.set(account, {
      ...record,
      tierId: placement.tier.id,
      expiresAt,
      grantedSeconds: placement.grantedSeconds + seconds,
    });

    return this.extension(record.tokenId, placement.tier.id, seconds, expiresAt, placement.switched);
  }

  /**
   * Remove outstanding granted seconds, never going below now.
   */
  revoke(account: AccountId): TimeReduction {
    const record = this.require(account);
    const now = this.clock.now();
    const expiresAt = Math.max(now, record.expiresAt - record.grantedSeconds);

    this.subscriptions.set(account, { ...record, expiresAt, grantedSeconds: 0 });
    return { secondsRemoved: Math.max(0, record.expiresAt - expiresAt), expiresAt };
  }

  /**
   * Remove the time `amount` paid for (all of it on free tiers), never
   * going below now. Settlement is the caller's job.
   */
  refund(account: AccountId, amount: Amount): TimeReduction {
    const record = this.require(account);
    const now = this.clock.now();
    const remaining = Math.max(0, record.expiresAt - now);

    let removal = remaining;
    if (record.tierId !== 0) {
      const tier = this.tiers.get(record.tierId);
      if (tier.pricePerPeriod !== 0n) {
        const paidFor = mulDivUp(amount, BigInt(tier.periodDurationSeconds), tier.pricePerPeriod);
        removal = paidFor < BigInt(remaining) ? Number(paidFor) : remaining;
      }
    }

    const expiresAt = Math.max(now, record.expiresAt - removal);
    this.subscriptions.set(account, {
      ...record,
      expiresAt,
      grantedSeconds: Math.min(record.grantedSeconds, Math.max(0, expiresAt - now)),
    });
    return { secondsRemoved: Math.max(0, record.expiresAt - expiresAt), expiresAt };
  }

  /**
   * Drop an expired subscription's tier membership. Returns whether
   * anything changed.
   */
  deactivate(account: AccountId): boolean {
    const record = this.get(account);
    if (record.tierId === 0 || this.clock.now() <= record.expiresAt) {
      return false;
    }

    this.tiers.leave(record.tierId);
    this.subscriptions.set(account, { ...record, tierId: 0 });
    return true;
  }

  /**
   * Move a record ahead of an identity transfer.
   */
  transfer(from: AccountId, to: AccountId): Subscription {
    const source = this.require(from);
    if (this.get(to).tokenId !== 0) {
      throw new StateConflictError("DESTINATION_HAS_SUBSCRIPTION", `${to} already holds a subscription`);
    }
    if (source.tierId !== 0 && !this.tiers.get(source.tierId).transferable) {
      throw new StateConflictError("TRANSFER_DISABLED", `Tier ${source.tierId} is not transferable`);
    }

    this.subscriptions.delete(from);
    this.subscriptions.set(to, source);
    return source;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(account: AccountId): Subscription {
    return this.subscriptions.get(account) ?? NO_SUBSCRIPTION;
  }

  remainingSeconds(account: AccountId): number {
    return Math.max(0, this.get(account).expiresAt - this.clock.now());
  }

  detail(): SupplyDetail {
    return { subscriberCount: this.subscriberCount, supplyCap: this.supplyCap };
  }

  entries(): readonly (readonly [AccountId, Subscription])[] {
    return [...this.subscriptions.entries()];
  }

  checkpoint(): Rollback {
    const subscriptions = new Map(this.subscriptions);
    const subscriberCount = this.subscriberCount;
    const supplyCap = this.supplyCap;
    return () => {
      this.subscriptions = subscriptions;
      this.subscriberCount = subscriberCount;
      this.supplyCap = supplyCap;
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private require(account: AccountId): Subscription {
    const record = this.get(account);
    if (record.tokenId === 0) {
      throw new ValidationError("UNKNOWN_SUBSCRIPTION", `${account} has no subscription`);
    }
    return record;
  }

  /**
   * Resolve the target tier and what joining or switching to it does to
   * the record, without changing anything.
   */
  private place(
    record: Subscription,
    requestedTierId: number,
    now: Timestamp,
    who: { readonly caller: AccountId; readonly account: AccountId; readonly privileged: boolean },
  ): Placement {
    const tierId = requestedTierId !== 0 ? requestedTierId : record.tierId !== 0 ? record.tierId : 1;
    const tier = this.tiers.get(tierId);

    if (record.tierId === 0) {
      return { tier, joins: true, expiresAt: record.expiresAt, grantedSeconds: record.grantedSeconds };
    }

    if (record.tierId === tierId) {
      if (!who.privileged) {
        this.tiers.assertOpen(tierId, now);
      }
      return { tier, joins: false, expiresAt: record.expiresAt, grantedSeconds: record.grantedSeconds };
    }

    if (!who.privileged && who.caller !== who.account) {
      throw new StateConflictError(
        "TIER_INVALID_SWITCH",
        `Only ${who.account} can move its subscription from tier ${record.tierId} to tier ${tierId}`,
      );
    }

    const remaining = Math.max(0, record.expiresAt - now);
    const converted = convertTime(remaining, this.tiers.get(record.tierId), tier);
    return {
      tier,
      joins: true,
      switched: { fromTierId: record.tierId, toTierId: tierId, remainingSeconds: converted },
      expiresAt: now + converted,
      grantedSeconds: Math.min(record.grantedSeconds, converted),
    };
  }

  private commitPlacement(record: Subscription, placement: Placement, now: Timestamp, privileged: boolean): void {
    if (!placement.joins) {
      return;
    }
    this.tiers.join(placement.tier.id, now, { privileged });
    if (record.tierId !== 0) {
      this.tiers.leave(record.tierId);
    }
  }

  private extension(
    tokenId: number,
    tierId: number,
    secondsAdded: number,
    expiresAt: Timestamp,
    switched: TierSwitch | undefined,
  ): TimeExtension {
    return switched === undefined
      ? { tokenId, tierId, secondsAdded, expiresAt }
      : { tokenId, tierId, secondsAdded, expiresAt, switched };
  }
}
