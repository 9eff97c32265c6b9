/**
 * Shared fixtures for @accrual/subscriptions tests.
 */

import { Currency, InMemoryAssetBook } from "@accrual/ledger";
import type { CurveParams } from "@accrual/rewards";
import type { Amount, CurrencyRef } from "@accrual/types";
import { AccessLedger } from "../src/access-ledger.js";
import { ManualClock, RoleTable, SequentialIdentityRegistry } from "../src/collaborators.js";
import type { CallContext, FeeParams, PurchaseReceipt, RewardParams, TierParams } from "../src/types.js";

export const OWNER = "0xowner";
export const AGENT = "0xagent";
export const ALICE = "0xalice";
export const BOB = "0xbob";
export const CAROL = "0xcarol";
export const DAVE = "0xdave";
export const PROTOCOL = "0xprotocol";
export const CLIENT = "0xclient";
export const REFERRER = "0xreferrer";
export const LEDGER = "0xledger";

export const DAY = 86_400;
export const MONTH = 30 * DAY;
/** 2023-11-14T22:13:20.000Z */
export const T0 = 1_700_000_000;

/** 1 unit at 18 decimals */
export const UNIT = 10n ** 18n;
export const FUNDING = 10n ** 24n;

export const NATIVE: CurrencyRef = { kind: "native", symbol: "ETH", decimals: 18 };
export const TOKEN: CurrencyRef = { kind: "token", address: "0xtoken", symbol: "USDC", decimals: 6 };

/** Multiplier 1 at all times. */
export const FLAT_CURVE: CurveParams = {
  startTimestamp: 0,
  policy: { kind: "linear", startMultiplier: 1, endMultiplier: 1, windowSeconds: 1 },
};

export const NO_FEES: FeeParams = {
  protocolRecipient: null,
  protocolBps: 0,
  clientRecipient: null,
  clientBps: 0,
  clientReferralBps: 0,
};

/** 0.001 unit per 30 days unless overridden. */
export function tierParams(overrides: Partial<TierParams> = {}): TierParams {
  return {
    periodDurationSeconds: MONTH,
    pricePerPeriod: UNIT / 1000n,
    initialMintPrice: 0n,
    maxSupply: 0,
    transferable: true,
    rewardBasisPoints: 0,
    rewardCurveId: 0,
    startTimestamp: 0,
    endTimestamp: 0,
    maxCommitmentSeconds: 0,
    ...overrides,
  };
}

export interface HarnessOptions {
  readonly currency?: CurrencyRef;
  readonly fees?: FeeParams;
  readonly tier?: TierParams;
  readonly curve?: CurveParams;
  readonly rewards?: Partial<RewardParams>;
  readonly globalSupplyCap?: number;
  readonly transferFeeBps?: number;
}

export interface Harness {
  readonly ledger: AccessLedger;
  readonly book: InMemoryAssetBook;
  readonly clock: ManualClock;
  readonly roles: RoleTable;
  readonly identities: SequentialIdentityRegistry;
  readonly currency: Currency;
}

/**
 * Ledger at T0 with ALICE, BOB and CAROL funded and AGENT holding the
 * agent role.
 */
export function createHarness(options: HarnessOptions = {}): Harness {
  const book = new InMemoryAssetBook({ transferFeeBps: options.transferFeeBps ?? 0 });
  const clock = new ManualClock(T0);
  const roles = new RoleTable(OWNER);
  roles.grantRole(AGENT, "agent");
  const identities = new SequentialIdentityRegistry();
  const currency = new Currency(options.currency ?? NATIVE, book, LEDGER);

  const ledger = new AccessLedger({
    currency,
    authorizer: roles,
    identities,
    clock,
    fees: options.fees ?? NO_FEES,
    initialCurve: options.curve ?? FLAT_CURVE,
    initialTier: options.tier ?? tierParams(),
    rewards: options.rewards,
    globalSupplyCap: options.globalSupplyCap,
  });

  for (const account of [ALICE, BOB, CAROL]) {
    book.mint(account, FUNDING);
  }

  return { ledger, book, clock, roles, identities, currency };
}

/** Call context paying `amount` of the native asset. */
export function paying(caller: string, amount: Amount): CallContext {
  return { caller, value: amount };
}

/** Self-purchase of `amount` on `tierId` with no referral. */
export function buy(harness: Harness, account: string, amount: Amount, tierId = 0): PurchaseReceipt {
  const ctx = harness.currency.isNative ? paying(account, amount) : { caller: account };
  return harness.ledger.purchase(ctx, { account, tierId, amount, referralCode: 0, referrer: null });
}

/** Run `fn` and return what it threw. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}
