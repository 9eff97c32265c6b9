/**
 * @accrual/subscriptions — Configuration.
 *
 * Two Zod schemas:
 * - AccessLedgerConfigSchema: a JSON deployment document (prices as
 *   decimal strings) parsed into typed ledger parameters
 * - RuntimeConfigSchema: process settings from environment variables
 *
 * createAccessLedger() turns a parsed deployment document into a ledger.
 */

import { z } from "zod";
import type { Logger } from "pino";
import type { EventStore } from "@accrual/event-store";
import { Currency, LedgerError, parseAmount } from "@accrual/ledger";
import type { AssetBook } from "@accrual/ledger";
import type { CurveParams } from "@accrual/rewards";
import { isAccountId } from "@accrual/types";
import type { AccountId, CurrencyRef } from "@accrual/types";
import { AccessLedger, DEFAULT_SLASH_GRACE_PERIOD } from "./access-ledger.js";
import type { Authorizer, Clock, FeeParams, IdentityRegistry, RewardParams, TierParams } from "./types.js";

// =============================================================================
// Deployment document
// =============================================================================

const AccountSchema = z.string().refine(isAccountId, { message: "must be a non-zero account" });

const CountSchema = z.number().int().min(0);

const DecimalSchema = z.string().regex(/^\d+(\.\d+)?$/, "must be an unsigned decimal string");

const CurrencySchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("native"),
    symbol: z.string().min(1),
    decimals: z.number().int().min(0).max(36),
  }),
  z.object({
    kind: z.literal("token"),
    address: AccountSchema,
    symbol: z.string().min(1),
    decimals: z.number().int().min(0).max(36),
  }),
]);

const FeesSchema = z.object({
  protocolRecipient: AccountSchema.nullable().default(null),
  protocolBps: CountSchema.default(0),
  clientRecipient: AccountSchema.nullable().default(null),
  clientBps: CountSchema.default(0),
  clientReferralBps: CountSchema.default(0),
});

const RewardsSchema = z.object({
  slashable: z.boolean().default(true),
  slashGracePeriod: CountSchema.default(DEFAULT_SLASH_GRACE_PERIOD),
});

const TierSchema = z.object({
  periodDurationSeconds: z.number().int().positive(),
  pricePerPeriod: DecimalSchema,
  initialMintPrice: DecimalSchema.default("0"),
  maxSupply: CountSchema.default(0),
  transferable: z.boolean().default(true),
  rewardBasisPoints: z.number().int().min(0).max(10_000).default(0),
  rewardCurveId: CountSchema.default(0),
  startTimestamp: CountSchema.default(0),
  endTimestamp: CountSchema.default(0),
  maxCommitmentSeconds: CountSchema.default(0),
  paused: z.boolean().default(false),
});

const CurveSchema = z.object({
  startTimestamp: CountSchema,
  policy: z.discriminatedUnion("kind", [
    z.object({
      kind: z.literal("exponential"),
      base: z.number().int().min(1),
      numPeriods: CountSchema,
      periodSeconds: z.number().int().positive(),
      minMultiplier: CountSchema,
    }),
    z.object({
      kind: z.literal("linear"),
      startMultiplier: CountSchema,
      endMultiplier: CountSchema,
      windowSeconds: z.number().int().positive(),
    }),
  ]),
});

export interface AccessLedgerConfig {
  readonly currency: CurrencyRef;
  readonly globalSupplyCap: number;
  readonly fees: FeeParams;
  readonly rewards: RewardParams;
  readonly tier: TierParams;
  readonly curve: CurveParams;
}

export const AccessLedgerConfigSchema = z
  .object({
    currency: CurrencySchema,
    globalSupplyCap: CountSchema.default(0),
    fees: FeesSchema.default({}),
    rewards: RewardsSchema.default({}),
    tier: TierSchema,
    curve: CurveSchema.default({
      startTimestamp: 0,
      policy: { kind: "linear", startMultiplier: 1, endMultiplier: 1, windowSeconds: 1 },
    }),
  })
  .transform((raw, ctx): AccessLedgerConfig => {
    const decimals = raw.currency.decimals;
    try {
      return {
        ...raw,
        tier: {
          ...raw.tier,
          pricePerPeriod: parseAmount(raw.tier.pricePerPeriod, decimals),
          initialMintPrice: parseAmount(raw.tier.initialMintPrice, decimals),
        },
      };
    } catch (err) {
      if (!(err instanceof LedgerError)) throw err;
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["tier"], message: err.message });
      return z.NEVER;
    }
  });

export type AccessLedgerConfigInput = z.input<typeof AccessLedgerConfigSchema>;

/**
 * Parse a deployment document.
 *
 * @throws {z.ZodError} if the document is malformed
 */
export function parseAccessLedgerConfig(document: unknown): AccessLedgerConfig {
  return AccessLedgerConfigSchema.parse(document);
}

// ─── Ledger construction ───────────────────────────────────────────────

/** What a deployment document cannot describe. */
export interface AccessLedgerEnvironment {
  readonly book: AssetBook;
  /** Account the ledger's funds are held under */
  readonly holder: AccountId;
  readonly authorizer: Authorizer;
  readonly identities?: IdentityRegistry;
  readonly clock?: Clock;
  readonly eventStore?: EventStore;
  readonly logger?: Logger;
}

/**
 * Build a ledger from a parsed deployment document: `tier` becomes tier 1
 * and `curve` becomes curve 0.
 */
export function createAccessLedger(config: AccessLedgerConfig, env: AccessLedgerEnvironment): AccessLedger {
  return new AccessLedger({
    currency: new Currency(config.currency, env.book, env.holder),
    authorizer: env.authorizer,
    identities: env.identities,
    clock: env.clock,
    eventStore: env.eventStore,
    logger: env.logger,
    fees: config.fees,
    initialTier: config.tier,
    initialCurve: config.curve,
    rewards: config.rewards,
    globalSupplyCap: config.globalSupplyCap,
  });
}

// =============================================================================
// Runtime
// =============================================================================

export const RuntimeConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

/**
 * Load runtime settings from process.env.
 *
 * @throws {z.ZodError} if a variable is invalid
 */
export function loadRuntimeConfig(
  env: Record<string, string | undefined> = process.env,
): RuntimeConfig {
  return RuntimeConfigSchema.parse(env);
}
