/**
 * Financial Types
 *
 * Core financial primitives for the access ledger.
 *
 * Rules:
 * - Amounts are bigint base units inside the engine (wei, drops, cents)
 * - Amounts cross the boundary as decimal strings (views, events, config)
 * - Currency is always explicit
 */

/**
 * Account identifier (an address on the settlement rails).
 */
export type AccountId = string;

/**
 * The zero-identity sentinel. Never a valid subscriber, fee recipient,
 * or transfer destination.
 */
export const ZERO_ACCOUNT: AccountId = "0x0000000000000000000000000000000000000000";

/**
 * An amount in base units of the configured currency.
 */
export type Amount = bigint;

/**
 * A precise monetary amount for display.
 * String representation to avoid IEEE 754 floating-point issues.
 */
export interface Money {
  /** String representation of the amount (e.g., "0.001", "1000000") */
  readonly amount: string;

  /** Currency symbol (e.g., "ETH", "USDC") */
  readonly currency: string;

  /**
   * Number of decimal places for this currency.
   * ETH = 18 (wei), USDC = 6.
   */
  readonly decimals: number;
}

/**
 * The asset an access ledger is priced in.
 *
 * - native: the rails' own asset, attached to the call as value
 * - token: a single fungible token pulled from the payer
 */
export type CurrencyRef =
  | {
      readonly kind: "native";
      readonly symbol: string;
      readonly decimals: number;
    }
  | {
      readonly kind: "token";
      readonly address: AccountId;
      readonly symbol: string;
      readonly decimals: number;
    };

/** Basis points: 1/10 000th. */
export type BasisPoints = number;

/** Unix timestamp in seconds. */
export type Timestamp = number;
