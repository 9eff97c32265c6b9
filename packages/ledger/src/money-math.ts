/**
 * @accrual/ledger — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint. String amounts are converted to/from bigint
 * via decimal scaling at the boundary.
 *
 * Rules:
 * - No floating-point operations
 * - Division rounds down unless the name says otherwise
 * - Basis points are integers in [0, 10 000]
 */

import type { Amount, BasisPoints, Money } from "@accrual/types";
import { ValidationError } from "./types.js";

/** 100% in basis points. */
export const MAX_BPS = 10_000;

// ─── Decimal Strings ─────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "0.001" with decimals=18 → 1000000000000000n
 * "100" with decimals=6 → 100000000n
 */
export function parseAmount(amount: string, decimals: number): Amount {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new ValidationError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  // Unsigned: digits, optional decimal point + digits
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new ValidationError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const parts = trimmed.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new ValidationError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but currency allows ${String(decimals)}`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 1000000000000000n with decimals=18 → "0.001000000000000000"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: Amount, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Wrap a base-unit amount as a display Money value.
 */
export function toMoney(amount: Amount, currency: string, decimals: number): Money {
  return {
    amount: formatAmount(amount, decimals),
    currency,
    decimals,
  };
}

// ─── Validation ──────────────────────────────────────────────────────────

/**
 * Assert an amount is a non-negative bigint.
 */
export function assertAmount(amount: Amount, label = "amount"): void {
  if (typeof amount !== "bigint" || amount < 0n) {
    throw new ValidationError("INVALID_AMOUNT", `${label} must be a non-negative bigint, got ${String(amount)}`);
  }
}

/**
 * Assert a basis-point value is an integer in [0, max].
 */
export function assertBasisPoints(bps: BasisPoints, max: number = MAX_BPS, label = "basis points"): void {
  if (!Number.isInteger(bps) || bps < 0 || bps > max) {
    throw new ValidationError(
      "INVALID_BASIS_POINTS",
      `${label} must be an integer between 0 and ${String(max)}, got ${String(bps)}`,
    );
  }
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

/**
 * floor(a * b / denominator)
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new ValidationError("INVALID_AMOUNT", "Division by zero");
  }
  return (a * b) / denominator;
}

/**
 * ceil(a * b / denominator) for non-negative operands.
 */
export function mulDivUp(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new ValidationError("INVALID_AMOUNT", "Division by zero");
  }
  const product = a * b;
  const quotient = product / denominator;
  return product % denominator === 0n ? quotient : quotient + 1n;
}

/**
 * The basis-point share of an amount, rounded down.
 *
 * applyBps(1000n, 500) → 50n
 */
export function applyBps(amount: Amount, bps: BasisPoints): Amount {
  return mulDiv(amount, BigInt(bps), BigInt(MAX_BPS));
}

export function minAmount(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxAmount(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}
