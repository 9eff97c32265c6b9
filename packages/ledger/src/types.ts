/**
 * @accrual/ledger — Shared engine types and the error taxonomy.
 *
 * Rules:
 * - Amounts are bigint base units, never negative once validated
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Every error aborts the whole operation; callers retry from scratch
 */

import type { AccountId, Amount } from "@accrual/types";

// ─── Checkpoints ─────────────────────────────────────────────────────────

/** Restores a component to the state captured by `checkpoint()`. */
export type Rollback = () => void;

/**
 * A stateful component that can be rolled back to an earlier point.
 * The orchestrator checkpoints every participant before an operation
 * and rolls all of them back if the operation throws.
 */
export interface Checkpointable {
  checkpoint(): Rollback;
}

// ─── Settlement Rails ────────────────────────────────────────────────────

/**
 * Balances of one asset, as seen by the ledger.
 *
 * `transfer` returns false when the rails refuse the movement
 * (insufficient balance, rejecting recipient). It may also throw when a
 * recipient callback fails.
 */
export interface AssetBook extends Checkpointable {
  balanceOf(holder: AccountId): Amount;
  transfer(from: AccountId, to: AccountId, amount: Amount): boolean;
}

/** Outcome of a non-reverting transfer. */
export type TransferOutcome =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: string };

// ─── Error Types ─────────────────────────────────────────────────────────

export type ValidationErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_ACCOUNT"
  | "INVALID_BASIS_POINTS"
  | "INVALID_TIER_PARAMS"
  | "INVALID_CURVE_PARAMS"
  | "INVALID_FEE_PARAMS"
  | "INVALID_SUPPLY_CAP"
  | "INVALID_PURCHASE"
  | "INVALID_DURATION"
  | "UNKNOWN_TIER"
  | "UNKNOWN_CURVE"
  | "UNKNOWN_SUBSCRIPTION"
  | "TIER_LIMIT_REACHED"
  | "MAX_COMMITMENT_EXCEEDED";

export type AuthorizationErrorCode = "UNAUTHORIZED";

export type InsufficientFundsErrorCode =
  | "INVALID_CAPTURE"
  | "INSUFFICIENT_PURCHASE"
  | "INSUFFICIENT_BALANCE"
  | "TRANSFER_FAILED";

export type CapacityExceededErrorCode =
  | "TIER_SUPPLY_EXCEEDED"
  | "GLOBAL_SUPPLY_EXCEEDED";

export type StateConflictErrorCode =
  | "TIER_INVALID_SWITCH"
  | "TIER_PAUSED"
  | "TIER_NOT_STARTED"
  | "TIER_ENDED"
  | "DESTINATION_HAS_SUBSCRIPTION"
  | "TRANSFER_DISABLED"
  | "REFERRAL_LOCKED"
  | "REENTRANT_CALL";

export type NotEligibleErrorCode =
  | "NOT_SLASHABLE"
  | "NOT_FEE_RECIPIENT";

/** Error codes for every ledger operation. */
export type LedgerErrorCode =
  | ValidationErrorCode
  | AuthorizationErrorCode
  | InsufficientFundsErrorCode
  | CapacityExceededErrorCode
  | StateConflictErrorCode
  | NotEligibleErrorCode;

export type LedgerErrorKind =
  | "validation"
  | "authorization"
  | "insufficient-funds"
  | "capacity-exceeded"
  | "state-conflict"
  | "not-eligible";

/**
 * Structured error from the ledger engine.
 * Always thrown, never returned as a code.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly kind: LedgerErrorKind;

  constructor(kind: LedgerErrorKind, code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.kind = kind;
    this.code = code;
  }
}

/** Malformed parameters or unknown ids. */
export class ValidationError extends LedgerError {
  constructor(code: ValidationErrorCode, message: string) {
    super("validation", code, message);
    this.name = "ValidationError";
  }
}

/** The caller lacks the required role. */
export class AuthorizationError extends LedgerError {
  constructor(code: AuthorizationErrorCode, message: string) {
    super("authorization", code, message);
    this.name = "AuthorizationError";
  }
}

/** Capture mismatch, short payment, or not enough held funds. */
export class InsufficientFundsError extends LedgerError {
  constructor(code: InsufficientFundsErrorCode, message: string) {
    super("insufficient-funds", code, message);
    this.name = "InsufficientFundsError";
  }
}

/** Per-tier or global supply cap reached. */
export class CapacityExceededError extends LedgerError {
  constructor(code: CapacityExceededErrorCode, message: string) {
    super("capacity-exceeded", code, message);
    this.name = "CapacityExceededError";
  }
}

/** The operation conflicts with the current state. */
export class StateConflictError extends LedgerError {
  constructor(code: StateConflictErrorCode, message: string) {
    super("state-conflict", code, message);
    this.name = "StateConflictError";
  }
}

/** Preconditions for a permissioned action are not met. */
export class NotEligibleError extends LedgerError {
  constructor(code: NotEligibleErrorCode, message: string) {
    super("not-eligible", code, message);
    this.name = "NotEligibleError";
  }
}
