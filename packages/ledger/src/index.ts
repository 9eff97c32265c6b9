/**
 * @accrual/ledger — Settlement primitives for the access ledger.
 *
 * A pure TypeScript package with zero runtime dependencies:
 * - All monetary arithmetic uses bigint (no floating point)
 * - One currency abstraction over native and fungible-token assets
 * - Checkpoint/rollback for all-or-nothing operations
 * - A re-entrancy guard for state-mutating entry points
 * - The shared error taxonomy
 */

// Currency abstraction
export { Currency } from "./currency.js";

// In-memory settlement rails
export { InMemoryAssetBook } from "./asset-book.js";
export type { InMemoryAssetBookOptions, TransferHook } from "./asset-book.js";

// Transaction boundaries
export { checkpointAll, runAtomically, ReentrancyGuard } from "./atomic.js";

// Money arithmetic
export {
  MAX_BPS,
  parseAmount,
  formatAmount,
  toMoney,
  assertAmount,
  assertBasisPoints,
  mulDiv,
  mulDivUp,
  applyBps,
  minAmount,
  maxAmount,
} from "./money-math.js";

// Types
export type {
  Rollback,
  Checkpointable,
  AssetBook,
  TransferOutcome,
  ValidationErrorCode,
  AuthorizationErrorCode,
  InsufficientFundsErrorCode,
  CapacityExceededErrorCode,
  StateConflictErrorCode,
  NotEligibleErrorCode,
  LedgerErrorCode,
  LedgerErrorKind,
} from "./types.js";

export {
  LedgerError,
  ValidationError,
  AuthorizationError,
  InsufficientFundsError,
  CapacityExceededError,
  StateConflictError,
  NotEligibleError,
} from "./types.js";
