/**
 * @accrual/types — Shared domain types for the access ledger stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Financial types
export type {
  AccountId,
  Amount,
  Money,
  CurrencyRef,
  BasisPoints,
  Timestamp,
} from "./financial.js";
export { ZERO_ACCOUNT } from "./financial.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isAccountId,
  isMoney,
  isCurrencyRef,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
