/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types.
 * Used at system boundaries (deserialized data, external integrations).
 */

import type { AccountId, CurrencyRef, Money } from "./financial.js";
import { ZERO_ACCOUNT } from "./financial.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

function isDecimals(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 36;
}

// =============================================================================
// Financial guards
// =============================================================================

export function isAccountId(value: unknown): value is AccountId {
  return typeof value === "string" && value.length > 0 && value !== ZERO_ACCOUNT;
}

export function isMoney(value: unknown): value is Money {
  if (!isRecord(value)) return false;
  return (
    typeof value.amount === "string" &&
    typeof value.currency === "string" &&
    isDecimals(value.decimals)
  );
}

export function isCurrencyRef(value: unknown): value is CurrencyRef {
  if (!isRecord(value)) return false;
  if (typeof value.symbol !== "string" || value.symbol.length === 0) return false;
  if (!isDecimals(value.decimals)) return false;
  if (value.kind === "native") return true;
  return value.kind === "token" && isAccountId(value.address);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["subscriptions", "fees", "tiers", "referrals", "rewards"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    isEventSource(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
