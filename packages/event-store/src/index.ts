/**
 * @accrual/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a hash-chained global log
 * - EventCatalog for schema versioning and payload validation
 * - The access ledger's domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashableEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog & schema versioning
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError, createVersionedEvent, getSchemaVersion } from "./catalog.js";

// Access ledger domain events
export { ACCESS_EVENTS, createAccessCatalog } from "./access-events.js";
export type {
  AccessEventType,
  AccessEventPayloads,
  SubscriptionMintedPayload,
  SubscriptionPurchasedPayload,
  SubscriptionGrantedPayload,
  GrantRevokedPayload,
  SubscriptionRefundedPayload,
  SubscriptionSwitchedPayload,
  SubscriptionDeactivatedPayload,
  SubscriptionTransferredPayload,
  FundsWithdrawnPayload,
  SupplyCapUpdatedPayload,
  FeeTransferredPayload,
  ReferralPaidPayload,
  FeeRecipientUpdatedPayload,
  TierChangedPayload,
  TierPauseChangedPayload,
  ReferralCodeSetPayload,
  CurveCreatedPayload,
  SharesIssuedPayload,
  PoolAllocatedPayload,
  RewardsClaimedPayload,
  HolderSlashedPayload,
  SlashPayoutFailedPayload,
} from "./access-events.js";
