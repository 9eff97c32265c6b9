/**
 * Event Types
 *
 * Every committed state change in the access ledger is captured as a
 * DomainEvent. Events are the durable contract for observers and indexers.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which operation)
 * - Events of a rolled-back operation are never published
 */

/** Subsystems that emit events. One event stream per source. */
export type EventSource =
  | "subscriptions"
  | "fees"
  | "tiers"
  | "referrals"
  | "rewards";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp (ledger clock) */
  readonly timestamp: string;

  /** Caller of the operation that produced the event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** Shared by every event of one operation */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "subscriptions.subscription.purchased") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
