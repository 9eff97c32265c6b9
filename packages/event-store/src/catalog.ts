/**
 * @accrual/event-store — Event Catalog & Schema Versioning.
 *
 * Formalizes all domain events into a catalog with:
 * - Typed event definitions (type string → payload shape)
 * - Schema versions stamped onto each emitted payload
 * - Runtime payload validation before an event is published
 *
 * Unknown event types are never published: emitting one is a programming
 * error, surfaced by `validate` returning false.
 */

import type { DomainEvent, EventMetadata, EventSource } from "@accrual/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

/**
 * A versioned event schema.
 */
export interface EventSchema {
  /** Event type string (e.g., "rewards.pool.allocated") */
  readonly type: string;

  /** Current schema version (positive integer) */
  readonly version: number;

  /** Human-readable description of this event */
  readonly description: string;

  /** Which subsystem emits this event */
  readonly source: EventSource;

  /** True if the payload is valid for the current version. */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

/**
 * Centralized registry of domain event types.
 *
 * The catalog serves as:
 * 1. Documentation: what events exist in the system
 * 2. Validation: runtime payload checking
 * 3. Discovery: listing all known event types
 */
export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema. Re-registering the same version is
   * idempotent; a new version replaces the old one.
   */
  register(schema: EventSchema): void {
    if (!Number.isInteger(schema.version) || schema.version < 1) {
      throw new CatalogError(
        `Schema version for "${schema.type}" must be a positive integer, got ${String(schema.version)}`,
      );
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  /** All registered event types, sorted. */
  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listSchemas(): readonly EventSchema[] {
    return [...this._schemas.values()];
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * Validate an event payload against its registered schema.
   *
   * @returns true if valid, false if invalid or unregistered
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    return schema !== undefined && schema.validate(payload);
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

// =============================================================================
// Versioned Event Helper
// =============================================================================

/**
 * Create a DomainEvent with the schema version embedded in the payload
 * under `_schemaVersion`.
 */
export function createVersionedEvent(
  type: string,
  metadata: EventMetadata,
  payload: Readonly<Record<string, unknown>>,
  schemaVersion: number,
): DomainEvent {
  return {
    type,
    metadata,
    payload: {
      ...payload,
      _schemaVersion: schemaVersion,
    },
  };
}

/**
 * Extract the schema version from a stored event's payload.
 * Returns 1 if no version is embedded.
 */
export function getSchemaVersion(event: DomainEvent): number {
  const version = event.payload._schemaVersion;
  if (typeof version === "number" && Number.isInteger(version) && version > 0) {
    return version;
  }
  return 1;
}
