/**
 * Event Types
 *
 * Append-only event architecture.
 * Every state change in the ledger is published as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - Payloads are JSON-safe: amounts travel as decimal strings
 * - No UPDATE, no DELETE — only new events
 */

/**
 * Which subsystem emitted an event.
 */
export type EventSource = "registry" | "transfer" | "settlement";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string | undefined;

  /** ID for grouping related events across systems */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event.
 * Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "mt.transfer", "settlement.resolved") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
