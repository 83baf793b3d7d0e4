/**
 * Event Types
 *
 * Every committed state change in Breakwater is published as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which tick)
 * - Payloads are JSON-safe: amounts and ticks travel as decimal strings
 * - Events are emitted only after the operation has committed
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 wall-clock timestamp */
  readonly timestamp: string;

  /** Tick at which the operation committed, as a decimal string */
  readonly tick: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID for grouping related events across systems */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: "breaker" | "lending" | "node";
}

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "breaker.liquidation.initiated") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
