/**
 * Event Types
 *
 * Every state change and alert in the engine is reported as a DomainEvent.
 * Core packages never log; they hand events to an `onEvent` sink and the
 * host process decides where they go.
 */

/**
 * Subsystem that emitted an event.
 */
export type EventSource = "vault" | "bridge" | "strategy" | "scheduler" | "monitor";

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

  /** ID for grouping related events (vault id, transfer id, plan id) */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * Severity attached to events. "alert" requires an operator.
 */
export type EventSeverity = "info" | "warning" | "alert";

/**
 * A domain event. Discriminated by `type` (e.g. "vault.deposit", "bridge.transfer.failed").
 */
export interface DomainEvent {
  readonly type: string;
  readonly severity: EventSeverity;
  readonly metadata: EventMetadata;
  readonly payload: Readonly<Record<string, unknown>>;
}

/**
 * Receives events. Must not throw.
 */
export type EventSink = (event: DomainEvent) => void;
