/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types, used at system boundaries
 * (API inputs, deserialized state, external adapters).
 */

import type { Money } from "./financial.js";
import type { DomainEvent, EventMetadata } from "./event.js";
import type { ChainRef } from "./chain.js";

const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;
const EVENT_SOURCES = new Set(["vault", "bridge", "strategy", "scheduler", "monitor"]);
const SEVERITIES = new Set(["info", "warning", "alert"]);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// Financial guards
// =============================================================================

export function isMoney(value: unknown): value is Money {
  if (!isRecord(value)) return false;
  return (
    typeof value.amount === "string" &&
    AMOUNT_PATTERN.test(value.amount) &&
    typeof value.currency === "string" &&
    value.currency.length > 0 &&
    typeof value.decimals === "number" &&
    Number.isInteger(value.decimals) &&
    value.decimals >= 0
  );
}

export function isBps(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= 10_000
  );
}

// =============================================================================
// Chain guards
// =============================================================================

export function isChainRef(value: unknown): value is ChainRef {
  if (!isRecord(value)) return false;
  return (
    typeof value.chainId === "string" &&
    value.chainId.length > 0 &&
    typeof value.name === "string" &&
    typeof value.confirmationBlocks === "number" &&
    Number.isInteger(value.confirmationBlocks) &&
    value.confirmationBlocks >= 0
  );
}

// =============================================================================
// Event guards
// =============================================================================

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    typeof value.source === "string" &&
    EVENT_SOURCES.has(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    value.type.length > 0 &&
    typeof value.severity === "string" &&
    SEVERITIES.has(value.severity) &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
