/**
 * Runtime Type Guards
 *
 * Narrowing functions for Breakwater domain types.
 * Used at system boundaries (HTTP inputs, deserialized events).
 */

import type {
  LiquidationPhaseKind,
  LiquidationRecord,
  Principal,
} from "./liquidation.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Liquidation guards
// =============================================================================

const PRINCIPAL_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const UNSIGNED_INTEGER_PATTERN = /^(0|[1-9]\d*)$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

const PHASE_KINDS = new Set<string>([
  "no-liquidation",
  "cooldown",
  "execution-window",
  "expired",
]);

/**
 * Shape check only. Checksum validation happens where principals are
 * normalised (see @breakwater/ledger `toPrincipal`).
 */
export function isPrincipal(value: unknown): value is Principal {
  return typeof value === "string" && PRINCIPAL_PATTERN.test(value);
}

/** A non-negative integer in canonical decimal form ("0", "42", not "042"). */
export function isUnsignedIntegerString(value: unknown): value is string {
  return typeof value === "string" && UNSIGNED_INTEGER_PATTERN.test(value);
}

export function isLiquidationRecord(value: unknown): value is LiquidationRecord {
  if (!isRecord(value)) return false;
  return (
    typeof value.blockedUntil === "bigint" &&
    typeof value.windowEnd === "bigint" &&
    typeof value.snapshotAmount === "bigint" &&
    value.blockedUntil > 0n &&
    value.windowEnd >= value.blockedUntil &&
    value.snapshotAmount >= 0n
  );
}

export function isLiquidationPhaseKind(value: unknown): value is LiquidationPhaseKind {
  return typeof value === "string" && PHASE_KINDS.has(value);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["breaker", "lending", "node"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    isUnsignedIntegerString(value.tick) &&
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
    isEventMetadata(value.metadata) &&
    value.payload !== null &&
    typeof value.payload === "object"
  );
}
