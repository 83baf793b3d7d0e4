/**
 * @breakwater/types: Shared domain types for the Breakwater stack.
 *
 * These types are used across all Breakwater packages:
 * - Liquidation primitives (principal, tick, amount, record, phase)
 * - Collaborator boundaries (lending target, underlying asset)
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types: meaning lives in consuming code
 */

// Liquidation types
export type {
  Principal,
  Tick,
  Amount,
  LiquidationRecord,
  LiquidationPhase,
  LiquidationPhaseKind,
  LiquidatableAmount,
  PullClassification,
} from "./liquidation.js";

// Collaborators
export type {
  LiquidationTarget,
  UnderlyingAsset,
} from "./collaborators.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
} from "./event.js";

// Runtime type guards
export {
  isPrincipal,
  isUnsignedIntegerString,
  isLiquidationRecord,
  isLiquidationPhaseKind,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
