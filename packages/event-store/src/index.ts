/**
 * @breakwater/event-store: Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain
 * - EventCatalog for payload validation
 * - Breakwater domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashedStoredEvent,
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

// Event construction
export { createDomainEvent } from "./domain-event.js";
export type { CreateEventOptions } from "./domain-event.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Breakwater domain events
export { BREAKER_EVENTS, createBreakerCatalog } from "./breaker-events.js";
export type {
  BreakerEventType,
  LiquidationInitiatedPayload,
  LiquidationExecutedPayload,
  CustodyDepositedPayload,
  CustodyWithdrawnPayload,
  ApprovalGrantedPayload,
  CollateralDepositedPayload,
  CollateralWithdrawnPayload,
  HealthFactorUpdatedPayload,
  PositionLiquidatedPayload,
  ClockAdvancedPayload,
} from "./breaker-events.js";
