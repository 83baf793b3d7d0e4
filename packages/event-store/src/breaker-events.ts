/**
 * @breakwater/event-store: Breakwater Domain Event Definitions.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`
 *
 * Amounts and ticks travel as base-unit decimal strings so that events
 * survive JSON and canonicalization without losing precision.
 */

import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Breaker Events
// =============================================================================

export interface LiquidationInitiatedPayload {
  readonly principal: string;
  readonly initiator: string;
  readonly initiatedAt: string;
  readonly blockedUntil: string;
  readonly windowEnd: string;
  readonly snapshotAmount: string;
}

export interface LiquidationExecutedPayload {
  readonly principal: string;
  readonly spender: string;
  readonly recipient: string;
  readonly amount: string;
  readonly percentage: string;
  readonly ceiling: string;
  readonly executedAt: string;
}

export interface CustodyDepositedPayload {
  readonly principal: string;
  readonly amount: string;
}

export interface CustodyWithdrawnPayload {
  readonly principal: string;
  readonly amount: string;
}

export interface ApprovalGrantedPayload {
  readonly owner: string;
  readonly spender: string;
  readonly amount: string;
  readonly grantedAt: string;
}

// =============================================================================
// Lending Events
// =============================================================================

export interface CollateralDepositedPayload {
  readonly borrower: string;
  readonly amount: string;
  readonly collateral: string;
}

export interface CollateralWithdrawnPayload {
  readonly borrower: string;
  readonly amount: string;
  readonly collateral: string;
}

export interface HealthFactorUpdatedPayload {
  readonly borrower: string;
  readonly healthFactor: string;
}

export interface PositionLiquidatedPayload {
  readonly borrower: string;
  readonly liquidator: string;
  readonly recipient: string;
  readonly amount: string;
  readonly collateral: string;
}

// =============================================================================
// Node Events
// =============================================================================

export interface ClockAdvancedPayload {
  readonly from: string;
  readonly to: string;
}

// =============================================================================
// Event Type Constants
// =============================================================================

export const BREAKER_EVENTS = {
  // Breaker
  LIQUIDATION_INITIATED: "breaker.liquidation.initiated",
  LIQUIDATION_EXECUTED: "breaker.liquidation.executed",
  CUSTODY_DEPOSITED: "breaker.custody.deposited",
  CUSTODY_WITHDRAWN: "breaker.custody.withdrawn",
  APPROVAL_GRANTED: "breaker.approval.granted",

  // Lending
  COLLATERAL_DEPOSITED: "lending.collateral.deposited",
  COLLATERAL_WITHDRAWN: "lending.collateral.withdrawn",
  HEALTH_FACTOR_UPDATED: "lending.health-factor.updated",
  POSITION_LIQUIDATED: "lending.position.liquidated",

  // Node
  CLOCK_ADVANCED: "node.clock.advanced",
} as const;

export type BreakerEventType = (typeof BREAKER_EVENTS)[keyof typeof BREAKER_EVENTS];

// =============================================================================
// Schema Definitions
// =============================================================================

const UNSIGNED_INTEGER = /^(0|[1-9]\d*)$/;

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function hasString(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "string";
}

function hasInteger(obj: Record<string, unknown>, key: string): boolean {
  const value = obj[key];
  return typeof value === "string" && UNSIGNED_INTEGER.test(value);
}

function hasIntegers(obj: Record<string, unknown>, ...keys: string[]): boolean {
  return keys.every((key) => hasInteger(obj, key));
}

const BREAKER_SCHEMAS: readonly EventSchema[] = [
  {
    type: BREAKER_EVENTS.LIQUIDATION_INITIATED,
    version: 1,
    description: "A liquidation record was opened against a principal",
    source: "breaker",
    validate: (p) =>
      isObject(p) &&
      hasString(p, "principal") &&
      hasString(p, "initiator") &&
      hasIntegers(p, "initiatedAt", "blockedUntil", "windowEnd", "snapshotAmount"),
  },
  {
    type: BREAKER_EVENTS.LIQUIDATION_EXECUTED,
    version: 1,
    description: "A seizure within the ceiling was executed and the record cleared",
    source: "breaker",
    validate: (p) =>
      isObject(p) &&
      hasString(p, "principal") &&
      hasString(p, "spender") &&
      hasString(p, "recipient") &&
      hasIntegers(p, "amount", "percentage", "ceiling", "executedAt"),
  },
  {
    type: BREAKER_EVENTS.CUSTODY_DEPOSITED,
    version: 1,
    description: "Underlying was taken into custody and wrapped units minted",
    source: "breaker",
    validate: (p) => isObject(p) && hasString(p, "principal") && hasInteger(p, "amount"),
  },
  {
    type: BREAKER_EVENTS.CUSTODY_WITHDRAWN,
    version: 1,
    description: "Wrapped units were burned and underlying returned",
    source: "breaker",
    validate: (p) => isObject(p) && hasString(p, "principal") && hasInteger(p, "amount"),
  },
  {
    type: BREAKER_EVENTS.APPROVAL_GRANTED,
    version: 1,
    description: "An allowance was granted and its tick recorded",
    source: "breaker",
    validate: (p) =>
      isObject(p) &&
      hasString(p, "owner") &&
      hasString(p, "spender") &&
      hasIntegers(p, "amount", "grantedAt"),
  },
];

const LENDING_SCHEMAS: readonly EventSchema[] = [
  {
    type: BREAKER_EVENTS.COLLATERAL_DEPOSITED,
    version: 1,
    description: "A borrower pledged wrapped collateral",
    source: "lending",
    validate: (p) =>
      isObject(p) && hasString(p, "borrower") && hasIntegers(p, "amount", "collateral"),
  },
  {
    type: BREAKER_EVENTS.COLLATERAL_WITHDRAWN,
    version: 1,
    description: "A borrower released pledged collateral",
    source: "lending",
    validate: (p) =>
      isObject(p) && hasString(p, "borrower") && hasIntegers(p, "amount", "collateral"),
  },
  {
    type: BREAKER_EVENTS.HEALTH_FACTOR_UPDATED,
    version: 1,
    description: "A borrower's health factor was set",
    source: "lending",
    validate: (p) => isObject(p) && hasString(p, "borrower") && hasInteger(p, "healthFactor"),
  },
  {
    type: BREAKER_EVENTS.POSITION_LIQUIDATED,
    version: 1,
    description: "Collateral was seized from an unhealthy position",
    source: "lending",
    validate: (p) =>
      isObject(p) &&
      hasString(p, "borrower") &&
      hasString(p, "liquidator") &&
      hasString(p, "recipient") &&
      hasIntegers(p, "amount", "collateral"),
  },
];

const NODE_SCHEMAS: readonly EventSchema[] = [
  {
    type: BREAKER_EVENTS.CLOCK_ADVANCED,
    version: 1,
    description: "The shared tick clock moved forward",
    source: "node",
    validate: (p) => isObject(p) && hasIntegers(p, "from", "to"),
  },
];

/**
 * Create a catalog with every Breakwater event registered.
 */
export function createBreakerCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of [...BREAKER_SCHEMAS, ...LENDING_SCHEMAS, ...NODE_SCHEMAS]) {
    catalog.register(schema);
  }
  return catalog;
}
