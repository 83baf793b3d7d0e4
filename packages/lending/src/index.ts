/**
 * @breakwater/lending: Reference lending protocol.
 *
 * - LendingProtocol: collateral pledges, health factors, liquidation entry points
 * - PositionMonitor: status and next action per borrower
 *
 * @packageDocumentation
 */

export { LendingProtocol } from "./lending-protocol.js";
export type { LendingProtocolOptions } from "./lending-protocol.js";

export { PositionMonitor } from "./position-monitor.js";

export { HEALTH_FACTOR_ONE, LendingError } from "./types.js";
export type {
  CollateralToken,
  Position,
  PositionStatus,
  PositionAction,
  PositionView,
  LendingErrorCode,
} from "./types.js";
