/**
 * @breakwater/breaker: Circuit-breaker wrapper token.
 *
 * - CircuitBreakerToken: wrap/unwrap, ERC-20-style movements, liquidation ops
 * - LiquidationStateMachine: cooldown → execution window → expiry per principal
 * - computeLiquidatableAmount: progressive, wallet-aware seizure ceiling
 * - TransferInterceptor: the guard every balance change passes
 * - DepositClassifier: same-tick approval rule
 * - TickClock: shared discrete time
 *
 * @packageDocumentation
 */

export { CircuitBreakerToken } from "./circuit-breaker-token.js";
export type { CircuitBreakerTokenOptions } from "./circuit-breaker-token.js";

export { CustodyGateway } from "./custody-gateway.js";
export { DepositClassifier } from "./deposit-classifier.js";

export { LiquidationStateMachine, TRANSITIONS, phaseOf } from "./liquidation-state.js";
export type { LiquidationAction, Transition } from "./liquidation-state.js";

export {
  computeLiquidatableAmount,
  basePercentage,
  walletCap,
  NOTHING_LIQUIDATABLE,
  BASE_PERCENTAGE,
  FULL_PERCENTAGE,
} from "./progressive-calculator.js";
export type { CeilingInput } from "./progressive-calculator.js";

export { TransferInterceptor } from "./transfer-interceptor.js";
export type {
  InterceptDecision,
  SeizureReceipt,
  TransferInterceptorOptions,
} from "./transfer-interceptor.js";

export { TickClock } from "./tick-clock.js";
export type { Clock } from "./tick-clock.js";

export { liquidationStream, custodyStream, approvalStream } from "./events.js";

export {
  BreakerError,
  ERROR_CATEGORIES,
  DEFAULT_BREAKER_CONFIG,
  createBreakerConfig,
} from "./types.js";
export type { BreakerConfig, BreakerErrorCode, BreakerErrorCategory } from "./types.js";
