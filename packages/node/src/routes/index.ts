/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createTokenRoutes } from "./token.js";
export { createUnderlyingRoutes } from "./underlying.js";
export { createLiquidationRoutes } from "./liquidations.js";
export { createLendingRoutes } from "./lending.js";
export { createPositionRoutes } from "./positions.js";
export { createTickRoutes } from "./ticks.js";
export { createEventRoutes } from "./events.js";
