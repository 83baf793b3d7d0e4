/**
 * @breakwater/node: HTTP node over a circuit-breaker deployment.
 *
 * @packageDocumentation
 */

export { BreakerService, DEFAULT_SERVICE_CONFIG, CLOCK_STREAM } from "./services/breaker-service.js";
export type { BreakerServiceConfig, ClockAdvance } from "./services/breaker-service.js";
export { subscribeEventLogger } from "./services/event-logger.js";
export type { EventLogSink } from "./services/event-logger.js";
export { loadConfig, ConfigSchema, serviceConfigFrom } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
