/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability: tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { BreakerService } from "./services/breaker-service.js";
import type { BreakerServiceConfig } from "./services/breaker-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  createEventRoutes,
  createHealthRoutes,
  createLendingRoutes,
  createLiquidationRoutes,
  createPositionRoutes,
  createTickRoutes,
  createTokenRoutes,
  createUnderlyingRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** An existing deployment; otherwise one is built from serviceConfig */
  readonly service?: BreakerService | undefined;
  readonly serviceConfig?: BreakerServiceConfig | undefined;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: BreakerService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const service = options.service ?? new BreakerService(options.serviceConfig);

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes());

  // ─── API Routes ─────────────────────────────────────────────────
  app.route("/api/v1/token", createTokenRoutes());
  app.route("/api/v1/underlying", createUnderlyingRoutes());
  app.route("/api/v1/liquidations", createLiquidationRoutes());
  app.route("/api/v1/lending", createLendingRoutes());
  app.route("/api/v1/positions", createPositionRoutes());
  app.route("/api/v1/ticks", createTickRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
