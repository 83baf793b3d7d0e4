/**
 * Health check routes.
 *
 * GET /health: Liveness probe (always 200 if server is running)
 * GET /ready : Readiness probe (event hash chain intact, every payload
 *               matches its catalog schema)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const service = c.get("service");
    const { integrity, invalidEvents } = service.checkEventStore();
    const ready = integrity.valid && invalidEvents === 0;

    const body = {
      status: ready ? "ready" : "not_ready",
      tick: service.clock.now().toString(),
      eventStore: {
        events: service.eventStore.globalPosition(),
        chainValid: integrity.valid,
        lastVerifiedPosition: integrity.lastVerifiedPosition,
        invalidEvents,
      },
      timestamp: new Date().toISOString(),
    };

    return ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
