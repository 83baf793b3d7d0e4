/**
 * Clock routes.
 *
 * GET  /api/v1/ticks        : Current tick
 * POST /api/v1/ticks/advance: Move the clock forward (dev networks)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AdvanceTicksSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createTickRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: { tick: c.get("service").clock.now().toString() } });
  });

  routes.post("/advance", validateBody(AdvanceTicksSchema), (c) => {
    const { ticks } = c.get("validatedBody");
    const { from, to } = c.get("service").advance(BigInt(ticks), "http");
    return c.json({ data: { from: from.toString(), to: to.toString() } });
  });

  return routes;
}
