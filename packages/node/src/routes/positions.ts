/**
 * Position monitor routes.
 *
 * GET /api/v1/positions           : Every known borrower with status and next action
 * GET /api/v1/positions/:principal: One borrower
 */

import { Hono } from "hono";
import { toPrincipal } from "@breakwater/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { toMonitorView } from "../types/views.js";

export function createPositionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const { monitor, clock } = c.get("service");
    return c.json({
      data: monitor.describeAll().map(toMonitorView),
      tick: clock.now().toString(),
    });
  });

  routes.get("/:principal", (c) => {
    const principal = toPrincipal(c.req.param("principal"));
    return c.json({ data: toMonitorView(c.get("service").monitor.describe(principal)) });
  });

  return routes;
}
