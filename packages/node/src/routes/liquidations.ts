/**
 * Liquidation routes.
 *
 * POST /api/v1/liquidations                    : Initiate against a principal (eligibility comes from the lending target)
 * GET  /api/v1/liquidations/:principal         : Phase, record and current ceiling
 * GET  /api/v1/liquidations/:principal/amount  : Current (percentage, amount)
 */

import { Hono } from "hono";
import { toPrincipal } from "@breakwater/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { InitiateLiquidationSchema } from "../types/dto.js";
import { toLiquidatableView, toPhaseView, toRecordView } from "../types/views.js";
import { callerMiddleware } from "../middleware/caller.js";
import { validateBody } from "../middleware/validate.js";

export function createLiquidationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", callerMiddleware(), validateBody(InitiateLiquidationSchema), (c) => {
    const { token } = c.get("service");
    const { principal } = c.get("validatedBody");
    const record = token.initiate(c.get("caller"), principal);
    return c.json({ data: { principal, record: toRecordView(record) } }, 201);
  });

  routes.get("/:principal", (c) => {
    const { token } = c.get("service");
    const principal = toPrincipal(c.req.param("principal"));
    const record = token.liquidationRecord(principal);
    return c.json({
      data: {
        principal,
        tick: token.now().toString(),
        phase: toPhaseView(token.liquidationPhase(principal)),
        record: record !== undefined ? toRecordView(record) : null,
        liquidatable: toLiquidatableView(token.getLiquidatableAmount(principal)),
      },
    });
  });

  routes.get("/:principal/amount", (c) => {
    const principal = toPrincipal(c.req.param("principal"));
    return c.json({
      data: toLiquidatableView(c.get("service").token.getLiquidatableAmount(principal)),
    });
  });

  return routes;
}
