/**
 * Lending protocol routes.
 *
 * POST /api/v1/lending/collateral/deposit  : Pledge wrapped collateral (caller)
 * POST /api/v1/lending/collateral/withdraw : Release pledged collateral (caller)
 * POST /api/v1/lending/health-factor       : Set a borrower's health factor
 * POST /api/v1/lending/initiate            : Open a liquidation through the protocol
 * POST /api/v1/lending/liquidate           : Seize collateral within the ceiling
 * GET  /api/v1/lending/positions/:principal: Raw position
 */

import { Hono } from "hono";
import { toPrincipal } from "@breakwater/ledger";
import type { AppEnv } from "../types/api-contract.js";
import {
  AmountBodySchema,
  HealthFactorSchema,
  LendingInitiateSchema,
  LendingLiquidateSchema,
} from "../types/dto.js";
import { toPositionView, toRecordView } from "../types/views.js";
import { callerMiddleware } from "../middleware/caller.js";
import { validateBody } from "../middleware/validate.js";

export function createLendingRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/collateral/deposit", callerMiddleware(), validateBody(AmountBodySchema), (c) => {
    const position = c
      .get("service")
      .protocol.depositCollateral(c.get("caller"), c.get("validatedBody").amount);
    return c.json({ data: toPositionView(position) });
  });

  routes.post("/collateral/withdraw", callerMiddleware(), validateBody(AmountBodySchema), (c) => {
    const position = c
      .get("service")
      .protocol.withdrawCollateral(c.get("caller"), c.get("validatedBody").amount);
    return c.json({ data: toPositionView(position) });
  });

  routes.post("/health-factor", callerMiddleware(), validateBody(HealthFactorSchema), (c) => {
    const { borrower, healthFactor } = c.get("validatedBody");
    const position = c
      .get("service")
      .protocol.setHealthFactor(c.get("caller"), borrower, healthFactor);
    return c.json({ data: toPositionView(position) });
  });

  routes.post("/initiate", callerMiddleware(), validateBody(LendingInitiateSchema), (c) => {
    const { borrower } = c.get("validatedBody");
    const record = c.get("service").protocol.initiateLiquidation(c.get("caller"), borrower);
    return c.json({ data: { principal: borrower, record: toRecordView(record) } }, 201);
  });

  routes.post("/liquidate", callerMiddleware(), validateBody(LendingLiquidateSchema), (c) => {
    const { token, protocol } = c.get("service");
    const caller = c.get("caller");
    const { borrower, amount, recipient } = c.get("validatedBody");
    const to = recipient ?? caller;
    const position = protocol.liquidate(caller, borrower, amount, to);
    return c.json({
      data: {
        ...toPositionView(position),
        recipient: to,
        recipientBalance: token.balanceOf(to).toString(),
      },
    });
  });

  routes.get("/positions/:principal", (c) => {
    const principal = toPrincipal(c.req.param("principal"));
    return c.json({ data: toPositionView(c.get("service").protocol.position(principal)) });
  });

  return routes;
}
