/**
 * Underlying asset routes (dev network only).
 *
 * GET  /api/v1/underlying/balances/:principal: Underlying balance
 * POST /api/v1/underlying/faucet             : Mint underlying to the caller or `to`
 * POST /api/v1/underlying/approve            : Approve the wrapper (or anyone) to pull
 */

import { Hono } from "hono";
import { toPrincipal } from "@breakwater/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { ApproveSchema, FaucetSchema } from "../types/dto.js";
import { toBalanceView } from "../types/views.js";
import { callerMiddleware } from "../middleware/caller.js";
import { validateBody } from "../middleware/validate.js";

export function createUnderlyingRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/balances/:principal", (c) => {
    const holder = toPrincipal(c.req.param("principal"));
    return c.json({
      data: toBalanceView(holder, c.get("service").underlying.balanceOf(holder)),
    });
  });

  routes.post("/faucet", callerMiddleware(), validateBody(FaucetSchema), (c) => {
    const { to, amount } = c.get("validatedBody");
    const recipient = to ?? c.get("caller");
    const balance = c.get("service").faucet(recipient, amount);
    return c.json({ data: toBalanceView(recipient, balance) }, 201);
  });

  routes.post("/approve", callerMiddleware(), validateBody(ApproveSchema), (c) => {
    const { underlying } = c.get("service");
    const caller = c.get("caller");
    const { spender, amount } = c.get("validatedBody");
    underlying.approve(caller, spender, amount);
    return c.json({
      data: {
        owner: caller,
        spender,
        allowance: underlying.allowance(caller, spender).toString(),
      },
    });
  });

  return routes;
}
