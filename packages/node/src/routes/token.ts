/**
 * Wrapper token routes.
 *
 * GET  /api/v1/token                           : Token info and breaker config
 * GET  /api/v1/token/snapshot                  : Ledger snapshot
 * GET  /api/v1/token/balances/:principal       : Wrapped balance
 * GET  /api/v1/token/allowances/:owner/:spender: Allowance and last approval tick
 * POST /api/v1/token/deposit                   : Wrap underlying
 * POST /api/v1/token/withdraw                  : Unwrap to underlying
 * POST /api/v1/token/approve                   : Set an allowance
 * POST /api/v1/token/transfer                  : Push from the caller
 * POST /api/v1/token/transfer-from             : Pull on behalf of an owner
 *
 * POST routes act as the X-Principal caller.
 */

import { Hono } from "hono";
import { toPrincipal } from "@breakwater/ledger";
import type { AppEnv } from "../types/api-contract.js";
import {
  AmountBodySchema,
  ApproveSchema,
  TransferFromSchema,
  TransferSchema,
} from "../types/dto.js";
import { toBalanceView } from "../types/views.js";
import { callerMiddleware } from "../middleware/caller.js";
import { validateBody } from "../middleware/validate.js";

export function createTokenRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const { token, clock } = c.get("service");
    return c.json({
      data: {
        address: token.address,
        symbol: token.symbol,
        decimals: token.decimals,
        totalSupply: token.totalSupply.toString(),
        custodyBalance: token.custodyBalance().toString(),
        cooldownDuration: token.config.cooldownDuration.toString(),
        windowDuration: token.config.windowDuration.toString(),
        tick: clock.now().toString(),
      },
    });
  });

  routes.get("/snapshot", (c) => {
    return c.json({ data: c.get("service").token.snapshot() });
  });

  routes.get("/balances/:principal", (c) => {
    const holder = toPrincipal(c.req.param("principal"));
    return c.json({ data: toBalanceView(holder, c.get("service").token.balanceOf(holder)) });
  });

  routes.get("/allowances/:owner/:spender", (c) => {
    const { token } = c.get("service");
    const owner = toPrincipal(c.req.param("owner"));
    const spender = toPrincipal(c.req.param("spender"));
    const approvedAt = token.lastApproval(owner, spender);
    return c.json({
      data: {
        owner,
        spender,
        allowance: token.allowance(owner, spender).toString(),
        approvedAt: approvedAt !== undefined ? approvedAt.toString() : null,
      },
    });
  });

  routes.post("/deposit", callerMiddleware(), validateBody(AmountBodySchema), (c) => {
    const { token } = c.get("service");
    const caller = c.get("caller");
    token.deposit(caller, c.get("validatedBody").amount);
    return c.json({
      data: {
        ...toBalanceView(caller, token.balanceOf(caller)),
        custodyBalance: token.custodyBalance().toString(),
      },
    });
  });

  routes.post("/withdraw", callerMiddleware(), validateBody(AmountBodySchema), (c) => {
    const { token } = c.get("service");
    const caller = c.get("caller");
    token.withdraw(caller, c.get("validatedBody").amount);
    return c.json({
      data: {
        ...toBalanceView(caller, token.balanceOf(caller)),
        custodyBalance: token.custodyBalance().toString(),
      },
    });
  });

  routes.post("/approve", callerMiddleware(), validateBody(ApproveSchema), (c) => {
    const { token } = c.get("service");
    const caller = c.get("caller");
    const { spender, amount } = c.get("validatedBody");
    token.approve(caller, spender, amount);
    return c.json({
      data: {
        owner: caller,
        spender,
        allowance: token.allowance(caller, spender).toString(),
        approvedAt: token.now().toString(),
      },
    });
  });

  routes.post("/transfer", callerMiddleware(), validateBody(TransferSchema), (c) => {
    const { token } = c.get("service");
    const caller = c.get("caller");
    const { to, amount } = c.get("validatedBody");
    token.transfer(caller, to, amount);
    return c.json({
      data: {
        from: toBalanceView(caller, token.balanceOf(caller)),
        to: toBalanceView(to, token.balanceOf(to)),
      },
    });
  });

  routes.post("/transfer-from", callerMiddleware(), validateBody(TransferFromSchema), (c) => {
    const { token } = c.get("service");
    const caller = c.get("caller");
    const { from, to, amount } = c.get("validatedBody");
    token.transferFrom(caller, from, to, amount);
    return c.json({
      data: {
        from: toBalanceView(from, token.balanceOf(from)),
        to: toBalanceView(to, token.balanceOf(to)),
        allowance: token.allowance(from, caller).toString(),
      },
    });
  });

  return routes;
}
