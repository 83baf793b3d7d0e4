/**
 * Caller middleware.
 *
 * State-changing routes act on behalf of the principal named in the
 * X-Principal header. There is no authentication: this node models a
 * dev network where any account can be impersonated.
 */

import type { MiddlewareHandler } from "hono";
import { isPrincipal } from "@breakwater/types";
import type { Principal } from "@breakwater/types";
import { toPrincipal } from "@breakwater/ledger";
import { createErrorEnvelope } from "../types/error.js";

export const PRINCIPAL_HEADER = "X-Principal";

export function callerMiddleware(): MiddlewareHandler<{ Variables: { caller: Principal } }> {
  return async (c, next) => {
    const raw = c.req.header(PRINCIPAL_HEADER);
    if (raw === undefined || !isPrincipal(raw)) {
      return c.json(
        createErrorEnvelope(
          "MISSING_PRINCIPAL",
          `${PRINCIPAL_HEADER} header must carry a 0x-prefixed 20-byte address`,
        ),
        400,
      );
    }

    c.set("caller", toPrincipal(raw));
    return next();
  };
}
