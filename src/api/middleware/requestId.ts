/**
 * Tags each request with an id (taken from `x-request-id` or freshly made),
 * echoes it back, and hands later handlers a logger bound to it.
 */
import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import { createLogger } from "../../logger.js";

const log = createLogger("api");

export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const requestId = c.req.header("x-request-id") ?? crypto.randomUUID();
  const requestLog = log.child({ requestId });

  c.set("requestId", requestId);
  c.set("log", requestLog);
  c.header("x-request-id", requestId);

  const start = Date.now();
  await next();

  requestLog.debug(
    {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    },
    "Request handled",
  );
};

declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
    log: Logger;
  }
}
