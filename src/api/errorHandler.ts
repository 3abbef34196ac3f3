/**
 * Global error boundary - catches all unhandled errors.
 * Never let errors bubble up without logging and a clean response.
 */
import type { ErrorHandler } from "hono";
import { createLogger } from "../logger.js";

const log = createLogger("api");

/**
 * Global error handler for Hono.
 * Logs errors with context; the caller gets a bare 500 with no detail.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  // Falls back to the module logger if the request-id middleware never ran
  const requestLog = c.get("log") ?? log;

  requestLog.error(
    {
      operation: "unhandledError",
      error: err.message,
      stack: err.stack,
      path: c.req.path,
      method: c.req.method,
    },
    "❌ Unhandled error",
  );

  return c.body(null, 500);
};
