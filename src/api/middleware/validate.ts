/**
 * Validation middleware - checks the request body against the compiled post
 * schema before the downstream handler sees it.
 *
 * Outcomes:
 * - body unreadable or not JSON → 500, empty body
 * - schema violations → 400 with every violation listed
 * - valid → next handler runs; the body stays readable for it
 */
import type { MiddlewareHandler } from "hono";
import { ResultAsync } from "neverthrow";
import {
  type PostValidator,
  bodyUnreadable,
  buildErrorResponse,
  formatPostError,
  serializeErrorResponse,
  toError,
  validatePost,
} from "../../post/index.js";

/**
 * Wrap a handler with post validation. The validator is injected so tests
 * and alternate deployments can supply their own schema.
 */
export const validationMiddleware =
  (validator: PostValidator): MiddlewareHandler =>
  async (c, next) => {
    const log = c.get("log");

    // Hono caches the text, so the downstream handler can read it again
    const rawBody = await ResultAsync.fromPromise(c.req.text(), (error) => {
      const cause = toError(error);
      return bodyUnreadable(cause.message, cause);
    });

    if (rawBody.isErr()) {
      log.error(
        { operation: "validationMiddleware" },
        formatPostError(rawBody.error),
      );
      return c.body(null, 500);
    }

    const result = validatePost(validator, rawBody.value, log);

    if (result.isOk()) {
      await next();
      return;
    }

    // Already logged by validatePost
    if (result.error.type !== "VALIDATION_FAILED") {
      return c.body(null, 500);
    }

    const serialized = serializeErrorResponse(
      buildErrorResponse(result.error.errors),
    );

    if (serialized.isErr()) {
      log.error(
        { operation: "validationMiddleware" },
        formatPostError(serialized.error),
      );
      return c.body(null, 500);
    }

    return c.body(serialized.value, 400, {
      "Content-Type": "application/json",
    });
  };
