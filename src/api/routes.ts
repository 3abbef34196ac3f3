/**
 * API routes for the post validator.
 *
 * - / (any method) - validated post submission
 */
import { Hono, type Handler } from "hono";
import type { PostValidator } from "../post/index.js";
import { validationMiddleware } from "./middleware/validate.js";

/**
 * Placeholder business handler. Only ever sees posts that passed validation.
 */
export const processPost: Handler = (c) => {
  c.get("log").info("Post accepted");
  return c.text("valid request", 200);
};

/**
 * Build the routes around an already-compiled validator.
 * The downstream handler can be swapped; it never learns validation ran.
 */
export function createRoutes(
  validator: PostValidator,
  handler: Handler = processPost,
): Hono {
  const routes = new Hono();

  routes.all("/", validationMiddleware(validator), handler);

  return routes;
}
