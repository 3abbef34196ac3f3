/**
 * Application factory - wires global middleware, the error boundary and the
 * routes around an injected validator.
 */
import { type Handler, Hono } from "hono";
import type { PostValidator } from "../post/index.js";
import { errorHandler } from "./errorHandler.js";
import { requestIdMiddleware } from "./middleware/requestId.js";
import { createRoutes } from "./routes.js";

export function createApp(validator: PostValidator, handler?: Handler): Hono {
  const app = new Hono();

  app.use("*", requestIdMiddleware);
  app.onError(errorHandler);
  app.route("/", createRoutes(validator, handler));

  return app;
}
