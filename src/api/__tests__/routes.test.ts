/**
 * API Routes Integration Tests
 *
 * Runs requests through the full app (request id, validation, handler)
 * with Hono's app.request() - no sockets.
 */
import { type Handler, Hono } from "hono";
import { beforeEach, describe, expect, test, vi } from "vitest";
import {
  ErrorResponseSchema,
  POST_SCHEMA_DEFINITION,
  type PostValidator,
  formatPostError,
  loadPostValidator,
} from "../../post/index.js";
import { createApp } from "../app.js";

const loadValidator = (requireAuthorEmail = false): PostValidator => {
  const loaded = loadPostValidator(POST_SCHEMA_DEFINITION, {
    requireAuthorEmail,
  });
  if (loaded.isErr()) {
    throw new Error(formatPostError(loaded.error));
  }
  return loaded.value;
};

const validPost = {
  title: "Hello",
  date: "2023-01-01",
  body: "text",
  post_type: "original",
};

const post = (app: Hono, body: string, headers: Record<string, string> = {}) =>
  app.request("/", {
    method: "POST",
    body,
    headers: { "Content-Type": "application/json", ...headers },
  });

describe("API Routes", () => {
  const validator = loadValidator();
  let app: Hono;

  beforeEach(() => {
    app = createApp(validator);
  });

  // ===========================================================================
  // Valid posts
  // ===========================================================================

  describe("valid payload", () => {
    test("returns 200 with the confirmation body", async () => {
      // Act
      const res = await post(app, JSON.stringify(validPost));

      // Assert
      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toMatch(/^text\/plain/);
      expect(await res.text()).toBe("valid request");
    });

    test("accepts any method", async () => {
      const res = await app.request("/", {
        method: "PUT",
        body: JSON.stringify({ ...validPost, views: 3, tags: ["news"] }),
      });

      expect(res.status).toBe(200);
      expect(await res.text()).toBe("valid request");
    });

    test("leaves the body readable for the downstream handler", async () => {
      // Arrange
      const echo: Handler = async (c) => c.json(await c.req.json(), 201);
      const echoApp = createApp(validator, echo);

      // Act
      const res = await post(echoApp, JSON.stringify(validPost));

      // Assert
      expect(res.status).toBe(201);
      expect(await res.json()).toEqual(validPost);
    });
  });

  // ===========================================================================
  // Validation failures
  // ===========================================================================

  describe("invalid payload", () => {
    test("returns 400 with the violation list", async () => {
      // Act
      const { date: _date, ...withoutDate } = validPost;
      const res = await post(app, JSON.stringify(withoutDate));

      // Assert
      expect(res.status).toBe(400);
      expect(res.headers.get("content-type")).toBe("application/json");
      expect(await res.json()).toEqual({
        errors: ["(root): must have required property 'date'"],
      });
    });

    test("lists every violation in one response", async () => {
      const res = await post(
        app,
        JSON.stringify({ ...validPost, title: "hello", post_type: "draft" }),
      );
      const body = ErrorResponseSchema.parse(await res.json());

      expect(res.status).toBe(400);
      expect(body.errors).toHaveLength(2);
      expect(body.errors).toEqual(
        expect.arrayContaining([
          'title: must match pattern "^[A-Z].*"',
          "post_type: must be equal to one of the allowed values",
        ]),
      );
    });

    test("does not call the downstream handler", async () => {
      // Arrange
      const handler = vi.fn<Handler>((c) => c.text("should not run"));
      const guardedApp = createApp(validator, handler);

      // Act
      const res = await post(guardedApp, JSON.stringify({ title: "Hello" }));

      // Assert
      expect(res.status).toBe(400);
      expect(handler).not.toHaveBeenCalled();
    });

    test("rejects JSON of the wrong shape with 400", async () => {
      const res = await post(app, "[]");

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ errors: ["(root): must be object"] });
    });

    test("rejects views below 1", async () => {
      const res = await post(app, JSON.stringify({ ...validPost, views: 0 }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ errors: ["views: must be >= 1"] });
    });
  });

  // ===========================================================================
  // Internal failures
  // ===========================================================================

  describe("unprocessable body", () => {
    test("returns 500 with an empty body for an empty request", async () => {
      const res = await post(app, "");

      expect(res.status).toBe(500);
      expect(await res.text()).toBe("");
    });

    test("returns 500 for a body that is not JSON", async () => {
      const handler = vi.fn<Handler>((c) => c.text("should not run"));
      const guardedApp = createApp(validator, handler);

      const res = await post(guardedApp, "title=Hello");

      expect(res.status).toBe(500);
      expect(await res.text()).toBe("");
      expect(handler).not.toHaveBeenCalled();
    });

    test("returns 500 when the body stream fails mid-read", async () => {
      // Arrange
      const handler = vi.fn<Handler>((c) => c.text("should not run"));
      const guardedApp = createApp(validator, handler);
      const body = new ReadableStream({
        start(controller) {
          controller.error(new Error("socket reset"));
        },
      });

      // Act
      const res = await guardedApp.request("/", {
        method: "POST",
        body,
        duplex: "half",
      });

      // Assert
      expect(res.status).toBe(500);
      expect(await res.text()).toBe("");
      expect(handler).not.toHaveBeenCalled();
    });

    test("returns 500 for a GET without a body", async () => {
      const res = await app.request("/");

      expect(res.status).toBe(500);
    });

    test("returns an empty 500 when the handler throws", async () => {
      // Arrange
      const failing: Handler = () => {
        throw new Error("handler exploded");
      };
      const failingApp = createApp(validator, failing);

      // Act
      const res = await post(failingApp, JSON.stringify(validPost));

      // Assert
      expect(res.status).toBe(500);
      expect(await res.text()).toBe("");
    });
  });

  // ===========================================================================
  // Request tracing
  // ===========================================================================

  describe("x-request-id", () => {
    test("echoes an incoming request id", async () => {
      const res = await post(app, JSON.stringify(validPost), {
        "x-request-id": "test-request-id",
      });

      expect(res.headers.get("x-request-id")).toBe("test-request-id");
    });

    test("hands the handler a logger bound to the request id", async () => {
      // Arrange
      const bindingsOf: Handler = (c) => c.json(c.get("log").bindings());
      const inspectApp = createApp(validator, bindingsOf);

      // Act
      const res = await post(inspectApp, JSON.stringify(validPost), {
        "x-request-id": "test-request-id",
      });

      // Assert
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        name: "api",
        requestId: "test-request-id",
      });
    });

    test("generates one when absent", async () => {
      const res = await post(app, JSON.stringify({}));

      expect(res.status).toBe(400);
      expect(res.headers.get("x-request-id")).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
      );
    });
  });

  // ===========================================================================
  // Schema variant
  // ===========================================================================

  describe("author_email variant", () => {
    test("rejects posts without author_email", async () => {
      const strictApp = createApp(loadValidator(true));

      const res = await post(strictApp, JSON.stringify(validPost));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        errors: ["(root): must have required property 'author_email'"],
      });
    });

    test("accepts posts that carry author_email", async () => {
      const strictApp = createApp(loadValidator(true));

      const res = await post(
        strictApp,
        JSON.stringify({ ...validPost, author_email: "ada@example.com" }),
      );

      expect(res.status).toBe(200);
    });
  });

  test("unknown paths fall through to 404", async () => {
    const res = await app.request("/posts", { method: "POST", body: "{}" });

    expect(res.status).toBe(404);
  });
});
