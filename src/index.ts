/**
 * Post Validator - Application Entry Point
 *
 * Startup order:
 * - Config parsed (exits on invalid env)
 * - Post schema compiled (exits on a broken definition)
 * - Hono app built around the compiled validator
 * - Node server starts listening
 */
import { serve } from "@hono/node-server";
import { createApp } from "./api/app.js";
import { config, getSchemaOptions } from "./config.js";
import { createLogger, logOperationFailed } from "./logger.js";
import {
  POST_SCHEMA_DEFINITION,
  formatPostError,
  loadPostValidator,
} from "./post/index.js";

const log = createLogger("api");

log.info(
  {
    port: config.PORT,
    host: config.HOST,
    env: config.NODE_ENV,
    requireAuthorEmail: config.REQUIRE_AUTHOR_EMAIL,
  },
  "Configuration loaded",
);

// =============================================================================
// LOAD SCHEMA
// =============================================================================

// Never serve unvalidated traffic: no schema, no server.
const validator = loadPostValidator(POST_SCHEMA_DEFINITION, getSchemaOptions());

if (validator.isErr()) {
  logOperationFailed(log, "loadPostValidator", formatPostError(validator.error));
  process.exit(1);
}

log.info("Post schema ready");

// =============================================================================
// START SERVER
// =============================================================================

const app = createApp(validator.value);

const server = serve(
  { fetch: app.fetch, port: config.PORT, hostname: config.HOST },
  (info) => {
    log.info(
      { port: info.port, address: info.address, appName: config.APP_NAME },
      `🚀 ${config.APP_NAME} listening on port ${info.port}`,
    );
  },
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  server.close((error) => {
    if (error) {
      logOperationFailed(log, "shutdown", error);
      process.exit(1);
    }
    log.info("Shutdown complete");
    process.exit(0);
  });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
