/**
 * Typed configuration - all config lives in the environment, parsed with Zod
 * at startup. App crashes immediately on invalid config - fail fast.
 *
 * Post validator configuration covering:
 * - Server settings
 * - Logging
 * - Schema variant selection
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce
    .number()
    .int()
    .min(1)
    .max(65535)
    .default(8000)
    .describe("HTTP server port"),
  HOST: z.string().min(1).default("0.0.0.0").describe("Bind address"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("PostValidator").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Schema
  // ==========================================================================
  REQUIRE_AUTHOR_EMAIL: envBoolean(false).describe(
    "Also require author_email, a field the post schema never declares",
  ),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

/**
 * Options handed to the schema loader.
 */
export function getSchemaOptions(): Readonly<{ requireAuthorEmail: boolean }> {
  return { requireAuthorEmail: config.REQUIRE_AUTHOR_EMAIL };
}
