/**
 * Logging for the post validator.
 *
 * One root pino instance per process; modules and requests get children of
 * it, so there is a single pino-pretty transport in development.
 */
import { type Logger, pino } from "pino";
import { config } from "./config.js";

export type ModuleName = "api" | "post";

const rootLogger: Logger = pino({
  level: config.LOG_LEVEL,
  ...(config.NODE_ENV === "development"
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            messageFormat: "[{name}] {msg}",
            ignore: "pid,hostname,name",
            translateTime: "HH:MM:ss",
          },
        },
      }
    : {}),
});

/**
 * Logger bound to a module name.
 *
 * @example
 * const log = createLogger("post");
 * log.child({ requestId }).warn("Validation failed");
 */
export const createLogger = (module: ModuleName): Logger =>
  rootLogger.child({ name: module });

/**
 * Log an operation failure with the error message pulled out.
 */
export function logOperationFailed(
  logger: Logger,
  operation: string,
  error: unknown,
): void {
  const message = error instanceof Error ? error.message : String(error);
  logger.error({ operation, error: message }, `✗ ${operation} failed: ${message}`);
}
