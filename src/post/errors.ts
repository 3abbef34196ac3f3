/**
 * Post module error types - typed error unions, not strings.
 * Errors carry context about what failed.
 */

/**
 * Failures while turning the embedded definition into a validator.
 * Both are fatal at startup.
 */
export type SchemaLoadError =
  | {
      readonly type: "SCHEMA_MALFORMED";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "SCHEMA_INVALID";
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Per-request failures. Only VALIDATION_FAILED is the caller's fault.
 */
export type PostError =
  | {
      readonly type: "BODY_UNREADABLE";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "BODY_NOT_JSON";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "VALIDATION_FAILED";
      readonly errors: ReadonlyArray<string>;
    }
  | {
      readonly type: "SERIALIZATION_FAILED";
      readonly message: string;
      readonly cause?: Error;
    };

export const schemaMalformed = (
  message: string,
  cause?: Error,
): SchemaLoadError =>
  cause
    ? { type: "SCHEMA_MALFORMED", message, cause }
    : { type: "SCHEMA_MALFORMED", message };

export const schemaInvalid = (
  message: string,
  cause?: Error,
): SchemaLoadError =>
  cause
    ? { type: "SCHEMA_INVALID", message, cause }
    : { type: "SCHEMA_INVALID", message };

export const bodyUnreadable = (message: string, cause?: Error): PostError =>
  cause
    ? { type: "BODY_UNREADABLE", message, cause }
    : { type: "BODY_UNREADABLE", message };

export const bodyNotJson = (message: string, cause?: Error): PostError =>
  cause
    ? { type: "BODY_NOT_JSON", message, cause }
    : { type: "BODY_NOT_JSON", message };

export const validationFailed = (errors: ReadonlyArray<string>): PostError => ({
  type: "VALIDATION_FAILED",
  errors,
});

export const serializationFailed = (
  message: string,
  cause?: Error,
): PostError =>
  cause
    ? { type: "SERIALIZATION_FAILED", message, cause }
    : { type: "SERIALIZATION_FAILED", message };

/**
 * Converts an unknown thrown value into an Error.
 */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * Format any post or schema error for logs.
 */
export function formatPostError(error: PostError | SchemaLoadError): string {
  switch (error.type) {
    case "VALIDATION_FAILED":
      return `Validation failed: ${error.errors.join("; ")}`;
    case "BODY_UNREADABLE":
      return `Could not read request body: ${error.message}`;
    case "BODY_NOT_JSON":
      return `Request body is not JSON: ${error.message}`;
    case "SERIALIZATION_FAILED":
      return `Could not serialize error response: ${error.message}`;
    case "SCHEMA_MALFORMED":
      return `Schema definition is not valid JSON: ${error.message}`;
    case "SCHEMA_INVALID":
      return `Schema failed to compile: ${error.message}`;
  }
}
