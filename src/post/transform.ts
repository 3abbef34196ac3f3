/**
 * Post transformations - pure functions with no side effects.
 * Each function does ONE thing: (input: A) => B
 */
import type { ErrorObject, SchemaObject } from "ajv";
import { Result, err, ok } from "neverthrow";
import {
  type PostError,
  type SchemaLoadError,
  bodyNotJson,
  schemaMalformed,
  serializationFailed,
  toError,
} from "./errors.js";
import { AUTHOR_EMAIL_FIELD, type ErrorResponse } from "./schema.js";

const safeJsonParse = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  toError,
);

const safeJsonStringify = Result.fromThrowable(
  (value: ErrorResponse): string => JSON.stringify(value),
  toError,
);

const isSchemaObject = (value: unknown): value is SchemaObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

// =============================================================================
// Schema Definition
// =============================================================================

/**
 * Parses the textual schema definition into a schema object.
 * Compilation is left to the service.
 */
export const parseSchemaDefinition = (
  definition: string,
): Result<SchemaObject, SchemaLoadError> =>
  safeJsonParse(definition)
    .mapErr((cause) => schemaMalformed(cause.message, cause))
    .andThen((value) =>
      isSchemaObject(value)
        ? ok(value)
        : err(schemaMalformed("Schema definition must be a JSON object")),
    );

/**
 * Returns a copy of the schema that also requires `author_email`.
 */
export const withAuthorEmailRequired = (schema: SchemaObject): SchemaObject => {
  const current: unknown = schema.required;
  const required = Array.isArray(current)
    ? current.filter((field): field is string => typeof field === "string")
    : [];

  if (required.includes(AUTHOR_EMAIL_FIELD)) {
    return schema;
  }

  return { ...schema, required: [...required, AUTHOR_EMAIL_FIELD] };
};

// =============================================================================
// Violations
// =============================================================================

/**
 * Turns a JSON pointer into a dotted field path.
 *
 * @example
 * formatFieldPath("/tags/1") // "tags.1"
 * formatFieldPath("") // "(root)"
 */
export const formatFieldPath = (instancePath: string): string => {
  if (instancePath === "") {
    return "(root)";
  }

  return instancePath
    .split("/")
    .slice(1)
    .map((segment) => segment.replace(/~1/g, "/").replace(/~0/g, "~"))
    .join(".");
};

/**
 * One human-readable message per violated constraint.
 */
export const formatViolation = (error: ErrorObject): string => {
  const message = error.message ?? `failed "${error.keyword}" constraint`;
  return `${formatFieldPath(error.instancePath)}: ${message}`;
};

export const formatViolations = (
  errors: ReadonlyArray<ErrorObject>,
): ReadonlyArray<string> => errors.map(formatViolation);

// =============================================================================
// Request / Response Bodies
// =============================================================================

/**
 * Parses a raw request body. An empty body is not JSON.
 */
export const parseRequestBody = (text: string): Result<unknown, PostError> =>
  safeJsonParse(text).mapErr((cause) => bodyNotJson(cause.message, cause));

export const buildErrorResponse = (
  errors: ReadonlyArray<string>,
): ErrorResponse => ({ errors: [...errors] });

export const serializeErrorResponse = (
  response: ErrorResponse,
): Result<string, PostError> =>
  safeJsonStringify(response).mapErr((cause) =>
    serializationFailed(cause.message, cause),
  );
