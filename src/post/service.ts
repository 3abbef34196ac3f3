/**
 * Post service - compiles the schema and runs validation.
 * This is the "imperative shell" that wraps pure functions.
 */
import { Ajv, type ValidateFunction } from "ajv";
import { type Result, err, ok } from "neverthrow";
import type { Logger } from "pino";
import { createLogger } from "../logger.js";
import {
  type PostError,
  type SchemaLoadError,
  formatPostError,
  schemaInvalid,
  toError,
  validationFailed,
} from "./errors.js";
import type {
  PostValidator,
  SchemaLoadOptions,
  ValidationResult,
} from "./schema.js";
import {
  formatViolations,
  parseRequestBody,
  parseSchemaDefinition,
  withAuthorEmailRequired,
} from "./transform.js";

const log = createLogger("post");

/**
 * Build the validator from a schema definition.
 * parse → adjust required → compile
 */
export const loadPostValidator = (
  definition: string,
  options: SchemaLoadOptions,
): Result<PostValidator, SchemaLoadError> => {
  const parsed = parseSchemaDefinition(definition);
  if (parsed.isErr()) {
    log.error(
      { operation: "loadPostValidator", error: parsed.error.message },
      `  ↳ ${formatPostError(parsed.error)}`,
    );
    return err(parsed.error);
  }

  const schema = options.requireAuthorEmail
    ? withAuthorEmailRequired(parsed.value)
    : parsed.value;

  if (options.requireAuthorEmail) {
    log.warn(
      { operation: "loadPostValidator" },
      "  ↳ author_email is required but not declared; only payloads carrying it can pass",
    );
  }

  const ajv = new Ajv({ allErrors: true });

  let check: ValidateFunction;
  try {
    check = ajv.compile(schema);
  } catch (error) {
    const cause = toError(error);
    log.error(
      { operation: "loadPostValidator", error: cause.message },
      "  ↳ Schema compilation failed",
    );
    return err(schemaInvalid(cause.message, cause));
  }

  log.info(
    {
      operation: "loadPostValidator",
      requireAuthorEmail: options.requireAuthorEmail,
    },
    "✓ Post schema compiled",
  );

  // Ajv leaves the last run's errors on the function; copy them out before
  // returning so nothing leaks into the next call.
  const validate = (document: unknown): ValidationResult => {
    if (check(document)) {
      return { valid: true, errors: [] };
    }
    return { valid: false, errors: formatViolations(check.errors ?? []) };
  };

  return ok(Object.freeze({ validate }));
};

/**
 * Validate a raw request body.
 * parse → validate → return the parsed document or every violation
 *
 * Pass the request-scoped logger so its bindings land on these lines.
 */
export const validatePost = (
  validator: PostValidator,
  rawBody: string,
  requestLog: Logger = log,
): Result<unknown, PostError> => {
  const parsed = parseRequestBody(rawBody);
  if (parsed.isErr()) {
    requestLog.warn(
      { operation: "validatePost", error: parsed.error.type },
      formatPostError(parsed.error),
    );
    return err(parsed.error);
  }

  const result = validator.validate(parsed.value);
  if (!result.valid) {
    requestLog.warn(
      { operation: "validatePost", errors: result.errors },
      "Validation failed",
    );
    return err(validationFailed(result.errors));
  }

  requestLog.debug({ operation: "validatePost" }, "Post is valid");

  return ok(parsed.value);
};
