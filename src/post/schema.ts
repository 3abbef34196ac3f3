/**
 * Post module schemas - the embedded JSON Schema for blog posts and the
 * shapes the validator hands back.
 */
import { z } from "zod";

/**
 * JSON Schema a request body must satisfy before it reaches the handler.
 * Compiled once at startup; never read from disk or network.
 */
export const POST_SCHEMA_DEFINITION = `{
  "$schema": "http://json-schema.org/draft-07/schema#",
  "type": "object",
  "title": "post",
  "description": "a blog post",
  "properties": {
    "title": {
      "type": "string",
      "minLength": 1,
      "maxLength": 50,
      "pattern": "^[A-Z].*"
    },
    "date": {
      "type": "string"
    },
    "body": {
      "type": "string"
    },
    "views": {
      "type": "integer",
      "minimum": 1
    },
    "post_type": {
      "type": "string",
      "enum": ["cross-post", "original"]
    },
    "tags": {
      "type": "array",
      "items": {
        "type": "string"
      }
    }
  },
  "required": ["title", "date", "body", "post_type"]
}`;

/**
 * Required field the documented schema variant adds without declaring it
 * under `properties`.
 */
export const AUTHOR_EMAIL_FIELD = "author_email";

export interface SchemaLoadOptions {
  readonly requireAuthorEmail: boolean;
}

/**
 * Outcome of checking one document. `errors` is empty when `valid`.
 */
export interface ValidationResult {
  readonly valid: boolean;
  readonly errors: ReadonlyArray<string>;
}

/**
 * Compiled, read-only validator built once per process.
 */
export interface PostValidator {
  readonly validate: (document: unknown) => ValidationResult;
}

/**
 * Body of a 400 response.
 */
export const ErrorResponseSchema = z.object({
  errors: z
    .array(z.string())
    .min(1)
    .describe("One message per violated constraint"),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
