/**
 * Post module public API.
 * Modules import from other modules via index.ts only - no deep imports.
 */
export { loadPostValidator, validatePost } from "./service.js";
export { buildErrorResponse, serializeErrorResponse } from "./transform.js";
export { bodyUnreadable, formatPostError, toError } from "./errors.js";
export type { PostValidator } from "./schema.js";
export { ErrorResponseSchema, POST_SCHEMA_DEFINITION } from "./schema.js";
