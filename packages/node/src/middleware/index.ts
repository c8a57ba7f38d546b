/**
 * Middleware barrel - re-exports all middleware.
 */

export { handleError, statusForError } from "./error-handler.js";
export { requestIdMiddleware, resolveRequestId, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, requestLogger } from "./logger.js";
export type { RequestLogEntry, RequestLogFn } from "./logger.js";
export { validateBody, validateQuery, formatZodErrors } from "./validate.js";
export type { ValidatedEnv, ValidatedQueryEnv, ValidationIssue } from "./validate.js";
export {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
  requestFingerprint,
  IDEMPOTENCY_HEADER,
  REPLAY_HEADER,
} from "./idempotency.js";
export type { IdempotencyStore, CachedResponse } from "./idempotency.js";
export {
  authMiddleware,
  unsecuredAuthMiddleware,
  requirePermission,
  requireCaller,
  verifyJwt,
  signJwt,
  CALLER_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
