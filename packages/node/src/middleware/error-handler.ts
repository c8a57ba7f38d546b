/**
 * Global error handler, registered with `app.onError`.
 *
 * LedgerError, EventStoreError and RegistryError carry a `code`; each
 * code maps to one HTTP status. Anything else is a 500 whose message is
 * never sent to the client.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { createErrorEnvelope } from "../types/error.js";
import type { DomainErrorCode } from "../types/error.js";

const STATUS_BY_CODE: Readonly<Record<DomainErrorCode, ContentfulStatusCode>> = {
  // Business failures: the request was well formed but the ledger refused it
  INSUFFICIENT_BALANCE: 422,
  BALANCE_OVERFLOW: 422,

  INVALID_AMOUNT: 400,
  INVALID_ACCOUNT: 400,
  INVALID_SNAPSHOT: 400,
  INVALID_LEDGER_ID: 400,
  INVALID_STREAM_ID: 400,
  EMPTY_APPEND: 400,
  INVALID_VERSION: 400,

  LEDGER_NOT_FOUND: 404,

  LEDGER_EXISTS: 409,
  CONCURRENCY_CONFLICT: 409,

  // Unreadable snapshot on disk
  CORRUPT_SNAPSHOT: 500,
};

function isDomainErrorCode(code: unknown): code is DomainErrorCode {
  return typeof code === "string" && Object.prototype.hasOwnProperty.call(STATUS_BY_CODE, code);
}

/**
 * Status a domain error code is reported with; 500 for anything unknown.
 */
export function statusForError(err: Error): ContentfulStatusCode {
  const code: unknown = "code" in err ? err.code : undefined;
  return isDomainErrorCode(code) ? STATUS_BY_CODE[code] : 500;
}

export function handleError(err: Error, c: Context): Response {
  const code: unknown = "code" in err ? err.code : undefined;
  const status = statusForError(err);

  if (status === 500 || !isDomainErrorCode(code)) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code, err.message), status);
}
