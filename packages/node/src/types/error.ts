/**
 * Error envelope returned by every failing request:
 * { error: { code, message, details? } }
 *
 * `code` is either an HTTP-level code below or the code of the domain
 * error that caused the failure, passed through unchanged.
 */

import type { LedgerErrorCode } from "@tokenledger/ledger";
import type { EventStoreErrorCode } from "@tokenledger/event-store";
import type { RegistryErrorCode } from "../services/ledger-registry.js";

export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "IDEMPOTENCY_CONFLICT"
  | "INTERNAL_ERROR";

/** Codes raised by the ledger, the event store and the registry. */
export type DomainErrorCode = LedgerErrorCode | EventStoreErrorCode | RegistryErrorCode;

export type ErrorCode = ApiErrorCode | DomainErrorCode;

export interface ErrorDetail {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details === undefined
    ? { error: { code, message } }
    : { error: { code, message, details } };
}
