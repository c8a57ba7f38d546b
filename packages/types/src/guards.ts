/**
 * Runtime type guards for values that cross a boundary: request bodies,
 * snapshot files read back from disk, events handed to subscribers.
 */

import type { AccountId, Balance, TransferNotification } from "./token.js";
import { MAX_BALANCE } from "./token.js";
import type { DomainEvent, EventMetadata } from "./event.js";

const ACCOUNT_ID_PATTERN = /^[0-9a-f]{64}$/;
const EVENT_SOURCES: ReadonlySet<unknown> = new Set(["ledger", "host"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function allStrings(record: Record<string, unknown>, keys: readonly string[]): boolean {
  return keys.every((key) => typeof record[key] === "string");
}

/** 32-byte identity as 64 lowercase hex characters. */
export function isAccountId(value: unknown): value is AccountId {
  return typeof value === "string" && ACCOUNT_ID_PATTERN.test(value);
}

export function isBalance(value: unknown): value is Balance {
  return typeof value === "bigint" && value >= 0n && value <= MAX_BALANCE;
}

export function isTransferNotification(value: unknown): value is TransferNotification {
  return isRecord(value) && isAccountId(value.from) && isAccountId(value.to) && isBalance(value.value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  return (
    isRecord(value) &&
    allStrings(value, ["eventId", "timestamp", "actor", "correlationId"]) &&
    EVENT_SOURCES.has(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  return (
    isRecord(value) &&
    typeof value.type === "string" &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
