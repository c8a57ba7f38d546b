/**
 * @tokenledger/event-store - SHA-256 chain over the global event log.
 *
 *   hash(1) = sha256(jcs(event 1) + "genesis")
 *   hash(n) = sha256(jcs(event n) + hash(n - 1))
 *
 * jcs is RFC 8785 canonical JSON, so key order never changes a hash. Editing
 * any stored field of any event invalidates it and every later link.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { EventStoreIntegrityResult, IntegrityError, StoredEvent } from "./types.js";
import { isHashedEvent } from "./types.js";

/** `previousHash` of the first event. */
export const GENESIS_HASH = "genesis";

/** Hex digest. The event's own hash fields, if any, are not hashed. */
export function computeEventHash(event: StoredEvent, previousHash: string): string {
  const { event: inner, streamId, version, globalPosition, appendedAt } = event;
  const content = canonicalize({
    event: { type: inner.type, metadata: inner.metadata, payload: inner.payload },
    streamId,
    version,
    globalPosition,
    appendedAt,
  });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/** Problems with one event's link, given the hash the chain expects before it. */
function linkErrors(event: StoredEvent, expectedPrevious: string): IntegrityError[] {
  const position = event.globalPosition;
  if (!isHashedEvent(event)) {
    return [{ position, reason: `Event at position ${position} is missing hash fields` }];
  }

  const errors: IntegrityError[] = [];
  if (event.previousHash !== expectedPrevious) {
    errors.push({
      position,
      reason: `previousHash mismatch at position ${position}: expected "${expectedPrevious}", got "${event.previousHash}"`,
    });
  }
  const recomputed = computeEventHash(event, event.previousHash);
  if (event.hash !== recomputed) {
    errors.push({
      position,
      reason: `Hash mismatch at position ${position}: expected "${recomputed}", got "${event.hash}"`,
    });
  }
  return errors;
}

/**
 * Walk `events` in global order. `lastVerifiedPosition` stops advancing at
 * the first broken link; later breaks are still reported.
 */
export function verifyHashChain(events: readonly StoredEvent[]): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let expectedPrevious = GENESIS_HASH;

  for (const event of events) {
    errors.push(...linkErrors(event, expectedPrevious));
    if (!isHashedEvent(event)) {
      continue;
    }
    expectedPrevious = event.hash;
    if (errors.length === 0) {
      lastVerifiedPosition = event.globalPosition;
    }
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}
