/**
 * @tokenledger/event-store - In-memory EventStore.
 *
 * The host keeps one store per process and every ledger instance writes its
 * transfer notifications to a stream named after the ledger id. Events are
 * linked into a single SHA-256 chain in global append order, so tampering
 * with any ledger's history breaks `verifyIntegrity()` for the whole store.
 *
 * Stream arrays are dense: the event with version v sits at index v - 1,
 * and the global log holds position p at index p - 1. Reads slice instead
 * of scanning. Nothing survives the process.
 */

import type { DomainEvent } from "@tokenledger/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ExpectedVersion,
  HashedStoredEvent,
  ReadAllOptions,
  ReadDirection,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

/**
 * Events of a dense, 1-based sequence starting at `from`, walked in
 * `direction` and capped at `maxCount` (ignored when negative).
 */
function sliceWindow<T>(
  sequence: readonly T[],
  from: number,
  direction: ReadDirection,
  maxCount: number | undefined,
): T[] {
  const selected =
    direction === "forward"
      ? sequence.slice(Math.max(from - 1, 0))
      : sequence.slice(0, Math.max(from, 0)).reverse();
  return maxCount !== undefined && maxCount >= 0 ? selected.slice(0, maxCount) : selected;
}

function checkExpectedVersion(
  streamId: string,
  current: number,
  expected: ExpectedVersion | undefined,
): void {
  if (expected === undefined || expected === "any") {
    return;
  }
  if (expected === "no_stream" && current !== 0) {
    throw new EventStoreError(
      "CONCURRENCY_CONFLICT",
      `Stream "${streamId}" already exists (version ${current}), expected no_stream`,
      streamId,
    );
  }
  if (typeof expected === "number" && current !== expected) {
    throw new EventStoreError(
      "CONCURRENCY_CONFLICT",
      `Stream "${streamId}" is at version ${current}, expected ${expected}`,
      streamId,
    );
  }
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, HashedStoredEvent[]>();
  private readonly _log: HashedStoredEvent[] = [];
  private readonly _streamHandlers = new Map<string, Set<EventHandler>>();
  private readonly _allHandlers = new Set<EventHandler>();

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._assertStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const stream = this._streams.get(streamId) ?? [];
    checkExpectedVersion(streamId, stream.length, options?.expectedVersion);

    const fromVersion = stream.length + 1;
    const appendedAt = new Date().toISOString();
    let previousHash = this.lastHash;

    // Build the whole batch before touching either array
    const batch = events.map((event, i): HashedStoredEvent => {
      const stored: StoredEvent = {
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: fromVersion + i,
        globalPosition: this._log.length + i + 1,
        appendedAt,
      };
      const hash = computeEventHash(stored, previousHash);
      const linked = { ...stored, hash, previousHash };
      previousHash = hash;
      return linked;
    });

    stream.push(...batch);
    this._streams.set(streamId, stream);
    this._log.push(...batch);
    this._notify(streamId, batch);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + batch.length - 1,
      count: batch.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._assertStreamId(streamId);
    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const direction = options?.direction ?? "forward";
    const fromVersion = options?.fromVersion ?? (direction === "forward" ? 1 : stream.length);

    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    return sliceWindow(stream, fromVersion, direction, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const direction = options?.direction ?? "forward";
    const fromPosition =
      options?.fromPosition ?? (direction === "forward" ? 1 : this._log.length);
    return sliceWindow(this._log, fromPosition, direction, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._assertStreamId(streamId);

    const handlers = this._streamHandlers.get(streamId) ?? new Set<EventHandler>();
    handlers.add(handler);
    this._streamHandlers.set(streamId, handlers);

    return {
      unsubscribe: () => {
        handlers.delete(handler);
        if (handlers.size === 0 && this._streamHandlers.get(streamId) === handlers) {
          this._streamHandlers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._allHandlers.add(handler);
    return { unsubscribe: () => void this._allHandlers.delete(handler) };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._log.length;
  }

  /** Hash of the newest event, or GENESIS_HASH while the store is empty. */
  get lastHash(): string {
    return this._log.at(-1)?.hash ?? GENESIS_HASH;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _assertStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  /** Stream handlers see the batch first, then store-wide handlers. */
  private _notify(streamId: string, batch: readonly StoredEvent[]): void {
    const handlers = [...(this._streamHandlers.get(streamId) ?? []), ...this._allHandlers];
    for (const handler of handlers) {
      for (const event of batch) {
        handler(event);
      }
    }
  }
}
