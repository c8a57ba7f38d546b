/**
 * @tokenledger/event-store - Core types.
 *
 * The store is the ledger's notification log: every successful transfer
 * lands here as a `token.transfer` event on the stream of the ledger that
 * emitted it. Entries are never rewritten; a stream only grows.
 */

import type { DomainEvent, EventMetadata } from "@tokenledger/types";

// ─── Stored events ───────────────────────────────────────────────────────

/**
 * A DomainEvent plus the coordinates the store assigned to it. `version`
 * counts within one stream, `globalPosition` across the whole store; both
 * start at 1 and never skip.
 */
export interface StoredEvent<TPayload = Record<string, unknown>> {
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: Readonly<TPayload>;
  }>;
  readonly streamId: string;
  readonly version: number;
  readonly globalPosition: number;
  /** ISO-8601 time of the append, not of the ledger operation. */
  readonly appendedAt: string;
}

/** A StoredEvent carrying its link in the SHA-256 chain. */
export interface HashedStoredEvent<TPayload = Record<string, unknown>>
  extends StoredEvent<TPayload> {
  readonly hash: string;
  /** GENESIS_HASH for the event at global position 1. */
  readonly previousHash: string;
}

export function isHashedEvent(event: StoredEvent): event is HashedStoredEvent {
  const candidate = event as Partial<HashedStoredEvent>;
  return typeof candidate.hash === "string" && typeof candidate.previousHash === "string";
}

// ─── Appending ───────────────────────────────────────────────────────────

/**
 * Optimistic concurrency guard checked before an append: an exact stream
 * version, "no_stream" for a stream that must still be empty, or "any".
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  /** New head of the stream. */
  readonly toVersion: number;
  readonly count: number;
}

// ─── Reading ─────────────────────────────────────────────────────────────

export type ReadDirection = "forward" | "backward";

export interface ReadWindow {
  /** Upper bound on returned events; negative or absent means no bound. */
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

export interface ReadOptions extends ReadWindow {
  /** Inclusive. Defaults to 1 going forward and the head going backward. */
  readonly fromVersion?: number;
}

export interface ReadAllOptions extends ReadWindow {
  /** Inclusive. Defaults to 1 going forward and the head going backward. */
  readonly fromPosition?: number;
}

// ─── Subscriptions ───────────────────────────────────────────────────────

export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// ─── Integrity ───────────────────────────────────────────────────────────

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** 0 when even the first event fails. */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// ─── Store ───────────────────────────────────────────────────────────────

/**
 * Append-only, synchronously dispatching event log. Handlers registered
 * through `subscribe` and `subscribeAll` run inside `append`, in order,
 * before it returns.
 */
export interface EventStore {
  /** @throws EventStoreError on an empty stream id, an empty batch or a version conflict */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** An unknown stream reads as empty. */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;
  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;
  /** 0 for a stream with no events. */
  streamVersion(streamId: string): number;
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION"
  | "CORRUPT_SNAPSHOT";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
