/**
 * Domain events.
 *
 * A ledger reports each completed transfer to its host as a DomainEvent.
 * Events are values: once built they are never changed, only appended.
 */

export interface EventMetadata {
  readonly eventId: string;
  /** ISO 8601. */
  readonly timestamp: string;
  /** Caller whose operation produced the event. */
  readonly actor: string;
  /** Ledger instance the event belongs to. */
  readonly correlationId: string;
  readonly source: "ledger" | "host";
}

/** Discriminated by `type`, e.g. "token.transfer". */
export interface DomainEvent {
  readonly type: string;
  readonly metadata: EventMetadata;
  /** Shape depends on `type`; consumers narrow it with their own guards. */
  readonly payload: Readonly<Record<string, unknown>>;
}
