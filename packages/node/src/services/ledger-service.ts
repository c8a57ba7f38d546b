/**
 * LedgerService - Host wrapper around one TokenLedger instance.
 *
 * Route handlers delegate to this service; they never touch the ledger
 * directly. The service:
 * - wires the ledger's notification sink to the EventStore
 * - saves a snapshot after every successful mutation, and rolls the
 *   mutation back (notifications included) when that save fails
 * - restores the latest verified snapshot on first access
 * - logs mutations through an optional pino logger
 */

import type { Logger } from "pino";
import type { AccountId, Balance } from "@tokenledger/types";
import {
  TokenLedger,
  LedgerError,
  assertAccount,
  parseLedgerSnapshot,
} from "@tokenledger/ledger";
import type {
  LedgerResult,
  TokenLedgerOptions,
  TokenLedgerSnapshot,
} from "@tokenledger/ledger";
import { verifySnapshotIntegrity } from "@tokenledger/event-store";
import type {
  EventStore,
  SnapshotStore,
  StoredEvent,
  StoredSnapshot,
} from "@tokenledger/event-store";
import { EventStoreSink } from "./event-sink.js";

// =============================================================================
// Configuration
// =============================================================================

export interface LedgerServiceConfig {
  readonly ledgerId: string;
  readonly snapshotStore: SnapshotStore;
  readonly eventStore: EventStore;
  readonly logger?: Logger | undefined;
}

export interface LedgerSummary {
  readonly id: string;
  readonly totalSupply: string;
  readonly circulatingSupply: string;
  readonly accounts: number;
  readonly version: number;
}

export interface ReadLedgerEventsOptions {
  /** Only events after this stream version. Default: 0 */
  readonly afterVersion?: number | undefined;
  readonly limit: number;
}

export interface LedgerEventsPage {
  readonly events: readonly StoredEvent[];
  readonly hasMore: boolean;
}

// =============================================================================
// Service
// =============================================================================

export class LedgerService {
  readonly ledgerId: string;

  private _ledger: TokenLedger;
  private readonly _sink: EventStoreSink;
  private readonly _snapshots: SnapshotStore;
  private readonly _events: EventStore;
  private readonly _logger: Logger | undefined;
  private _version: number;

  private constructor(
    config: LedgerServiceConfig,
    build: (options: TokenLedgerOptions) => TokenLedger,
    version: number,
  ) {
    this.ledgerId = config.ledgerId;
    this._snapshots = config.snapshotStore;
    this._events = config.eventStore;
    this._logger = config.logger;
    this._version = version;
    this._sink = new EventStoreSink(config.eventStore, config.ledgerId);
    this._ledger = build({ sink: this._sink });
  }

  /**
   * Create a new ledger and persist its first snapshot.
   * Without `initialSupply` the ledger starts empty.
   */
  static create(
    config: LedgerServiceConfig,
    caller: AccountId,
    initialSupply?: Balance,
  ): LedgerService {
    const service = new LedgerService(
      config,
      (options) =>
        initialSupply === undefined
          ? TokenLedger.createDefault(caller, options)
          : TokenLedger.create(caller, initialSupply, options),
      0,
    );
    service._persist(service._ledger.snapshot());
    service._logger?.info(
      { caller, initialSupply: (initialSupply ?? 0n).toString() },
      "Ledger created",
    );
    return service;
  }

  /**
   * Rebuild a ledger from its latest snapshot.
   *
   * @returns undefined when no snapshot exists
   * @throws LedgerError("INVALID_SNAPSHOT") if the snapshot fails its
   * integrity check or does not parse
   */
  static restore(config: LedgerServiceConfig): LedgerService | undefined {
    const stored = config.snapshotStore.load(config.ledgerId);
    if (stored === undefined) {
      return undefined;
    }

    if (!verifySnapshotIntegrity(stored)) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Snapshot ${stored.version} of ledger "${config.ledgerId}" failed its integrity check`,
      );
    }

    const state = parseLedgerSnapshot(stored.state);
    const service = new LedgerService(
      config,
      (options) => TokenLedger.fromSnapshot(state, options),
      stored.version,
    );
    service._logger?.info({ version: stored.version }, "Ledger restored");
    return service;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /** Snapshot sequence; increases by one per persisted mutation. */
  get version(): number {
    return this._version;
  }

  totalSupply(): Balance {
    return this._ledger.totalSupply();
  }

  circulatingSupply(): Balance {
    return this._ledger.circulatingSupply();
  }

  balanceOf(account: AccountId): Balance {
    assertAccount(account);
    return this._ledger.balanceOf(account);
  }

  allowance(owner: AccountId, spender: AccountId): Balance {
    assertAccount(owner, "Owner");
    assertAccount(spender, "Spender");
    return this._ledger.allowance(owner, spender);
  }

  summary(): LedgerSummary {
    return {
      id: this.ledgerId,
      totalSupply: this._ledger.totalSupply().toString(),
      circulatingSupply: this._ledger.circulatingSupply().toString(),
      accounts: this._ledger.accountCount,
      version: this._version,
    };
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  transfer(caller: AccountId, to: AccountId, value: Balance): LedgerResult {
    return this._mutate("transfer", { caller, to, value: value.toString() }, (ledger) =>
      ledger.transfer(caller, to, value),
    );
  }

  transferFrom(caller: AccountId, from: AccountId, value: Balance): LedgerResult {
    return this._mutate("transferFrom", { caller, from, value: value.toString() }, (ledger) =>
      ledger.transferFrom(caller, from, value),
    );
  }

  approve(caller: AccountId, spender: AccountId, value: Balance): void {
    this._mutate("approve", { caller, spender, value: value.toString() }, (ledger) => {
      ledger.approve(caller, spender, value);
      return { ok: true };
    });
  }

  burn(caller: AccountId, value: Balance): void {
    this._mutate("burn", { caller, value: value.toString() }, (ledger) => {
      ledger.burn(caller, value);
      return { ok: true };
    });
  }

  issue(to: AccountId, value: Balance): LedgerResult {
    return this._mutate("issue", { to, value: value.toString() }, (ledger) =>
      ledger.issue(to, value),
    );
  }

  // ─── Events & Snapshots ──────────────────────────────────────────────

  /**
   * Transfer notifications recorded for this ledger, in stream order.
   */
  readEvents(options: ReadLedgerEventsOptions): LedgerEventsPage {
    const fromVersion = (options.afterVersion ?? 0) + 1;
    if (fromVersion > this._events.streamVersion(this.ledgerId)) {
      return { events: [], hasMore: false };
    }

    const page = this._events.read(this.ledgerId, {
      fromVersion,
      maxCount: options.limit + 1,
    });
    return {
      events: page.slice(0, options.limit),
      hasMore: page.length > options.limit,
    };
  }

  /** Latest persisted snapshot. */
  storedSnapshot(): StoredSnapshot | undefined {
    return this._snapshots.load(this.ledgerId);
  }

  // ─── Internal ────────────────────────────────────────────────────────

  /**
   * Run one ledger mutation. A failed result leaves nothing behind. On
   * success the new state is saved before its notifications reach the
   * event store; if the save throws, the ledger is rebuilt from the state
   * it had before the call and the error propagates.
   */
  private _mutate(
    operation: string,
    details: Record<string, string>,
    run: (ledger: TokenLedger) => LedgerResult,
  ): LedgerResult {
    const before = this._ledger.snapshot();
    let result: LedgerResult;
    try {
      result = run(this._ledger);
    } catch (err) {
      this._sink.discard();
      throw err;
    }

    if (!result.ok) {
      this._sink.discard();
      this._logger?.warn(
        { operation, ...details, code: result.error.code },
        result.error.message,
      );
      return result;
    }

    try {
      this._persist(this._ledger.snapshot());
    } catch (err) {
      this._sink.discard();
      this._ledger = TokenLedger.fromSnapshot(before, { sink: this._sink });
      this._logger?.error(
        { operation, ...details, err },
        "Snapshot save failed; mutation rolled back",
      );
      throw err;
    }

    this._sink.commit();
    this._logger?.info({ operation, ...details, version: this._version }, "Ledger mutated");
    return result;
  }

  /** The version only advances once the store has accepted the snapshot. */
  private _persist(state: TokenLedgerSnapshot): void {
    const version = this._version + 1;
    this._snapshots.save({ streamId: this.ledgerId, version, state });
    this._version = version;
  }
}
