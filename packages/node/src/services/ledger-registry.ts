/**
 * LedgerRegistry - Maps ledger IDs to LedgerService instances.
 *
 * Ledgers are created explicitly and restored lazily from the snapshot
 * store on first access. All ledgers share one EventStore; each writes
 * to its own stream.
 */

import type { Logger } from "pino";
import type { AccountId, Balance } from "@tokenledger/types";
import { InMemoryEventStore } from "@tokenledger/event-store";
import type {
  EventStore,
  EventStoreIntegrityResult,
  SnapshotStore,
} from "@tokenledger/event-store";
import { LedgerIdSchema } from "../types/dto.js";
import { LedgerService } from "./ledger-service.js";
import type { LedgerServiceConfig } from "./ledger-service.js";

// =============================================================================
// Errors
// =============================================================================

export type RegistryErrorCode =
  | "LEDGER_NOT_FOUND"
  | "LEDGER_EXISTS"
  | "INVALID_LEDGER_ID";

export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;

  constructor(code: RegistryErrorCode, message: string) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
  }
}

// =============================================================================
// Registry
// =============================================================================

export interface LedgerRegistryConfig {
  readonly snapshotStore: SnapshotStore;
  readonly eventStore?: EventStore | undefined;
  /** Parent logger; each ledger gets a child bound to its id */
  readonly logger?: Logger | undefined;
}

export class LedgerRegistry {
  private readonly _ledgers = new Map<string, LedgerService>();
  private readonly _snapshotStore: SnapshotStore;
  private readonly _eventStore: EventStore;
  private readonly _logger: Logger | undefined;

  constructor(config: LedgerRegistryConfig) {
    this._snapshotStore = config.snapshotStore;
    this._eventStore = config.eventStore ?? new InMemoryEventStore();
    this._logger = config.logger;
  }

  /**
   * Create a new ledger owned by `caller`.
   *
   * @throws RegistryError("LEDGER_EXISTS") if the id is loaded or persisted
   */
  create(ledgerId: string, caller: AccountId, initialSupply?: Balance): LedgerService {
    this._validateId(ledgerId);
    if (this._ledgers.has(ledgerId) || this._snapshotStore.hasSnapshot(ledgerId)) {
      throw new RegistryError("LEDGER_EXISTS", `Ledger "${ledgerId}" already exists`);
    }

    const service = LedgerService.create(this._serviceConfig(ledgerId), caller, initialSupply);
    this._ledgers.set(ledgerId, service);
    return service;
  }

  /**
   * Get a ledger, restoring it from its latest snapshot if needed.
   *
   * @throws RegistryError("LEDGER_NOT_FOUND")
   */
  get(ledgerId: string): LedgerService {
    this._validateId(ledgerId);
    const loaded = this._ledgers.get(ledgerId);
    if (loaded !== undefined) {
      return loaded;
    }

    const restored = LedgerService.restore(this._serviceConfig(ledgerId));
    if (restored === undefined) {
      throw new RegistryError("LEDGER_NOT_FOUND", `Ledger "${ledgerId}" not found`);
    }
    this._ledgers.set(ledgerId, restored);
    return restored;
  }

  has(ledgerId: string): boolean {
    return this._ledgers.has(ledgerId) || this._snapshotStore.hasSnapshot(ledgerId);
  }

  /**
   * IDs of every known ledger, loaded or persisted, sorted.
   */
  ledgerIds(): readonly string[] {
    return [...new Set([...this._ledgers.keys(), ...this._snapshotStore.streams()])].sort();
  }

  /**
   * IDs of ledgers currently held in memory.
   */
  loadedIds(): readonly string[] {
    return [...this._ledgers.keys()];
  }

  get eventStore(): EventStore {
    return this._eventStore;
  }

  /**
   * Verify the shared transfer-notification hash chain.
   */
  verifyIntegrity(): EventStoreIntegrityResult {
    return this._eventStore.verifyIntegrity();
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _validateId(ledgerId: string): void {
    if (!LedgerIdSchema.safeParse(ledgerId).success) {
      throw new RegistryError("INVALID_LEDGER_ID", `Invalid ledger id "${ledgerId}"`);
    }
  }

  private _serviceConfig(ledgerId: string): LedgerServiceConfig {
    return {
      ledgerId,
      snapshotStore: this._snapshotStore,
      eventStore: this._eventStore,
      logger: this._logger?.child({ ledgerId }),
    };
  }
}
