/**
 * @tokenledger/event-store - Snapshot persistence.
 *
 * A snapshot is a ledger's complete state at one mutation sequence number
 * (`version`), stamped with the SHA-256 of its canonical JSON. The host
 * writes one after every successful mutation; on first access it loads the
 * newest, checks `stateHash` and rebuilds the ledger from it.
 *
 * Saving the same version twice replaces the earlier copy. With `retain`
 * set, a save also drops all but the newest `retain` versions.
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  unlinkSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { EventStoreError } from "./types.js";

export interface StoredSnapshot<TState = unknown> {
  readonly streamId: string;
  readonly version: number;
  readonly state: TState;
  readonly createdAt: string;
  /** Hex SHA-256 of the RFC 8785 form of `state`. */
  readonly stateHash: string;
}

export interface SaveSnapshotOptions {
  readonly streamId: string;
  readonly version: number;
  readonly state: unknown;
}

export interface SnapshotStoreOptions {
  /** Snapshots kept per stream; unlimited when absent. */
  readonly retain?: number;
}

export interface SnapshotStore {
  save(options: SaveSnapshotOptions): void;
  /** Newest snapshot of the stream. */
  load(streamId: string): StoredSnapshot | undefined;
  loadAtVersion(streamId: string, version: number): StoredSnapshot | undefined;
  deleteAll(streamId: string): void;
  hasSnapshot(streamId: string): boolean;
  /** Sorted ids of the streams holding at least one snapshot. */
  streams(): readonly string[];
}

// ─── Hashing and validation ──────────────────────────────────────────────

export function computeSnapshotHash(state: unknown): string {
  return createHash("sha256").update(canonicalize(state)).digest("hex");
}

/** False for a tampered state or a missing hash. */
export function verifySnapshotIntegrity(snapshot: StoredSnapshot): boolean {
  return snapshot.stateHash !== "" && snapshot.stateHash === computeSnapshotHash(snapshot.state);
}

export function isStoredSnapshot(value: unknown): value is StoredSnapshot {
  if (typeof value !== "object" || value === null || !("state" in value)) {
    return false;
  }
  const record = value as Record<string, unknown>;
  return (
    typeof record["streamId"] === "string" &&
    Number.isInteger(record["version"]) &&
    typeof record["createdAt"] === "string" &&
    typeof record["stateHash"] === "string"
  );
}

function stamp({ streamId, version, state }: SaveSnapshotOptions): StoredSnapshot {
  return {
    streamId,
    version,
    state,
    createdAt: new Date().toISOString(),
    stateHash: computeSnapshotHash(state),
  };
}

/** Versions (ascending input) that fall outside the retention window. */
function expiredVersions(ascending: readonly number[], retain: number | undefined): number[] {
  return retain === undefined ? [] : ascending.slice(0, Math.max(0, ascending.length - retain));
}

// ─── In memory ───────────────────────────────────────────────────────────

export class InMemorySnapshotStore implements SnapshotStore {
  private readonly _byStream = new Map<string, Map<number, StoredSnapshot>>();
  private readonly _retain: number | undefined;

  constructor(options?: SnapshotStoreOptions) {
    this._retain = options?.retain;
  }

  save(options: SaveSnapshotOptions): void {
    const versions = this._byStream.get(options.streamId) ?? new Map<number, StoredSnapshot>();
    versions.set(options.version, stamp(options));
    this._byStream.set(options.streamId, versions);

    const ascending = [...versions.keys()].sort((a, b) => a - b);
    for (const version of expiredVersions(ascending, this._retain)) {
      versions.delete(version);
    }
  }

  load(streamId: string): StoredSnapshot | undefined {
    const versions = this._byStream.get(streamId);
    if (versions === undefined || versions.size === 0) {
      return undefined;
    }
    return versions.get(Math.max(...versions.keys()));
  }

  loadAtVersion(streamId: string, version: number): StoredSnapshot | undefined {
    return this._byStream.get(streamId)?.get(version);
  }

  deleteAll(streamId: string): void {
    this._byStream.delete(streamId);
  }

  hasSnapshot(streamId: string): boolean {
    return (this._byStream.get(streamId)?.size ?? 0) > 0;
  }

  streams(): readonly string[] {
    return [...this._byStream.keys()].filter((id) => this.hasSnapshot(id)).sort();
  }
}

// ─── On disk ─────────────────────────────────────────────────────────────

const SAFE_STREAM_ID = /^[a-zA-Z0-9_.-]+$/;
const SNAPSHOT_FILE = /^(\d+)\.json$/;

/**
 * One pretty-printed JSON file per snapshot at
 * `<baseDir>/<streamId>/<version>.json`. Stream ids double as directory
 * names, so only `[a-zA-Z0-9_.-]` is accepted (and never "." or "..").
 */
export class FileSnapshotStore implements SnapshotStore {
  readonly baseDir: string;
  private readonly _retain: number | undefined;

  constructor(baseDir: string, options?: SnapshotStoreOptions) {
    this.baseDir = baseDir;
    this._retain = options?.retain;
    mkdirSync(baseDir, { recursive: true });
  }

  save(options: SaveSnapshotOptions): void {
    mkdirSync(this._dir(options.streamId), { recursive: true });
    writeFileSync(
      this._file(options.streamId, options.version),
      JSON.stringify(stamp(options), null, 2),
      "utf-8",
    );

    for (const version of expiredVersions(this._versions(options.streamId), this._retain)) {
      unlinkSync(this._file(options.streamId, version));
    }
  }

  load(streamId: string): StoredSnapshot | undefined {
    const newest = this._versions(streamId).at(-1);
    return newest === undefined ? undefined : this._read(streamId, newest);
  }

  loadAtVersion(streamId: string, version: number): StoredSnapshot | undefined {
    return this._read(streamId, version);
  }

  deleteAll(streamId: string): void {
    const dir = this._dir(streamId);
    if (existsSync(dir)) {
      for (const file of readdirSync(dir)) {
        unlinkSync(join(dir, file));
      }
    }
  }

  hasSnapshot(streamId: string): boolean {
    return this._versions(streamId).length > 0;
  }

  streams(): readonly string[] {
    return readdirSync(this.baseDir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory() && this.hasSnapshot(entry.name))
      .map((entry) => entry.name)
      .sort();
  }

  private _dir(streamId: string): string {
    if (!SAFE_STREAM_ID.test(streamId) || streamId === "." || streamId === "..") {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        `Stream ID "${streamId}" is not usable as a snapshot directory`,
        streamId,
      );
    }
    return join(this.baseDir, streamId);
  }

  private _file(streamId: string, version: number): string {
    return join(this._dir(streamId), `${version}.json`);
  }

  /** Ascending. */
  private _versions(streamId: string): number[] {
    const dir = this._dir(streamId);
    if (!existsSync(dir)) {
      return [];
    }
    return readdirSync(dir)
      .flatMap((file) => {
        const digits = SNAPSHOT_FILE.exec(file)?.[1];
        return digits === undefined ? [] : [Number(digits)];
      })
      .sort((a, b) => a - b);
  }

  private _read(streamId: string, version: number): StoredSnapshot | undefined {
    const file = this._file(streamId, version);
    if (!existsSync(file)) {
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(file, "utf-8"));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new EventStoreError(
        "CORRUPT_SNAPSHOT",
        `Snapshot ${file} is not valid JSON: ${reason}`,
        streamId,
      );
    }

    if (!isStoredSnapshot(parsed)) {
      throw new EventStoreError(
        "CORRUPT_SNAPSHOT",
        `Snapshot ${file} is missing required fields`,
        streamId,
      );
    }
    return parsed;
  }
}
