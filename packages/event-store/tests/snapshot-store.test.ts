/**
 * Tests for InMemorySnapshotStore and FileSnapshotStore.
 *
 * Verifies:
 * - Save and load snapshots
 * - Latest snapshot retrieval
 * - Version-specific retrieval
 * - Delete all snapshots
 * - Overwrite at same version
 * - Retention
 * - File persistence across store instances
 * - stateHash computation and verification
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, existsSync, writeFileSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  InMemorySnapshotStore,
  FileSnapshotStore,
  computeSnapshotHash,
  verifySnapshotIntegrity,
  isStoredSnapshot,
} from "../src/snapshot-store.js";
import type { SnapshotStore, SnapshotStoreOptions, StoredSnapshot } from "../src/snapshot-store.js";
import { EventStoreError } from "../src/types.js";

// =============================================================================
// Shared test suite that runs against both implementations
// =============================================================================

function runSharedTests(createStore: (options?: SnapshotStoreOptions) => SnapshotStore) {
  describe("save and load", () => {
    it("saves and loads a snapshot", () => {
      const store = createStore();
      store.save({ streamId: "ledger-1", version: 5, state: { totalSupply: "1000" } });

      const snapshot = store.load("ledger-1");

      expect(snapshot).toBeDefined();
      expect(snapshot!.streamId).toBe("ledger-1");
      expect(snapshot!.version).toBe(5);
      expect(snapshot!.state).toEqual({ totalSupply: "1000" });
      expect(snapshot!.stateHash).toBe(computeSnapshotHash({ totalSupply: "1000" }));
    });

    it("returns undefined for non-existent stream", () => {
      expect(createStore().load("nope")).toBeUndefined();
    });

    it("loads latest snapshot when multiple exist", () => {
      const store = createStore();
      store.save({ streamId: "ledger-1", version: 1, state: { v: 1 } });
      store.save({ streamId: "ledger-1", version: 5, state: { v: 5 } });
      store.save({ streamId: "ledger-1", version: 3, state: { v: 3 } });

      expect(store.load("ledger-1")!.version).toBe(5);
    });
  });

  describe("loadAtVersion", () => {
    it("loads a specific version", () => {
      const store = createStore();
      store.save({ streamId: "ledger-1", version: 1, state: { v: 1 } });
      store.save({ streamId: "ledger-1", version: 2, state: { v: 2 } });

      expect(store.loadAtVersion("ledger-1", 1)!.state).toEqual({ v: 1 });
    });

    it("returns undefined for non-existent version", () => {
      const store = createStore();
      store.save({ streamId: "ledger-1", version: 1, state: {} });

      expect(store.loadAtVersion("ledger-1", 9)).toBeUndefined();
    });
  });

  describe("overwrite", () => {
    it("overwrites snapshot at same version", () => {
      const store = createStore();
      store.save({ streamId: "ledger-1", version: 1, state: { v: "old" } });
      store.save({ streamId: "ledger-1", version: 1, state: { v: "new" } });

      expect(store.load("ledger-1")!.state).toEqual({ v: "new" });
    });
  });

  describe("retain", () => {
    it("keeps only the newest snapshots", () => {
      const store = createStore({ retain: 2 });
      for (let v = 1; v <= 4; v++) {
        store.save({ streamId: "ledger-1", version: v, state: { v } });
      }

      expect(store.loadAtVersion("ledger-1", 2)).toBeUndefined();
      expect(store.loadAtVersion("ledger-1", 3)!.state).toEqual({ v: 3 });
      expect(store.load("ledger-1")!.version).toBe(4);
    });
  });

  describe("deleteAll", () => {
    it("deletes all snapshots for a stream only", () => {
      const store = createStore();
      store.save({ streamId: "ledger-1", version: 1, state: {} });
      store.save({ streamId: "ledger-2", version: 1, state: {} });

      store.deleteAll("ledger-1");

      expect(store.hasSnapshot("ledger-1")).toBe(false);
      expect(store.hasSnapshot("ledger-2")).toBe(true);
    });

    it("is safe to call on non-existent stream", () => {
      expect(() => createStore().deleteAll("nope")).not.toThrow();
    });
  });

  describe("streams", () => {
    it("lists streams with snapshots in sorted order", () => {
      const store = createStore();
      expect(store.streams()).toEqual([]);

      store.save({ streamId: "beta", version: 1, state: {} });
      store.save({ streamId: "alpha", version: 1, state: {} });

      expect(store.streams()).toEqual(["alpha", "beta"]);
    });
  });
}

describe("InMemorySnapshotStore", () => {
  runSharedTests((options) => new InMemorySnapshotStore(options));
});

describe("FileSnapshotStore", () => {
  let testDir: string;

  beforeEach(() => {
    testDir = join(
      tmpdir(),
      `tokenledger-snapshot-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`,
    );
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  runSharedTests((options) => new FileSnapshotStore(join(testDir, "snapshots"), options));

  describe("file persistence", () => {
    it("snapshots survive store recreation", () => {
      const dir = join(testDir, "persistent");

      new FileSnapshotStore(dir).save({ streamId: "ledger-1", version: 5, state: { data: "test" } });
      const snapshot = new FileSnapshotStore(dir).load("ledger-1");

      expect(snapshot!.version).toBe(5);
      expect(snapshot!.state).toEqual({ data: "test" });
      expect(verifySnapshotIntegrity(snapshot!)).toBe(true);
    });

    it("creates base directory", () => {
      const dir = join(testDir, "deep", "nested", "dir");
      const store = new FileSnapshotStore(dir);

      expect(existsSync(dir)).toBe(true);
      expect(store.baseDir).toBe(dir);
    });

    it("prunes old files when retaining", () => {
      const dir = join(testDir, "retain");
      const store = new FileSnapshotStore(dir, { retain: 1 });
      store.save({ streamId: "ledger-1", version: 1, state: {} });
      store.save({ streamId: "ledger-1", version: 2, state: {} });

      expect(readdirSync(join(dir, "ledger-1"))).toEqual(["2.json"]);
    });

    it("rejects stream IDs that are not filesystem-safe", () => {
      const store = new FileSnapshotStore(join(testDir, "unsafe"));

      expect(() => store.save({ streamId: "../escape", version: 1, state: {} })).toThrow(
        EventStoreError,
      );
    });

    it("throws CORRUPT_SNAPSHOT for unreadable JSON", () => {
      const dir = join(testDir, "corrupt");
      const store = new FileSnapshotStore(dir);
      mkdirSync(join(dir, "ledger-1"), { recursive: true });
      writeFileSync(join(dir, "ledger-1", "1.json"), "{not json", "utf-8");

      try {
        store.load("ledger-1");
        expect.unreachable("should have thrown");
      } catch (e) {
        expect(e).toBeInstanceOf(EventStoreError);
        expect((e as EventStoreError).code).toBe("CORRUPT_SNAPSHOT");
      }
    });

    it("throws CORRUPT_SNAPSHOT for a file missing fields", () => {
      const dir = join(testDir, "partial");
      const store = new FileSnapshotStore(dir);
      mkdirSync(join(dir, "ledger-1"), { recursive: true });
      writeFileSync(join(dir, "ledger-1", "1.json"), JSON.stringify({ version: 1 }), "utf-8");

      expect(() => store.load("ledger-1")).toThrow("missing required fields");
    });
  });
});

// =============================================================================
// Integrity
// =============================================================================

describe("computeSnapshotHash", () => {
  it("produces a 64-char hex string", () => {
    expect(computeSnapshotHash({ key: "value" })).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is order-independent for object keys (canonical JSON)", () => {
    expect(computeSnapshotHash({ b: 2, a: 1 })).toBe(computeSnapshotHash({ a: 1, b: 2 }));
  });

  it("changes when state changes", () => {
    expect(computeSnapshotHash({ x: 1 })).not.toBe(computeSnapshotHash({ x: 2 }));
  });
});

describe("verifySnapshotIntegrity", () => {
  const state = { balances: [{ account: "a", balance: "100" }] };
  const snapshot: StoredSnapshot = {
    streamId: "s",
    version: 1,
    state,
    createdAt: "2026-01-01T00:00:00.000Z",
    stateHash: computeSnapshotHash(state),
  };

  it("returns true for a valid snapshot", () => {
    expect(verifySnapshotIntegrity(snapshot)).toBe(true);
  });

  it("returns false for a tampered snapshot", () => {
    const tampered: StoredSnapshot = {
      ...snapshot,
      state: { balances: [{ account: "a", balance: "999" }] },
    };
    expect(verifySnapshotIntegrity(tampered)).toBe(false);
  });

  it("returns false for an empty hash", () => {
    expect(verifySnapshotIntegrity({ ...snapshot, stateHash: "" })).toBe(false);
  });
});

describe("isStoredSnapshot", () => {
  it("accepts a complete record and rejects partial ones", () => {
    expect(
      isStoredSnapshot({ streamId: "s", version: 1, state: null, createdAt: "t", stateHash: "h" }),
    ).toBe(true);
    expect(isStoredSnapshot({ streamId: "s", version: 1.5, state: {}, createdAt: "t", stateHash: "h" })).toBe(false);
    expect(isStoredSnapshot(null)).toBe(false);
  });
});
