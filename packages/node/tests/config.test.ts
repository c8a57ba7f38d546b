/**
 * Tests for config.ts - env parsing plus the auth and snapshot store builders.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect } from "vitest";
import { FileSnapshotStore, InMemorySnapshotStore } from "@tokenledger/event-store";
import { accountIdFromByte } from "@tokenledger/types";
import {
  buildAuthConfig,
  createSnapshotStore,
  loadConfig,
  parseApiKeys,
} from "../src/config.js";

const ACCOUNT_1 = accountIdFromByte(1);
const ACCOUNT_2 = accountIdFromByte(2);

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses a single key entry", () => {
    expect(parseApiKeys(`abc123:admin:${ACCOUNT_1}`)).toEqual([
      { key: "abc123", role: "admin", accountId: ACCOUNT_1 },
    ]);
  });

  it("parses multiple comma-separated entries with whitespace", () => {
    const keys = parseApiKeys(` k1:operator:${ACCOUNT_1} , k2:viewer:${ACCOUNT_2} `);
    expect(keys).toEqual([
      { key: "k1", role: "operator", accountId: ACCOUNT_1 },
      { key: "k2", role: "viewer", accountId: ACCOUNT_2 },
    ]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys(`a:admin:${ACCOUNT_1}:d`)).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key", () => {
    expect(() => parseApiKeys(`:admin:${ACCOUNT_1}`)).toThrow("API key cannot be empty");
  });

  it("throws on invalid role", () => {
    expect(() => parseApiKeys(`k1:superuser:${ACCOUNT_1}`)).toThrow("Invalid role");
  });

  it("throws on a malformed account id", () => {
    expect(() => parseApiKeys("k1:admin:alice")).toThrow(
      'Invalid account id for API key "k1"',
    );
    expect(() => parseApiKeys("k1:admin:")).toThrow("Invalid account id");
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.API_KEYS).toBe("");
    expect(config.JWT_SECRET).toBeUndefined();
    expect(config.JWT_ISSUER).toBe("tokenledger");
    expect(config.DATA_DIR).toBeUndefined();
    expect(config.SNAPSHOT_RETAIN).toBe(10);
    expect(config.IDEMPOTENCY_TTL_MS).toBe(86400000);
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      DATA_DIR: "/var/lib/tokenledger",
      SNAPSHOT_RETAIN: "3",
    });
    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.DATA_DIR).toBe("/var/lib/tokenledger");
    expect(config.SNAPSHOT_RETAIN).toBe(3);
  });

  it("throws on invalid values", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
    expect(() => loadConfig({ PORT: "99999" })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
    expect(() => loadConfig({ SNAPSHOT_RETAIN: "0" })).toThrow();
  });
});

// =============================================================================
// Builders
// =============================================================================

describe("buildAuthConfig", () => {
  it("returns undefined without keys or a JWT secret", () => {
    expect(buildAuthConfig(loadConfig({}))).toBeUndefined();
  });

  it("indexes API keys by key", () => {
    const auth = buildAuthConfig(
      loadConfig({ API_KEYS: `k1:operator:${ACCOUNT_1},k2:viewer:${ACCOUNT_2}` }),
    );

    expect(auth?.apiKeys.get("k2")).toEqual({ key: "k2", role: "viewer", accountId: ACCOUNT_2 });
    expect(auth?.apiKeys.size).toBe(2);
    expect(auth?.jwtSecret).toBeUndefined();
  });

  it("enables JWT on its own", () => {
    const auth = buildAuthConfig(loadConfig({ JWT_SECRET: "test-secret", JWT_ISSUER: "issuer" }));

    expect(auth?.apiKeys.size).toBe(0);
    expect(auth?.jwtSecret).toBe("test-secret");
    expect(auth?.jwtIssuer).toBe("issuer");
  });
});

describe("createSnapshotStore", () => {
  it("keeps snapshots in memory without DATA_DIR", () => {
    expect(createSnapshotStore(loadConfig({}))).toBeInstanceOf(InMemorySnapshotStore);
  });

  it("writes to disk under DATA_DIR", async () => {
    const dir = await mkdtemp(join(tmpdir(), "tokenledger-config-"));
    try {
      expect(createSnapshotStore(loadConfig({ DATA_DIR: dir }))).toBeInstanceOf(
        FileSnapshotStore,
      );
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
