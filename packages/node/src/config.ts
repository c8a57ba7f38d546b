/**
 * @tokenledger/node - Configuration.
 *
 * Everything comes from environment variables, validated with zod.
 * `buildAuthConfig` and `createSnapshotStore` turn the parsed values into
 * the objects `createApp` takes.
 */

import { z } from "zod";
import { FileSnapshotStore, InMemorySnapshotStore } from "@tokenledger/event-store";
import type { SnapshotStore } from "@tokenledger/event-store";
import type { AccountId } from "@tokenledger/types";
import { isAccountId } from "@tokenledger/types";
import type { ApiKeyRecord, Role } from "./types/auth.js";
import { isRole } from "./types/auth.js";
import type { AuthConfig } from "./middleware/auth.js";

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  /** Comma-separated `key:role:accountId` triples. */
  API_KEYS: z.string().default(""),
  JWT_SECRET: z.string().min(1).optional(),
  JWT_ISSUER: z.string().default("tokenledger"),

  /** Snapshots go to disk under this directory when set. */
  DATA_DIR: z.string().min(1).optional(),
  SNAPSHOT_RETAIN: z.coerce.number().int().min(1).default(10),

  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86_400_000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/** @throws {z.ZodError} when a variable is present but malformed */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

// ─── API keys ────────────────────────────────────────────────────────────

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  readonly accountId: AccountId;
}

function parseApiKeyEntry(entry: string): ParsedApiKey {
  const parts = entry.split(":");
  if (parts.length !== 3) {
    throw new Error(`Invalid API_KEYS entry: "${entry}". Expected format: key:role:accountId`);
  }
  const [key = "", role = "", accountId = ""] = parts;

  if (key === "") {
    throw new Error("API key cannot be empty");
  }
  if (!isRole(role)) {
    throw new Error(`Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`);
  }
  if (!isAccountId(accountId)) {
    throw new Error(
      `Invalid account id for API key "${key}": expected 64 lowercase hex characters`,
    );
  }
  return { key, role, accountId };
}

export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }
  return raw.split(",").map((entry) => parseApiKeyEntry(entry.trim()));
}

/**
 * Auth settings for `createApp`, or undefined when neither API keys nor a
 * JWT secret are configured and the node should run unsecured.
 */
export function buildAuthConfig(config: AppConfig): AuthConfig | undefined {
  const keys = parseApiKeys(config.API_KEYS);
  if (keys.length === 0 && config.JWT_SECRET === undefined) {
    return undefined;
  }
  return {
    apiKeys: new Map<string, ApiKeyRecord>(keys.map((k) => [k.key, k])),
    jwtSecret: config.JWT_SECRET,
    jwtIssuer: config.JWT_ISSUER,
  };
}

export function createSnapshotStore(config: AppConfig): SnapshotStore {
  const options = { retain: config.SNAPSHOT_RETAIN };
  return config.DATA_DIR === undefined
    ? new InMemorySnapshotStore(options)
    : new FileSnapshotStore(config.DATA_DIR, options);
}
