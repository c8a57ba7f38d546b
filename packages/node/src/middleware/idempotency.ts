/**
 * Idempotency middleware.
 *
 * A POST carrying an Idempotency-Key runs at most once per (identity, key)
 * within the TTL; repeats get the stored response back with
 * X-Idempotent-Replay. The stored entry remembers a fingerprint of the
 * request (method, path, body), and reusing a key for a different request
 * is rejected with 409 IDEMPOTENCY_CONFLICT rather than replaying a
 * response that belongs to another mutation.
 *
 * Only successful responses are stored, so a transfer refused for
 * insufficient balance can be retried with the same key. Concurrent
 * requests sharing a key run one at a time.
 */

import { createHash } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const REPLAY_HEADER = "X-Idempotent-Replay";

export interface CachedResponse {
  readonly fingerprint: string;
  readonly status: number;
  readonly body: string;
  readonly headers: Record<string, string>;
  readonly cachedAt: number;
}

export interface IdempotencyStore {
  get(key: string): CachedResponse | undefined;
  set(key: string, response: CachedResponse): void;
}

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _entries = new Map<string, CachedResponse>();
  private readonly _ttlMs: number;

  constructor(ttlMs: number = 86_400_000) {
    this._ttlMs = ttlMs;
  }

  get(key: string): CachedResponse | undefined {
    const entry = this._entries.get(key);
    if (entry !== undefined && Date.now() - entry.cachedAt > this._ttlMs) {
      this._entries.delete(key);
      return undefined;
    }
    return entry;
  }

  set(key: string, response: CachedResponse): void {
    this._entries.set(key, response);
  }

  /** Drop every expired entry; returns how many were removed. */
  prune(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this._entries) {
      if (now - entry.cachedAt > this._ttlMs) {
        this._entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this._entries.size;
  }

  clear(): void {
    this._entries.clear();
  }
}

export function requestFingerprint(method: string, path: string, body: string): string {
  return createHash("sha256").update(`${method}\n${path}\n${body}`).digest("hex");
}

/**
 * Must run after the auth middleware: keys are scoped by `auth.identity`.
 *
 * While a keyed request runs, later requests with the same scoped key wait
 * for it and then replay its stored response (or run themselves if it
 * failed and stored nothing).
 */
export function idempotencyMiddleware(store: IdempotencyStore): MiddlewareHandler<AppEnv> {
  const inFlight = new Map<string, Promise<void>>();

  return async (c, next) => {
    const key = c.req.header(IDEMPOTENCY_HEADER);
    if (c.req.method !== "POST" || key === undefined) {
      return next();
    }

    const scopedKey = `${c.get("auth").identity}:${key}`;
    const fingerprint = requestFingerprint(c.req.method, c.req.path, await c.req.text());

    let running = inFlight.get(scopedKey);
    while (running !== undefined) {
      await running;
      running = inFlight.get(scopedKey);
    }

    // No await from here until the key is marked in flight
    const cached = store.get(scopedKey);
    if (cached !== undefined) {
      if (cached.fingerprint !== fingerprint) {
        return c.json(
          createErrorEnvelope(
            "IDEMPOTENCY_CONFLICT",
            `Idempotency key "${key}" was already used for a different request`,
          ),
          409,
        );
      }
      const headers = new Headers(cached.headers);
      headers.set(REPLAY_HEADER, "true");
      return new Response(cached.body, { status: cached.status, headers });
    }

    let release: () => void = () => undefined;
    inFlight.set(
      scopedKey,
      new Promise<void>((resolve) => {
        release = resolve;
      }),
    );

    try {
      await next();
      if (c.res.status < 400) {
        const response = c.res.clone();
        const headers: Record<string, string> = {};
        response.headers.forEach((value, name) => {
          headers[name] = value;
        });
        store.set(scopedKey, {
          fingerprint,
          status: response.status,
          body: await response.text(),
          headers,
          cachedAt: Date.now(),
        });
      }
    } finally {
      inFlight.delete(scopedKey);
      release();
    }
  };
}
