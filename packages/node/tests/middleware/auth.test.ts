/**
 * Tests for authentication middleware.
 *
 * Verifies:
 * - API key auth (valid, invalid, missing)
 * - JWT bearer auth (valid, invalid, expired)
 * - Unsecured mode (X-Caller-Id)
 * - Permission and caller guards
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { accountIdFromByte } from "@tokenledger/types";
import type { AppEnv } from "../../src/types/api-contract.js";
import type { ApiKeyRecord, AuthContext } from "../../src/types/auth.js";
import {
  authMiddleware,
  unsecuredAuthMiddleware,
  requireCaller,
  requirePermission,
  signJwt,
  verifyJwt,
} from "../../src/middleware/auth.js";
import type { ErrorBody } from "../setup.js";

const JWT_SECRET = "test-secret";
const USER = accountIdFromByte(0x11);
const OTHER = accountIdFromByte(0x22);

function inOneHour(): number {
  return Math.floor(Date.now() / 1000) + 3600;
}

function addProbeRoutes(app: Hono<AppEnv>): Hono<AppEnv> {
  app.get("/test", (c) => c.json({ auth: c.get("auth") }));
  app.get("/admin-only", requirePermission("admin"), (c) => c.json({ ok: true }));
  app.get("/write-only", requirePermission("write"), (c) => c.json({ ok: true }));
  app.get("/caller", requireCaller(), (c) => c.json({ caller: c.get("caller") }));
  return app;
}

function makeApp(apiKeys: ApiKeyRecord[] = []): Hono<AppEnv> {
  const keyMap = new Map<string, ApiKeyRecord>();
  for (const k of apiKeys) {
    keyMap.set(k.key, k);
  }

  const app = new Hono<AppEnv>();
  app.use(
    "*",
    authMiddleware({
      apiKeys: keyMap,
      jwtSecret: JWT_SECRET,
      jwtIssuer: "tokenledger",
    }),
  );
  return addProbeRoutes(app);
}

function makeUnsecuredApp(): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.use("*", unsecuredAuthMiddleware());
  return addProbeRoutes(app);
}

describe("API Key auth", () => {
  it("authenticates with a valid API key and binds its account", async () => {
    const app = makeApp([{ key: "key-1", role: "operator", accountId: USER }]);

    const res = await app.request("/test", { headers: { "X-Api-Key": "key-1" } });

    expect(res.status).toBe(200);
    const body = (await res.json()) as { auth: AuthContext };
    expect(body.auth).toEqual({
      type: "api-key",
      identity: "key-1",
      role: "operator",
      accountId: USER,
    });
  });

  it("returns 401 for an invalid API key", async () => {
    const app = makeApp([{ key: "key-1", role: "operator", accountId: USER }]);

    const res = await app.request("/test", { headers: { "X-Api-Key": "invalid-key" } });

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "UNAUTHORIZED", message: "Invalid API key" });
  });

  it("returns 401 when no auth is provided", async () => {
    const res = await makeApp().request("/test");
    expect(res.status).toBe(401);
  });

  it("ignores X-Caller-Id when auth is configured", async () => {
    const app = makeApp([{ key: "key-1", role: "operator", accountId: USER }]);

    const res = await app.request("/caller", {
      headers: { "X-Api-Key": "key-1", "X-Caller-Id": OTHER },
    });

    expect(await res.json()).toEqual({ caller: USER });
  });
});

describe("JWT Bearer auth", () => {
  it("authenticates with a valid JWT whose subject is the caller", async () => {
    const token = signJwt(
      { sub: USER, role: "admin", iss: "tokenledger", exp: inOneHour() },
      JWT_SECRET,
    );

    const res = await makeApp().request("/caller", {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ caller: USER });
  });

  it("returns 401 for an expired JWT", async () => {
    const token = signJwt(
      { sub: USER, role: "admin", iss: "tokenledger", exp: Math.floor(Date.now() / 1000) - 100 },
      JWT_SECRET,
    );

    const res = await makeApp().request("/test", {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(res.status).toBe(401);
  });

  it("returns 401 for a tampered JWT", async () => {
    const token = signJwt(
      { sub: USER, role: "admin", iss: "tokenledger", exp: inOneHour() },
      JWT_SECRET,
    );
    const tampered = token.slice(0, -5) + "XXXXX";

    const res = await makeApp().request("/test", {
      headers: { Authorization: `Bearer ${tampered}` },
    });

    expect(res.status).toBe(401);
  });

  it("returns 401 when JWT is not configured", async () => {
    const app = new Hono<AppEnv>();
    app.use("*", authMiddleware({ apiKeys: new Map() }));
    addProbeRoutes(app);
    const token = signJwt(
      { sub: USER, role: "admin", iss: "tokenledger", exp: inOneHour() },
      JWT_SECRET,
    );

    const res = await app.request("/test", { headers: { Authorization: `Bearer ${token}` } });

    const body = (await res.json()) as ErrorBody;
    expect(res.status).toBe(401);
    expect(body.error.message).toBe("JWT authentication not configured");
  });
});

describe("verifyJwt", () => {
  it("returns the claims of a valid token", () => {
    const exp = inOneHour();
    const token = signJwt({ sub: USER, role: "viewer", iss: "tokenledger", exp, iat: 100 }, JWT_SECRET);

    expect(verifyJwt(token, JWT_SECRET, "tokenledger")).toEqual({
      sub: USER,
      role: "viewer",
      iss: "tokenledger",
      exp,
      iat: 100,
    });
  });

  it("returns undefined for malformed token", () => {
    expect(verifyJwt("not-a-jwt", JWT_SECRET)).toBeUndefined();
    expect(verifyJwt("a.b.c.d", JWT_SECRET)).toBeUndefined();
  });

  it("returns undefined for wrong issuer", () => {
    const token = signJwt(
      { sub: USER, role: "admin", iss: "wrong-issuer", exp: inOneHour() },
      JWT_SECRET,
    );

    expect(verifyJwt(token, JWT_SECRET, "tokenledger")).toBeUndefined();
  });

  it("returns undefined for a wrong secret", () => {
    const token = signJwt(
      { sub: USER, role: "admin", iss: "tokenledger", exp: inOneHour() },
      JWT_SECRET,
    );

    expect(verifyJwt(token, "other-secret")).toBeUndefined();
  });
});

describe("unsecured mode", () => {
  it("grants admin and takes the caller from X-Caller-Id", async () => {
    const res = await makeUnsecuredApp().request("/test", { headers: { "X-Caller-Id": USER } });

    expect(await res.json()).toEqual({
      auth: { type: "unsecured", identity: USER, role: "admin", accountId: USER },
    });
  });

  it("rejects a malformed X-Caller-Id", async () => {
    const res = await makeUnsecuredApp().request("/test", { headers: { "X-Caller-Id": "alice" } });

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INVALID_ACCOUNT");
  });

  it("lets reads through without a caller but not caller-bound routes", async () => {
    const app = makeUnsecuredApp();

    expect((await app.request("/admin-only")).status).toBe(200);

    const res = await app.request("/caller");
    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Caller identity required (X-Caller-Id header)");
  });
});

describe("permission guard", () => {
  it("allows admin to access admin-only route", async () => {
    const app = makeApp([{ key: "admin-key", role: "admin", accountId: USER }]);

    const res = await app.request("/admin-only", { headers: { "X-Api-Key": "admin-key" } });
    expect(res.status).toBe(200);
  });

  it("denies viewer from admin-only route", async () => {
    const app = makeApp([{ key: "viewer-key", role: "viewer", accountId: USER }]);

    const res = await app.request("/admin-only", { headers: { "X-Api-Key": "viewer-key" } });
    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Role 'viewer' lacks 'admin' permission");
  });

  it("allows operator to access write routes", async () => {
    const app = makeApp([{ key: "op-key", role: "operator", accountId: USER }]);

    const res = await app.request("/write-only", { headers: { "X-Api-Key": "op-key" } });
    expect(res.status).toBe(200);
  });

  it("denies viewer from write routes", async () => {
    const app = makeApp([{ key: "viewer-key", role: "viewer", accountId: USER }]);

    const res = await app.request("/write-only", { headers: { "X-Api-Key": "viewer-key" } });
    expect(res.status).toBe(403);
  });
});
