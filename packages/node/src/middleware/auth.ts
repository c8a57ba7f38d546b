/**
 * Authentication middleware.
 *
 * An X-Api-Key header is looked up in the configured keys; otherwise an
 * `Authorization: Bearer` token is verified as an HS256 JWT. Either way the
 * request ends up with `c.get("auth")` naming a caller account, or a 401.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import { isAccountId } from "@tokenledger/types";
import type { AppEnv, CallerEnv } from "../types/api-contract.js";
import type {
  AuthContext,
  Permission,
  ApiKeyRecord,
  JwtClaims,
} from "../types/auth.js";
import { hasPermission, isRole } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const CALLER_HEADER = "X-Caller-Id";
const API_KEY_HEADER = "X-Api-Key";
const BEARER_PREFIX = "Bearer ";

export interface AuthConfig {
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
  /** JWTs are rejected when unset. */
  readonly jwtSecret?: string | undefined;
  readonly jwtIssuer?: string | undefined;
}

/** Outcome of one strategy: a context, a 401 reason, or "not attempted". */
type Resolution = AuthContext | { readonly rejected: string } | undefined;

function fromApiKey(config: AuthConfig, apiKey: string | undefined): Resolution {
  if (apiKey === undefined) {
    return undefined;
  }
  const record = config.apiKeys.get(apiKey);
  if (record === undefined) {
    return { rejected: "Invalid API key" };
  }
  return { type: "api-key", identity: record.key, role: record.role, accountId: record.accountId };
}

function fromBearer(config: AuthConfig, authorization: string | undefined): Resolution {
  if (authorization === undefined || !authorization.startsWith(BEARER_PREFIX)) {
    return undefined;
  }
  if (config.jwtSecret === undefined) {
    return { rejected: "JWT authentication not configured" };
  }
  const claims = verifyJwt(
    authorization.slice(BEARER_PREFIX.length),
    config.jwtSecret,
    config.jwtIssuer,
  );
  if (claims === undefined) {
    return { rejected: "Invalid or expired JWT" };
  }
  return { type: "jwt", identity: claims.sub, role: claims.role, accountId: claims.sub };
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const resolved =
      fromApiKey(config, c.req.header(API_KEY_HEADER)) ??
      fromBearer(config, c.req.header("Authorization")) ?? { rejected: "Authentication required" };

    if ("rejected" in resolved) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", resolved.rejected), 401);
    }
    c.set("auth", resolved);
    return next();
  };
}

/**
 * Unsecured mode (tests, development).
 *
 * Every request gets the admin role; the caller comes from X-Caller-Id
 * when the header is present.
 */
export function unsecuredAuthMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const callerId = c.req.header(CALLER_HEADER);
    if (callerId !== undefined && !isAccountId(callerId)) {
      return c.json(
        createErrorEnvelope(
          "INVALID_ACCOUNT",
          `${CALLER_HEADER} must be 64 lowercase hex characters`,
        ),
        400,
      );
    }

    c.set("auth", {
      type: "unsecured",
      identity: callerId ?? "anonymous",
      role: "admin",
      accountId: callerId,
    });
    return next();
  };
}

// ─── Guards ──────────────────────────────────────────────────────────────

/** 403 unless the authenticated role grants `permission`. */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}

/**
 * Require a caller account id and expose it as `c.get("caller")`.
 */
export function requireCaller(): MiddlewareHandler<CallerEnv> {
  return async (c, next) => {
    const accountId = c.get("auth").accountId;
    if (accountId === undefined) {
      return c.json(
        createErrorEnvelope(
          "UNAUTHORIZED",
          `Caller identity required (${CALLER_HEADER} header)`,
        ),
        401,
      );
    }
    c.set("caller", accountId);
    return next();
  };
}

// ─── JWT ─────────────────────────────────────────────────────────────────

function decodeSegment(segment: string): Record<string, unknown> | undefined {
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(segment, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (typeof decoded !== "object" || decoded === null) {
    return undefined;
  }
  return decoded as Record<string, unknown>;
}

function sign(data: string, secret: string): string {
  return createHmac("sha256", secret).update(data).digest("base64url");
}

/**
 * Verify a JWT token using HMAC-SHA256.
 *
 * Only supports HS256 (alg: "HS256"). The subject must be an account id.
 *
 * @returns Decoded claims, or undefined if invalid/expired.
 */
export function verifyJwt(
  token: string,
  secret: string,
  expectedIssuer?: string,
): JwtClaims | undefined {
  const [headerB64, payloadB64, signatureB64, ...rest] = token.split(".");
  if (
    headerB64 === undefined ||
    payloadB64 === undefined ||
    signatureB64 === undefined ||
    rest.length > 0
  ) {
    return undefined;
  }

  const expected = Buffer.from(sign(`${headerB64}.${payloadB64}`, secret));
  const actual = Buffer.from(signatureB64);
  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
    return undefined;
  }

  const header = decodeSegment(headerB64);
  if (header === undefined || header["alg"] !== "HS256") {
    return undefined;
  }

  const payload = decodeSegment(payloadB64);
  if (payload === undefined) {
    return undefined;
  }

  const { sub, role, exp, iat, iss } = payload;
  if (
    !isAccountId(sub) ||
    !isRole(role) ||
    typeof exp !== "number" ||
    typeof iat !== "number"
  ) {
    return undefined;
  }

  if (exp < Math.floor(Date.now() / 1000)) {
    return undefined;
  }

  if (expectedIssuer !== undefined && iss !== expectedIssuer) {
    return undefined;
  }

  return {
    sub,
    role,
    iss: typeof iss === "string" ? iss : "",
    exp,
    iat,
  };
}

/**
 * Create a signed JWT for testing/bootstrapping.
 */
export function signJwt(
  claims: Omit<JwtClaims, "iat"> & { iat?: number },
  secret: string,
): string {
  const header = Buffer.from(JSON.stringify({ alg: "HS256", typ: "JWT" })).toString("base64url");

  const payload = Buffer.from(
    JSON.stringify({
      ...claims,
      iat: claims.iat ?? Math.floor(Date.now() / 1000),
    }),
  ).toString("base64url");

  return `${header}.${payload}.${sign(`${header}.${payload}`, secret)}`;
}
