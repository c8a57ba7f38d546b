/**
 * Who is calling, and what they may do.
 *
 * A request authenticates with an API key (X-Api-Key) or a JWT bearer
 * token. With neither configured the node runs unsecured and reads the
 * caller from X-Caller-Id. Either way the ledger sees an AccountId.
 */

import type { AccountId } from "@tokenledger/types";

const ROLES = ["viewer", "operator", "admin"] as const;

/** Ordered from least to most privileged. */
export type Role = (typeof ROLES)[number];

export type Permission = "read" | "write" | "admin";

export const ROLE_PERMISSIONS: Readonly<Record<Role, readonly Permission[]>> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write", "admin"],
};

export function isRole(value: unknown): value is Role {
  return ROLES.some((role) => role === value);
}

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

/**
 * Set by the auth middleware on every request. `accountId` is missing only
 * in unsecured mode when the request sends no X-Caller-Id.
 */
export interface AuthContext {
  readonly type: "api-key" | "jwt" | "unsecured";
  /** Scope for idempotency keys. */
  readonly identity: string;
  readonly role: Role;
  readonly accountId?: AccountId | undefined;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly accountId: AccountId;
}

/** HS256 claims; `sub` is the caller's account id. */
export interface JwtClaims {
  readonly sub: AccountId;
  readonly role: Role;
  readonly iss: string;
  readonly exp: number;
  readonly iat: number;
}
