/**
 * Token Types
 *
 * Primitives for a single fungible token denominated in one raw
 * integer unit.
 *
 * Rules:
 * - Account identifiers are opaque 32-byte identities (lowercase hex)
 * - Balances are non-negative bigints, never floating point
 * - No decimals or metadata: the raw unit is the only unit
 */

/**
 * Size of an account identity in bytes.
 */
export const ACCOUNT_ID_BYTES = 32;

/**
 * Opaque account identity.
 * 64 lowercase hex characters encoding 32 bytes. Equality-comparable,
 * usable directly as a Map key. No ordering semantics.
 */
export type AccountId = string;

/**
 * Quantity of the token's smallest unit.
 */
export type Balance = bigint;

/**
 * Largest representable balance (2^128 - 1).
 * Every stored balance and every credit result stays within this bound.
 */
export const MAX_BALANCE: Balance = (1n << 128n) - 1n;

/**
 * Announcement of a completed owner-authorized transfer.
 * Emitted once per successful transfer, and only by transfer.
 */
export interface TransferNotification {
  readonly from: AccountId;
  readonly to: AccountId;
  readonly value: Balance;
}

/**
 * Build an AccountId from raw identity bytes.
 *
 * @throws RangeError if the input is not exactly 32 bytes
 */
export function accountIdFromBytes(bytes: Uint8Array): AccountId {
  if (bytes.length !== ACCOUNT_ID_BYTES) {
    throw new RangeError(
      `Account identity must be ${ACCOUNT_ID_BYTES} bytes, got ${bytes.length}`,
    );
  }
  return Buffer.from(bytes).toString("hex");
}

/**
 * Build an AccountId whose 32 bytes all equal `byte`.
 * Convenient for fixtures and local tooling.
 */
export function accountIdFromByte(byte: number): AccountId {
  return accountIdFromBytes(new Uint8Array(ACCOUNT_ID_BYTES).fill(byte));
}
