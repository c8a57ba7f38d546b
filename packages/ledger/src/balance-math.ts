/**
 * @tokenledger/ledger - Deterministic balance arithmetic.
 *
 * All arithmetic uses bigint. Values cross the wire and land in
 * snapshots as base-10 integer strings.
 *
 * Rules:
 * - No floating-point operations
 * - Every balance stays within [0, MAX_BALANCE]
 * - Credits are checked, burns are clamped
 */

import type { AccountId, Balance } from "@tokenledger/types";
import { MAX_BALANCE, isAccountId } from "@tokenledger/types";
import { LedgerError } from "./types.js";

// ─── Conversion ──────────────────────────────────────────────────────────

/**
 * Parse a base-10 integer string into a Balance.
 *
 * "1000" → 1000n
 * "-1", "1.5", "1e3", "" → LedgerError("INVALID_AMOUNT")
 */
export function parseBalance(value: string): Balance {
  if (typeof value !== "string" || !/^\d+$/.test(value)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${String(value)}"`);
  }

  const parsed = BigInt(value);
  if (parsed > MAX_BALANCE) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${value}" exceeds the maximum balance ${MAX_BALANCE.toString()}`,
    );
  }
  return parsed;
}

// ─── Validation ──────────────────────────────────────────────────────────

/**
 * Assert a value is a Balance within [0, MAX_BALANCE].
 * Throws LedgerError if invalid.
 */
export function assertAmount(value: Balance, label = "Amount"): void {
  if (typeof value !== "bigint") {
    throw new LedgerError("INVALID_AMOUNT", `${label} must be a bigint, got ${typeof value}`);
  }
  if (value < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must be non-negative, got ${value.toString()}`);
  }
  if (value > MAX_BALANCE) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} ${value.toString()} exceeds the maximum balance ${MAX_BALANCE.toString()}`,
    );
  }
}

/**
 * Assert a value is a well-formed AccountId.
 * Throws LedgerError if invalid.
 */
export function assertAccount(value: AccountId, label = "Account"): void {
  if (!isAccountId(value)) {
    throw new LedgerError(
      "INVALID_ACCOUNT",
      `${label} must be 64 lowercase hex characters, got "${String(value)}"`,
    );
  }
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

/**
 * Add a credit to a balance.
 * Returns undefined when the result would exceed MAX_BALANCE.
 */
export function checkedCredit(balance: Balance, value: Balance): Balance | undefined {
  const sum = balance + value;
  return sum > MAX_BALANCE ? undefined : sum;
}

/**
 * Subtract a debit from a balance, flooring at zero.
 */
export function clampedDebit(balance: Balance, value: Balance): Balance {
  return balance < value ? 0n : balance - value;
}
