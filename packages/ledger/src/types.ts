/**
 * @tokenledger/ledger - Internal types for the ledger engine.
 *
 * Rules:
 * - All exposed types are readonly
 * - Business failures are returned as values, never thrown
 * - Boundary misuse (malformed ids, out-of-range amounts) throws
 */

import type {
  AccountId,
  TransferNotification,
} from "@tokenledger/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "BALANCE_OVERFLOW"
  | "INVALID_AMOUNT"
  | "INVALID_ACCOUNT"
  | "INVALID_SNAPSHOT";

/** The subset of codes an operation reports as a failed result. */
export type LedgerFailureCode = Extract<
  LedgerErrorCode,
  "INSUFFICIENT_BALANCE" | "BALANCE_OVERFLOW"
>;

/**
 * Structured error from the ledger engine.
 *
 * Thrown for boundary misuse; carried inside a failed LedgerResult
 * for business outcomes.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

/**
 * A business failure. Guarantees that no state was written.
 */
export interface LedgerFailure {
  readonly code: LedgerFailureCode;
  readonly message: string;
}

/**
 * Outcome of a fallible mutating operation.
 */
export type LedgerResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: LedgerFailure };

// ─── Ports ───────────────────────────────────────────────────────────────

/**
 * Notification channel the ledger announces transfers through.
 * Delivery and indexing are the host's responsibility.
 */
export interface NotificationSink {
  emit(notification: TransferNotification): void;
}

/**
 * Options shared by both constructors and snapshot restore.
 */
export interface TokenLedgerOptions {
  readonly sink?: NotificationSink | undefined;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/** A stored balance. Amount as a base-10 string. */
export interface BalanceRecord {
  readonly account: AccountId;
  readonly balance: string;
}

/** A stored allowance. Amount as a base-10 string. */
export interface AllowanceRecord {
  readonly owner: AccountId;
  readonly spender: AccountId;
  readonly value: string;
}

/**
 * Serializable snapshot of the entire ledger state.
 * Used for persistence and rehydration.
 */
export interface TokenLedgerSnapshot {
  readonly version: 1;
  readonly totalSupply: string;
  readonly balances: readonly BalanceRecord[];
  readonly allowances: readonly AllowanceRecord[];
}
