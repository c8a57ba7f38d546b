/**
 * @tokenledger/ledger - Fungible-token ledger engine.
 *
 * A pure TypeScript state machine with zero runtime dependencies
 * beyond the shared types. Enforces:
 * - Balances stay within [0, 2^128 - 1]
 * - Transfers conserve value between sender and receiver
 * - Failed operations write nothing
 * - Absent accounts and allowances read as zero
 *
 * Design rules:
 * - Callers are explicit arguments, never ambient state
 * - Business failures are returned, boundary misuse throws
 * - All arithmetic uses bigint
 */

// Core engine
export { TokenLedger } from "./ledger.js";

// Zero-default tables
export { BalanceBook, allowanceKey } from "./balance-book.js";

// Balance arithmetic
export {
  parseBalance,
  assertAmount,
  assertAccount,
  checkedCredit,
  clampedDebit,
} from "./balance-math.js";

// Snapshot validation
export { parseLedgerSnapshot } from "./snapshot.js";

// Types
export type {
  LedgerErrorCode,
  LedgerFailureCode,
  LedgerFailure,
  LedgerResult,
  NotificationSink,
  TokenLedgerOptions,
  BalanceRecord,
  AllowanceRecord,
  TokenLedgerSnapshot,
} from "./types.js";

export { LedgerError } from "./types.js";
