/**
 * @tokenledger/ledger - Core TokenLedger class.
 *
 * A single fungible token: balances, allowances and a fixed total
 * supply, mutated in place by explicit-caller operations.
 *
 * API surface:
 * - create() / createDefault() - Construct a ledger owned by the caller
 * - totalSupply() / balanceOf() / allowance() - Pure queries
 * - transfer() - Owner-authorized move, emits a notification
 * - transferFrom() - Move out of any account to the caller
 * - approve() - Record an allowance
 * - burn() - Reduce the caller's balance, clamped at zero
 * - issue() - Credit any account
 * - snapshot() / fromSnapshot() - Persistence
 *
 * Every validation runs before the first write. A failed operation
 * leaves both maps exactly as they were.
 */

import type { AccountId, Balance } from "@tokenledger/types";
import { allowanceKey, BalanceBook } from "./balance-book.js";
import {
  assertAccount,
  assertAmount,
  checkedCredit,
  clampedDebit,
  parseBalance,
} from "./balance-math.js";
import { parseLedgerSnapshot } from "./snapshot.js";
import type {
  LedgerFailureCode,
  LedgerResult,
  NotificationSink,
  TokenLedgerOptions,
  TokenLedgerSnapshot,
} from "./types.js";

const OK: LedgerResult = { ok: true };

function fail(code: LedgerFailureCode, message: string): LedgerResult {
  return { ok: false, error: { code, message } };
}

/**
 * Fungible-token ledger.
 *
 * Known divergences:
 * - transferFrom() neither checks nor consumes an allowance, so any
 *   caller can move any account's balance to itself.
 * - burn() and issue() leave totalSupply() untouched; compare with
 *   circulatingSupply() for the sum of balances.
 */
export class TokenLedger {
  private readonly _balances: BalanceBook<AccountId> = new BalanceBook();
  private readonly _allowances: BalanceBook = new BalanceBook();
  private readonly _sink: NotificationSink | undefined;
  private _totalSupply: Balance;

  private constructor(totalSupply: Balance, options?: TokenLedgerOptions) {
    this._totalSupply = totalSupply;
    this._sink = options?.sink;
  }

  // ─── Construction ────────────────────────────────────────────────────

  /**
   * Create a ledger whose entire initial supply is credited to `caller`.
   */
  static create(
    caller: AccountId,
    initialSupply: Balance,
    options?: TokenLedgerOptions,
  ): TokenLedger {
    assertAccount(caller, "Caller");
    assertAmount(initialSupply, "Initial supply");

    const ledger = new TokenLedger(initialSupply, options);
    ledger._balances.set(caller, initialSupply);
    return ledger;
  }

  /**
   * Create an empty ledger owned by `caller` (zero supply).
   */
  static createDefault(caller: AccountId, options?: TokenLedgerOptions): TokenLedger {
    return TokenLedger.create(caller, 0n, options);
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * The supply recorded at construction.
   */
  totalSupply(): Balance {
    return this._totalSupply;
  }

  /**
   * Balance of `account`; 0 when the account has never been written.
   */
  balanceOf(account: AccountId): Balance {
    return this._balances.get(account);
  }

  /**
   * Remaining amount `spender` may move out of `owner`; 0 when unset.
   */
  allowance(owner: AccountId, spender: AccountId): Balance {
    return this._allowances.get(allowanceKey(owner, spender));
  }

  /**
   * Sum of every stored balance.
   */
  circulatingSupply(): Balance {
    return this._balances.total();
  }

  /**
   * Number of accounts with a stored balance entry.
   */
  get accountCount(): number {
    return this._balances.size;
  }

  // ─── Transfers ───────────────────────────────────────────────────────

  /**
   * Move `value` from the caller to `to`.
   * Emits one transfer notification on success.
   */
  transfer(caller: AccountId, to: AccountId, value: Balance): LedgerResult {
    assertAccount(caller, "Caller");
    assertAccount(to, "Recipient");
    assertAmount(value);

    const result = this._move(caller, to, value);
    if (result.ok) {
      this._sink?.emit({ from: caller, to, value });
    }
    return result;
  }

  /**
   * Move `value` out of `from` and credit the caller.
   *
   * No allowance is consulted or decremented and no notification is
   * emitted. Any caller may drain any account.
   */
  transferFrom(caller: AccountId, from: AccountId, value: Balance): LedgerResult {
    assertAccount(caller, "Caller");
    assertAccount(from, "Source");
    assertAmount(value);

    return this._move(from, caller, value);
  }

  /**
   * Set the allowance of `spender` over the caller's balance.
   * Overwrites any previous value.
   */
  approve(caller: AccountId, spender: AccountId, value: Balance): void {
    assertAccount(caller, "Caller");
    assertAccount(spender, "Spender");
    assertAmount(value);

    this._allowances.set(allowanceKey(caller, spender), value);
  }

  // ─── Supply ──────────────────────────────────────────────────────────

  /**
   * Reduce the caller's balance by `value`, or to 0 when it holds less.
   */
  burn(caller: AccountId, value: Balance): void {
    assertAccount(caller, "Caller");
    assertAmount(value);

    this._balances.set(caller, clampedDebit(this._balances.get(caller), value));
  }

  /**
   * Credit `to` by `value`. Fails only when the credit would exceed
   * MAX_BALANCE.
   */
  issue(to: AccountId, value: Balance): LedgerResult {
    assertAccount(to, "Recipient");
    assertAmount(value);

    const credited = checkedCredit(this._balances.get(to), value);
    if (credited === undefined) {
      return fail(
        "BALANCE_OVERFLOW",
        `Crediting ${value.toString()} to "${to}" would exceed the maximum balance`,
      );
    }

    this._balances.set(to, credited);
    return OK;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  /**
   * Debit `from` and credit `to`. All checks precede the writes.
   */
  private _move(from: AccountId, to: AccountId, value: Balance): LedgerResult {
    const fromBalance = this._balances.get(from);
    if (fromBalance < value) {
      return fail(
        "INSUFFICIENT_BALANCE",
        `Insufficient balance: "${from}" holds ${fromBalance.toString()}, requested ${value.toString()}`,
      );
    }

    if (from === to) {
      this._balances.set(from, fromBalance);
      return OK;
    }

    const credited = checkedCredit(this._balances.get(to), value);
    if (credited === undefined) {
      return fail(
        "BALANCE_OVERFLOW",
        `Crediting ${value.toString()} to "${to}" would exceed the maximum balance`,
      );
    }

    this._balances.set(from, fromBalance - value);
    this._balances.set(to, credited);
    return OK;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Create a serializable snapshot of the ledger.
   * Entries are sorted, so equal states produce equal snapshots.
   */
  snapshot(): TokenLedgerSnapshot {
    return {
      version: 1,
      totalSupply: this._totalSupply.toString(),
      balances: this._balances.entries().map(([account, balance]) => ({
        account,
        balance: balance.toString(),
      })),
      allowances: this._allowances.entries().map(([key, value]) => {
        const [owner = "", spender = ""] = key.split(":");
        return { owner, spender, value: value.toString() };
      }),
    };
  }

  /**
   * Restore a ledger from a snapshot.
   *
   * @throws LedgerError("INVALID_SNAPSHOT") if any field is malformed
   */
  static fromSnapshot(
    snapshot: TokenLedgerSnapshot,
    options?: TokenLedgerOptions,
  ): TokenLedger {
    const valid = parseLedgerSnapshot(snapshot);
    const ledger = new TokenLedger(parseBalance(valid.totalSupply), options);

    for (const record of valid.balances) {
      ledger._balances.set(record.account, parseBalance(record.balance));
    }
    for (const record of valid.allowances) {
      ledger._allowances.set(
        allowanceKey(record.owner, record.spender),
        parseBalance(record.value),
      );
    }

    return ledger;
  }
}
