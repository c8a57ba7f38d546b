/**
 * @tokenledger/ledger - Zero-default balance tables.
 *
 * Wraps a Map so that reads of absent keys yield 0 instead of
 * undefined. Both the balance map and the allowance map go through
 * this table; absence never propagates as an error.
 */

import type { AccountId, Balance } from "@tokenledger/types";

/**
 * Key for the (owner, spender) allowance table.
 */
export function allowanceKey(owner: AccountId, spender: AccountId): string {
  return `${owner}:${spender}`;
}

/**
 * Map from key to Balance with 0 as the value of every absent key.
 */
export class BalanceBook<K extends string = string> {
  private readonly _entries: Map<K, Balance> = new Map();

  /**
   * Read a value. Absent keys read as 0.
   */
  get(key: K): Balance {
    return this._entries.get(key) ?? 0n;
  }

  /**
   * Write a value. Explicit zeros are stored.
   */
  set(key: K, value: Balance): void {
    this._entries.set(key, value);
  }

  /**
   * Sum of every stored value.
   */
  total(): Balance {
    let sum = 0n;
    for (const value of this._entries.values()) {
      sum += value;
    }
    return sum;
  }

  /**
   * All stored entries, sorted by key.
   */
  entries(): readonly (readonly [K, Balance])[] {
    return [...this._entries.entries()].sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0,
    );
  }

  /**
   * Number of stored keys.
   */
  get size(): number {
    return this._entries.size;
  }
}
