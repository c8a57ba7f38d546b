/**
 * @tokenledger/ledger - Snapshot validation.
 *
 * Snapshots arrive from disk or the network as untyped JSON. Every
 * field is checked before a ledger is rebuilt from one.
 */

import { isAccountId } from "@tokenledger/types";
import type { Balance } from "@tokenledger/types";
import { parseBalance } from "./balance-math.js";
import type {
  AllowanceRecord,
  BalanceRecord,
  TokenLedgerSnapshot,
} from "./types.js";
import { LedgerError } from "./types.js";

function invalid(reason: string): LedgerError {
  return new LedgerError("INVALID_SNAPSHOT", `Invalid ledger snapshot: ${reason}`);
}

function amountAt(value: unknown, where: string): Balance {
  if (typeof value !== "string") {
    throw invalid(`${where} must be a string`);
  }
  try {
    return parseBalance(value);
  } catch (err) {
    if (err instanceof LedgerError) {
      throw invalid(`${where}: ${err.message}`);
    }
    throw err;
  }
}

function accountAt(value: unknown, where: string): string {
  if (!isAccountId(value)) {
    throw invalid(`${where} is not a valid account id`);
  }
  return value;
}

function recordAt(value: unknown, where: string): Record<string, unknown> {
  if (value === null || typeof value !== "object") {
    throw invalid(`${where} must be an object`);
  }
  return value as Record<string, unknown>;
}

/**
 * Validate an untyped value as a TokenLedgerSnapshot.
 *
 * Rejects unknown versions, malformed accounts or amounts, and
 * duplicate balance or allowance keys.
 *
 * @throws LedgerError("INVALID_SNAPSHOT")
 */
export function parseLedgerSnapshot(value: unknown): TokenLedgerSnapshot {
  const v = recordAt(value, "snapshot");

  if (v.version !== 1) {
    throw invalid(`unsupported version ${String(v.version)}`);
  }

  const totalSupply = amountAt(v.totalSupply, "totalSupply");

  if (!Array.isArray(v.balances)) {
    throw invalid("balances must be an array");
  }
  if (!Array.isArray(v.allowances)) {
    throw invalid("allowances must be an array");
  }

  const balances: BalanceRecord[] = [];
  const seenAccounts = new Set<string>();
  v.balances.forEach((raw: unknown, i: number) => {
    const record = recordAt(raw, `balances[${i}]`);
    const account = accountAt(record.account, `balances[${i}].account`);
    const balance = amountAt(record.balance, `balances[${i}].balance`);
    if (seenAccounts.has(account)) {
      throw invalid(`duplicate balance for account "${account}"`);
    }
    seenAccounts.add(account);
    balances.push({ account, balance: balance.toString() });
  });

  const allowances: AllowanceRecord[] = [];
  const seenPairs = new Set<string>();
  v.allowances.forEach((raw: unknown, i: number) => {
    const record = recordAt(raw, `allowances[${i}]`);
    const owner = accountAt(record.owner, `allowances[${i}].owner`);
    const spender = accountAt(record.spender, `allowances[${i}].spender`);
    const allowance = amountAt(record.value, `allowances[${i}].value`);
    const pair = `${owner}:${spender}`;
    if (seenPairs.has(pair)) {
      throw invalid(`duplicate allowance for "${owner}" → "${spender}"`);
    }
    seenPairs.add(pair);
    allowances.push({ owner, spender, value: allowance.toString() });
  });

  return {
    version: 1,
    totalSupply: totalSupply.toString(),
    balances,
    allowances,
  };
}
