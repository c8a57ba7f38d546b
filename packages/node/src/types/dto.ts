/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Amounts travel as decimal strings and come out of validation as bigint.
 */

import { z } from "zod";
import { MAX_BALANCE } from "@tokenledger/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "Amount must be a non-negative decimal integer string")
  .max(64, "Amount has too many digits")
  // refinements still run after a failed regex; only compare well-formed input
  .refine((s) => !/^\d+$/.test(s) || BigInt(s) <= MAX_BALANCE, "Amount exceeds the maximum balance")
  .transform((s) => BigInt(s));

export const AccountIdSchema = z
  .string()
  .regex(/^[0-9a-f]{64}$/, "Account id must be 64 lowercase hex characters");

export const LedgerIdSchema = z
  .string()
  .regex(/^[a-zA-Z0-9_.-]{1,64}$/, "Ledger id must be 1-64 characters of [a-zA-Z0-9_.-]")
  .refine((s) => s !== "." && s !== "..", "Ledger id cannot be a relative path");

// =============================================================================
// Ledger DTOs
// =============================================================================

export const CreateLedgerSchema = z.object({
  id: LedgerIdSchema,
  initialSupply: AmountSchema.optional(),
});

export type CreateLedgerDto = z.infer<typeof CreateLedgerSchema>;

export const TransferSchema = z.object({
  to: AccountIdSchema,
  value: AmountSchema,
});

export type TransferDto = z.infer<typeof TransferSchema>;

export const TransferFromSchema = z.object({
  from: AccountIdSchema,
  value: AmountSchema,
});

export type TransferFromDto = z.infer<typeof TransferFromSchema>;

export const ApproveSchema = z.object({
  spender: AccountIdSchema,
  value: AmountSchema,
});

export type ApproveDto = z.infer<typeof ApproveSchema>;

export const BurnSchema = z.object({
  value: AmountSchema,
});

export type BurnDto = z.infer<typeof BurnSchema>;

export const IssueSchema = z.object({
  to: AccountIdSchema,
  value: AmountSchema,
});

export type IssueDto = z.infer<typeof IssueSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListLedgerEventsQuerySchema = z.object({
  afterVersion: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type ListLedgerEventsQuery = z.infer<typeof ListLedgerEventsQuerySchema>;
