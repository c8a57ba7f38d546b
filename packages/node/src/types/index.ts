/**
 * Type barrel - re-exports all public types from @tokenledger/node.
 */

// DTOs
export {
  AmountSchema,
  AccountIdSchema,
  LedgerIdSchema,
  CreateLedgerSchema,
  TransferSchema,
  TransferFromSchema,
  ApproveSchema,
  BurnSchema,
  IssueSchema,
  ListLedgerEventsQuerySchema,
} from "./dto.js";
export type {
  CreateLedgerDto,
  TransferDto,
  TransferFromDto,
  ApproveDto,
  BurnDto,
  IssueDto,
  ListLedgerEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type {
  ApiErrorCode,
  DomainErrorCode,
  ErrorCode,
  ErrorDetail,
  ErrorEnvelope,
} from "./error.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission, isRole } from "./auth.js";
export type {
  Role,
  Permission,
  AuthContext,
  ApiKeyRecord,
  JwtClaims,
} from "./auth.js";

// App env
export type { AppEnv, CallerEnv } from "./api-contract.js";
