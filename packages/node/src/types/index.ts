/**
 * Type barrel: re-exports all public types from @stakegate/node.
 */

// DTOs
export {
  WeiSchema,
  HexSchema,
  IdParamSchema,
  PaginationQuerySchema,
  CreateDepositSchema,
  AssignDepositSchema,
  ConfirmDepositSchema,
  TransferHandleSchema,
  ListDepositsQuerySchema,
  SetOperatorSchema,
  RequestVaultDepositSchema,
  ProcessVaultDepositSchema,
  RequestRedeemSchema,
  ProcessRedeemSchema,
  ListRequestsQuerySchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
  toDepositRecordDto,
  toExitRequestDto,
  toBalancesDto,
  toReconciliationDto,
} from "./dto.js";
export type {
  CreateDepositDto,
  AssignDepositDto,
  ConfirmDepositDto,
  TransferHandleDto,
  ListDepositsQuery,
  SetOperatorDto,
  RequestVaultDepositDto,
  RequestRedeemDto,
  ProcessRedeemDto,
  ListRequestsQuery,
  ListEventsQuery,
  ListStreamEventsQuery,
  DepositRecordDto,
  ExitRequestDto,
  ReconciliationDto,
} from "./dto.js";

// Error
export { createErrorEnvelope, isErrorCode, statusForCode } from "./error.js";
export type {
  ApiErrorCode,
  DomainErrorCode,
  ErrorCode,
  ErrorDetail,
  ErrorEnvelope,
} from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission, isRole } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
