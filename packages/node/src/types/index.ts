/**
 * Type barrel — request schemas, envelopes and pagination.
 */

// DTOs
export {
  AmountSchema,
  PaginationQuerySchema,
  DepositSchema,
  WithdrawSchema,
  ListWithdrawalsQuerySchema,
  RebalanceSchema,
  EmergencyShutdownSchema,
  RecordReturnSchema,
  DisableStrategySchema,
  ListTransfersQuerySchema,
} from "./dto.js";
export type {
  DepositDto,
  WithdrawDto,
  ListWithdrawalsQuery,
  RebalanceDto,
  EmergencyShutdownDto,
  RecordReturnDto,
  DisableStrategyDto,
  ListTransfersQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope, RequestValidationError } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope, ValidationIssue } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
