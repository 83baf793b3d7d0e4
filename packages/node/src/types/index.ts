/**
 * Type barrel: re-exports all public types from @breakwater/node.
 */

// DTOs
export {
  PrincipalSchema,
  AmountSchema,
  PaginationQuerySchema,
  AmountBodySchema,
  ApproveSchema,
  TransferSchema,
  TransferFromSchema,
  FaucetSchema,
  InitiateLiquidationSchema,
  HealthFactorSchema,
  LendingInitiateSchema,
  LendingLiquidateSchema,
  AdvanceTicksSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
} from "./dto.js";
export type {
  AmountBodyDto,
  ApproveDto,
  TransferDto,
  TransferFromDto,
  FaucetDto,
  InitiateLiquidationDto,
  HealthFactorDto,
  LendingInitiateDto,
  LendingLiquidateDto,
  AdvanceTicksDto,
  ListEventsQuery,
  ListStreamEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Views
export {
  toRecordView,
  toPhaseView,
  toLiquidatableView,
  toPositionView,
  toMonitorView,
  toBalanceView,
} from "./views.js";
export type { RecordView, PhaseView, LiquidatableView } from "./views.js";

// App env
export type { AppEnv } from "./api-contract.js";
