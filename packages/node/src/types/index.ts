/**
 * Type barrel — re-exports all public types from @mintsplit/node.
 */

// DTOs
export {
  UintStringSchema,
  HexSchema,
  PayeeIndexParamSchema,
  PaginationQuerySchema,
  VoucherSchema,
  RedeemVoucherSchema,
  DepositSchema,
  RotateSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
} from "./dto.js";
export type {
  RedeemVoucherDto,
  DepositDto,
  RotateDto,
  ListEventsQuery,
  ListStreamEventsQuery,
} from "./dto.js";

// Environment
export type { AppEnv, ValidatedEnv } from "./api-contract.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type {
  ApiErrorCode,
  DomainErrorCode,
  ErrorCode,
  ErrorDetail,
  ErrorEnvelope,
} from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type { PaginationQuery, PaginationMeta, PaginatedResponse } from "./pagination.js";

// Views
export {
  toDomainView,
  toRedemptionView,
  toAssetView,
  toPayeeView,
  toEquityView,
  toReceiptView,
  toReleaseView,
  toRotationView,
} from "./views.js";
