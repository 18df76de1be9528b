/**
 * Type barrel — re-exports all public types from @ballast/node.
 */

// DTOs
export {
  U64Schema,
  AddressSchema,
  TimestampSchema,
  CollateralEntrySchema,
  CollateralColumnsSchema,
  InitializeLedgerSchema,
  IssueSchema,
  RedeemSchema,
  TransferSchema,
  ValuationSchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type {
  InitializeLedgerDto,
  IssueDto,
  RedeemDto,
  TransferDto,
  ValuationDto,
  ListEventsQuery,
} from "./dto.js";

// Views
export {
  toEntryRecord,
  toLedgerView,
  toHealthView,
  toIssueView,
  toRedeemView,
} from "./views.js";
export type { LedgerView, HealthView, IssueView, RedeemView } from "./views.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv, WithBody, WithCaller } from "./api-contract.js";
