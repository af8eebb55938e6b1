/**
 * Type barrel: re-exports all public types from @referral-rewards/node.
 */

// DTOs
export {
  PaginationQuerySchema,
  CreateCampaignSchema,
  CreateReferralSchema,
  CreateRewardSchema,
  FulfillRewardSchema,
} from "./dto.js";
export type {
  PaginationQueryDto,
  CreateCampaignDto,
  CreateReferralDto,
  CreateRewardDto,
  FulfillRewardDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate, creationKey } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
