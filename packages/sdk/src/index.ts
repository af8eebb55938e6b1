/**
 * @referral-rewards/sdk: Typed HTTP client for the referral rewards API.
 *
 * Zero runtime dependencies; uses native fetch.
 *
 * @packageDocumentation
 */

// Types
export type {
  ReferralRewardsClientConfig,
  ReferralRewardsResponse,
  PaginatedList,
  ListParams,
  RewardStatus,
  Campaign,
  Referral,
  Reward,
  WidgetConfig,
  TrackActionResult,
  HealthStatus,
  CreateCampaignParams,
  CreateReferralParams,
  CreateRewardParams,
  FulfillmentParams,
  ActionEvent,
  TrackOptions,
} from "./types.js";

export { ReferralRewardsError } from "./types.js";

// HTTP Client
export { HttpClient } from "./http-client.js";

// Webhook signing
export { signWebhookBody, SIGNATURE_HEADER, IDEMPOTENCY_HEADER } from "./signature.js";

// Client
export { ReferralRewardsClient } from "./client.js";

// Client namespace classes (for type usage)
export {
  CampaignsNamespace,
  ReferralsNamespace,
  RewardsNamespace,
  WidgetNamespace,
  WebhooksNamespace,
} from "./client.js";
