/**
 * Wire representations of domain records.
 *
 * Domain types are camelCase; every response body is snake_case.
 */

import type {
  Campaign,
  FulfillmentDetails,
  Referral,
  Reward,
  RewardStatus,
  WidgetConfig,
} from "@referral-rewards/types";

// =============================================================================
// Response Shapes
// =============================================================================

export interface CampaignResponse {
  readonly id: string;
  readonly name: string;
  readonly reward_description: string;
  readonly created_at: string;
}

export interface ReferralResponse {
  readonly id: string;
  readonly campaign_id: string;
  readonly referrer_email: string;
  readonly referral_code: string;
  readonly created_at: string;
}

export interface RewardResponse {
  readonly id: string;
  readonly referral_id: string;
  readonly action_type: string;
  readonly reward_type: string;
  readonly reward_value: number;
  readonly status: RewardStatus;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly idempotency_key: string | null;
  readonly fulfillment: FulfillmentDetails | null;
  readonly created_at: string;
  readonly fulfilled_at: string | null;
}

export interface WidgetConfigResponse {
  readonly campaign_id: string;
  readonly campaign_name: string;
  readonly reward_description: string;
  readonly primary_color: string;
  readonly api_base_url: string;
}

export interface TrackActionResponse {
  readonly status: "tracked" | "duplicate";
  readonly referral_code: string;
  readonly action: string;
  readonly reward_id: string;
  readonly reward: RewardResponse;
}

// =============================================================================
// Presenters
// =============================================================================

export function presentCampaign(campaign: Campaign): CampaignResponse {
  return {
    id: campaign.id,
    name: campaign.name,
    reward_description: campaign.rewardDescription,
    created_at: campaign.createdAt,
  };
}

export function presentReferral(referral: Referral): ReferralResponse {
  return {
    id: referral.id,
    campaign_id: referral.campaignId,
    referrer_email: referral.referrerEmail,
    referral_code: referral.code,
    created_at: referral.createdAt,
  };
}

export function presentReward(reward: Reward): RewardResponse {
  return {
    id: reward.id,
    referral_id: reward.referralId,
    action_type: reward.actionType,
    reward_type: reward.rewardType,
    reward_value: reward.rewardValue,
    status: reward.status,
    metadata: reward.metadata,
    idempotency_key: reward.idempotencyKey,
    fulfillment: reward.fulfillment,
    created_at: reward.createdAt,
    fulfilled_at: reward.fulfilledAt,
  };
}

export function presentWidgetConfig(config: WidgetConfig): WidgetConfigResponse {
  return {
    campaign_id: config.campaignId,
    campaign_name: config.campaignName,
    reward_description: config.rewardDescription,
    primary_color: config.primaryColor,
    api_base_url: config.apiBaseUrl,
  };
}
