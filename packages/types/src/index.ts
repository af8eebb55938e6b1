/**
 * @referral-rewards/types: Shared domain types.
 *
 * Used by every package in the stack:
 * - Campaigns and widget configuration
 * - Referrals and their public codes
 * - Rewards and the actions that create them
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Guards only narrow; meaning lives in consuming code
 */

// Campaign types
export type { Campaign, WidgetConfig } from "./campaign.js";

// Referral types
export type { Referral } from "./referral.js";

// Reward types
export type {
  Reward,
  RewardStatus,
  FulfillmentDetails,
  ActionEvent,
} from "./reward.js";

// Runtime type guards
export {
  isRecord,
  isRewardStatus,
} from "./guards.js";
