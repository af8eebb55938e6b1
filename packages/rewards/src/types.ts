/**
 * Rewards core types: operation inputs and the store ports.
 *
 * The stores are collaborators with narrow contracts. Each write is a
 * single atomic statement at the store level.
 */

import type {
  Campaign,
  FulfillmentDetails,
  Referral,
  Reward,
} from "@referral-rewards/types";

// =============================================================================
// Operation inputs
// =============================================================================

export interface CreateCampaignInput {
  readonly name: string;
  readonly rewardDescription: string;
}

export interface CreateReferralInput {
  readonly campaignId: string;
  readonly referrerEmail: string;
}

export interface CreateRewardInput {
  readonly referralId: string;
  readonly actionType: string;
  readonly rewardValue: number;
  /** Defaults to "credit" */
  readonly rewardType?: string | undefined;
  readonly metadata?: Readonly<Record<string, unknown>> | undefined;
}

export interface TrackActionOptions {
  /** Deduplicates redeliveries of the same action for one referral */
  readonly idempotencyKey?: string | undefined;
}

export interface TrackActionResult {
  readonly referral: Referral;
  readonly reward: Reward;
  /** False when an earlier delivery with the same idempotency key created the reward */
  readonly created: boolean;
}

// =============================================================================
// Store ports
// =============================================================================

export interface CampaignStore {
  insertCampaign(campaign: Campaign): void;
  findCampaign(id: string): Campaign | undefined;
  /** Oldest first */
  listCampaigns(): readonly Campaign[];
}

export interface ReferralStore {
  /**
   * Insert a referral unless its code is already taken.
   *
   * @returns false when the code collided, true when the row was written
   */
  insertReferral(referral: Referral): boolean;
  findReferral(id: string): Referral | undefined;
  findReferralByCode(code: string): Referral | undefined;
  listReferralsByCampaign(campaignId: string): readonly Referral[];
}

export interface InsertRewardResult {
  readonly reward: Reward;
  readonly created: boolean;
}

export interface RewardStore {
  /**
   * Insert a reward. When the reward carries an idempotency key already
   * used for the same referral, nothing is written and the existing
   * reward is returned with `created: false`.
   */
  insertReward(reward: Reward): InsertRewardResult;
  findReward(id: string): Reward | undefined;
  listRewardsByReferral(referralId: string): readonly Reward[];

  /**
   * Conditionally move a pending reward to fulfilled.
   *
   * @returns the updated reward, or undefined when no pending reward
   *          with that id exists
   */
  markFulfilled(
    id: string,
    fulfillment: FulfillmentDetails,
    fulfilledAt: string,
  ): Reward | undefined;
}

export interface RewardsStore extends CampaignStore, ReferralStore, RewardStore {
  /** Whether the backing database answers queries. */
  ping(): boolean;
  close(): void;
}
