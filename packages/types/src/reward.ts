/**
 * Reward Types
 *
 * A reward is compensation owed for a tracked action.
 * Rewards move one way: pending → fulfilled.
 */

/**
 * Lifecycle states of a Reward.
 */
export type RewardStatus = "pending" | "fulfilled";

/**
 * Opaque fulfillment details (coupon code, expiry, ...) attached
 * when a reward is fulfilled.
 */
export type FulfillmentDetails = Readonly<Record<string, unknown>>;

/**
 * A unit of compensation owed to a referral.
 */
export interface Reward {
  readonly id: string;

  /** The referral this reward is owed to */
  readonly referralId: string;

  /** The action that triggered the reward (signup, purchase, ...) */
  readonly actionType: string;

  /** Kind of compensation, e.g. "credit" */
  readonly rewardType: string;

  /** Positive reward amount */
  readonly rewardValue: number;

  readonly status: RewardStatus;

  /** Action metadata as delivered, after validation */
  readonly metadata: Readonly<Record<string, unknown>>;

  /** Caller-supplied deduplication key for webhook deliveries */
  readonly idempotencyKey: string | null;

  /** Set only once the reward is fulfilled */
  readonly fulfillment: FulfillmentDetails | null;

  readonly createdAt: string;
  readonly fulfilledAt: string | null;
}

/**
 * A rewardable action reported by an external system.
 *
 * Transient: it becomes a Reward or nothing.
 */
export interface ActionEvent {
  readonly referralCode: string;
  readonly actionType: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}
