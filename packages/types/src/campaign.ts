/**
 * Campaign Types
 *
 * A campaign is a named referral program. It owns referrals and
 * describes, in human terms, what a referrer earns.
 */

/**
 * A referral program.
 *
 * Immutable after creation.
 */
export interface Campaign {
  /** Unique identifier (UUID) */
  readonly id: string;

  /** Display name shown to referrers */
  readonly name: string;

  /** Human-readable description of the reward, e.g. "$10 credit per signup" */
  readonly rewardDescription: string;

  /** ISO 8601 timestamp of creation */
  readonly createdAt: string;
}

/**
 * Display configuration served to the embeddable widget.
 */
export interface WidgetConfig {
  readonly campaignId: string;
  readonly campaignName: string;
  readonly rewardDescription: string;
  readonly primaryColor: string;
  readonly apiBaseUrl: string;
}
