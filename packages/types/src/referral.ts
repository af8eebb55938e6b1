/**
 * Referral Types
 *
 * A referral is one referrer's participation in a campaign,
 * identified publicly by a short code.
 */

/**
 * A referrer's participation record within a campaign.
 *
 * The code is assigned at creation, unique across all campaigns,
 * and never changes.
 */
export interface Referral {
  readonly id: string;
  readonly campaignId: string;

  /** Identity of the referrer (an email address) */
  readonly referrerEmail: string;

  /** Public, human-typable referral code */
  readonly code: string;

  readonly createdAt: string;
}
