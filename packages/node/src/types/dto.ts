/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Wire keys are snake_case; route handlers map them onto program inputs.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type PaginationQueryDto = z.infer<typeof PaginationQuerySchema>;

// =============================================================================
// Campaign DTOs
// =============================================================================

export const CreateCampaignSchema = z.object({
  name: z.string().trim().min(1).max(200),
  reward_description: z.string().trim().min(1).max(1000),
});

export type CreateCampaignDto = z.infer<typeof CreateCampaignSchema>;

// =============================================================================
// Referral DTOs
// =============================================================================

export const CreateReferralSchema = z.object({
  campaign_id: z.string().min(1),
  referrer_email: z.string().trim().email().max(320),
});

export type CreateReferralDto = z.infer<typeof CreateReferralSchema>;

// =============================================================================
// Reward DTOs
// =============================================================================

export const CreateRewardSchema = z.object({
  referral_id: z.string().min(1),
  action_type: z.string().trim().min(1).max(64),
  reward_type: z.string().trim().min(1).max(64).optional(),
  reward_value: z.number().finite().positive(),
  metadata: z.record(z.unknown()).optional(),
});

export type CreateRewardDto = z.infer<typeof CreateRewardSchema>;

/** Fulfillment details; unknown keys are stored as given */
export const FulfillRewardSchema = z
  .object({
    coupon_code: z.string().min(1).max(128).optional(),
    expires_at: z.string().datetime({ offset: true }).optional(),
  })
  .passthrough()
  .default({});

export type FulfillRewardDto = z.infer<typeof FulfillRewardSchema>;
