/**
 * RewardProgram: Campaigns, referrals and the rewards they earn.
 *
 * Composition root of the rewards core. The HTTP layer delegates to
 * this class and never touches the store directly.
 *
 * Rules:
 * - Rewards are only created for referrals that exist
 * - Webhook actions are validated here, before the store is consulted
 * - Fulfillment is one-way; fulfilling twice is rejected
 *   (INVALID_TRANSITION) and leaves the first fulfillment intact
 */

import { randomUUID } from "node:crypto";
import type {
  ActionEvent,
  Campaign,
  FulfillmentDetails,
  Referral,
  Reward,
  WidgetConfig,
} from "@referral-rewards/types";
import { RewardError } from "./errors.js";
import { generateReferralCode, normalizeReferralCode } from "./referral-code.js";
import { TrackActionSchema, formatZodIssues } from "./schemas.js";
import type {
  CreateCampaignInput,
  CreateReferralInput,
  CreateRewardInput,
  RewardsStore,
  TrackActionOptions,
  TrackActionResult,
} from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export const DEFAULT_REWARD_TYPE = "credit";

/** Fresh codes tried before giving up on a referral */
export const MAX_CODE_ATTEMPTS = 10;

export interface WidgetSettings {
  readonly primaryColor: string;
  readonly apiBaseUrl: string;
}

export interface RewardProgramConfig {
  readonly store: RewardsStore;
  readonly widget: WidgetSettings;
  /** Code source; defaults to generateReferralCode */
  readonly generateCode?: (() => string) | undefined;
  /** Clock; defaults to the system clock */
  readonly now?: (() => Date) | undefined;
}

// =============================================================================
// Program
// =============================================================================

export class RewardProgram {
  private readonly store: RewardsStore;
  private readonly widget: WidgetSettings;
  private readonly generateCode: () => string;
  private readonly now: () => Date;

  constructor(config: RewardProgramConfig) {
    this.store = config.store;
    this.widget = config.widget;
    this.generateCode = config.generateCode ?? (() => generateReferralCode());
    this.now = config.now ?? (() => new Date());
  }

  // ─── Campaigns ─────────────────────────────────────────────────────

  createCampaign(input: CreateCampaignInput): Campaign {
    const campaign: Campaign = {
      id: randomUUID(),
      name: input.name,
      rewardDescription: input.rewardDescription,
      createdAt: this.timestamp(),
    };
    this.store.insertCampaign(campaign);
    return campaign;
  }

  listCampaigns(): readonly Campaign[] {
    return this.store.listCampaigns();
  }

  getCampaign(id: string): Campaign {
    const campaign = this.store.findCampaign(id);
    if (campaign === undefined) {
      throw new RewardError("CAMPAIGN_NOT_FOUND", `Campaign '${id}' not found`);
    }
    return campaign;
  }

  getWidgetConfig(campaignId: string): WidgetConfig {
    const campaign = this.getCampaign(campaignId);
    return {
      campaignId: campaign.id,
      campaignName: campaign.name,
      rewardDescription: campaign.rewardDescription,
      primaryColor: this.widget.primaryColor,
      apiBaseUrl: this.widget.apiBaseUrl,
    };
  }

  // ─── Referrals ─────────────────────────────────────────────────────

  /**
   * Create a referral with a freshly generated code.
   *
   * The store claims the code atomically; a collision just means
   * another code is drawn.
   */
  createReferral(input: CreateReferralInput): Referral {
    this.getCampaign(input.campaignId);

    const id = randomUUID();
    const createdAt = this.timestamp();

    for (let attempt = 0; attempt < MAX_CODE_ATTEMPTS; attempt++) {
      const referral: Referral = {
        id,
        campaignId: input.campaignId,
        referrerEmail: input.referrerEmail,
        code: this.generateCode(),
        createdAt,
      };
      if (this.store.insertReferral(referral)) {
        return referral;
      }
    }

    throw new RewardError(
      "CODE_GENERATION_FAILED",
      `Failed to generate a unique referral code after ${MAX_CODE_ATTEMPTS} attempts`,
    );
  }

  getReferralByCode(code: string): Referral {
    const referral = this.store.findReferralByCode(normalizeReferralCode(code));
    if (referral === undefined) {
      throw new RewardError("REFERRAL_NOT_FOUND", `Referral '${code}' not found`);
    }
    return referral;
  }

  listReferralsByCampaign(campaignId: string): readonly Referral[] {
    this.getCampaign(campaignId);
    return this.store.listReferralsByCampaign(campaignId);
  }

  // ─── Rewards ───────────────────────────────────────────────────────

  /**
   * Record a reward directly (not through the webhook).
   */
  createReward(input: CreateRewardInput): Reward {
    const referral = this.requireReferral(input.referralId);
    assertRewardValue(input.rewardValue);

    const { reward } = this.store.insertReward(
      this.pendingReward(referral, {
        actionType: input.actionType,
        rewardType: input.rewardType ?? DEFAULT_REWARD_TYPE,
        rewardValue: input.rewardValue,
        metadata: input.metadata ?? {},
        idempotencyKey: null,
      }),
    );
    return reward;
  }

  listRewardsByReferral(referralId: string): readonly Reward[] {
    this.requireReferral(referralId);
    return this.store.listRewardsByReferral(referralId);
  }

  getReward(id: string): Reward {
    const reward = this.store.findReward(id);
    if (reward === undefined) {
      throw new RewardError("REWARD_NOT_FOUND", `Reward '${id}' not found`);
    }
    return reward;
  }

  /**
   * Turn a verified webhook action into a pending reward.
   *
   * The payload must already have passed signature verification;
   * this method only checks its shape and resolves the code.
   */
  trackAction(payload: unknown, options?: TrackActionOptions): TrackActionResult {
    const { event, rewardValue, rewardType } = parseAction(payload);

    const referral = this.store.findReferralByCode(
      normalizeReferralCode(event.referralCode),
    );
    if (referral === undefined) {
      throw new RewardError(
        "REFERRAL_NOT_FOUND",
        `Referral '${event.referralCode}' not found`,
      );
    }

    const { reward, created } = this.store.insertReward(
      this.pendingReward(referral, {
        actionType: event.actionType,
        rewardType,
        rewardValue,
        metadata: event.metadata,
        idempotencyKey: options?.idempotencyKey ?? null,
      }),
    );

    return { referral, reward, created };
  }

  /**
   * Move a pending reward to fulfilled, attaching the supplied details.
   */
  fulfillReward(id: string, details: FulfillmentDetails): Reward {
    const updated = this.store.markFulfilled(id, details, this.timestamp());
    if (updated !== undefined) {
      return updated;
    }

    // Nothing pending matched: either unknown or already fulfilled
    const current = this.getReward(id);
    throw new RewardError(
      "INVALID_TRANSITION",
      `Reward '${id}' is already ${current.status}`,
    );
  }

  // ─── Health ────────────────────────────────────────────────────────

  isReady(): boolean {
    return this.store.ping();
  }

  close(): void {
    this.store.close();
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private requireReferral(id: string): Referral {
    const referral = this.store.findReferral(id);
    if (referral === undefined) {
      throw new RewardError("REFERRAL_NOT_FOUND", `Referral '${id}' not found`);
    }
    return referral;
  }

  private pendingReward(
    referral: Referral,
    fields: Pick<
      Reward,
      "actionType" | "rewardType" | "rewardValue" | "metadata" | "idempotencyKey"
    >,
  ): Reward {
    return {
      id: randomUUID(),
      referralId: referral.id,
      ...fields,
      status: "pending",
      fulfillment: null,
      createdAt: this.timestamp(),
      fulfilledAt: null,
    };
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

// =============================================================================
// Helpers
// =============================================================================

interface ParsedAction {
  readonly event: ActionEvent;
  readonly rewardValue: number;
  readonly rewardType: string;
}

function parseAction(payload: unknown): ParsedAction {
  const result = TrackActionSchema.safeParse(payload);
  if (!result.success) {
    throw new RewardError("VALIDATION_FAILED", "Invalid action payload", {
      issues: formatZodIssues(result.error),
    });
  }
  const { data } = result;
  return {
    event: {
      referralCode: data.referral_code,
      actionType: data.action_type,
      metadata: data.metadata,
    },
    rewardValue: data.metadata.reward_value,
    rewardType: data.metadata.reward_type ?? DEFAULT_REWARD_TYPE,
  };
}

function assertRewardValue(value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RewardError(
      "VALIDATION_FAILED",
      "reward_value must be a positive number",
    );
  }
}
