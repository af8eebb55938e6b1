/**
 * @referral-rewards/sdk: Referral Rewards Client.
 *
 * Main entry point for the SDK. Operations are grouped by resource:
 * client.campaigns, client.referrals, client.rewards, client.widget
 * and client.webhooks.
 */

import { randomUUID } from "node:crypto";
import type {
  ActionEvent,
  Campaign,
  CreateCampaignParams,
  CreateReferralParams,
  CreateRewardParams,
  FulfillmentParams,
  HealthStatus,
  ListParams,
  PaginatedList,
  Referral,
  ReferralRewardsClientConfig,
  ReferralRewardsResponse,
  Reward,
  TrackActionResult,
  TrackOptions,
  WidgetConfig,
} from "./types.js";
import { HttpClient } from "./http-client.js";
import { IDEMPOTENCY_HEADER, SIGNATURE_HEADER, signWebhookBody } from "./signature.js";

function withListQuery(path: string, params?: ListParams): string {
  const query = new URLSearchParams();
  if (params?.cursor !== undefined) query.set("cursor", params.cursor);
  if (params?.limit !== undefined) query.set("limit", String(params.limit));

  const qs = query.toString();
  return qs.length > 0 ? `${path}?${qs}` : path;
}

// =============================================================================
// Namespaces
// =============================================================================

export class CampaignsNamespace {
  constructor(private readonly http: HttpClient) {}

  async create(params: CreateCampaignParams): Promise<ReferralRewardsResponse<Campaign>> {
    return this.http.post<Campaign>("/api/campaigns", params);
  }

  async list(params?: ListParams): Promise<ReferralRewardsResponse<PaginatedList<Campaign>>> {
    return this.http.getPage<Campaign>(withListQuery("/api/campaigns", params));
  }

  async get(id: string): Promise<ReferralRewardsResponse<Campaign>> {
    return this.http.get<Campaign>(`/api/campaigns/${encodeURIComponent(id)}`);
  }

  /**
   * List the referrals issued within a campaign.
   */
  async listReferrals(
    id: string,
    params?: ListParams,
  ): Promise<ReferralRewardsResponse<PaginatedList<Referral>>> {
    return this.http.getPage<Referral>(
      withListQuery(`/api/campaigns/${encodeURIComponent(id)}/referrals`, params),
    );
  }
}

export class ReferralsNamespace {
  constructor(private readonly http: HttpClient) {}

  /**
   * Issue a referral code for a referrer.
   */
  async create(params: CreateReferralParams): Promise<ReferralRewardsResponse<Referral>> {
    return this.http.post<Referral>("/api/referrals", params);
  }

  async getByCode(code: string): Promise<ReferralRewardsResponse<Referral>> {
    return this.http.get<Referral>(`/api/referrals/${encodeURIComponent(code)}`);
  }

  async listRewards(
    id: string,
    params?: ListParams,
  ): Promise<ReferralRewardsResponse<PaginatedList<Reward>>> {
    return this.http.getPage<Reward>(
      withListQuery(`/api/referrals/${encodeURIComponent(id)}/rewards`, params),
    );
  }
}

export class RewardsNamespace {
  constructor(private readonly http: HttpClient) {}

  async create(params: CreateRewardParams): Promise<ReferralRewardsResponse<Reward>> {
    return this.http.post<Reward>("/api/rewards", params);
  }

  /**
   * Mark a pending reward fulfilled. Fails with INVALID_TRANSITION if it
   * already is.
   */
  async fulfill(
    id: string,
    details: FulfillmentParams = {},
  ): Promise<ReferralRewardsResponse<Reward>> {
    return this.http.post<Reward>(`/api/rewards/${encodeURIComponent(id)}/fulfill`, details);
  }
}

export class WidgetNamespace {
  constructor(private readonly http: HttpClient) {}

  async get(campaignId: string): Promise<ReferralRewardsResponse<WidgetConfig>> {
    return this.http.get<WidgetConfig>(`/api/widget/${encodeURIComponent(campaignId)}`);
  }
}

export class WebhooksNamespace {
  constructor(private readonly http: HttpClient) {}

  /**
   * Deliver a signed action event.
   *
   * The event is serialized once and those exact bytes are signed and
   * sent. Every attempt reuses one idempotency key, so a retried
   * delivery cannot create a second reward.
   */
  async track(
    event: ActionEvent,
    options: TrackOptions,
  ): Promise<ReferralRewardsResponse<TrackActionResult>> {
    const body = JSON.stringify(event);
    return this.http.postRaw<TrackActionResult>("/api/webhooks/track", body, {
      [SIGNATURE_HEADER]: signWebhookBody(options.secret, body),
      [IDEMPOTENCY_HEADER]: options.idempotencyKey ?? randomUUID(),
    });
  }
}

// =============================================================================
// Main Client
// =============================================================================

/**
 * Referral rewards SDK client.
 *
 * Usage:
 * ```typescript
 * const client = new ReferralRewardsClient({
 *   baseUrl: "https://rewards.example.com",
 *   apiKey: "your-api-key",
 * });
 *
 * const { data: campaign } = await client.campaigns.create({
 *   name: "Spring launch",
 *   reward_description: "$20 credit per signup",
 * });
 * ```
 */
export class ReferralRewardsClient {
  readonly campaigns: CampaignsNamespace;
  readonly referrals: ReferralsNamespace;
  readonly rewards: RewardsNamespace;
  readonly widget: WidgetNamespace;
  readonly webhooks: WebhooksNamespace;

  private readonly http: HttpClient;

  constructor(config: ReferralRewardsClientConfig) {
    this.http = new HttpClient(config);
    this.campaigns = new CampaignsNamespace(this.http);
    this.referrals = new ReferralsNamespace(this.http);
    this.rewards = new RewardsNamespace(this.http);
    this.widget = new WidgetNamespace(this.http);
    this.webhooks = new WebhooksNamespace(this.http);
  }

  /**
   * Liveness check.
   */
  async health(): Promise<ReferralRewardsResponse<HealthStatus>> {
    return this.http.get<HealthStatus>("/health");
  }
}
