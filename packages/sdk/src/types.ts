/**
 * @referral-rewards/sdk: SDK types.
 *
 * Types specific to the SDK client layer. Record shapes mirror the
 * server's snake_case wire format.
 */

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Configuration for the referral rewards SDK client.
 */
export interface ReferralRewardsClientConfig {
  /** Base URL of the API (e.g., "https://rewards.example.com") */
  readonly baseUrl: string;
  /** API key for the management routes (optional when the server runs unsecured) */
  readonly apiKey?: string | undefined;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Maximum retry attempts for 5xx and network errors (default: 3) */
  readonly retries?: number | undefined;
  /** First backoff delay in milliseconds, doubled per attempt (default: 1000) */
  readonly retryDelay?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
}

// =============================================================================
// Response Types
// =============================================================================

/**
 * A decoded API response.
 */
export interface ReferralRewardsResponse<T> {
  /** Response payload */
  readonly data: T;
  /** HTTP status code */
  readonly status: number;
  /** Response headers (selected) */
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Paginated list response.
 */
export interface PaginatedList<T> {
  /** Items in this page */
  readonly data: readonly T[];
  /** Pagination metadata */
  readonly pagination: {
    readonly cursor: string | null;
    readonly hasMore: boolean;
  };
}

export interface ListParams {
  readonly cursor?: string | undefined;
  readonly limit?: number | undefined;
}

// =============================================================================
// Records
// =============================================================================

export type RewardStatus = "pending" | "fulfilled";

export interface Campaign {
  readonly id: string;
  readonly name: string;
  readonly reward_description: string;
  readonly created_at: string;
}

export interface Referral {
  readonly id: string;
  readonly campaign_id: string;
  readonly referrer_email: string;
  readonly referral_code: string;
  readonly created_at: string;
}

export interface Reward {
  readonly id: string;
  readonly referral_id: string;
  readonly action_type: string;
  readonly reward_type: string;
  readonly reward_value: number;
  readonly status: RewardStatus;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly idempotency_key: string | null;
  readonly fulfillment: Readonly<Record<string, unknown>> | null;
  readonly created_at: string;
  readonly fulfilled_at: string | null;
}

export interface WidgetConfig {
  readonly campaign_id: string;
  readonly campaign_name: string;
  readonly reward_description: string;
  readonly primary_color: string;
  readonly api_base_url: string;
}

export interface TrackActionResult {
  readonly status: "tracked" | "duplicate";
  readonly referral_code: string;
  readonly action: string;
  readonly reward_id: string;
  readonly reward: Reward;
}

export interface HealthStatus {
  readonly status: string;
  readonly timestamp: string;
}

// =============================================================================
// Request Parameters
// =============================================================================

export interface CreateCampaignParams {
  readonly name: string;
  readonly reward_description: string;
}

export interface CreateReferralParams {
  readonly campaign_id: string;
  readonly referrer_email: string;
}

export interface CreateRewardParams {
  readonly referral_id: string;
  readonly action_type: string;
  readonly reward_type?: string | undefined;
  readonly reward_value: number;
  readonly metadata?: Readonly<Record<string, unknown>> | undefined;
}

export interface FulfillmentParams {
  readonly coupon_code?: string | undefined;
  readonly expires_at?: string | undefined;
  readonly [key: string]: unknown;
}

/**
 * An action event as a webhook sender delivers it.
 */
export interface ActionEvent {
  readonly referral_code: string;
  readonly action_type: string;
  readonly metadata: {
    readonly reward_value: number;
    readonly reward_type?: string | undefined;
    readonly [key: string]: unknown;
  };
}

export interface TrackOptions {
  /** Shared webhook secret the server verifies against */
  readonly secret: string;
  /** Deduplication key; generated when omitted so retries stay idempotent */
  readonly idempotencyKey?: string | undefined;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Structured error from the referral rewards API.
 */
export class ReferralRewardsError extends Error {
  /** Error code from the API (e.g., "NOT_FOUND", "VALIDATION_ERROR") */
  readonly code: string;
  /** HTTP status code (0 for network failures and timeouts) */
  readonly statusCode: number;
  /** Additional error details (validation issues, etc.) */
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = "ReferralRewardsError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}
