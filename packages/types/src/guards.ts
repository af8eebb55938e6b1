/**
 * Runtime Type Guards
 *
 * Narrowing functions for referral reward domain types.
 * Used at system boundaries (database rows, deserialized JSON).
 */

import type { RewardStatus } from "./reward.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// Reward guards
// =============================================================================

const REWARD_STATUSES = new Set<string>(["pending", "fulfilled"]);

export function isRewardStatus(value: unknown): value is RewardStatus {
  return typeof value === "string" && REWARD_STATUSES.has(value);
}
