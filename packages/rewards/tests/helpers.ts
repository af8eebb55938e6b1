/**
 * Test helpers for @referral-rewards/rewards.
 */

import { RewardError } from "../src/errors.js";
import { RewardProgram } from "../src/reward-program.js";
import { SqliteRewardsStore } from "../src/sqlite-store.js";
import type { Referral } from "@referral-rewards/types";

export const TEST_WIDGET = {
  primaryColor: "#6366f1",
  apiBaseUrl: "http://localhost:8000",
};

/**
 * In-memory store plus a program bound to it.
 */
export function createTestProgram(
  overrides?: { generateCode?: () => string; now?: () => Date },
): { store: SqliteRewardsStore; program: RewardProgram } {
  const store = SqliteRewardsStore.open(":memory:");
  const program = new RewardProgram({
    store,
    widget: TEST_WIDGET,
    generateCode: overrides?.generateCode,
    now: overrides?.now,
  });
  return { store, program };
}

/**
 * Seed a campaign and a referral with a fixed code.
 */
export function seedReferral(
  store: SqliteRewardsStore,
  code: string = "ABC123XY",
): Referral {
  store.insertCampaign({
    id: "camp-1",
    name: "Launch",
    rewardDescription: "$50 credit per signup",
    createdAt: "2025-01-01T00:00:00.000Z",
  });
  const referral: Referral = {
    id: "ref-1",
    campaignId: "camp-1",
    referrerEmail: "ada@example.com",
    code,
    createdAt: "2025-01-01T00:00:00.000Z",
  };
  store.insertReferral(referral);
  return referral;
}

/**
 * A clock that advances one second per call.
 */
export function steppingClock(start: string = "2025-01-15T10:00:00.000Z"): () => Date {
  let current = new Date(start).getTime();
  return () => {
    const now = new Date(current);
    current += 1000;
    return now;
  };
}

/**
 * Run `fn` and return the RewardError it throws.
 */
export function catchRewardError(fn: () => unknown): RewardError {
  try {
    fn();
  } catch (error) {
    if (error instanceof RewardError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a RewardError to be thrown");
}
