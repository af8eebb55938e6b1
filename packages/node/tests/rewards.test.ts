/**
 * Tests for reward routes.
 *
 * Covers: direct creation and the one-way fulfillment transition.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createTestApp, jsonRequest, seedReferral } from "./setup.js";
import type { TestAppInstance } from "./setup.js";
import type { RewardResponse } from "../src/presenters.js";

let instance: TestAppInstance;

beforeEach(() => {
  instance = createTestApp();
  seedReferral(instance.store);
});

async function createReward(): Promise<RewardResponse> {
  const res = await instance.app.request(
    jsonRequest("/api/rewards", "POST", {
      referral_id: "ref-1",
      action_type: "signup",
      reward_value: 50,
    }),
  );
  const body = (await res.json()) as { data: RewardResponse };
  return body.data;
}

async function listRewards(): Promise<RewardResponse[]> {
  const res = await instance.app.request("/api/referrals/ref-1/rewards");
  const body = (await res.json()) as { data: RewardResponse[] };
  return body.data;
}

// =============================================================================
// POST /api/rewards
// =============================================================================

describe("POST /api/rewards", () => {
  it("records a pending reward with the default type", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/rewards", "POST", {
        referral_id: "ref-1",
        action_type: "signup",
        reward_value: 50,
      }),
    );

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: RewardResponse };
    expect(body.data).toMatchObject({
      referral_id: "ref-1",
      action_type: "signup",
      reward_type: "credit",
      reward_value: 50,
      status: "pending",
      metadata: {},
      idempotency_key: null,
      fulfillment: null,
      fulfilled_at: null,
    });
  });

  it("keeps an explicit reward type", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/rewards", "POST", {
        referral_id: "ref-1",
        action_type: "purchase",
        reward_type: "coupon",
        reward_value: 5,
      }),
    );

    const body = (await res.json()) as { data: RewardResponse };
    expect(body.data.reward_type).toBe("coupon");
  });

  it("returns 404 for an unknown referral", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/rewards", "POST", {
        referral_id: "missing",
        action_type: "signup",
        reward_value: 50,
      }),
    );

    expect(res.status).toBe(404);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("REFERRAL_NOT_FOUND");
  });

  it("returns 400 for a non-positive value", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/rewards", "POST", {
        referral_id: "ref-1",
        action_type: "signup",
        reward_value: 0,
      }),
    );

    expect(res.status).toBe(400);
    expect(await listRewards()).toEqual([]);
  });
});

// =============================================================================
// POST /api/rewards/:id/fulfill
// =============================================================================

describe("POST /api/rewards/:id/fulfill", () => {
  it("fulfills a pending reward", async () => {
    const reward = await createReward();
    const res = await instance.app.request(
      jsonRequest(`/api/rewards/${reward.id}/fulfill`, "POST", {
        coupon_code: "SAVE50",
        expires_at: "2025-12-31T23:59:59Z",
      }),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: RewardResponse };
    expect(body.data.status).toBe("fulfilled");
    expect(body.data.fulfillment).toEqual({
      coupon_code: "SAVE50",
      expires_at: "2025-12-31T23:59:59Z",
    });
    expect(body.data.fulfilled_at).not.toBeNull();
  });

  it("keeps unknown detail keys", async () => {
    const reward = await createReward();
    const res = await instance.app.request(
      jsonRequest(`/api/rewards/${reward.id}/fulfill`, "POST", { note: "sent by email" }),
    );

    const body = (await res.json()) as { data: RewardResponse };
    expect(body.data.fulfillment).toEqual({ note: "sent by email" });
  });

  it("accepts a request without a body", async () => {
    const reward = await createReward();
    const res = await instance.app.request(`/api/rewards/${reward.id}/fulfill`, {
      method: "POST",
    });

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: RewardResponse };
    expect(body.data.fulfillment).toEqual({});
  });

  it("returns 409 on a second fulfillment and keeps the first", async () => {
    const reward = await createReward();
    await instance.app.request(
      jsonRequest(`/api/rewards/${reward.id}/fulfill`, "POST", { coupon_code: "FIRST" }),
    );

    const res = await instance.app.request(
      jsonRequest(`/api/rewards/${reward.id}/fulfill`, "POST", { coupon_code: "SECOND" }),
    );

    expect(res.status).toBe(409);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({
      code: "INVALID_TRANSITION",
      message: `Reward '${reward.id}' is already fulfilled`,
    });

    const [stored] = await listRewards();
    expect(stored?.fulfillment).toEqual({ coupon_code: "FIRST" });
  });

  it("returns 404 for an unknown reward", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/rewards/missing/fulfill", "POST", {}),
    );

    expect(res.status).toBe(404);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("REWARD_NOT_FOUND");
  });

  it("returns 400 for a malformed expiry", async () => {
    const reward = await createReward();
    const res = await instance.app.request(
      jsonRequest(`/api/rewards/${reward.id}/fulfill`, "POST", { expires_at: "next week" }),
    );

    expect(res.status).toBe(400);
    const [stored] = await listRewards();
    expect(stored?.status).toBe("pending");
  });
});
