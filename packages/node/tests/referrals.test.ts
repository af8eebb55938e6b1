/**
 * Tests for referral routes.
 *
 * Covers: issuing codes, lookup by code, and a referral's rewards.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createTestApp, jsonRequest, seedReferral } from "./setup.js";
import type { TestAppInstance } from "./setup.js";
import type { ReferralResponse, RewardResponse } from "../src/presenters.js";

let instance: TestAppInstance;

beforeEach(() => {
  instance = createTestApp();
  seedReferral(instance.store);
});

// =============================================================================
// POST /api/referrals
// =============================================================================

describe("POST /api/referrals", () => {
  it("issues a referral code for an existing campaign", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/referrals", "POST", {
        campaign_id: "camp-1",
        referrer_email: "grace@example.com",
      }),
    );

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: ReferralResponse };
    expect(body.data.campaign_id).toBe("camp-1");
    expect(body.data.referrer_email).toBe("grace@example.com");
    expect(body.data.referral_code).toMatch(/^[A-HJ-NP-Z2-9]{8}$/);
  });

  it("returns 404 for an unknown campaign", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/referrals", "POST", {
        campaign_id: "missing",
        referrer_email: "grace@example.com",
      }),
    );

    expect(res.status).toBe(404);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("CAMPAIGN_NOT_FOUND");
  });

  it("returns 400 for an invalid email", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/referrals", "POST", {
        campaign_id: "camp-1",
        referrer_email: "not-an-email",
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as {
      error: { code: string; details: { issues: { path: string }[] } };
    };
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details.issues.map((i) => i.path)).toEqual(["referrer_email"]);
  });
});

// =============================================================================
// GET /api/referrals/:code
// =============================================================================

describe("GET /api/referrals/:code", () => {
  it("returns the referral for a code", async () => {
    const res = await instance.app.request("/api/referrals/ABC123XY");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: ReferralResponse };
    expect(body.data.id).toBe("ref-1");
    expect(body.data.referral_code).toBe("ABC123XY");
  });

  it("accepts a lowercase code", async () => {
    const res = await instance.app.request("/api/referrals/abc123xy");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: ReferralResponse };
    expect(body.data.id).toBe("ref-1");
  });

  it("returns 404 REFERRAL_NOT_FOUND for an unknown code", async () => {
    const res = await instance.app.request("/api/referrals/NOPE2222");

    expect(res.status).toBe(404);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("REFERRAL_NOT_FOUND");
  });
});

// =============================================================================
// GET /api/referrals/:id/rewards
// =============================================================================

describe("GET /api/referrals/:id/rewards", () => {
  it("is empty before any action is tracked", async () => {
    const res = await instance.app.request("/api/referrals/ref-1/rewards");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: RewardResponse[] };
    expect(body.data).toEqual([]);
  });

  it("lists rewards recorded for the referral", async () => {
    await instance.app.request(
      jsonRequest("/api/rewards", "POST", {
        referral_id: "ref-1",
        action_type: "signup",
        reward_value: 50,
      }),
    );

    const res = await instance.app.request("/api/referrals/ref-1/rewards");
    const body = (await res.json()) as { data: RewardResponse[] };
    expect(body.data).toHaveLength(1);
    expect(body.data[0]!.action_type).toBe("signup");
  });

  it("returns 404 for an unknown referral", async () => {
    const res = await instance.app.request("/api/referrals/missing/rewards");
    expect(res.status).toBe(404);
  });
});
