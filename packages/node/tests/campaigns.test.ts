/**
 * Tests for campaign routes.
 *
 * Covers: create, list (with pagination), get, and a campaign's referrals.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createTestApp, jsonRequest, seedReferral } from "./setup.js";
import type { TestAppInstance } from "./setup.js";
import type { CampaignResponse, ReferralResponse } from "../src/presenters.js";
import type { PaginationMeta } from "../src/types/pagination.js";

let instance: TestAppInstance;

beforeEach(() => {
  instance = createTestApp();
});

async function createCampaign(name: string): Promise<CampaignResponse> {
  const res = await instance.app.request(
    jsonRequest("/api/campaigns", "POST", {
      name,
      reward_description: "$50 credit per signup",
    }),
  );
  const body = (await res.json()) as { data: CampaignResponse };
  return body.data;
}

// =============================================================================
// POST /api/campaigns
// =============================================================================

describe("POST /api/campaigns", () => {
  it("creates a campaign and returns 201", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/campaigns", "POST", {
        name: "  Launch  ",
        reward_description: "$50 credit per signup",
      }),
    );

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: CampaignResponse };
    expect(body.data.name).toBe("Launch");
    expect(body.data.reward_description).toBe("$50 credit per signup");
    expect(body.data.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("returns 400 with issue paths for a missing field", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/campaigns", "POST", { reward_description: "x" }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as {
      error: { code: string; details: { issues: { path: string; message: string }[] } };
    };
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details.issues).toEqual([{ path: "name", message: "Required" }]);
  });

  it("returns 400 for malformed JSON", async () => {
    const res = await instance.app.request(
      new Request("http://localhost/api/campaigns", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({
      code: "VALIDATION_ERROR",
      message: "Invalid JSON in request body",
    });
  });
});

// =============================================================================
// GET /api/campaigns
// =============================================================================

describe("GET /api/campaigns", () => {
  it("returns an empty page when no campaigns exist", async () => {
    const res = await instance.app.request("/api/campaigns");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: unknown[]; pagination: PaginationMeta };
    expect(body).toEqual({ data: [], pagination: { cursor: null, hasMore: false } });
  });

  it("pages through every campaign", async () => {
    const created = [
      await createCampaign("A"),
      await createCampaign("B"),
      await createCampaign("C"),
    ];

    const first = await instance.app.request("/api/campaigns?limit=2");
    const firstBody = (await first.json()) as {
      data: CampaignResponse[];
      pagination: PaginationMeta;
    };
    expect(firstBody.data).toHaveLength(2);
    expect(firstBody.pagination.hasMore).toBe(true);
    expect(firstBody.pagination.cursor).not.toBeNull();

    const second = await instance.app.request(
      `/api/campaigns?limit=2&cursor=${firstBody.pagination.cursor ?? ""}`,
    );
    const secondBody = (await second.json()) as {
      data: CampaignResponse[];
      pagination: PaginationMeta;
    };
    expect(secondBody.data).toHaveLength(1);
    expect(secondBody.pagination).toEqual({ cursor: null, hasMore: false });

    const seen = [...firstBody.data, ...secondBody.data].map((c) => c.id).sort();
    expect(seen).toEqual(created.map((c) => c.id).sort());
  });

  it("returns 400 for an out-of-range limit", async () => {
    const res = await instance.app.request("/api/campaigns?limit=0");

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

// =============================================================================
// GET /api/campaigns/:id
// =============================================================================

describe("GET /api/campaigns/:id", () => {
  it("returns the campaign", async () => {
    const campaign = await createCampaign("Launch");
    const res = await instance.app.request(`/api/campaigns/${campaign.id}`);

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: CampaignResponse };
    expect(body.data).toEqual(campaign);
  });

  it("returns 404 CAMPAIGN_NOT_FOUND for an unknown id", async () => {
    const res = await instance.app.request("/api/campaigns/missing");

    expect(res.status).toBe(404);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({
      code: "CAMPAIGN_NOT_FOUND",
      message: "Campaign 'missing' not found",
    });
  });
});

// =============================================================================
// GET /api/campaigns/:id/referrals
// =============================================================================

describe("GET /api/campaigns/:id/referrals", () => {
  it("lists the campaign's referrals", async () => {
    seedReferral(instance.store);
    const res = await instance.app.request("/api/campaigns/camp-1/referrals");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: ReferralResponse[] };
    expect(body.data).toEqual([
      {
        id: "ref-1",
        campaign_id: "camp-1",
        referrer_email: "ada@example.com",
        referral_code: "ABC123XY",
        created_at: "2025-01-01T00:00:00.000Z",
      },
    ]);
  });

  it("returns 404 for an unknown campaign", async () => {
    const res = await instance.app.request("/api/campaigns/missing/referrals");
    expect(res.status).toBe(404);
  });
});
