/**
 * Campaign routes.
 *
 * POST /api/campaigns               : Create a campaign
 * GET  /api/campaigns               : List campaigns (cursor pagination)
 * GET  /api/campaigns/:id           : Get a single campaign
 * GET  /api/campaigns/:id/referrals : List a campaign's referrals
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateCampaignSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { presentCampaign, presentReferral } from "../presenters.js";
import { respondWithPage } from "./list.js";

export function createCampaignRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateCampaignSchema), (c) => {
    const body = c.get("validatedBody");
    const campaign = c.get("program").createCampaign({
      name: body.name,
      rewardDescription: body.reward_description,
    });
    return c.json({ data: presentCampaign(campaign) }, 201);
  });

  routes.get("/", (c) => {
    return respondWithPage(c, c.get("program").listCampaigns(), presentCampaign);
  });

  routes.get("/:id", (c) => {
    const campaign = c.get("program").getCampaign(c.req.param("id"));
    return c.json({ data: presentCampaign(campaign) });
  });

  routes.get("/:id/referrals", (c) => {
    const referrals = c.get("program").listReferralsByCampaign(c.req.param("id"));
    return respondWithPage(c, referrals, presentReferral);
  });

  return routes;
}
