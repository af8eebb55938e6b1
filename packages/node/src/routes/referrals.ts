/**
 * Referral routes.
 *
 * POST /api/referrals             : Issue a referral code
 * GET  /api/referrals/:code       : Look a referral up by code
 * GET  /api/referrals/:id/rewards : List a referral's rewards
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateReferralSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { presentReferral, presentReward } from "../presenters.js";
import { respondWithPage } from "./list.js";

export function createReferralRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateReferralSchema), (c) => {
    const body = c.get("validatedBody");
    const referral = c.get("program").createReferral({
      campaignId: body.campaign_id,
      referrerEmail: body.referrer_email,
    });
    return c.json({ data: presentReferral(referral) }, 201);
  });

  routes.get("/:code", (c) => {
    const referral = c.get("program").getReferralByCode(c.req.param("code"));
    return c.json({ data: presentReferral(referral) });
  });

  routes.get("/:id/rewards", (c) => {
    const rewards = c.get("program").listRewardsByReferral(c.req.param("id"));
    return respondWithPage(c, rewards, presentReward);
  });

  return routes;
}
