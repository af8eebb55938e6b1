/**
 * Reward routes.
 *
 * POST /api/rewards             : Record a reward directly
 * POST /api/rewards/:id/fulfill : Mark a pending reward fulfilled
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateRewardSchema, FulfillRewardSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import type { MetricsCollector } from "../middleware/metrics.js";
import { presentReward } from "../presenters.js";

export interface RewardRouteDeps {
  readonly metrics?: MetricsCollector | undefined;
}

export function createRewardRoutes(deps?: RewardRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const metrics = deps?.metrics;

  routes.post("/", validateBody(CreateRewardSchema), (c) => {
    const body = c.get("validatedBody");
    const reward = c.get("program").createReward({
      referralId: body.referral_id,
      actionType: body.action_type,
      rewardType: body.reward_type,
      rewardValue: body.reward_value,
      metadata: body.metadata,
    });

    metrics?.incrementCounter("referral_rewards_rewards_total", {
      action: reward.actionType,
    });
    return c.json({ data: presentReward(reward) }, 201);
  });

  routes.post("/:id/fulfill", validateBody(FulfillRewardSchema), (c) => {
    const reward = c.get("program").fulfillReward(
      c.req.param("id"),
      c.get("validatedBody"),
    );
    return c.json({ data: presentReward(reward) });
  });

  return routes;
}
