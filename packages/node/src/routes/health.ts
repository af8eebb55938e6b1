/**
 * Health check routes.
 *
 * GET /health: Liveness check (always 200 if server is running)
 * GET /ready : Readiness check (database reachable)
 */

import { Hono } from "hono";
import type { RewardProgram } from "@referral-rewards/rewards";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(program: RewardProgram): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const ready = program.isReady();
    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        database: ready ? "ok" : "down",
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
