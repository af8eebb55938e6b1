/**
 * Widget routes.
 *
 * GET /api/widget/:campaignId: Public, read-only embed configuration
 *
 * Served with permissive CORS so any site can embed the widget.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import type { AppEnv } from "../types/api-contract.js";
import { presentWidgetConfig } from "../presenters.js";

export function createWidgetRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", cors({ origin: "*", allowMethods: ["GET", "OPTIONS"] }));

  routes.get("/:campaignId", (c) => {
    const config = c.get("program").getWidgetConfig(c.req.param("campaignId"));
    return c.json({ data: presentWidgetConfig(config) });
  });

  return routes;
}
