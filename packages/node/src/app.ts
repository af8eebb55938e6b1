/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability: tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import { RewardProgram, WebhookSignatureVerifier } from "@referral-rewards/rewards";
import type { RewardsStore, WidgetSettings } from "@referral-rewards/rewards";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorHandler, handleNotFound } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware, pinoRequestLog } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { managementAuthMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { metricsMiddleware, MetricsCollector } from "./middleware/metrics.js";
import { createHealthRoutes } from "./routes/health.js";
import { createMetricsRoute } from "./routes/metrics.js";
import { createCampaignRoutes } from "./routes/campaigns.js";
import { createReferralRoutes } from "./routes/referrals.js";
import { createRewardRoutes } from "./routes/rewards.js";
import { createWebhookRoutes } from "./routes/webhooks.js";
import { createWidgetRoutes } from "./routes/widget.js";

// =============================================================================
// App Config
// =============================================================================

export const DEFAULT_WIDGET_SETTINGS: WidgetSettings = {
  primaryColor: "#6366f1",
  apiBaseUrl: "http://localhost:8000",
};

/** Action types tracked as their own series; later ones count as "other" */
export const MAX_ACTION_TYPE_SERIES = 20;

export interface CreateAppOptions {
  readonly store: RewardsStore;
  /** Shared webhook secret. Unset means every webhook is rejected. */
  readonly webhookSecret?: string | undefined;
  /** Widget colour and public base URL */
  readonly widget?: WidgetSettings | undefined;
  /** Application logger (webhook rejections, unexpected errors) */
  readonly logger?: Logger | undefined;
  /** Per-request log sink. Defaults to the logger, when one is given. */
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Auth configuration. When provided, management routes need an API key. */
  readonly auth?: AuthConfig | undefined;
  /** Enable metrics collection. Default: true */
  readonly enableMetrics?: boolean | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly program: RewardProgram;
  readonly metricsCollector: MetricsCollector;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const program = new RewardProgram({
    store: options.store,
    widget: options.widget ?? DEFAULT_WIDGET_SETTINGS,
  });
  const verifier = new WebhookSignatureVerifier(options.webhookSecret);
  if (!verifier.configured) {
    options.logger?.warn("No webhook secret configured, every webhook delivery will be rejected");
  }
  const metricsCollector = new MetricsCollector();
  const enableMetrics = options.enableMetrics !== false;
  const metrics = enableMetrics ? metricsCollector : undefined;
  const logFn =
    options.logFn ??
    (options.logger !== undefined ? pinoRequestLog(options.logger) : undefined);

  metricsCollector.describeCounter(
    "referral_rewards_actions_total",
    "Webhook action deliveries by result",
  );
  metricsCollector.describeCounter(
    "referral_rewards_rewards_total",
    "Rewards created by action type",
    { maxSeries: MAX_ACTION_TYPE_SERIES },
  );

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (logFn !== undefined) {
    app.use("*", loggerMiddleware(logFn));
  }

  if (enableMetrics) {
    app.use("*", metricsMiddleware(metricsCollector));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler(options.logger));
  app.notFound(handleNotFound);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(program));

  // ─── Metrics Route (no auth for Prometheus scraping) ────────────
  if (enableMetrics) {
    app.route("/", createMetricsRoute(metricsCollector));
  }

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("program", program);
    await next();
  });

  if (options.auth !== undefined) {
    // Secured mode: management routes need a key, webhook and widget stay open
    app.use("/api/*", managementAuthMiddleware(options.auth));
  }

  app.route("/api/campaigns", createCampaignRoutes());
  app.route("/api/referrals", createReferralRoutes());
  app.route("/api/rewards", createRewardRoutes({ metrics }));
  app.route(
    "/api/webhooks",
    createWebhookRoutes({ verifier, logger: options.logger, metrics }),
  );
  app.route("/api/widget", createWidgetRoutes());

  return { app, program, metricsCollector };
}
