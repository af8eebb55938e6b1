/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createMetricsRoute, PROMETHEUS_CONTENT_TYPE } from "./metrics.js";
export { createCampaignRoutes } from "./campaigns.js";
export { createReferralRoutes } from "./referrals.js";
export { createRewardRoutes } from "./rewards.js";
export type { RewardRouteDeps } from "./rewards.js";
export { createWebhookRoutes, IDEMPOTENCY_HEADER } from "./webhooks.js";
export type { WebhookRouteDeps } from "./webhooks.js";
export { createWidgetRoutes } from "./widget.js";
export { respondWithPage } from "./list.js";
