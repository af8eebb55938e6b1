/**
 * @referral-rewards/node: HTTP service for referral campaigns.
 *
 * Package public API. The server itself starts from main.ts.
 */

export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp, DEFAULT_WIDGET_SETTINGS, MAX_ACTION_TYPE_SERIES } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export {
  presentCampaign,
  presentReferral,
  presentReward,
  presentWidgetConfig,
} from "./presenters.js";
export type {
  CampaignResponse,
  ReferralResponse,
  RewardResponse,
  WidgetConfigResponse,
  TrackActionResponse,
} from "./presenters.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
