/**
 * @referral-rewards/rewards: Referral rewards domain core.
 *
 * Three pieces:
 * - Signatures: HMAC-SHA256 verification of webhook bodies
 * - Program: campaigns, referrals, reward materialization and fulfillment
 * - Store: better-sqlite3 persistence behind narrow store ports
 *
 * Design rules:
 * - Verification never touches the store
 * - Every store write is one atomic statement
 * - Fulfillment is one-way
 */

// Program
export {
  RewardProgram,
  DEFAULT_REWARD_TYPE,
  MAX_CODE_ATTEMPTS,
} from "./reward-program.js";
export type { RewardProgramConfig, WidgetSettings } from "./reward-program.js";

// Signatures
export {
  WebhookSignatureVerifier,
  signWebhookBody,
  SIGNATURE_HEX_LENGTH,
} from "./signature.js";
export type { SignatureCheck, SignatureRejection } from "./signature.js";

// Referral codes
export {
  generateReferralCode,
  normalizeReferralCode,
  REFERRAL_CODE_ALPHABET,
  REFERRAL_CODE_LENGTH,
} from "./referral-code.js";

// Errors
export { RewardError } from "./errors.js";
export type { RewardErrorCode } from "./errors.js";

// Schemas
export { formatZodIssues } from "./schemas.js";
export type { ValidationIssue } from "./schemas.js";

// Store
export { SqliteRewardsStore } from "./sqlite-store.js";

// Types
export type {
  CreateCampaignInput,
  CreateReferralInput,
  CreateRewardInput,
  TrackActionOptions,
  TrackActionResult,
  CampaignStore,
  ReferralStore,
  RewardStore,
  RewardsStore,
  InsertRewardResult,
} from "./types.js";
