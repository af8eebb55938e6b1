/**
 * Domain errors for the rewards core.
 *
 * Every failure carries a machine-readable code; the HTTP layer
 * maps codes to status codes.
 */

export type RewardErrorCode =
  | "VALIDATION_FAILED"
  | "CAMPAIGN_NOT_FOUND"
  | "REFERRAL_NOT_FOUND"
  | "REWARD_NOT_FOUND"
  | "INVALID_TRANSITION"
  | "CODE_GENERATION_FAILED";

export class RewardError extends Error {
  public readonly code: RewardErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: RewardErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "RewardError";
    this.code = code;
    this.details = details;
  }
}
