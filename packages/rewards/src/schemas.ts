/**
 * Zod schemas for webhook-delivered actions.
 *
 * Action metadata arrives loosely typed; it is checked here, at the
 * materialization boundary, before anything reaches storage.
 */

import { z } from "zod";
import type { ZodError } from "zod";

const ActionMetadataSchema = z
  .object({
    reward_value: z
      .number({
        required_error: "reward_value is required",
        invalid_type_error: "reward_value must be a number",
      })
      .finite()
      .positive(),
    reward_type: z.string().trim().min(1).max(64).optional(),
  })
  .passthrough();

export const TrackActionSchema = z.object({
  referral_code: z.string().trim().min(1).max(64),
  action_type: z.string().trim().min(1).max(64),
  metadata: ActionMetadataSchema,
});

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export function formatZodIssues(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
