/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { RewardProgram } from "@referral-rewards/rewards";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the referral rewards app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Program bound to the app's store (set by the app factory) */
    program: RewardProgram;

    /** Authentication context (set by auth middleware when keys are configured) */
    auth: AuthContext;

    /** Raw webhook body, set once its signature has been verified */
    webhookBody: string;
  };
}
