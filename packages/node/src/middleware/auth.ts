/**
 * Authentication middleware.
 *
 * Management routes take an API key via the X-Api-Key header, looked
 * up in the configured key registry. Reads need the `read` permission,
 * anything else needs `write`.
 *
 * On success, sets `c.set("auth", authContext)`.
 * On failure, returns 401 or 403.
 */

import type { Context, MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Build an AuthConfig from parsed key records.
 */
export function createAuthConfig(records: readonly ApiKeyRecord[]): AuthConfig {
  return { apiKeys: new Map(records.map((record) => [record.key, record])) };
}

/**
 * Resolve the caller from the X-Api-Key header.
 *
 * @returns The auth context, or a 401 response.
 */
function authenticate(c: Context<AppEnv>, config: AuthConfig): AuthContext | Response {
  const apiKey = c.req.header(API_KEY_HEADER);
  if (apiKey === undefined) {
    return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
  }

  const record = config.apiKeys.get(apiKey);
  if (record === undefined) {
    return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
  }

  return { type: "api-key", identity: record.key, role: record.role };
}

const READ_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

/**
 * The permission a request needs, judged by its method.
 */
export function permissionForMethod(method: string): Permission {
  return READ_METHODS.has(method.toUpperCase()) ? "read" : "write";
}

/**
 * @returns A 403 response when the role lacks the permission the method needs.
 */
function authorize(c: Context<AppEnv>, auth: AuthContext): Response | undefined {
  const permission = permissionForMethod(c.req.method);
  if (hasPermission(auth.role, permission)) {
    return undefined;
  }
  return c.json(
    createErrorEnvelope("FORBIDDEN", `Role '${auth.role}' lacks '${permission}' permission`),
    403,
  );
}

// =============================================================================
// Management Scope
// =============================================================================

/** Route prefixes that require an API key when keys are configured */
export const MANAGEMENT_PREFIXES: readonly string[] = [
  "/api/campaigns",
  "/api/referrals",
  "/api/rewards",
];

export function isManagementPath(path: string): boolean {
  return MANAGEMENT_PREFIXES.some(
    (prefix) => path === prefix || path.startsWith(`${prefix}/`),
  );
}

/**
 * Auth plus permission guard, applied to management paths only.
 *
 * The webhook (signed) and widget (public) routes pass straight through.
 */
export function managementAuthMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (!isManagementPath(c.req.path)) {
      await next();
      return;
    }

    const auth = authenticate(c, config);
    if (auth instanceof Response) {
      return auth;
    }
    const denied = authorize(c, auth);
    if (denied !== undefined) {
      return denied;
    }

    c.set("auth", auth);
    await next();
  };
}
