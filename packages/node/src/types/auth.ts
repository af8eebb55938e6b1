/**
 * Authentication and authorization types.
 *
 * Management routes accept an API key via the X-Api-Key header.
 *
 * Role hierarchy: admin > viewer
 */

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "viewer";

/** Permission levels for role-based access control */
export type Permission = "read" | "write";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  admin: ["read", "write"],
};

/**
 * Check whether a role has a specific permission.
 */
export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key";
  readonly identity: string;
  readonly role: Role;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
}
