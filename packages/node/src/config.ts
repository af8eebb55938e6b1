/**
 * @referral-rewards/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { ApiKeyRecord, Role } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Storage
  DATABASE_PATH: z.string().min(1).default("referral-rewards.db"),

  // Webhooks: unset means every delivery is rejected
  WEBHOOK_SECRET: z
    .string()
    .refine((value) => value.trim().length > 0, "Must not be blank")
    .optional(),

  // Auth
  API_KEYS: z.string().default(""),

  // Widget
  WIDGET_PRIMARY_COLOR: z
    .string()
    .regex(/^#[0-9a-fA-F]{6}$/, "Must be a #rrggbb colour")
    .default("#6366f1"),
  PUBLIC_BASE_URL: z.string().url().default("http://localhost:8000"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export type ParsedApiKey = ApiKeyRecord;

function isRole(value: string): value is Role {
  return value === "admin" || value === "viewer";
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1,key2:role2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role] = parts;
    if (parts.length !== 2 || key === undefined || role === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(`Invalid role "${role}" in API_KEYS. Must be: admin or viewer`);
    }

    keys.push({ key, role });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
