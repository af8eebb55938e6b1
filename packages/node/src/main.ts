/**
 * @referral-rewards/node: Entry point.
 *
 * Bootstraps the Hono app, loads config, opens the database, starts
 * the HTTP server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { SqliteRewardsStore } from "@referral-rewards/rewards";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import { createAuthConfig } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // Build auth config from env vars
  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    authConfig = createAuthConfig(parsedKeys);
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured, management routes are unsecured");
  }

  const store = SqliteRewardsStore.open(config.DATABASE_PATH);
  logger.info({ databasePath: config.DATABASE_PATH }, "Database opened");

  const { app, program } = createApp({
    store,
    webhookSecret: config.WEBHOOK_SECRET,
    widget: {
      primaryColor: config.WIDGET_PRIMARY_COLOR,
      apiBaseUrl: config.PUBLIC_BASE_URL,
    },
    logger,
    auth: authConfig,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST },
    "Referral rewards service started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "HTTP server did not close cleanly");
      }
      program.close();
      logger.info("Shutdown complete");
      process.exit(err === undefined ? 0 : 1);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
