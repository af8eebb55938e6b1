/**
 * SQLite schema for the rewards store.
 *
 * Tables:
 * - campaigns: referral programs
 * - referrals: one row per referrer per campaign, with a globally unique code
 * - rewards: compensation owed per tracked action
 *
 * Applied with CREATE ... IF NOT EXISTS every time a store opens.
 */

import type Database from "better-sqlite3";

const REWARDS_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS campaigns (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  reward_description TEXT NOT NULL,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS referrals (
  id TEXT PRIMARY KEY,
  campaign_id TEXT NOT NULL REFERENCES campaigns(id),
  referrer_email TEXT NOT NULL,
  code TEXT NOT NULL UNIQUE,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_referrals_campaign
  ON referrals(campaign_id);

CREATE TABLE IF NOT EXISTS rewards (
  id TEXT PRIMARY KEY,
  referral_id TEXT NOT NULL REFERENCES referrals(id),
  action_type TEXT NOT NULL,
  reward_type TEXT NOT NULL,
  reward_value REAL NOT NULL CHECK (reward_value > 0),
  status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'fulfilled')),
  metadata TEXT NOT NULL DEFAULT '{}',
  idempotency_key TEXT,
  fulfillment TEXT,
  created_at TEXT NOT NULL,
  fulfilled_at TEXT,
  -- NULL keys never collide, so keyless deliveries are not deduplicated
  UNIQUE (referral_id, idempotency_key)
);

CREATE INDEX IF NOT EXISTS idx_rewards_referral
  ON rewards(referral_id);
`;

export function applySchema(db: Database.Database): void {
  db.exec(REWARDS_SCHEMA_SQL);
}
