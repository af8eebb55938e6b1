/**
 * SqliteRewardsStore: better-sqlite3 implementation of the store ports.
 *
 * Every write is one SQL statement:
 * - referral codes are claimed with INSERT ... ON CONFLICT(code) DO NOTHING
 * - webhook redeliveries are absorbed by the (referral_id, idempotency_key)
 *   unique constraint
 * - fulfillment is a single UPDATE guarded by status = 'pending'
 *
 * Pass ":memory:" to `open` for an in-process database.
 */

import Database from "better-sqlite3";
import { isRecord, isRewardStatus } from "@referral-rewards/types";
import type {
  Campaign,
  FulfillmentDetails,
  Referral,
  Reward,
} from "@referral-rewards/types";
import { applySchema } from "./sqlite-schema.js";
import type { InsertRewardResult, RewardsStore } from "./types.js";

// =============================================================================
// Row Types
// =============================================================================

interface CampaignRow {
  id: string;
  name: string;
  reward_description: string;
  created_at: string;
}

interface ReferralRow {
  id: string;
  campaign_id: string;
  referrer_email: string;
  code: string;
  created_at: string;
}

interface RewardRow {
  id: string;
  referral_id: string;
  action_type: string;
  reward_type: string;
  reward_value: number;
  status: string;
  metadata: string;
  idempotency_key: string | null;
  fulfillment: string | null;
  created_at: string;
  fulfilled_at: string | null;
}

interface RewardParams {
  id: string;
  referral_id: string;
  action_type: string;
  reward_type: string;
  reward_value: number;
  status: string;
  metadata: string;
  idempotency_key: string | null;
  fulfillment: string | null;
  created_at: string;
  fulfilled_at: string | null;
}

// =============================================================================
// Row Mapping
// =============================================================================

function parseJsonObject(
  text: string,
  column: string,
  id: string,
): Record<string, unknown> {
  const parsed: unknown = JSON.parse(text);
  if (!isRecord(parsed)) {
    throw new Error(`Reward '${id}' has a non-object ${column} column`);
  }
  return parsed;
}

function rowToCampaign(row: CampaignRow): Campaign {
  return {
    id: row.id,
    name: row.name,
    rewardDescription: row.reward_description,
    createdAt: row.created_at,
  };
}

function rowToReferral(row: ReferralRow): Referral {
  return {
    id: row.id,
    campaignId: row.campaign_id,
    referrerEmail: row.referrer_email,
    code: row.code,
    createdAt: row.created_at,
  };
}

function rowToReward(row: RewardRow): Reward {
  if (!isRewardStatus(row.status)) {
    throw new Error(`Reward '${row.id}' has unknown status '${row.status}'`);
  }
  return {
    id: row.id,
    referralId: row.referral_id,
    actionType: row.action_type,
    rewardType: row.reward_type,
    rewardValue: row.reward_value,
    status: row.status,
    metadata: parseJsonObject(row.metadata, "metadata", row.id),
    idempotencyKey: row.idempotency_key,
    fulfillment:
      row.fulfillment === null
        ? null
        : parseJsonObject(row.fulfillment, "fulfillment", row.id),
    createdAt: row.created_at,
    fulfilledAt: row.fulfilled_at,
  };
}

function rewardToParams(reward: Reward): RewardParams {
  return {
    id: reward.id,
    referral_id: reward.referralId,
    action_type: reward.actionType,
    reward_type: reward.rewardType,
    reward_value: reward.rewardValue,
    status: reward.status,
    metadata: JSON.stringify(reward.metadata),
    idempotency_key: reward.idempotencyKey,
    fulfillment: reward.fulfillment === null ? null : JSON.stringify(reward.fulfillment),
    created_at: reward.createdAt,
    fulfilled_at: reward.fulfilledAt,
  };
}

// =============================================================================
// Store
// =============================================================================

export class SqliteRewardsStore implements RewardsStore {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    applySchema(this.db);
  }

  /**
   * Open (or create) a database file and prepare it for use.
   */
  static open(filename: string): SqliteRewardsStore {
    const db = new Database(filename);
    db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");
    return new SqliteRewardsStore(db);
  }

  // ─── Campaigns ─────────────────────────────────────────────────────

  insertCampaign(campaign: Campaign): void {
    this.db
      .prepare<[string, string, string, string]>(
        `INSERT INTO campaigns (id, name, reward_description, created_at)
         VALUES (?, ?, ?, ?)`,
      )
      .run(campaign.id, campaign.name, campaign.rewardDescription, campaign.createdAt);
  }

  findCampaign(id: string): Campaign | undefined {
    const row = this.db
      .prepare<[string], CampaignRow>("SELECT * FROM campaigns WHERE id = ?")
      .get(id);
    return row === undefined ? undefined : rowToCampaign(row);
  }

  listCampaigns(): readonly Campaign[] {
    return this.db
      .prepare<[], CampaignRow>("SELECT * FROM campaigns ORDER BY created_at, id")
      .all()
      .map(rowToCampaign);
  }

  // ─── Referrals ─────────────────────────────────────────────────────

  insertReferral(referral: Referral): boolean {
    const info = this.db
      .prepare<[string, string, string, string, string]>(
        `INSERT INTO referrals (id, campaign_id, referrer_email, code, created_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT (code) DO NOTHING`,
      )
      .run(
        referral.id,
        referral.campaignId,
        referral.referrerEmail,
        referral.code,
        referral.createdAt,
      );
    return info.changes === 1;
  }

  findReferral(id: string): Referral | undefined {
    const row = this.db
      .prepare<[string], ReferralRow>("SELECT * FROM referrals WHERE id = ?")
      .get(id);
    return row === undefined ? undefined : rowToReferral(row);
  }

  findReferralByCode(code: string): Referral | undefined {
    const row = this.db
      .prepare<[string], ReferralRow>("SELECT * FROM referrals WHERE code = ?")
      .get(code);
    return row === undefined ? undefined : rowToReferral(row);
  }

  listReferralsByCampaign(campaignId: string): readonly Referral[] {
    return this.db
      .prepare<[string], ReferralRow>(
        "SELECT * FROM referrals WHERE campaign_id = ? ORDER BY created_at, id",
      )
      .all(campaignId)
      .map(rowToReferral);
  }

  // ─── Rewards ───────────────────────────────────────────────────────

  insertReward(reward: Reward): InsertRewardResult {
    const inserted = this.db
      .prepare<RewardParams, RewardRow>(
        `INSERT INTO rewards (
           id, referral_id, action_type, reward_type, reward_value, status,
           metadata, idempotency_key, fulfillment, created_at, fulfilled_at
         ) VALUES (
           @id, @referral_id, @action_type, @reward_type, @reward_value, @status,
           @metadata, @idempotency_key, @fulfillment, @created_at, @fulfilled_at
         )
         ON CONFLICT (referral_id, idempotency_key) DO NOTHING
         RETURNING *`,
      )
      .get(rewardToParams(reward));

    if (inserted !== undefined) {
      return { reward: rowToReward(inserted), created: true };
    }

    // Only a non-null idempotency key can conflict
    const existing = this.db
      .prepare<[string, string | null], RewardRow>(
        "SELECT * FROM rewards WHERE referral_id = ? AND idempotency_key = ?",
      )
      .get(reward.referralId, reward.idempotencyKey);
    if (existing === undefined) {
      throw new Error(`Reward '${reward.id}' was neither inserted nor found`);
    }
    return { reward: rowToReward(existing), created: false };
  }

  findReward(id: string): Reward | undefined {
    const row = this.db
      .prepare<[string], RewardRow>("SELECT * FROM rewards WHERE id = ?")
      .get(id);
    return row === undefined ? undefined : rowToReward(row);
  }

  listRewardsByReferral(referralId: string): readonly Reward[] {
    return this.db
      .prepare<[string], RewardRow>(
        "SELECT * FROM rewards WHERE referral_id = ? ORDER BY created_at, id",
      )
      .all(referralId)
      .map(rowToReward);
  }

  markFulfilled(
    id: string,
    fulfillment: FulfillmentDetails,
    fulfilledAt: string,
  ): Reward | undefined {
    const row = this.db
      .prepare<[string, string, string], RewardRow>(
        `UPDATE rewards
         SET status = 'fulfilled', fulfillment = ?, fulfilled_at = ?
         WHERE id = ? AND status = 'pending'
         RETURNING *`,
      )
      .get(JSON.stringify(fulfillment), fulfilledAt, id);
    return row === undefined ? undefined : rowToReward(row);
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  ping(): boolean {
    if (!this.db.open) {
      return false;
    }
    const row = this.db.prepare<[], { ok: number }>("SELECT 1 AS ok").get();
    return row?.ok === 1;
  }

  close(): void {
    this.db.close();
  }
}
