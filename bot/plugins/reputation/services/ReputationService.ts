/**
 * ReputationService - member reputation points, persisted as the
 * `reputation` document.
 *
 * Points never go below zero and the level is recomputed on every change.
 * Sanctioned violations cost 10 points per severity point.
 */

import { createLogger } from "../../../src/core/Logger.js";
import { userKey } from "../../../src/core/locks/ResourceKey.js";
import type { LockRegistry } from "../../../src/core/locks/LockRegistry.js";
import { DocumentSlot, type LoadOutcome } from "../../../src/core/store/DocumentSlot.js";
import type { DocumentStore } from "../../../src/core/store/DocumentStore.js";
import { ModerationEventType, type ModerationEventBus } from "../../moderation/services/ModerationEventBus.js";
import { systemClock, type Clock, type ServiceResult } from "../../moderation/types/index.js";
import { REPUTATION_DOCUMENT, ReputationDocumentSchema, type ReputationDocument, type UserReputation } from "../models/Reputation.js";
import { calculateLevel } from "../utils/levels.js";

const log = createLogger("reputation:service");

/** Reputation points removed per severity point of a sanctioned violation */
export const PENALTY_PER_SEVERITY = 10;

/** Points granted by /giverep */
export const GIVE_AMOUNT = 10;

/** A member can reward the same member once per this period */
export const GIVE_COOLDOWN_MS = 12 * 60 * 60 * 1000;

/** History entries older than this are trimmed */
export const HISTORY_RETENTION_MS = 30 * 24 * 60 * 60 * 1000;

const MIN_GIVE_REASON_LENGTH = 3;

export interface PointsUpdate {
  previousPoints: number;
  points: number;
  level: number;
  levelChanged: boolean;
}

export interface LeaderboardEntry {
  userId: string;
  points: number;
  level: number;
}

export class ReputationService {
  private slot: DocumentSlot<ReputationDocument>;
  /** `guild:giver:target` → last time the giver rewarded the target */
  private lastGiven = new Map<string, number>();

  constructor(
    store: DocumentStore,
    private readonly locks: LockRegistry,
    private readonly clock: Clock = systemClock,
  ) {
    this.slot = new DocumentSlot(store, {
      name: REPUTATION_DOCUMENT,
      schema: ReputationDocumentSchema,
      empty: () => ({}),
    });
  }

  load(): Promise<LoadOutcome> {
    return this.slot.load();
  }

  /** Stored reputation, or a fresh level-1 record for unknown members */
  getReputation(guildId: string, userId: string): UserReputation {
    const stored = this.slot.value[guildId]?.[userId];
    if (!stored) return { points: 0, level: 1, history: [] };
    return { ...stored, history: [...stored.history] };
  }

  // ── Point changes ──────────────────────────────────────

  async updatePoints(guildId: string, userId: string, change: number, reason: string): Promise<PointsUpdate> {
    return this.locks.withLock(userKey(guildId, userId), async () => {
      const now = this.clock();
      const guild = (this.slot.value[guildId] ??= {});
      const data = (guild[userId] ??= { points: 0, level: 1, history: [] });

      const previousPoints = data.points;
      const previousLevel = data.level;
      data.points = Math.max(0, Math.trunc(previousPoints + change));
      data.level = calculateLevel(data.points);
      data.history.push({
        change: Math.trunc(change),
        previousPoints,
        newPoints: data.points,
        reason,
        timestamp: new Date(now).toISOString(),
      });
      data.history = data.history.filter((entry) => now - Date.parse(entry.timestamp) < HISTORY_RETENTION_MS);

      await this.slot.save();

      if (data.level !== previousLevel) {
        log.info(`${guildId}/${userId} moved from level ${previousLevel} to ${data.level}`);
      }
      return { previousPoints, points: data.points, level: data.level, levelChanged: data.level !== previousLevel };
    });
  }

  /** Member-to-member reward, limited by a per-pair cooldown */
  async giveReputation(
    guildId: string,
    giverId: string,
    target: { id: string; bot: boolean },
    reason: string,
    giverName: string,
  ): Promise<ServiceResult<{ update: PointsUpdate }>> {
    if (target.id === giverId) return { success: false, error: "You cannot give reputation to yourself!" };
    if (target.bot) return { success: false, error: "You cannot give reputation to bots!" };

    const trimmed = reason.trim();
    if (trimmed.length < MIN_GIVE_REASON_LENGTH) {
      return { success: false, error: `Please provide a valid reason (at least ${MIN_GIVE_REASON_LENGTH} characters)` };
    }

    const cooldownKey = `${guildId}:${giverId}:${target.id}`;
    const now = this.clock();
    const last = this.lastGiven.get(cooldownKey);
    if (last !== undefined && now - last < GIVE_COOLDOWN_MS) {
      const minutes = Math.floor((GIVE_COOLDOWN_MS - (now - last)) / 60_000);
      return { success: false, error: `You can give reputation to this user again in ${minutes} minutes` };
    }

    this.lastGiven.set(cooldownKey, now);
    const update = await this.updatePoints(guildId, target.id, GIVE_AMOUNT, `Received from ${giverName}: ${trimmed}`);
    return { success: true, update };
  }

  /** Highest points first */
  leaderboard(guildId: string, limit = 10): LeaderboardEntry[] {
    return Object.entries(this.slot.value[guildId] ?? {})
      .map(([userId, data]) => ({ userId, points: data.points, level: data.level }))
      .sort((a, b) => b.points - a.points)
      .slice(0, limit);
  }

  // ── Maintenance ────────────────────────────────────────

  /** Drop history entries outside the retention window; returns how many */
  async trimHistory(now: number = this.clock()): Promise<number> {
    let removed = 0;

    for (const [guildId, users] of Object.entries(this.slot.value)) {
      for (const userId of Object.keys(users)) {
        removed += await this.locks.withLock(userKey(guildId, userId), async () => {
          const data = this.slot.value[guildId]?.[userId];
          if (!data) return 0;

          const kept = data.history.filter((entry) => now - Date.parse(entry.timestamp) < HISTORY_RETENTION_MS);
          const dropped = data.history.length - kept.length;
          if (dropped === 0) return 0;

          data.history = kept;
          await this.slot.save();
          return dropped;
        });
      }
    }

    for (const [key, given] of this.lastGiven) {
      if (now - given >= GIVE_COOLDOWN_MS) this.lastGiven.delete(key);
    }

    if (removed > 0) log.info(`Trimmed ${removed} reputation history entries`);
    return removed;
  }

  /** Deduct points for every applied sanction; returns an unsubscribe function */
  subscribe(bus: ModerationEventBus): () => void {
    return bus.on(ModerationEventType.SANCTION_APPLIED, async (payload) => {
      await this.updatePoints(payload.guildId, payload.userId, -PENALTY_PER_SEVERITY * payload.severity, `Violation: ${payload.violationType}`);
    });
  }
}
