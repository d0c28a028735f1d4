/**
 * ViolationLedger - append-only violation history per guild and user,
 * persisted as the `violations` document.
 *
 * Reads never remove records; expired entries only disappear in
 * `pruneExpired`, run by the retention sweep.
 */

import { createLogger } from "../../../src/core/Logger.js";
import { userKey } from "../../../src/core/locks/ResourceKey.js";
import type { LockRegistry } from "../../../src/core/locks/LockRegistry.js";
import { DocumentSlot, type LoadOutcome } from "../../../src/core/store/DocumentSlot.js";
import type { DocumentStore } from "../../../src/core/store/DocumentStore.js";
import { SeveritySchema, ViolationsDocumentSchema, type ViolationRecord, type ViolationsDocument, type ViolationType } from "../models/Violation.js";
import { ACTIVE_VIOLATION_WINDOW_MS, DOCUMENTS } from "../utils/constants.js";
import { tierForCount } from "../utils/punishment-tiers.js";
import { systemClock, type Clock } from "../types/index.js";

const log = createLogger("moderation:ledger");

/** Severities outside 1-5 or non-integers become 1 */
export function clampSeverity(severity: number): number {
  return SeveritySchema.safeParse(severity).success ? severity : 1;
}

export function isActive(record: ViolationRecord, now: number): boolean {
  return now - Date.parse(record.timestamp) < ACTIVE_VIOLATION_WINDOW_MS;
}

export class ViolationLedger {
  private slot: DocumentSlot<ViolationsDocument>;

  constructor(
    store: DocumentStore,
    private readonly locks: LockRegistry,
    private readonly clock: Clock = systemClock,
  ) {
    this.slot = new DocumentSlot(store, {
      name: DOCUMENTS.VIOLATIONS,
      schema: ViolationsDocumentSchema,
      empty: () => ({}),
    });
  }

  load(): Promise<LoadOutcome> {
    return this.slot.load();
  }

  /**
   * Append a record without locking or saving. The caller holds the user's
   * lock and saves at the end of its sequence.
   */
  append(guildId: string, userId: string, type: ViolationType, severity: number, now: number = this.clock()): ViolationRecord {
    const clamped = clampSeverity(severity);
    if (clamped !== severity) {
      log.warn(`Invalid severity ${severity} for ${type} (${guildId}/${userId}), using 1`);
    }

    const record: ViolationRecord = {
      guildId,
      userId,
      type,
      severity: clamped,
      timestamp: new Date(now).toISOString(),
    };

    const guild = (this.slot.value[guildId] ??= {});
    const records = (guild[userId] ??= []);
    records.push(record);
    return record;
  }

  /** Append and persist under the user's lock */
  async recordViolation(guildId: string, userId: string, type: ViolationType, severity: number): Promise<ViolationRecord> {
    return this.locks.withLock(userKey(guildId, userId), async () => {
      const record = this.append(guildId, userId, type, severity);
      await this.save();
      return record;
    });
  }

  /** Every stored record for the user, oldest first */
  allViolations(guildId: string, userId: string): ViolationRecord[] {
    return [...(this.slot.value[guildId]?.[userId] ?? [])];
  }

  activeViolations(guildId: string, userId: string, now: number = this.clock()): ViolationRecord[] {
    return this.allViolations(guildId, userId).filter((record) => isActive(record, now));
  }

  tierFor(guildId: string, userId: string, now: number = this.clock()): number {
    return tierForCount(this.activeViolations(guildId, userId, now).length);
  }

  /** Remove the user's history. Returns how many records were dropped. */
  async clearViolations(guildId: string, userId: string): Promise<number> {
    return this.locks.withLock(userKey(guildId, userId), async () => {
      const guild = this.slot.value[guildId];
      const removed = guild?.[userId]?.length ?? 0;
      if (!guild || removed === 0) return 0;

      delete guild[userId];
      if (Object.keys(guild).length === 0) delete this.slot.value[guildId];
      await this.save();
      log.info(`Cleared ${removed} violation(s) for ${guildId}/${userId}`);
      return removed;
    });
  }

  /**
   * Drop records outside the active window. Each user is pruned under their
   * own lock so the sweep never holds up more than one user at a time.
   */
  async pruneExpired(now: number = this.clock()): Promise<number> {
    let removed = 0;

    for (const [guildId, users] of Object.entries(this.slot.value)) {
      for (const userId of Object.keys(users)) {
        removed += await this.locks.withLock(userKey(guildId, userId), async () => {
          const guild = this.slot.value[guildId];
          const records = guild?.[userId];
          if (!guild || !records) return 0;

          const kept = records.filter((record) => isActive(record, now));
          const dropped = records.length - kept.length;
          if (dropped === 0) return 0;

          if (kept.length > 0) guild[userId] = kept;
          else delete guild[userId];
          if (Object.keys(guild).length === 0) delete this.slot.value[guildId];
          await this.save();
          return dropped;
        });
      }
    }

    if (removed > 0) log.info(`Pruned ${removed} expired violation record(s)`);
    return removed;
  }

  save(): Promise<void> {
    return this.slot.save();
  }
}
