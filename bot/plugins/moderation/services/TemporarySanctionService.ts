/**
 * TemporarySanctionService - registry of time-bounded bans and role grants,
 * persisted as the `temp_actions` document.
 *
 * Every change to an entry holds that entry's sanction lock through the save.
 */

import { createLogger } from "../../../src/core/Logger.js";
import { ValidationError } from "../../../src/core/errors.js";
import { sanctionKey } from "../../../src/core/locks/ResourceKey.js";
import type { LockRegistry } from "../../../src/core/locks/LockRegistry.js";
import { DocumentSlot, type LoadOutcome } from "../../../src/core/store/DocumentSlot.js";
import type { DocumentStore } from "../../../src/core/store/DocumentStore.js";
import {
  TemporarySanctionsDocumentSchema,
  temporaryBanKey,
  temporaryRoleKey,
  type TemporarySanction,
  type TemporarySanctionsDocument,
} from "../models/TemporarySanction.js";
import { DOCUMENTS } from "../utils/constants.js";
import { durationError } from "../utils/duration.js";
import { systemClock, type Clock } from "../types/index.js";

const log = createLogger("moderation:temp-sanctions");

export interface ScheduleSanctionInput {
  guildId: string;
  userId: string;
  durationMs: number;
  reason?: string;
  moderatorId?: string;
}

export class TemporarySanctionService {
  private slot: DocumentSlot<TemporarySanctionsDocument>;

  constructor(
    store: DocumentStore,
    private readonly locks: LockRegistry,
    private readonly clock: Clock = systemClock,
  ) {
    this.slot = new DocumentSlot(store, {
      name: DOCUMENTS.TEMP_ACTIONS,
      schema: TemporarySanctionsDocumentSchema,
      empty: () => ({}),
    });
  }

  load(): Promise<LoadOutcome> {
    return this.slot.load();
  }

  /** Track a temporary ban; re-banning replaces the expiry */
  async scheduleBan(input: ScheduleSanctionInput): Promise<TemporarySanction> {
    const now = this.clock();
    const expiresAt = expiryFor(now, input.durationMs);
    return this.put({
      action: "ban",
      key: temporaryBanKey(input.guildId, input.userId),
      guildId: input.guildId,
      userId: input.userId,
      expiresAt,
      createdAt: new Date(now).toISOString(),
      reason: input.reason,
      moderatorId: input.moderatorId,
    });
  }

  /** Track a temporary role grant; re-granting replaces the expiry */
  async scheduleRole(input: ScheduleSanctionInput & { roleId: string }): Promise<TemporarySanction> {
    const now = this.clock();
    const expiresAt = expiryFor(now, input.durationMs);
    return this.put({
      action: "role",
      key: temporaryRoleKey(input.guildId, input.userId, input.roleId),
      guildId: input.guildId,
      userId: input.userId,
      roleId: input.roleId,
      expiresAt,
      createdAt: new Date(now).toISOString(),
      reason: input.reason,
      moderatorId: input.moderatorId,
    });
  }

  get(key: string): TemporarySanction | undefined {
    return this.slot.value[key];
  }

  /** Entries with `expiresAt <= now`, soonest first */
  listExpired(now: number = this.clock()): TemporarySanction[] {
    return Object.values(this.slot.value)
      .filter((sanction) => Date.parse(sanction.expiresAt) <= now)
      .sort((a, b) => Date.parse(a.expiresAt) - Date.parse(b.expiresAt));
  }

  listForGuild(guildId: string): TemporarySanction[] {
    return Object.values(this.slot.value).filter((sanction) => sanction.guildId === guildId);
  }

  /** Stop tracking without reversing. Returns the removed entry, if any. */
  async cancel(key: string): Promise<TemporarySanction | undefined> {
    return this.locks.withLock(sanctionKey(key), async () => {
      const removed = this.removeUnlocked(key);
      if (removed) await this.save();
      return removed;
    });
  }

  /**
   * Delete without locking or saving; the caller holds the sanction lock
   */
  removeUnlocked(key: string): TemporarySanction | undefined {
    const existing = this.slot.value[key];
    if (existing) delete this.slot.value[key];
    return existing;
  }

  save(): Promise<void> {
    return this.slot.save();
  }

  private async put(sanction: TemporarySanction): Promise<TemporarySanction> {
    return this.locks.withLock(sanctionKey(sanction.key), async () => {
      const replaced = this.slot.value[sanction.key] !== undefined;
      this.slot.value[sanction.key] = sanction;
      await this.save();
      log.info(`${replaced ? "Updated" : "Scheduled"} temporary ${sanction.action} ${sanction.key} until ${sanction.expiresAt}`);
      return sanction;
    });
  }
}

function expiryFor(now: number, durationMs: number): string {
  const problem = durationError(durationMs, now);
  if (problem) throw new ValidationError(problem);
  return new Date(now + durationMs).toISOString();
}
