/**
 * WarningService - audit trail of issued warnings, persisted as the
 * `warnings` document.
 */

import { DocumentSlot, type LoadOutcome } from "../../../src/core/store/DocumentSlot.js";
import type { DocumentStore } from "../../../src/core/store/DocumentStore.js";
import { WarningsDocumentSchema, type WarningRecord, type WarningsDocument } from "../models/Warning.js";
import { DOCUMENTS } from "../utils/constants.js";
import { systemClock, type Clock } from "../types/index.js";

export class WarningService {
  private slot: DocumentSlot<WarningsDocument>;

  constructor(
    store: DocumentStore,
    private readonly clock: Clock = systemClock,
  ) {
    this.slot = new DocumentSlot(store, {
      name: DOCUMENTS.WARNINGS,
      schema: WarningsDocumentSchema,
      empty: () => ({}),
    });
  }

  load(): Promise<LoadOutcome> {
    return this.slot.load();
  }

  /** Append without locking or saving; the caller holds the user's lock */
  append(guildId: string, userId: string, moderatorId: string, reason: string, now: number = this.clock()): WarningRecord {
    const record: WarningRecord = {
      guildId,
      userId,
      reason,
      moderatorId,
      timestamp: new Date(now).toISOString(),
    };

    const guild = (this.slot.value[guildId] ??= {});
    (guild[userId] ??= []).push(record);
    return record;
  }

  /** Oldest first */
  getWarnings(guildId: string, userId: string): WarningRecord[] {
    return [...(this.slot.value[guildId]?.[userId] ?? [])];
  }

  save(): Promise<void> {
    return this.slot.save();
  }
}
