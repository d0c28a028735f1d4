/**
 * AppealService - stores member appeals, persisted as the `appeals` document.
 * At most one pending appeal per member per guild; review is up to moderators.
 */

import { nanoid } from "nanoid";
import { createLogger } from "../../../src/core/Logger.js";
import { guildKey } from "../../../src/core/locks/ResourceKey.js";
import type { LockRegistry } from "../../../src/core/locks/LockRegistry.js";
import { DocumentSlot, type LoadOutcome } from "../../../src/core/store/DocumentSlot.js";
import type { DocumentStore } from "../../../src/core/store/DocumentStore.js";
import { AppealsDocumentSchema, AppealStatus, type Appeal, type AppealsDocument } from "../models/Appeal.js";
import { DOCUMENTS, MAX_REASON_LENGTH } from "../utils/constants.js";
import { systemClock, type Clock, type ServiceResult } from "../types/index.js";

const log = createLogger("moderation:appeals");

export class AppealService {
  private slot: DocumentSlot<AppealsDocument>;

  constructor(
    store: DocumentStore,
    private readonly locks: LockRegistry,
    private readonly idLength = 12,
    private readonly clock: Clock = systemClock,
  ) {
    this.slot = new DocumentSlot(store, {
      name: DOCUMENTS.APPEALS,
      schema: AppealsDocumentSchema,
      empty: () => ({}),
    });
  }

  load(): Promise<LoadOutcome> {
    return this.slot.load();
  }

  async submit(guildId: string, userId: string, reason: string): Promise<ServiceResult<{ appeal: Appeal }>> {
    const trimmed = reason.trim();
    if (!trimmed) return { success: false, error: "Please explain why the sanction should be lifted." };
    if (trimmed.length > MAX_REASON_LENGTH) {
      return { success: false, error: `The appeal must be at most ${MAX_REASON_LENGTH} characters.` };
    }

    return this.locks.withLock(guildKey(guildId), async () => {
      const appeals = this.slot.value[guildId] ?? [];
      if (appeals.some((appeal) => appeal.userId === userId && appeal.status === AppealStatus.PENDING)) {
        return { success: false, error: "You already have a pending appeal." };
      }

      const appeal: Appeal = {
        id: nanoid(this.idLength),
        guildId,
        userId,
        reason: trimmed,
        status: AppealStatus.PENDING,
        createdAt: new Date(this.clock()).toISOString(),
      };

      this.slot.value[guildId] = [...appeals, appeal];
      try {
        await this.slot.save();
      } catch (error) {
        log.error(`Failed to save appeal for ${guildId}/${userId}:`, error);
        this.slot.value[guildId] = appeals;
        return { success: false, error: "Your appeal could not be saved." };
      }

      log.info(`Appeal ${appeal.id} submitted by ${userId} in ${guildId}`);
      return { success: true, appeal };
    });
  }

  /** Oldest first, optionally filtered by status */
  list(guildId: string, status?: AppealStatus): Appeal[] {
    const appeals = this.slot.value[guildId] ?? [];
    return status ? appeals.filter((appeal) => appeal.status === status) : [...appeals];
  }

  async setStatus(guildId: string, appealId: string, status: AppealStatus.APPROVED | AppealStatus.DENIED, reviewerId: string): Promise<ServiceResult<{ appeal: Appeal }>> {
    return this.locks.withLock(guildKey(guildId), async () => {
      const appeals = this.slot.value[guildId] ?? [];
      const existing = appeals.find((appeal) => appeal.id === appealId);
      if (!existing) return { success: false, error: `No appeal with id \`${appealId}\`.` };
      if (existing.status !== AppealStatus.PENDING) return { success: false, error: `That appeal was already ${existing.status}.` };

      const updated: Appeal = { ...existing, status, reviewedBy: reviewerId, reviewedAt: new Date(this.clock()).toISOString() };
      this.slot.value[guildId] = appeals.map((appeal) => (appeal.id === appealId ? updated : appeal));
      try {
        await this.slot.save();
      } catch (error) {
        log.error(`Failed to save appeal ${appealId}:`, error);
        this.slot.value[guildId] = appeals;
        return { success: false, error: "The appeal could not be updated." };
      }
      return { success: true, appeal: updated };
    });
  }
}
