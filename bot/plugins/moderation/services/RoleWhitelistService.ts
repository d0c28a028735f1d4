/**
 * RoleWhitelistService - roles exempt from automod, persisted as the
 * `role_whitelist` document.
 */

import { createLogger } from "../../../src/core/Logger.js";
import { guildKey } from "../../../src/core/locks/ResourceKey.js";
import type { LockRegistry } from "../../../src/core/locks/LockRegistry.js";
import { DocumentSlot, type LoadOutcome } from "../../../src/core/store/DocumentSlot.js";
import type { DocumentStore } from "../../../src/core/store/DocumentStore.js";
import { RoleWhitelistDocumentSchema, type RoleWhitelistDocument } from "../models/RoleWhitelist.js";
import { DOCUMENTS } from "../utils/constants.js";
import type { ServiceResult } from "../types/index.js";

const log = createLogger("moderation:whitelist");

export class RoleWhitelistService {
  private slot: DocumentSlot<RoleWhitelistDocument>;

  constructor(
    store: DocumentStore,
    private readonly locks: LockRegistry,
  ) {
    this.slot = new DocumentSlot(store, {
      name: DOCUMENTS.ROLE_WHITELIST,
      schema: RoleWhitelistDocumentSchema,
      empty: () => ({}),
    });
  }

  load(): Promise<LoadOutcome> {
    return this.slot.load();
  }

  list(guildId: string): string[] {
    return [...(this.slot.value[guildId] ?? [])];
  }

  /** True when any of the member's roles is whitelisted */
  isWhitelisted(guildId: string, roleIds: readonly string[]): boolean {
    const whitelisted = this.slot.value[guildId];
    if (!whitelisted || whitelisted.length === 0) return false;
    return roleIds.some((roleId) => whitelisted.includes(roleId));
  }

  async add(guildId: string, roleId: string): Promise<ServiceResult> {
    return this.locks.withLock(guildKey(guildId), async () => {
      const current = this.slot.value[guildId] ?? [];
      if (current.includes(roleId)) return { success: false, error: "That role is already whitelisted." };

      this.slot.value[guildId] = [...current, roleId];
      return this.persist(guildId, current);
    });
  }

  async remove(guildId: string, roleId: string): Promise<ServiceResult> {
    return this.locks.withLock(guildKey(guildId), async () => {
      const current = this.slot.value[guildId] ?? [];
      if (!current.includes(roleId)) return { success: false, error: "That role is not whitelisted." };

      this.slot.value[guildId] = current.filter((id) => id !== roleId);
      return this.persist(guildId, current);
    });
  }

  private async persist(guildId: string, previous: string[]): Promise<ServiceResult> {
    try {
      await this.slot.save();
      return { success: true };
    } catch (error) {
      log.error(`Failed to save role whitelist for guild ${guildId}:`, error);
      this.slot.value[guildId] = previous;
      return { success: false, error: "The whitelist could not be saved." };
    }
  }
}
