/**
 * AuditLogService - Log channel configuration and delivery of moderation
 * events to the configured channel.
 */

import type { EmbedBuilder } from "discord.js";
import { createLogger } from "../../../src/core/Logger.js";
import { describeError } from "../../../src/core/errors.js";
import { guildKey } from "../../../src/core/locks/ResourceKey.js";
import type { LockRegistry } from "../../../src/core/locks/LockRegistry.js";
import { DocumentSlot, type LoadOutcome } from "../../../src/core/store/DocumentSlot.js";
import type { DocumentStore } from "../../../src/core/store/DocumentStore.js";
import type { ModerationGateway } from "../../moderation/services/ModerationGateway.js";
import { ModerationEventType, type ModerationEventBus } from "../../moderation/services/ModerationEventBus.js";
import type { ServiceResult } from "../../moderation/types/index.js";
import { LOG_CHANNELS_DOCUMENT, LogChannelType, LogChannelsDocumentSchema, type GuildLogChannels, type LogChannelsDocument } from "../models/LogChannels.js";
import { logChannelSetEmbed, modActionEmbed, sanctionAppliedEmbed, sanctionExpiredEmbed } from "../utils/embeds.js";

const log = createLogger("logging:audit");

export class AuditLogService {
  private slot: DocumentSlot<LogChannelsDocument>;

  constructor(
    store: DocumentStore,
    private readonly locks: LockRegistry,
    private readonly gateway: ModerationGateway,
  ) {
    this.slot = new DocumentSlot(store, {
      name: LOG_CHANNELS_DOCUMENT,
      schema: LogChannelsDocumentSchema,
      empty: () => ({}),
    });
  }

  load(): Promise<LoadOutcome> {
    return this.slot.load();
  }

  // ── Channel config ─────────────────────────────────────

  getChannels(guildId: string): GuildLogChannels {
    return { ...(this.slot.value[guildId] ?? {}) };
  }

  /** Every type falls back to the `all` channel */
  resolveChannel(guildId: string, type: LogChannelType): string | null {
    const channels = this.slot.value[guildId];
    if (!channels) return null;
    return channels[type] ?? channels.all ?? null;
  }

  /**
   * Point a log type at a channel. A confirmation is posted there first, so a
   * channel the bot cannot write to is never stored.
   */
  async setChannel(guildId: string, type: LogChannelType, channelId: string, setBy: string): Promise<ServiceResult> {
    try {
      await this.gateway.sendEmbed(guildId, channelId, logChannelSetEmbed(type, setBy).toJSON());
    } catch (error) {
      log.warn(`Could not post to log channel ${channelId} in guild ${guildId}: ${describeError(error)}`);
      return { success: false, error: `I cannot send messages in <#${channelId}>: ${describeError(error)}` };
    }

    return this.locks.withLock(guildKey(guildId), async () => {
      const previous = this.slot.value[guildId];
      this.slot.value[guildId] = { ...previous, [type]: channelId };
      try {
        await this.slot.save();
      } catch (error) {
        log.error(`Failed to save log channels for guild ${guildId}:`, error);
        if (previous) this.slot.value[guildId] = previous;
        else delete this.slot.value[guildId];
        return { success: false, error: "The log channel could not be saved." };
      }
      log.info(`Set ${type} log channel for guild ${guildId} to ${channelId}`);
      return { success: true };
    });
  }

  async clearChannel(guildId: string, type: LogChannelType): Promise<ServiceResult> {
    return this.locks.withLock(guildKey(guildId), async () => {
      const previous = this.slot.value[guildId];
      if (!previous?.[type]) return { success: false, error: `No ${type} log channel is set.` };

      const next: GuildLogChannels = { ...previous };
      delete next[type];
      if (Object.values(next).every((channelId) => channelId === undefined)) delete this.slot.value[guildId];
      else this.slot.value[guildId] = next;

      try {
        await this.slot.save();
      } catch (error) {
        log.error(`Failed to save log channels for guild ${guildId}:`, error);
        this.slot.value[guildId] = previous;
        return { success: false, error: "The log channel could not be saved." };
      }
      return { success: true };
    });
  }

  // ── Delivery ───────────────────────────────────────────

  /** Post an entry; returns false when no channel is set or sending failed */
  async send(guildId: string, type: LogChannelType, embed: EmbedBuilder): Promise<boolean> {
    const channelId = this.resolveChannel(guildId, type);
    if (!channelId) return false;

    try {
      await this.gateway.sendEmbed(guildId, channelId, embed.toJSON());
      return true;
    } catch (error) {
      log.warn(`Failed to send ${type} log entry to ${channelId} in guild ${guildId}: ${describeError(error)}`);
      return false;
    }
  }

  /** Forward moderation events to the audit log; returns an unsubscribe function */
  subscribe(bus: ModerationEventBus): () => void {
    const unsubscribers = [
      bus.on(ModerationEventType.SANCTION_APPLIED, async (payload) => {
        await this.send(payload.guildId, LogChannelType.MOD, sanctionAppliedEmbed(payload));
      }),
      bus.on(ModerationEventType.SANCTION_EXPIRED, async (payload) => {
        await this.send(payload.guildId, LogChannelType.MOD, sanctionExpiredEmbed(payload));
      }),
      bus.on(ModerationEventType.MOD_ACTION, async (payload) => {
        await this.send(payload.guildId, LogChannelType.MOD, modActionEmbed(payload));
      }),
    ];

    return () => {
      for (const unsubscribe of unsubscribers) unsubscribe();
    };
  }
}
