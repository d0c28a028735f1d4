/**
 * LoggingEventService - Member and message activity for the audit log.
 *
 * Event handlers convert discord.js objects into the snapshots below, so this
 * service never touches a partial structure.
 */

import type { GuildBan, GuildMember, Message, PartialGuildMember, PartialMessage } from "discord.js";
import { createLogger } from "../../../src/core/Logger.js";
import { LogChannelType } from "../models/LogChannels.js";
import type { AuditLogService } from "./AuditLogService.js";
import { banEmbed, memberJoinEmbed, memberLeaveEmbed, messageDeleteEmbed, messageEditEmbed } from "../utils/embeds.js";

const log = createLogger("logging:events");

export interface MemberSnapshot {
  guildId: string;
  userId: string;
  tag: string;
  avatarUrl?: string;
  createdAt: Date;
  joinedAt: Date | null;
  roleIds: string[];
}

export interface MessageSnapshot {
  guildId: string;
  channelId: string;
  messageId: string;
  authorId: string | null;
  authorBot: boolean;
  /** null when the message was not cached */
  content: string | null;
  attachments: { name: string; url: string }[];
  url?: string;
}

export interface BanSnapshot {
  guildId: string;
  userId: string;
  tag: string;
  reason: string | null;
}

// ── Conversion ───────────────────────────────────────────

export function toMemberSnapshot(member: GuildMember | PartialGuildMember): MemberSnapshot {
  return {
    guildId: member.guild.id,
    userId: member.id,
    tag: member.user.tag,
    avatarUrl: member.user.displayAvatarURL(),
    createdAt: member.user.createdAt,
    joinedAt: member.joinedAt,
    // The @everyone role shares the guild's id
    roleIds: [...member.roles.cache.keys()].filter((id) => id !== member.guild.id),
  };
}

/** Null for messages outside a guild */
export function toMessageSnapshot(message: Message | PartialMessage): MessageSnapshot | null {
  if (!message.guildId) return null;
  return {
    guildId: message.guildId,
    channelId: message.channelId,
    messageId: message.id,
    authorId: message.author?.id ?? null,
    authorBot: message.author?.bot ?? false,
    content: message.content,
    attachments: message.attachments.map((attachment) => ({ name: attachment.name, url: attachment.url })),
    url: message.url,
  };
}

export function toBanSnapshot(ban: GuildBan): BanSnapshot {
  return { guildId: ban.guild.id, userId: ban.user.id, tag: ban.user.tag, reason: ban.reason ?? null };
}

// ── Service ──────────────────────────────────────────────

export class LoggingEventService {
  constructor(
    private readonly auditLog: AuditLogService,
    private readonly clock: () => number = Date.now,
  ) {}

  async handleMemberJoin(member: MemberSnapshot): Promise<boolean> {
    return this.auditLog.send(member.guildId, LogChannelType.MEMBER, memberJoinEmbed(member, this.now()));
  }

  async handleMemberLeave(member: MemberSnapshot): Promise<boolean> {
    return this.auditLog.send(member.guildId, LogChannelType.MEMBER, memberLeaveEmbed(member, this.now()));
  }

  async handleMessageDelete(message: MessageSnapshot): Promise<boolean> {
    if (message.authorBot) return false;
    return this.auditLog.send(message.guildId, LogChannelType.MESSAGE, messageDeleteEmbed(message, this.now()));
  }

  /** Embed-only updates (link previews) leave the content unchanged and are skipped */
  async handleMessageUpdate(before: MessageSnapshot, after: MessageSnapshot): Promise<boolean> {
    if (after.authorBot) return false;
    if (before.content === after.content) {
      log.debug(`Skipping update of message ${after.messageId}: content unchanged`);
      return false;
    }
    return this.auditLog.send(after.guildId, LogChannelType.MESSAGE, messageEditEmbed(before, after, this.now()));
  }

  async handleBanAdd(ban: BanSnapshot): Promise<boolean> {
    return this.auditLog.send(ban.guildId, LogChannelType.MOD, banEmbed(ban, this.now()));
  }

  private now(): Date {
    return new Date(this.clock());
  }
}
