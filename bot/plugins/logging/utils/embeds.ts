/**
 * Audit log embeds for moderation, member and message events.
 */

import { EmbedBuilder } from "discord.js";
import { VIOLATION_LABELS } from "../../moderation/models/Violation.js";
import type { ModActionPayload, SanctionAppliedPayload, SanctionExpiredPayload } from "../../moderation/services/ModerationEventBus.js";
import type { BanSnapshot, MemberSnapshot, MessageSnapshot } from "../services/LoggingEventService.js";
import { ACTION_COLORS, DEFAULT_REASON } from "../../moderation/utils/constants.js";
import { formatDuration } from "../../moderation/utils/duration.js";
import { actionLabel } from "../../moderation/utils/punishment-tiers.js";

export function sanctionAppliedEmbed(payload: SanctionAppliedPayload): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(ACTION_COLORS.escalation)
    .setTitle("🛡️ Auto-Moderation Action")
    .setDescription(`Action taken against <@${payload.userId}>`)
    .setTimestamp(payload.timestamp)
    .setFooter({ text: `User ID: ${payload.userId}` });

  embed.addFields(
    { name: "Violation", value: VIOLATION_LABELS[payload.violationType], inline: true },
    { name: "Action", value: actionLabel(payload.action), inline: true },
  );
  if (payload.durationMs !== undefined) {
    embed.addFields({ name: "Duration", value: formatDuration(payload.durationMs), inline: true });
  }
  embed.addFields(
    { name: "Tier", value: String(payload.tier), inline: true },
    { name: "Total Recent Violations", value: String(payload.activeCount), inline: true },
  );

  return embed;
}

export function sanctionExpiredEmbed(payload: SanctionExpiredPayload): EmbedBuilder {
  const { sanction } = payload;
  const description =
    sanction.action === "ban"
      ? `Temporary ban on <@${sanction.userId}> has ended`
      : `Temporary role <@&${sanction.roleId}> removed from <@${sanction.userId}>`;

  return new EmbedBuilder()
    .setColor(ACTION_COLORS.unban)
    .setTitle("⏱️ Temporary Sanction Expired")
    .setDescription(description)
    .addFields({ name: "Reversed", value: payload.reversed ? "Yes" : "No, the record was dropped" })
    .setTimestamp(payload.timestamp)
    .setFooter({ text: `User ID: ${payload.userId}` });
}

const MOD_ACTION_TITLES: Record<ModActionPayload["action"], string> = {
  kick: "👢 Member Kicked",
  ban: "🔨 Member Banned",
  temprole: "🎭 Temporary Role Granted",
  restrict: "🔇 Member Restricted",
};

const MOD_ACTION_COLORS: Record<ModActionPayload["action"], number> = {
  kick: ACTION_COLORS.kick,
  ban: ACTION_COLORS.ban,
  temprole: ACTION_COLORS.info,
  restrict: ACTION_COLORS.timeout,
};

export function modActionEmbed(payload: ModActionPayload): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(MOD_ACTION_COLORS[payload.action])
    .setTitle(MOD_ACTION_TITLES[payload.action])
    .setDescription(`<@${payload.userId}>`)
    .addFields({ name: "Moderator", value: `<@${payload.moderatorId}>`, inline: true })
    .setTimestamp(payload.timestamp)
    .setFooter({ text: `User ID: ${payload.userId}` });

  if (payload.roleId) embed.addFields({ name: "Role", value: `<@&${payload.roleId}>`, inline: true });
  if (payload.durationMs !== undefined) {
    embed.addFields({ name: "Duration", value: formatDuration(payload.durationMs), inline: true });
  }
  embed.addFields({ name: "Reason", value: payload.reason });

  return embed;
}

export function logChannelSetEmbed(logType: string, setBy: string): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(ACTION_COLORS.info)
    .setTitle("📝 Logging Channel Set")
    .setDescription(`This channel will now receive ${logType} logs`)
    .addFields({ name: "Log Type", value: logType, inline: true }, { name: "Set By", value: `<@${setBy}>`, inline: true });
}

// ── Member and message events ────────────────────────────

/** Discord's limit for an embed field value */
const FIELD_LIMIT = 1024;

export function truncateField(text: string, limit = FIELD_LIMIT): string {
  return text.length > limit ? `${text.substring(0, limit - 3)}...` : text;
}

const relative = (date: Date): string => `<t:${Math.floor(date.getTime() / 1000)}:R>`;

export function memberJoinEmbed(member: MemberSnapshot, timestamp: Date): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(ACTION_COLORS.unban)
    .setTitle("👋 Member Joined")
    .addFields(
      { name: "Member", value: `<@${member.userId}> (\`${member.userId}\`)`, inline: true },
      { name: "Account Created", value: relative(member.createdAt), inline: true },
    )
    .setTimestamp(timestamp)
    .setFooter({ text: `User ID: ${member.userId}` });

  if (member.avatarUrl) embed.setThumbnail(member.avatarUrl);
  return embed;
}

export function memberLeaveEmbed(member: MemberSnapshot, timestamp: Date): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(ACTION_COLORS.kick)
    .setTitle("👋 Member Left")
    .addFields(
      { name: "Member", value: `<@${member.userId}> (\`${member.userId}\`)`, inline: true },
      { name: "Joined Server", value: member.joinedAt ? relative(member.joinedAt) : "*Unknown*", inline: true },
    )
    .setTimestamp(timestamp)
    .setFooter({ text: `User ID: ${member.userId}` });

  if (member.roleIds.length > 0) {
    embed.addFields({ name: "Roles", value: truncateField(member.roleIds.map((id) => `<@&${id}>`).join(" ")) });
  }
  if (member.avatarUrl) embed.setThumbnail(member.avatarUrl);
  return embed;
}

function authorField(message: MessageSnapshot): string {
  return message.authorId ? `<@${message.authorId}> (\`${message.authorId}\`)` : "*Unknown*";
}

export function messageDeleteEmbed(message: MessageSnapshot, timestamp: Date): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(ACTION_COLORS.ban)
    .setTitle("🗑️ Message Deleted")
    .addFields(
      { name: "Author", value: authorField(message), inline: true },
      { name: "Channel", value: `<#${message.channelId}>`, inline: true },
      { name: "Message ID", value: message.messageId, inline: true },
    )
    .setTimestamp(timestamp);

  if (message.content === null) {
    embed.addFields({ name: "Content", value: "*Not available, the message was not cached*" });
  } else if (message.content) {
    embed.addFields({ name: "Content", value: truncateField(message.content) });
  }

  if (message.attachments.length > 0) {
    embed.addFields({
      name: `📎 Attachments (${message.attachments.length})`,
      value: truncateField(message.attachments.map((a) => `• [${a.name}](${a.url})`).join("\n")),
    });
  }

  if (message.authorId) embed.setFooter({ text: `User ID: ${message.authorId}` });
  return embed;
}

export function messageEditEmbed(before: MessageSnapshot, after: MessageSnapshot, timestamp: Date): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(ACTION_COLORS.automod)
    .setTitle("✏️ Message Edited")
    .addFields(
      { name: "Author", value: authorField(after), inline: true },
      { name: "Channel", value: `<#${after.channelId}>`, inline: true },
      { name: "Message ID", value: after.messageId, inline: true },
      { name: "Before", value: truncateField(before.content || "*Empty*") },
      { name: "After", value: truncateField(after.content || "*Empty*") },
    )
    .setTimestamp(timestamp);

  if (after.url) embed.setDescription(`[Jump to Message](${after.url})`);
  if (after.authorId) embed.setFooter({ text: `User ID: ${after.authorId}` });
  return embed;
}

export function banEmbed(ban: BanSnapshot, timestamp: Date): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(ACTION_COLORS.ban)
    .setTitle("🔨 Member Banned")
    .addFields(
      { name: "User", value: `${ban.tag} (<@${ban.userId}>)`, inline: true },
      { name: "Reason", value: truncateField(ban.reason ?? DEFAULT_REASON), inline: true },
    )
    .setTimestamp(timestamp)
    .setFooter({ text: `User ID: ${ban.userId}` });
}
