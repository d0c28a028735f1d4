/**
 * Embed helpers shared by moderation commands and the audit log.
 */

import { EmbedBuilder } from "discord.js";
import { VIOLATION_LABELS, type ViolationRecord } from "../models/Violation.js";
import type { WarningRecord } from "../models/Warning.js";
import { ACTION_COLORS } from "./constants.js";

/** Discord allows 25 fields per embed */
const MAX_FIELDS = 25;

export function errorEmbed(message: string): EmbedBuilder {
  return new EmbedBuilder().setColor(ACTION_COLORS.ban).setTitle("❌ Error").setDescription(message);
}

export function successEmbed(title: string, description?: string): EmbedBuilder {
  const embed = new EmbedBuilder().setColor(ACTION_COLORS.unban).setTitle(`✅ ${title}`);
  return description ? embed.setDescription(description) : embed;
}

/** `<t:unix:R>` relative timestamp */
export function relativeTime(iso: string): string {
  return `<t:${Math.floor(Date.parse(iso) / 1000)}:R>`;
}

export function violationHistoryEmbed(userTag: string, records: readonly ViolationRecord[], tier: number): EmbedBuilder {
  const embed = new EmbedBuilder().setColor(ACTION_COLORS.escalation).setTitle(`Violation History for ${userTag}`);

  if (records.length === 0) {
    return embed.setDescription("No violations in the last 30 days.");
  }

  const newestFirst = [...records].reverse().slice(0, MAX_FIELDS);
  embed.addFields(
    newestFirst.map((record) => ({
      name: VIOLATION_LABELS[record.type],
      value: `Severity ${record.severity} • ${relativeTime(record.timestamp)}`,
    })),
  );
  return embed.setFooter({ text: `Total violations in last 30 days: ${records.length} • Tier ${tier}` });
}

export function warningHistoryEmbed(userTag: string, warnings: readonly WarningRecord[]): EmbedBuilder {
  const embed = new EmbedBuilder().setColor(ACTION_COLORS.warn).setTitle(`Warnings for ${userTag}`);

  if (warnings.length === 0) {
    return embed.setDescription("No warnings on record.");
  }

  const newestFirst = [...warnings].reverse().slice(0, MAX_FIELDS);
  embed.addFields(
    newestFirst.map((warning) => ({
      name: relativeTime(warning.timestamp),
      value: `${warning.reason}\nModerator: <@${warning.moderatorId}>`,
    })),
  );
  return embed.setFooter({ text: `Total warnings: ${warnings.length}` });
}
