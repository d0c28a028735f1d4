/**
 * /warn <user> [reason] - Warn a member. The warning also counts as a
 * violation and may escalate.
 */

import { EmbedBuilder, PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import type { CommandContext } from "../../../src/core/CommandManager.js";
import { ACTION_COLORS, MAX_REASON_LENGTH, MOD_COMMAND_COOLDOWN_SECONDS } from "../utils/constants.js";
import { actionLabel } from "../utils/punishment-tiers.js";
import { formatDuration } from "../utils/duration.js";
import { errorEmbed } from "../utils/embeds.js";

export const data = new SlashCommandBuilder()
  .setName("warn")
  .setDescription("Warn a member and record a violation")
  .setDefaultMemberPermissions(PermissionFlagsBits.ModerateMembers)
  .addUserOption((opt) => opt.setName("user").setDescription("The member to warn").setRequired(true))
  .addStringOption((opt) => opt.setName("reason").setDescription("Reason for the warning").setRequired(false).setMaxLength(MAX_REASON_LENGTH));

export const config = { allowInDMs: false, cooldown: MOD_COMMAND_COOLDOWN_SECONDS };

export async function execute(context: CommandContext): Promise<void> {
  const { interaction, getPluginAPI } = context;
  const mod = getPluginAPI("moderation");
  if (!mod || !interaction.inGuild()) {
    await interaction.reply({ content: "Moderation plugin not loaded.", ephemeral: true });
    return;
  }

  await interaction.deferReply({ ephemeral: true });

  const user = interaction.options.getUser("user", true);
  const reason = interaction.options.getString("reason");

  const result = await mod.modActionService.warn(interaction.guildId, user.id, { id: interaction.user.id, tag: interaction.user.tag }, reason);
  if (!result.success) {
    await interaction.editReply({ embeds: [errorEmbed(`Failed to warn: ${result.error}`)] });
    return;
  }

  const { escalation } = result;
  const embed = new EmbedBuilder()
    .setColor(ACTION_COLORS.warn)
    .setTitle("⚠️ Warning Issued")
    .addFields(
      { name: "Member", value: `${user.tag} (${user})`, inline: true },
      { name: "Moderator", value: `${interaction.user}`, inline: true },
      { name: "Reason", value: result.warning.reason },
      { name: "Recent Violations", value: `${escalation.activeCount} (tier ${escalation.tier})`, inline: true },
    );

  if (escalation.action !== "warn") {
    const duration = escalation.durationMs ? ` for ${formatDuration(escalation.durationMs)}` : "";
    embed.addFields({
      name: "⚡ Escalation",
      value: escalation.applied ? `${actionLabel(escalation.action)}${duration}` : `${actionLabel(escalation.action)} was not applied: ${escalation.error ?? "unknown error"}`,
    });
  }

  await interaction.editReply({ embeds: [embed] });
}
