/**
 * /ban <user> [duration] [reason] - Ban a user, optionally for a limited time.
 */

import { EmbedBuilder, PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import type { CommandContext } from "../../../src/core/CommandManager.js";
import { ValidationError } from "../../../src/core/errors.js";
import { ACTION_COLORS, DEFAULT_REASON, MAX_REASON_LENGTH, MOD_COMMAND_COOLDOWN_SECONDS } from "../utils/constants.js";
import { formatDuration, parseDuration } from "../utils/duration.js";
import { errorEmbed, relativeTime } from "../utils/embeds.js";

export const data = new SlashCommandBuilder()
  .setName("ban")
  .setDescription("Ban a user from the server")
  .setDefaultMemberPermissions(PermissionFlagsBits.BanMembers)
  .addUserOption((opt) => opt.setName("user").setDescription("The user to ban").setRequired(true))
  .addStringOption((opt) => opt.setName("duration").setDescription("Lift the ban after this long (e.g. 7d, 1d12h)").setRequired(false))
  .addStringOption((opt) => opt.setName("reason").setDescription("Reason for the ban").setRequired(false).setMaxLength(MAX_REASON_LENGTH));

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
  const durationInput = interaction.options.getString("duration");

  let durationMs: number | undefined;
  if (durationInput) {
    try {
      durationMs = parseDuration(durationInput);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      await interaction.editReply({ embeds: [errorEmbed(error.userMessage)] });
      return;
    }
  }

  const result = await mod.modActionService.ban(interaction.guildId, user.id, { id: interaction.user.id, tag: interaction.user.tag }, reason, durationMs);
  if (!result.success) {
    await interaction.editReply({ embeds: [errorEmbed(`Failed to ban: ${result.error}`)] });
    return;
  }

  const embed = new EmbedBuilder()
    .setColor(ACTION_COLORS.ban)
    .setTitle("🔨 Member Banned")
    .addFields(
      { name: "User", value: `${user.tag} (${user})`, inline: true },
      { name: "Duration", value: durationMs ? formatDuration(durationMs) : "Permanent", inline: true },
      { name: "Reason", value: reason?.trim() || DEFAULT_REASON },
    );
  if (result.sanction) {
    embed.addFields({ name: "Expires", value: relativeTime(result.sanction.expiresAt), inline: true });
  }

  await interaction.editReply({ embeds: [embed] });
}
