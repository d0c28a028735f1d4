/**
 * /temprole <user> <role> <duration> [reason] - Grant a role that is removed
 * automatically when the duration runs out.
 */

import { EmbedBuilder, PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import type { CommandContext } from "../../../src/core/CommandManager.js";
import { ValidationError } from "../../../src/core/errors.js";
import { ACTION_COLORS, MAX_REASON_LENGTH, MOD_COMMAND_COOLDOWN_SECONDS } from "../utils/constants.js";
import { formatDuration, parseDuration } from "../utils/duration.js";
import { errorEmbed, relativeTime } from "../utils/embeds.js";

export const data = new SlashCommandBuilder()
  .setName("temprole")
  .setDescription("Give a member a role for a limited time")
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageRoles)
  .addUserOption((opt) => opt.setName("user").setDescription("The member").setRequired(true))
  .addRoleOption((opt) => opt.setName("role").setDescription("The role to grant").setRequired(true))
  .addStringOption((opt) => opt.setName("duration").setDescription("How long to keep the role (e.g. 2h, 1d12h)").setRequired(true))
  .addStringOption((opt) => opt.setName("reason").setDescription("Reason").setRequired(false).setMaxLength(MAX_REASON_LENGTH));

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
  const role = interaction.options.getRole("role", true);
  const reason = interaction.options.getString("reason");

  let durationMs: number;
  try {
    durationMs = parseDuration(interaction.options.getString("duration", true));
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    await interaction.editReply({ embeds: [errorEmbed(error.userMessage)] });
    return;
  }

  const result = await mod.modActionService.temprole(interaction.guildId, user.id, role.id, durationMs, { id: interaction.user.id, tag: interaction.user.tag }, reason);
  if (!result.success) {
    await interaction.editReply({ embeds: [errorEmbed(`Failed to grant role: ${result.error}`)] });
    return;
  }

  await interaction.editReply({
    embeds: [
      new EmbedBuilder()
        .setColor(ACTION_COLORS.info)
        .setTitle("⏳ Temporary Role Granted")
        .addFields(
          { name: "Member", value: `${user.tag} (${user})`, inline: true },
          { name: "Role", value: `<@&${role.id}>`, inline: true },
          { name: "Duration", value: formatDuration(durationMs), inline: true },
          { name: "Expires", value: relativeTime(result.sanction.expiresAt), inline: true },
        ),
    ],
  });
}
