/**
 * /restrict <user> [reason] - Stop a member from sending messages in every
 * text channel.
 */

import { EmbedBuilder, PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import type { CommandContext } from "../../../src/core/CommandManager.js";
import { ACTION_COLORS, DEFAULT_REASON, MAX_REASON_LENGTH, MOD_COMMAND_COOLDOWN_SECONDS } from "../utils/constants.js";
import { errorEmbed } from "../utils/embeds.js";

export const data = new SlashCommandBuilder()
  .setName("restrict")
  .setDescription("Prevent a member from sending messages in all channels")
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageRoles)
  .addUserOption((opt) => opt.setName("user").setDescription("The member to restrict").setRequired(true))
  .addStringOption((opt) => opt.setName("reason").setDescription("Reason for the restriction").setRequired(false).setMaxLength(MAX_REASON_LENGTH));

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

  const result = await mod.modActionService.restrict(interaction.guildId, user.id, { id: interaction.user.id, tag: interaction.user.tag }, reason);
  if (!result.success) {
    await interaction.editReply({ embeds: [errorEmbed(`Failed to restrict: ${result.error}`)] });
    return;
  }

  await interaction.editReply({
    embeds: [
      new EmbedBuilder()
        .setColor(ACTION_COLORS.timeout)
        .setTitle("🔇 Member Restricted")
        .addFields(
          { name: "User", value: `${user.tag} (${user})`, inline: true },
          { name: "Channels", value: String(result.channels), inline: true },
          { name: "Reason", value: reason?.trim() || DEFAULT_REASON },
        ),
    ],
  });
}
