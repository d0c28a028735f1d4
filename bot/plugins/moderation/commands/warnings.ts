/**
 * /warnings <user> - Stored warnings for a member.
 */

import { PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import type { CommandContext } from "../../../src/core/CommandManager.js";
import { warningHistoryEmbed } from "../utils/embeds.js";

export const data = new SlashCommandBuilder()
  .setName("warnings")
  .setDescription("Show a member's warnings")
  .setDefaultMemberPermissions(PermissionFlagsBits.ModerateMembers)
  .addUserOption((opt) => opt.setName("user").setDescription("The member").setRequired(true));

export const config = { allowInDMs: false };

export async function execute(context: CommandContext): Promise<void> {
  const { interaction, getPluginAPI } = context;
  const mod = getPluginAPI("moderation");
  if (!mod || !interaction.inGuild()) {
    await interaction.reply({ content: "Moderation plugin not loaded.", ephemeral: true });
    return;
  }

  const user = interaction.options.getUser("user", true);
  const warnings = mod.modActionService.warningsReport(interaction.guildId, user.id);

  await interaction.reply({ embeds: [warningHistoryEmbed(user.tag, warnings)], ephemeral: true });
}
