/**
 * /clearviolations <user> - Reset a member's violation history.
 */

import { PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import type { CommandContext } from "../../../src/core/CommandManager.js";
import { errorEmbed, successEmbed } from "../utils/embeds.js";

export const data = new SlashCommandBuilder()
  .setName("clearviolations")
  .setDescription("Clear a member's violation history")
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

  await interaction.deferReply({ ephemeral: true });

  const user = interaction.options.getUser("user", true);
  const result = await mod.modActionService.clearViolations(interaction.guildId, user.id, { id: interaction.user.id, tag: interaction.user.tag });

  if (!result.success) {
    await interaction.editReply({ embeds: [errorEmbed(result.error)] });
    return;
  }

  await interaction.editReply({
    embeds: [successEmbed("Violations Cleared", `Removed ${result.removed} violation record(s) for ${user}.`)],
  });
}
