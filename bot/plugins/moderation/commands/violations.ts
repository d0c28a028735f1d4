/**
 * /violations <user> - Active violations and current tier.
 */

import { PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import type { CommandContext } from "../../../src/core/CommandManager.js";
import { violationHistoryEmbed } from "../utils/embeds.js";

export const data = new SlashCommandBuilder()
  .setName("violations")
  .setDescription("Show a member's violations from the last 30 days")
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
  const { active, tier } = mod.modActionService.violationsReport(interaction.guildId, user.id);

  await interaction.reply({ embeds: [violationHistoryEmbed(user.tag, active, tier)], ephemeral: true });
}
