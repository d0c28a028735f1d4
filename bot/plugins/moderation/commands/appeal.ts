/**
 * /appeal <reason> - Submit an appeal against a sanction.
 */

import { SlashCommandBuilder } from "discord.js";
import type { CommandContext } from "../../../src/core/CommandManager.js";
import { MAX_REASON_LENGTH } from "../utils/constants.js";
import { errorEmbed, successEmbed } from "../utils/embeds.js";

export const data = new SlashCommandBuilder()
  .setName("appeal")
  .setDescription("Appeal a moderation action")
  .addStringOption((opt) => opt.setName("reason").setDescription("Why should the action be reconsidered?").setRequired(true).setMaxLength(MAX_REASON_LENGTH));

export const config = { allowInDMs: false };

export async function execute(context: CommandContext): Promise<void> {
  const { interaction, getPluginAPI } = context;
  const mod = getPluginAPI("moderation");
  if (!mod || !interaction.inGuild()) {
    await interaction.reply({ content: "Moderation plugin not loaded.", ephemeral: true });
    return;
  }

  await interaction.deferReply({ ephemeral: true });

  const result = await mod.appealService.submit(interaction.guildId, interaction.user.id, interaction.options.getString("reason", true));
  if (!result.success) {
    await interaction.editReply({ embeds: [errorEmbed(result.error)] });
    return;
  }

  await interaction.editReply({
    embeds: [successEmbed("Appeal Submitted", `Your appeal \`${result.appeal.id}\` has been recorded. A moderator will review it.`)],
  });
}
