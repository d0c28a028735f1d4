/**
 * /toprep - Reputation leaderboard.
 */

import { EmbedBuilder, SlashCommandBuilder } from "discord.js";
import type { CommandContext } from "../../../src/core/CommandManager.js";

export const data = new SlashCommandBuilder().setName("toprep").setDescription("View the server's reputation leaderboard");

export const config = { allowInDMs: false };

export async function execute(context: CommandContext): Promise<void> {
  const { interaction, getPluginAPI } = context;
  const reputation = getPluginAPI("reputation");
  if (!reputation || !interaction.inGuild()) {
    await interaction.reply({ content: "Reputation plugin not loaded.", ephemeral: true });
    return;
  }

  const entries = reputation.reputationService.leaderboard(interaction.guildId);
  if (entries.length === 0) {
    await interaction.reply({ content: "No reputation data to display yet!", ephemeral: true });
    return;
  }

  const embed = new EmbedBuilder()
    .setColor(0xf1c40f)
    .setTitle("🏆 Reputation Leaderboard")
    .setDescription(entries.map((entry, i) => `**${i + 1}.** <@${entry.userId}> - Level ${entry.level} (${entry.points} points)`).join("\n"));

  await interaction.reply({ embeds: [embed], allowedMentions: { parse: [] } });
}
