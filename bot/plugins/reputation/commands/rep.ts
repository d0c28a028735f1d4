/**
 * /rep [member] - Reputation points, level and recent changes.
 */

import { EmbedBuilder, SlashCommandBuilder } from "discord.js";
import type { CommandContext } from "../../../src/core/CommandManager.js";
import { relativeTime } from "../../moderation/utils/embeds.js";
import { levelProgress } from "../utils/levels.js";

const RECENT_CHANGES = 5;

export const data = new SlashCommandBuilder()
  .setName("rep")
  .setDescription("View reputation points and level for yourself or another member")
  .addUserOption((opt) => opt.setName("member").setDescription("Member to check (leave empty for yourself)").setRequired(false));

export const config = { allowInDMs: false };

export async function execute(context: CommandContext): Promise<void> {
  const { interaction, getPluginAPI } = context;
  const reputation = getPluginAPI("reputation");
  if (!reputation || !interaction.inGuild()) {
    await interaction.reply({ content: "Reputation plugin not loaded.", ephemeral: true });
    return;
  }

  const target = interaction.options.getUser("member") ?? interaction.user;
  const data = reputation.reputationService.getReputation(interaction.guildId, target.id);

  const embed = new EmbedBuilder()
    .setColor(0x3b82f6)
    .setTitle(`Reputation for ${target.displayName}`)
    .addFields(
      { name: "Level", value: String(data.level), inline: true },
      { name: "Points", value: String(data.points), inline: true },
      { name: "Progress to Next Level", value: `${levelProgress(data.points, data.level).toFixed(1)}%` },
    );

  const recent = [...data.history].sort((a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp)).slice(0, RECENT_CHANGES);
  if (recent.length > 0) {
    embed.addFields({
      name: "Recent Changes",
      value: recent.map((h) => `${h.change >= 0 ? "+" : ""}${h.change} points - ${h.reason} (${relativeTime(h.timestamp)})`).join("\n"),
    });
  }

  await interaction.reply({ embeds: [embed] });
}
