/**
 * /giverep <member> <reason> - Reward a member for being helpful.
 */

import { SlashCommandBuilder } from "discord.js";
import type { CommandContext } from "../../../src/core/CommandManager.js";
import { GIVE_AMOUNT } from "../services/ReputationService.js";

export const data = new SlashCommandBuilder()
  .setName("giverep")
  .setDescription("Give reputation points to another member for being helpful")
  .addUserOption((opt) => opt.setName("member").setDescription("The member to reward").setRequired(true))
  .addStringOption((opt) => opt.setName("reason").setDescription("Why (at least 3 characters)").setRequired(true).setMaxLength(200));

export const config = { allowInDMs: false };

export async function execute(context: CommandContext): Promise<void> {
  const { interaction, getPluginAPI } = context;
  const reputation = getPluginAPI("reputation");
  if (!reputation || !interaction.inGuild()) {
    await interaction.reply({ content: "Reputation plugin not loaded.", ephemeral: true });
    return;
  }

  const member = interaction.options.getUser("member", true);
  const reason = interaction.options.getString("reason", true);

  const result = await reputation.reputationService.giveReputation(
    interaction.guildId,
    interaction.user.id,
    { id: member.id, bot: member.bot },
    reason,
    interaction.user.username,
  );
  if (!result.success) {
    await interaction.reply({ content: result.error, ephemeral: true });
    return;
  }

  await interaction.reply(`Gave +${GIVE_AMOUNT} reputation to ${member} for: ${reason.trim()}`);

  if (result.update.levelChanged) {
    await interaction.followUp(`🎉 Congratulations ${member}! You've reached reputation level ${result.update.level}!`);
  }
}
