/**
 * /automod blockword <add|remove> <word>
 */

import type { CommandContext } from "../../../../src/core/CommandManager.js";
import { errorEmbed, successEmbed } from "../../utils/embeds.js";

export async function handleBlockWord(context: CommandContext): Promise<void> {
  const { interaction, getPluginAPI } = context;
  const mod = getPluginAPI("moderation");
  if (!mod || !interaction.inGuild()) {
    await interaction.reply({ content: "Moderation plugin not loaded.", ephemeral: true });
    return;
  }

  await interaction.deferReply({ ephemeral: true });

  const action = interaction.options.getString("action", true);
  const word = interaction.options.getString("word", true);

  const result =
    action === "remove" ? await mod.configService.removeBlockedWord(interaction.guildId, word) : await mod.configService.addBlockedWord(interaction.guildId, word);

  if (!result.success) {
    await interaction.editReply({ embeds: [errorEmbed(result.error)] });
    return;
  }

  const verb = action === "remove" ? "removed from" : "added to";
  await interaction.editReply({
    embeds: [successEmbed("Blocked Words Updated", `\`${word.trim().toLowerCase()}\` ${verb} the blocked words (${result.config.blockedWords.length} total).`)],
  });
}
