/**
 * /automod toggle <enabled> - Turn automod on or off for this server.
 */

import type { CommandContext } from "../../../../src/core/CommandManager.js";
import { errorEmbed, successEmbed } from "../../utils/embeds.js";

export async function handleToggle(context: CommandContext): Promise<void> {
  const { interaction, getPluginAPI } = context;
  const mod = getPluginAPI("moderation");
  if (!mod || !interaction.inGuild()) {
    await interaction.reply({ content: "Moderation plugin not loaded.", ephemeral: true });
    return;
  }

  await interaction.deferReply({ ephemeral: true });

  const enabled = interaction.options.getBoolean("enabled", true);
  const result = await mod.configService.setEnabled(interaction.guildId, enabled);

  if (!result.success) {
    await interaction.editReply({ embeds: [errorEmbed(`Failed to ${enabled ? "enable" : "disable"} automod: ${result.error}`)] });
    return;
  }

  await interaction.editReply({ embeds: [successEmbed("Automod Updated", `Automod has been **${enabled ? "enabled" : "disabled"}**.`)] });
}
