/**
 * /automod set <setting> <value> - Change one threshold.
 */

import type { CommandContext } from "../../../../src/core/CommandManager.js";
import { THRESHOLD_KEYS, type ThresholdKey } from "../../models/GuildConfig.js";
import { errorEmbed, successEmbed } from "../../utils/embeds.js";

function isThresholdKey(value: string): value is ThresholdKey {
  return THRESHOLD_KEYS.some((key) => key === value);
}

export async function handleSet(context: CommandContext): Promise<void> {
  const { interaction, getPluginAPI } = context;
  const mod = getPluginAPI("moderation");
  if (!mod || !interaction.inGuild()) {
    await interaction.reply({ content: "Moderation plugin not loaded.", ephemeral: true });
    return;
  }

  await interaction.deferReply({ ephemeral: true });

  const setting = interaction.options.getString("setting", true);
  const value = interaction.options.getNumber("value", true);
  if (!isThresholdKey(setting)) {
    await interaction.editReply({ embeds: [errorEmbed(`Unknown setting \`${setting}\`.`)] });
    return;
  }

  const result = await mod.configService.setThreshold(interaction.guildId, setting, value);
  if (!result.success) {
    await interaction.editReply({ embeds: [errorEmbed(result.error)] });
    return;
  }

  await interaction.editReply({ embeds: [successEmbed("Automod Updated", `\`${setting}\` is now **${result.config[setting]}**.`)] });
}
