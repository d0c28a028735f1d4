/**
 * /automod view - Display the current thresholds and lists.
 */

import { EmbedBuilder } from "discord.js";
import type { CommandContext } from "../../../../src/core/CommandManager.js";
import type { GuildConfig } from "../../models/GuildConfig.js";
import { ACTION_COLORS } from "../../utils/constants.js";

export function configEmbed(config: GuildConfig, whitelistedRoles: readonly string[]): EmbedBuilder {
  const list = (items: readonly string[]): string => (items.length > 0 ? items.map((item) => `\`${item}\``).join(", ").slice(0, 1024) : "None");

  return new EmbedBuilder()
    .setColor(ACTION_COLORS.automod)
    .setTitle("🛡️ Automod Configuration")
    .addFields(
      { name: "Status", value: config.automodEnabled ? "✅ Enabled" : "❌ Disabled", inline: true },
      { name: "Spam", value: `${config.maxMessages} messages / ${config.timeframeSeconds}s`, inline: true },
      { name: "Mentions", value: `${config.maxMentions} max`, inline: true },
      { name: "Lines", value: `${config.maxLines} max`, inline: true },
      { name: "Emojis", value: `${config.maxEmojis} max`, inline: true },
      { name: "Caps", value: `${Math.round(config.capsThreshold * 100)}%`, inline: true },
      { name: "Blocked Words", value: list(config.blockedWords) },
      { name: "Whitelisted Links", value: list(config.linkWhitelist) },
      { name: "Whitelisted Roles", value: whitelistedRoles.length > 0 ? whitelistedRoles.map((id) => `<@&${id}>`).join(", ") : "None" },
    );
}

export async function handleView(context: CommandContext): Promise<void> {
  const { interaction, getPluginAPI } = context;
  const mod = getPluginAPI("moderation");
  if (!mod || !interaction.inGuild()) {
    await interaction.reply({ content: "Moderation plugin not loaded.", ephemeral: true });
    return;
  }

  const config = await mod.configService.getConfig(interaction.guildId);
  const roles = mod.whitelistService.list(interaction.guildId);

  await interaction.reply({ embeds: [configEmbed(config, roles)], ephemeral: true });
}
