/**
 * /automod linkwhitelist <add|remove> <domain>
 */

import type { CommandContext } from "../../../../src/core/CommandManager.js";
import { normalizeDomain } from "../../services/GuildConfigService.js";
import { errorEmbed, successEmbed } from "../../utils/embeds.js";

export async function handleLinkWhitelist(context: CommandContext): Promise<void> {
  const { interaction, getPluginAPI } = context;
  const mod = getPluginAPI("moderation");
  if (!mod || !interaction.inGuild()) {
    await interaction.reply({ content: "Moderation plugin not loaded.", ephemeral: true });
    return;
  }

  await interaction.deferReply({ ephemeral: true });

  const action = interaction.options.getString("action", true);
  const domain = interaction.options.getString("domain", true);

  const result =
    action === "remove" ? await mod.configService.removeLinkDomain(interaction.guildId, domain) : await mod.configService.addLinkDomain(interaction.guildId, domain);

  if (!result.success) {
    await interaction.editReply({ embeds: [errorEmbed(result.error)] });
    return;
  }

  const verb = action === "remove" ? "removed from" : "added to";
  await interaction.editReply({
    embeds: [successEmbed("Link Whitelist Updated", `\`${normalizeDomain(domain)}\` ${verb} the link whitelist.`)],
  });
}
