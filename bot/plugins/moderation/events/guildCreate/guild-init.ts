/**
 * guildCreate → create the default automod config for a newly joined guild
 */

import { Events } from "discord.js";
import { definePluginEvent } from "../../../../src/core/PluginRegistry.js";

export default definePluginEvent({
  event: Events.GuildCreate,
  async execute(client, guild) {
    const mod = client.plugins.get("moderation");
    if (!mod) return;

    await mod.configService.ensureGuild(guild.id);
  },
});
