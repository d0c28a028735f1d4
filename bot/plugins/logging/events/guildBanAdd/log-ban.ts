/**
 * guildBanAdd → mod log, including bans issued outside the bot
 */

import { Events } from "discord.js";
import { definePluginEvent } from "../../../../src/core/PluginRegistry.js";
import { toBanSnapshot } from "../../services/LoggingEventService.js";

export default definePluginEvent({
  event: Events.GuildBanAdd,
  async execute(client, ban) {
    const logging = client.plugins.get("logging");
    if (!logging) return;

    await logging.eventService.handleBanAdd(toBanSnapshot(ban));
  },
});
