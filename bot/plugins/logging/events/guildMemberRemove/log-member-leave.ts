/**
 * guildMemberRemove → member log. Uncached members arrive as partials
 * without a join date.
 */

import { Events } from "discord.js";
import { definePluginEvent } from "../../../../src/core/PluginRegistry.js";
import { toMemberSnapshot } from "../../services/LoggingEventService.js";

export default definePluginEvent({
  event: Events.GuildMemberRemove,
  async execute(client, member) {
    const logging = client.plugins.get("logging");
    if (!logging) return;

    await logging.eventService.handleMemberLeave(toMemberSnapshot(member));
  },
});
