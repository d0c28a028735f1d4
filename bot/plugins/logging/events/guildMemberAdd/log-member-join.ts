/**
 * guildMemberAdd → member log
 */

import { Events } from "discord.js";
import { definePluginEvent } from "../../../../src/core/PluginRegistry.js";
import { toMemberSnapshot } from "../../services/LoggingEventService.js";

export default definePluginEvent({
  event: Events.GuildMemberAdd,
  async execute(client, member) {
    const logging = client.plugins.get("logging");
    if (!logging) return;

    await logging.eventService.handleMemberJoin(toMemberSnapshot(member));
  },
});
