/**
 * messageUpdate → message log
 */

import { Events } from "discord.js";
import { definePluginEvent } from "../../../../src/core/PluginRegistry.js";
import { toMessageSnapshot } from "../../services/LoggingEventService.js";

export default definePluginEvent({
  event: Events.MessageUpdate,
  async execute(client, oldMessage, newMessage) {
    const logging = client.plugins.get("logging");
    const before = toMessageSnapshot(oldMessage);
    const after = toMessageSnapshot(newMessage);
    if (!logging || !before || !after) return;

    await logging.eventService.handleMessageUpdate(before, after);
  },
});
