/**
 * messageDelete → message log
 */

import { Events } from "discord.js";
import { definePluginEvent } from "../../../../src/core/PluginRegistry.js";
import { toMessageSnapshot } from "../../services/LoggingEventService.js";

export default definePluginEvent({
  event: Events.MessageDelete,
  async execute(client, message) {
    const logging = client.plugins.get("logging");
    const snapshot = toMessageSnapshot(message);
    if (!logging || !snapshot) return;

    await logging.eventService.handleMessageDelete(snapshot);
  },
});
