/**
 * messageCreate → Automod message handler
 *
 * Delegates to AutomodEnforcer.handleMessage() for threshold checks.
 */

import { Events } from "discord.js";
import { definePluginEvent } from "../../../../src/core/PluginRegistry.js";
import { toInboundMessage } from "../../services/AutomodEnforcer.js";

export default definePluginEvent({
  event: Events.MessageCreate,
  async execute(client, message) {
    // Ignore bots, webhooks and DMs
    if (message.author.bot || message.webhookId || !message.inGuild()) return;

    const mod = client.plugins.get("moderation");
    if (!mod) return;

    await mod.automodEnforcer.handleMessage(toInboundMessage(message));
  },
});
