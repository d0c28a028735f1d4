/**
 * EventManager - Collects events from plugins and attaches them to the client
 */

import type { GuildwardenClient } from "../types/Client.js";
import type { PluginEventModule } from "../types/Plugin.js";
import log from "../utils/logger.js";
import { captureException } from "../utils/sentry.js";

interface RegisteredEvent {
  pluginName: string;
  module: PluginEventModule;
}

export class EventManager {
  private client: GuildwardenClient;
  private events: RegisteredEvent[] = [];
  private attached = false;

  constructor(client: GuildwardenClient) {
    this.client = client;
  }

  /**
   * Register an event from a plugin
   */
  registerEvent(pluginName: string, module: PluginEventModule): void {
    this.events.push({ pluginName, module });
    log.debug(`Registered event: ${module.event} (plugin: ${pluginName})`);
  }

  /**
   * Attach all registered events to the Discord client
   */
  attachEvents(): void {
    if (this.attached) {
      log.warn("Events already attached, skipping");
      return;
    }

    for (const { pluginName, module } of this.events) {
      module.bind(this.client, (error) => {
        log.error(`Event handler error (${module.event} from ${pluginName}):`, error);
        captureException(error, { context: "Event Handler", event: module.event, plugin: pluginName });
      });
    }

    this.attached = true;
    log.info(`Attached ${this.events.length} event handler(s)`);
  }

  getStats(): { total: number; byPlugin: Record<string, number> } {
    const byPlugin: Record<string, number> = {};

    for (const event of this.events) {
      byPlugin[event.pluginName] = (byPlugin[event.pluginName] ?? 0) + 1;
    }

    return {
      total: this.events.length,
      byPlugin,
    };
  }
}
