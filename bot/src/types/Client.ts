/**
 * GuildwardenClient - discord.js client carrying the plugin registry
 */

import { Client, type ClientOptions } from "discord.js";
import { PluginRegistry } from "../core/PluginRegistry.js";

/**
 * Plugins and their event handlers reach each other through `client.plugins`:
 *
 * @example
 * const mod = client.plugins.get("moderation");
 */
export class GuildwardenClient extends Client {
  readonly plugins: PluginRegistry;

  constructor(options: ClientOptions, plugins: PluginRegistry = new PluginRegistry()) {
    super(options);
    this.plugins = plugins;
  }
}
