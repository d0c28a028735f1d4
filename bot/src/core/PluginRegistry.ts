/**
 * PluginRegistry - Typed lookup of loaded plugin APIs
 */

import type { LoadablePlugin, PluginAPIRegistry, PluginEvent, PluginEventModule, PluginModule, PluginName } from "../types/Plugin.js";
import type { ClientEvents } from "discord.js";

export class PluginRegistry {
  private readonly apis: Partial<PluginAPIRegistry> = {};

  set<N extends PluginName>(name: N, api: PluginAPIRegistry[N]): void {
    this.apis[name] = api;
  }

  get<N extends PluginName>(name: N): PluginAPIRegistry[N] | undefined {
    return this.apis[name];
  }

  has(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.apis, name);
  }

  names(): string[] {
    return Object.keys(this.apis);
  }
}

/**
 * Erase a plugin module's name type so heterogeneous plugins fit one list
 */
export function definePlugin<N extends PluginName>(module: PluginModule<N>): LoadablePlugin {
  return {
    manifest: module.manifest,
    commands: module.commands ?? [],
    events: module.events ?? [],
    async load(context) {
      const api = await module.onLoad(context);
      context.plugins.set(module.manifest.name, api);
    },
    async unload(logger) {
      if (module.onDisable) await module.onDisable(logger);
    },
  };
}

/**
 * Wrap a typed event handler for registration with the EventManager
 */
export function definePluginEvent<K extends keyof ClientEvents>(definition: PluginEvent<K>): PluginEventModule {
  return {
    event: definition.event,
    once: definition.once ?? false,
    bind(client, onError) {
      const handler = (...args: ClientEvents[K]): void => {
        definition.execute(client, ...args).catch(onError);
      };

      if (definition.once) {
        client.once(definition.event, handler);
      } else {
        client.on(definition.event, handler);
      }
    },
  };
}
