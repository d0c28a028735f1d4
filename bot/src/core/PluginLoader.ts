/**
 * PluginLoader - Resolves dependencies and loads the registered plugins
 */

import log from "../utils/logger.js";
import type { LoadablePlugin, LoadedPlugin, PluginContext, PluginLogger, PluginManifest } from "../types/Plugin.js";
import type { GuildwardenClient } from "../types/Client.js";
import type { GlobalEnv } from "../types/Env.js";
import type { DocumentStore } from "./store/DocumentStore.js";
import type { LockRegistry } from "./locks/LockRegistry.js";
import type { CommandManager } from "./CommandManager.js";
import type { EventManager } from "./EventManager.js";

/** Where loaded commands and events go; CommandManager and EventManager satisfy this */
export interface PluginSinks {
  commandManager: Pick<CommandManager, "registerCommand">;
  eventManager: Pick<EventManager, "registerEvent">;
}

export interface PluginLoaderOptions extends PluginSinks {
  plugins: LoadablePlugin[];
  client: GuildwardenClient;
  store: DocumentStore;
  locks: LockRegistry;
  env: GlobalEnv;
  /** Environment used for `requiredEnv` checks (default: process.env) */
  processEnv?: NodeJS.ProcessEnv;
}

export class PluginLoader {
  private readonly options: PluginLoaderOptions;
  private readonly processEnv: NodeJS.ProcessEnv;

  private available: Map<string, LoadablePlugin> = new Map();
  private loadedPlugins: Map<string, LoadedPlugin> = new Map();
  private loadOrder: string[] = [];

  constructor(options: PluginLoaderOptions) {
    this.options = options;
    this.processEnv = options.processEnv ?? process.env;
  }

  /**
   * Main entry point - validate, resolve, and load all plugins
   */
  async loadAll(): Promise<Map<string, LoadedPlugin>> {
    // Step 1: Collect enabled plugins
    this.collectPlugins();

    // Step 2: Validate dependencies and env
    this.validatePlugins();

    // Step 3: Resolve load order
    this.loadOrder = this.resolveLoadOrder();

    // Step 4: Load plugins in order
    await this.loadPluginsInOrder();

    return this.loadedPlugins;
  }

  private collectPlugins(): void {
    for (const plugin of this.options.plugins) {
      const { name, version, disabled } = plugin.manifest;
      if (disabled) {
        log.debug(`Plugin ${name} is disabled, skipping`);
        continue;
      }
      if (this.available.has(name)) {
        throw new Error(`Plugin "${name}" is registered twice`);
      }
      this.available.set(name, plugin);
      log.debug(`Found plugin: ${name} v${version}`);
    }

    log.info(`Found ${this.available.size} plugin(s)`);
  }

  /**
   * Validate all plugins have required dependencies and env vars
   */
  private validatePlugins(): void {
    const errors: string[] = [];

    for (const [name, { manifest }] of this.available) {
      for (const dep of manifest.dependencies) {
        if (!this.available.has(dep)) {
          errors.push(`Plugin "${name}" requires "${dep}" which is not available`);
        }
      }

      for (const envKey of manifest.requiredEnv) {
        if (!this.processEnv[envKey]) {
          errors.push(`Plugin "${name}" requires env var "${envKey}" which is not set`);
        }
      }
    }

    if (errors.length > 0) {
      for (const error of errors) {
        log.error(error);
      }
      throw new Error(`Plugin validation failed with ${errors.length} error(s)`);
    }

    log.debug("All plugins validated successfully");
  }

  /**
   * Topological sort using Kahn's algorithm. Ties keep registration order.
   */
  private resolveLoadOrder(): string[] {
    const inDegree = new Map<string, number>();
    const dependents = new Map<string, string[]>();

    for (const name of this.available.keys()) {
      inDegree.set(name, 0);
      dependents.set(name, []);
    }

    const addEdge = (from: string, to: string): void => {
      dependents.get(from)?.push(to);
      inDegree.set(to, (inDegree.get(to) ?? 0) + 1);
    };

    for (const [name, { manifest }] of this.available) {
      for (const dep of manifest.dependencies) addEdge(dep, name);
      // Optional dependencies only count if present
      for (const dep of manifest.optionalDependencies) {
        if (this.available.has(dep)) addEdge(dep, name);
      }
    }

    const queue = [...inDegree].filter(([, degree]) => degree === 0).map(([name]) => name);
    const result: string[] = [];

    for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
      result.push(current);

      for (const dependent of dependents.get(current) ?? []) {
        const newDegree = (inDegree.get(dependent) ?? 0) - 1;
        inDegree.set(dependent, newDegree);
        if (newDegree === 0) queue.push(dependent);
      }
    }

    if (result.length !== this.available.size) {
      const remaining = [...this.available.keys()].filter((n) => !result.includes(n));
      throw new Error(`Circular dependency detected involving: ${remaining.join(", ")}`);
    }

    if (result.length > 0) {
      log.info(`Plugin load order: ${result.join(" → ")}`);
    }
    return result;
  }

  /**
   * Load plugins sequentially in resolved order. Fails fast.
   */
  private async loadPluginsInOrder(): Promise<void> {
    for (const name of this.loadOrder) {
      const plugin = this.available.get(name);
      if (!plugin) continue;

      const logger = this.createPluginLogger(name);
      try {
        await plugin.load(this.createPluginContext(plugin.manifest, logger));

        for (const command of plugin.commands) {
          this.options.commandManager.registerCommand(name, command);
        }
        for (const event of plugin.events) {
          this.options.eventManager.registerEvent(name, event);
        }

        this.loadedPlugins.set(name, { manifest: plugin.manifest, logger, status: "loaded" });
        log.info(`✅ Loaded plugin: ${name}`);
      } catch (error) {
        log.error(`❌ Failed to load plugin ${name}:`, error);
        this.loadedPlugins.set(name, {
          manifest: plugin.manifest,
          logger,
          status: "failed",
          error: error instanceof Error ? error : new Error(String(error)),
        });
        throw error;
      }
    }
  }

  /**
   * Unload plugins in reverse load order
   */
  async unloadAll(): Promise<void> {
    for (const name of [...this.loadOrder].reverse()) {
      const plugin = this.available.get(name);
      const loaded = this.loadedPlugins.get(name);
      if (!plugin || loaded?.status !== "loaded") continue;

      try {
        await plugin.unload(loaded.logger);
      } catch (error) {
        log.error(`Failed to unload plugin ${name}:`, error);
      }
    }
  }

  private createPluginContext(manifest: PluginManifest, logger: PluginLogger): PluginContext {
    const { client, store, locks, env } = this.options;
    return {
      client,
      store,
      locks,
      env,
      manifest,
      logger,
      plugins: client.plugins,
      getEnv: (key: string) => this.processEnv[key],
      hasEnv: (key: string) => {
        const value = this.processEnv[key];
        return value !== undefined && value !== "";
      },
    };
  }

  private createPluginLogger(pluginName: string): PluginLogger {
    const prefix = `[${pluginName}]`;
    return {
      info: (...args) => log.info(prefix, ...args),
      warn: (...args) => log.warn(prefix, ...args),
      error: (...args) => log.error(prefix, ...args),
      debug: (...args) => log.debug(prefix, ...args),
    };
  }

  getPlugin(name: string): LoadedPlugin | undefined {
    return this.loadedPlugins.get(name);
  }

  getAllPlugins(): Map<string, LoadedPlugin> {
    return this.loadedPlugins;
  }
}
