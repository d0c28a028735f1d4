/**
 * Plugin System Types
 */

import type { ClientEvents } from "discord.js";
import type { GuildwardenClient } from "./Client.js";
import type { GlobalEnv } from "./Env.js";
import type { DocumentStore } from "../core/store/DocumentStore.js";
import type { LockRegistry } from "../core/locks/LockRegistry.js";
import type { PluginCommandModule } from "../core/CommandManager.js";
import type { PluginRegistry } from "../core/PluginRegistry.js";

/**
 * API surface of every plugin, keyed by plugin name.
 * Each plugin adds its own entry via declaration merging:
 *
 * @example
 * declare module "../../src/types/Plugin.js" {
 *   interface PluginAPIRegistry {
 *     reputation: ReputationPluginAPI;
 *   }
 * }
 */
export interface PluginAPIRegistry {}

export type PluginName = keyof PluginAPIRegistry;

/**
 * Plugin manifest
 */
export interface PluginManifest<N extends string = string> {
  /** Unique plugin identifier */
  name: N;

  /** Semver version string */
  version: string;

  description: string;

  /** Required plugins that must be loaded first */
  dependencies: string[];

  /** Optional plugins loaded first if present */
  optionalDependencies: string[];

  /** Environment variables that must exist */
  requiredEnv: string[];

  /** Environment variables that may exist */
  optionalEnv: string[];

  /** Skip loading this plugin */
  disabled?: boolean;
}

/**
 * Logger interface for plugins
 */
export interface PluginLogger {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

/**
 * Context passed to plugin onLoad function
 */
export interface PluginContext {
  client: GuildwardenClient;

  /** Document persistence shared by all plugins */
  store: DocumentStore;

  /** Process-wide resource locks */
  locks: LockRegistry;

  env: GlobalEnv;

  /** Plugin's own manifest */
  manifest: PluginManifest;

  /** Logger instance scoped to plugin */
  logger: PluginLogger;

  /** APIs of plugins loaded so far (dependencies are always present) */
  plugins: PluginRegistry;

  getEnv: (key: string) => string | undefined;

  /** Check if env exists and is non-empty */
  hasEnv: (key: string) => boolean;
}

/**
 * Event handler contributed by a plugin
 */
export interface PluginEvent<K extends keyof ClientEvents> {
  /** Discord.js event name */
  event: K;
  /** Only fire once */
  once?: boolean;
  execute: (client: GuildwardenClient, ...args: ClientEvents[K]) => Promise<void>;
}

/**
 * Event handler with its event type erased; produced by `definePluginEvent`
 */
export interface PluginEventModule {
  readonly event: keyof ClientEvents;
  readonly once: boolean;
  /** Subscribe on the client; handler failures go to `onError` */
  bind(client: GuildwardenClient, onError: (error: unknown) => void): void;
}

/**
 * Plugin entry module exports
 */
export interface PluginModule<N extends PluginName> {
  manifest: PluginManifest<N>;

  /** Called when plugin loads - return API for dependents */
  onLoad: (context: PluginContext) => Promise<PluginAPIRegistry[N]>;

  /** Called when plugin unloads (bot shutdown) */
  onDisable?: (logger: PluginLogger) => Promise<void>;

  commands?: PluginCommandModule[];

  events?: PluginEventModule[];
}

/**
 * A plugin module with its name type erased, ready for the loader
 */
export interface LoadablePlugin {
  manifest: PluginManifest;
  commands: PluginCommandModule[];
  events: PluginEventModule[];
  load(context: PluginContext): Promise<void>;
  unload(logger: PluginLogger): Promise<void>;
}

export interface LoadedPlugin {
  manifest: PluginManifest;
  logger: PluginLogger;
  status: "loaded" | "failed";
  error?: Error;
}
