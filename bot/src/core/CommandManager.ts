/**
 * CommandManager - Collects commands from plugins and registers them to guilds
 *
 * - All loaded plugin commands are registered to every guild the bot is in
 * - Guild-scoped registration so updates apply instantly
 */

import { REST, Routes, type ChatInputCommandInteraction, type RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import type { GuildwardenClient } from "../types/Client.js";
import type { PluginAPIRegistry, PluginName } from "../types/Plugin.js";
import log from "../utils/logger.js";

export interface PluginCommandConfig {
  /** Allow the command outside of guilds (default: false) */
  allowInDMs?: boolean;
  /** Cooldown in seconds per user (default: none) */
  cooldown?: number;
}

/** Anything with a name that serializes to a chat-input command (SlashCommandBuilder) */
export interface SlashCommandData {
  readonly name: string;
  toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody;
}

/**
 * Shape of a command file: `export const data`, `export const config`, `export async function execute`
 */
export interface PluginCommandModule {
  data: SlashCommandData;
  config?: PluginCommandConfig;
  execute: (context: CommandContext) => Promise<void>;
}

export interface PluginCommand {
  data: RESTPostAPIChatInputApplicationCommandsJSONBody;
  pluginName: string;
  config: Required<PluginCommandConfig>;
  execute: (context: CommandContext) => Promise<void>;
}

export interface CommandContext {
  interaction: ChatInputCommandInteraction;
  client: GuildwardenClient;
  /** Get a loaded plugin's API by name */
  getPluginAPI: <N extends PluginName>(pluginName: N) => PluginAPIRegistry[N] | undefined;
}

export class CommandManager {
  private rest: REST;
  private client: GuildwardenClient;
  private commands: Map<string, PluginCommand> = new Map();

  constructor(client: GuildwardenClient, botToken: string) {
    this.client = client;
    this.rest = new REST({ version: "10" }).setToken(botToken);
  }

  /**
   * Register a command from a plugin
   */
  registerCommand(pluginName: string, module: PluginCommandModule): void {
    const name = module.data.name;
    if (this.commands.has(name)) {
      log.warn(`Command "${name}" already registered, overwriting`);
    }
    this.commands.set(name, {
      data: module.data.toJSON(),
      pluginName,
      config: { allowInDMs: module.config?.allowInDMs ?? false, cooldown: module.config?.cooldown ?? 0 },
      execute: module.execute,
    });
    log.debug(`Registered command: ${name} (plugin: ${pluginName})`);
  }

  getCommand(name: string): PluginCommand | undefined {
    return this.commands.get(name);
  }

  getAllCommands(): Map<string, PluginCommand> {
    return this.commands;
  }

  /**
   * Register ALL commands to a specific guild
   */
  async registerCommandsToGuild(guildId: string): Promise<void> {
    const clientId = this.client.user?.id;
    if (!clientId) {
      throw new Error("Client not ready - cannot register guild commands");
    }

    const commandData = Array.from(this.commands.values()).map((cmd) => cmd.data);
    if (commandData.length === 0) {
      log.debug(`No commands to register for guild ${guildId}`);
      return;
    }

    await this.rest.put(Routes.applicationGuildCommands(clientId, guildId), {
      body: commandData,
    });

    log.debug(`✅ Registered ${commandData.length} command(s) for guild ${guildId}`);
  }

  /**
   * Register ALL commands to ALL cached guilds
   */
  async registerAllCommandsToGuilds(): Promise<void> {
    const guilds = this.client.guilds.cache;

    if (guilds.size === 0) {
      log.warn("No guilds to register commands for");
      return;
    }

    if (this.commands.size === 0) {
      log.warn("No commands to register");
      return;
    }

    log.info(`Registering ${this.commands.size} command(s) to ${guilds.size} guild(s)...`);

    let successCount = 0;
    let failCount = 0;

    for (const [guildId, guild] of guilds) {
      try {
        await this.registerCommandsToGuild(guildId);
        successCount++;
      } catch (error) {
        failCount++;
        log.error(`Failed to register commands for guild ${guild.name} (${guildId}):`, error);
      }
    }

    log.info(`✅ Command registration complete: ${successCount}/${guilds.size} guilds succeeded`);
    if (failCount > 0) {
      log.warn(`⚠️ ${failCount} guild(s) failed command registration`);
    }
  }

  getStats(): { total: number; byPlugin: Record<string, number> } {
    const byPlugin: Record<string, number> = {};
    for (const command of this.commands.values()) {
      byPlugin[command.pluginName] = (byPlugin[command.pluginName] ?? 0) + 1;
    }
    return { total: this.commands.size, byPlugin };
  }
}
