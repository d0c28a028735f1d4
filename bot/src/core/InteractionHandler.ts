/**
 * InteractionHandler - Routes slash commands to plugin command handlers
 */

import { Events, type ChatInputCommandInteraction, type Interaction } from "discord.js";
import type { GuildwardenClient } from "../types/Client.js";
import type { CommandContext, CommandManager } from "./CommandManager.js";
import { CommandCooldowns } from "./CommandCooldowns.js";
import log from "../utils/logger.js";
import { captureException } from "../utils/sentry.js";

export interface InteractionHandlerOptions {
  client: GuildwardenClient;
  commandManager: CommandManager;
  cooldowns?: CommandCooldowns;
}

export class InteractionHandler {
  private client: GuildwardenClient;
  private commandManager: CommandManager;
  private cooldowns: CommandCooldowns;

  constructor(options: InteractionHandlerOptions) {
    this.client = options.client;
    this.commandManager = options.commandManager;
    this.cooldowns = options.cooldowns ?? new CommandCooldowns();
  }

  /**
   * Attach the interactionCreate handler to the client
   */
  attach(): void {
    this.client.on(Events.InteractionCreate, (interaction) => {
      this.handleInteraction(interaction).catch((error: unknown) => {
        log.error("Unhandled interaction error:", error);
        captureException(error, { context: "InteractionHandler" });
      });
    });

    log.info("InteractionHandler attached");
  }

  private async handleInteraction(interaction: Interaction): Promise<void> {
    if (interaction.isChatInputCommand()) {
      await this.handleCommand(interaction);
    }
  }

  private async handleCommand(interaction: ChatInputCommandInteraction): Promise<void> {
    const commandName = interaction.commandName;
    const command = this.commandManager.getCommand(commandName);

    if (!command) {
      log.warn(`Unknown command: ${commandName}`);
      await this.replyQuietly(interaction, "❌ This command is not available.");
      return;
    }

    if (!command.config.allowInDMs && !interaction.inGuild()) {
      await this.replyQuietly(interaction, "❌ This command can only be used in a server.");
      return;
    }

    const remainingMs = this.cooldowns.take(commandName, interaction.user.id, command.config.cooldown);
    if (remainingMs > 0) {
      await this.replyQuietly(interaction, `⏳ Please wait ${Math.ceil(remainingMs / 1000)}s before using /${commandName} again.`);
      return;
    }

    const context: CommandContext = {
      interaction,
      client: this.client,
      getPluginAPI: (name) => this.client.plugins.get(name),
    };

    try {
      await command.execute(context);
    } catch (error) {
      log.error(`Command ${commandName} execution failed:`, error);
      captureException(error, {
        context: "Command Execution",
        command: commandName,
        guild: interaction.guildId,
        user: interaction.user.id,
      });
      await this.replyQuietly(interaction, "❌ An error occurred while executing this command.");
    }
  }

  /**
   * Ephemeral reply that works whether or not the interaction was deferred.
   * Failures (expired interaction) are only logged.
   */
  private async replyQuietly(interaction: ChatInputCommandInteraction, content: string): Promise<void> {
    try {
      if (interaction.deferred) {
        await interaction.editReply({ content });
      } else if (!interaction.replied) {
        await interaction.reply({ content, ephemeral: true });
      }
    } catch (error) {
      log.debug(`Could not reply to interaction ${interaction.id}:`, error);
    }
  }
}
