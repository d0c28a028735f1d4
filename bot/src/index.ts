/**
 * Guildwarden - Main Entry Point
 * Plugin-based Discord moderation bot with phased initialization
 */

// Load .env before any other module reads process.env
import "dotenv/config";

// Initialize Sentry FIRST (before any other imports that might throw errors)
import { initializeSentry, captureException, flush as flushSentry } from "./utils/sentry.js";

initializeSentry({
  dsn: process.env.SENTRY_DSN,
  environment: process.env.NODE_ENV || "production",
  tracesSampleRate: 0.1,
  enabled: process.env.SENTRY_ENABLED !== "false",
});

import { Events, GatewayIntentBits, Partials } from "discord.js";
import mongoose from "mongoose";
import { envLoader } from "./utils/env.js";
import log from "./utils/logger.js";
import type { GlobalEnv } from "./types/Env.js";
import { GuildwardenClient } from "./types/Client.js";
import { PluginLoader } from "./core/PluginLoader.js";
import { CommandManager } from "./core/CommandManager.js";
import { EventManager } from "./core/EventManager.js";
import { InteractionHandler } from "./core/InteractionHandler.js";
import { LockRegistry } from "./core/locks/LockRegistry.js";
import type { DocumentStore } from "./core/store/DocumentStore.js";
import { JsonFileDocumentStore } from "./core/store/JsonFileDocumentStore.js";
import { MongoDocumentStore } from "./core/store/MongoDocumentStore.js";
import { plugins } from "./plugins.js";

// ============================================================================
// Phase 1: Load and validate environment
// ============================================================================
log.info("🚀 Guildwarden Starting...");
log.debug("Phase 1: Loading environment variables...");

const env = envLoader.loadGlobalEnv();

// ============================================================================
// Phase 2: Persistence
// ============================================================================

/**
 * Open the document store selected by STORE_DRIVER
 */
async function openStore(config: GlobalEnv): Promise<DocumentStore> {
  if (config.STORE_DRIVER === "mongo") {
    log.debug("Connecting to MongoDB...");
    await mongoose.connect(config.MONGODB_URI, { dbName: config.MONGODB_DATABASE });
    log.info("✅ MongoDB connected");
    return new MongoDocumentStore();
  }

  log.info(`✅ Using JSON documents in ${config.DATA_DIR}`);
  return new JsonFileDocumentStore(config.DATA_DIR);
}

// ============================================================================
// Phase 3: Discord client configuration
// ============================================================================

export const client = new GuildwardenClient({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMembers,
    GatewayIntentBits.GuildModeration,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent,
  ],
  partials: [Partials.Channel, Partials.Message, Partials.GuildMember],
});

const locks = new LockRegistry();
const commandManager = new CommandManager(client, env.BOT_TOKEN);
const eventManager = new EventManager(client);

let store: DocumentStore | null = null;
let pluginLoader: PluginLoader | null = null;

// ============================================================================
// Phase 4: Ready event handler
// ============================================================================

client.once(Events.ClientReady, async (readyClient) => {
  log.info(`✅ Ready! Serving ${readyClient.guilds.cache.size} guilds as ${readyClient.user.tag}`);

  if (!store) {
    log.error("Client became ready before the document store was opened");
    return;
  }

  // Plugins load once caches are populated so they can initialize every guild
  log.debug("Phase 4: Loading plugins...");
  pluginLoader = new PluginLoader({ plugins, client, store, locks, env, commandManager, eventManager });

  try {
    await pluginLoader.loadAll();
    log.info(`✅ Loaded ${pluginLoader.getAllPlugins().size} plugin(s)`);
  } catch (error) {
    log.error("Plugin loading failed:", error);
    captureException(error, { context: "Plugin Loading" });
  }

  new InteractionHandler({ client, commandManager }).attach();

  // Attach events after plugins have registered them
  eventManager.attachEvents();

  try {
    log.debug("Registering commands to all guilds...");
    await commandManager.registerAllCommandsToGuilds();
    log.info(`✅ Commands registered (${commandManager.getStats().total} total)`);
  } catch (error) {
    log.error("Failed to register commands:", error);
    captureException(error, { context: "Command Registration" });
  }
});

// Newly joined guilds get the commands right away
client.on(Events.GuildCreate, (guild) => {
  commandManager.registerCommandsToGuild(guild.id).catch((error: unknown) => {
    log.error(`Failed to register commands for guild ${guild.id}:`, error);
    captureException(error, { context: "Guild Command Registration", guildId: guild.id });
  });
});

// ============================================================================
// Phase 5: Error handling
// ============================================================================

client.on(Events.Error, (error) => {
  log.error("Discord client error:", error);
  captureException(error, { context: "Discord Client Error" });
});

process.on("unhandledRejection", (error) => {
  log.error("Unhandled promise rejection:", error);
  captureException(error, { context: "Unhandled Promise Rejection" });
});

process.on("uncaughtException", (error) => {
  log.error("Uncaught exception:", error);
  captureException(error, { context: "Uncaught Exception" });
  // Allow Sentry to send the error before exiting
  setTimeout(() => process.exit(1), 1000);
});

// ============================================================================
// Phase 6: Graceful shutdown
// ============================================================================

async function shutdown(signal: string): Promise<void> {
  log.info(`Received ${signal}, shutting down gracefully...`);

  try {
    // Unload plugins first (in reverse order)
    if (pluginLoader) {
      await pluginLoader.unloadAll();
      log.debug("Plugins unloaded");
    }

    await client.destroy();
    log.debug("Discord client destroyed");

    if (store?.close) {
      await store.close();
      log.debug("Document store closed");
    }

    if (env.STORE_DRIVER === "mongo") {
      await mongoose.disconnect();
      log.debug("MongoDB disconnected");
    }

    await flushSentry();

    log.info("✅ Shutdown complete");
    process.exit(0);
  } catch (error) {
    log.error("Error during shutdown:", error);
    process.exit(1);
  }
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

// ============================================================================
// Phase 7: Startup sequence
// ============================================================================

async function start(): Promise<void> {
  try {
    log.debug("Phase 2: Opening document store...");
    store = await openStore(env);

    // Plugins are loaded in the ready handler
    log.debug("Phase 4: Logging in to Discord...");
    await client.login(env.BOT_TOKEN);
  } catch (error) {
    log.error("Failed to start bot:", error);
    captureException(error, { context: "Bot Startup" });
    await flushSentry();
    process.exit(1);
  }
}

void start();
