/**
 * Logging Plugin - Audit log of moderation, member and message events.
 *
 * Provides:
 * - /setlog to pick the `all`, `mod`, `member` and `message` log channels
 * - Sanction, expiry and moderator action embeds, delivered from the
 *   moderation event bus
 * - Member join/leave, message delete/edit and ban entries from gateway events
 */

import type { PluginContext, PluginLogger, PluginModule } from "../../src/types/Plugin.js";
import { AuditLogService } from "./services/AuditLogService.js";
import { LoggingEventService } from "./services/LoggingEventService.js";
import * as setlogCommand from "./commands/setlog.js";
import * as logMemberJoin from "./events/guildMemberAdd/log-member-join.js";
import * as logMemberLeave from "./events/guildMemberRemove/log-member-leave.js";
import * as logMessageDelete from "./events/messageDelete/log-message-delete.js";
import * as logMessageEdit from "./events/messageUpdate/log-message-edit.js";
import * as logBan from "./events/guildBanAdd/log-ban.js";

/** Public API exposed to other plugins and commands */
export interface LoggingPluginAPI {
  version: string;
  auditLog: AuditLogService;
  eventService: LoggingEventService;
}

declare module "../../src/types/Plugin.js" {
  interface PluginAPIRegistry {
    logging: LoggingPluginAPI;
  }
}

let unsubscribe: (() => void) | null = null;

export async function onLoad(context: PluginContext): Promise<LoggingPluginAPI> {
  const { store, locks, logger, plugins } = context;

  const mod = plugins.get("moderation");
  if (!mod) throw new Error("logging requires moderation plugin");

  const auditLog = new AuditLogService(store, locks, mod.gateway);
  const outcome = await auditLog.load();
  if (outcome.status === "quarantined") {
    logger.warn(`Log channel document was corrupt and has been reset: ${outcome.reason}`);
  }

  unsubscribe = auditLog.subscribe(mod.events);

  const eventService = new LoggingEventService(auditLog);

  logger.info("✅ Logging plugin loaded");

  return { version: "1.0.0", auditLog, eventService };
}

export async function onDisable(logger: PluginLogger): Promise<void> {
  unsubscribe?.();
  unsubscribe = null;
  logger.info("🛑 Logging plugin unloaded");
}

export const manifest: PluginModule<"logging">["manifest"] = {
  name: "logging",
  version: "1.0.0",
  description: "Audit log channels for moderation, member and message events",
  dependencies: ["moderation"],
  optionalDependencies: [],
  requiredEnv: [],
  optionalEnv: [],
};

export const commands = [setlogCommand];

export const events = [logMemberJoin.default, logMemberLeave.default, logMessageDelete.default, logMessageEdit.default, logBan.default];

export const plugin: PluginModule<"logging"> = { manifest, onLoad, onDisable, commands, events };
