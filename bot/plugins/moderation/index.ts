/**
 * Moderation Plugin - threshold automod, the violation ledger with tiered
 * escalation, moderator commands and temporary sanction expiry.
 *
 * Automod findings and manual warnings feed the same ledger. A user's tier is
 * the number of violations in the last 30 days (capped at 5), and each tier
 * maps to a warn, timeout or ban. Side effects go out on the event bus for
 * the reputation and logging plugins.
 */

import type { PluginContext, PluginLogger, PluginModule } from "../../src/types/Plugin.js";
import { DiscordModerationGateway } from "./services/DiscordModerationGateway.js";
import type { ModerationGateway } from "./services/ModerationGateway.js";
import { ModerationEventBus } from "./services/ModerationEventBus.js";
import { GuildConfigService } from "./services/GuildConfigService.js";
import { RoleWhitelistService } from "./services/RoleWhitelistService.js";
import { RuleDetector } from "./services/RuleDetector.js";
import { ViolationLedger } from "./services/ViolationLedger.js";
import { WarningService } from "./services/WarningService.js";
import { TemporarySanctionService } from "./services/TemporarySanctionService.js";
import { EscalationService } from "./services/EscalationService.js";
import { ModActionService } from "./services/ModActionService.js";
import { AutomodEnforcer } from "./services/AutomodEnforcer.js";
import { AppealService } from "./services/AppealService.js";
import { TemporalSanctionScheduler } from "./services/TemporalSanctionScheduler.js";
import { RetentionSweeper } from "./services/RetentionSweeper.js";

import * as warnCommand from "./commands/warn.js";
import * as kickCommand from "./commands/kick.js";
import * as banCommand from "./commands/ban.js";
import * as temproleCommand from "./commands/temprole.js";
import * as restrictCommand from "./commands/restrict.js";
import * as clearViolationsCommand from "./commands/clearviolations.js";
import * as violationsCommand from "./commands/violations.js";
import * as warningsCommand from "./commands/warnings.js";
import * as automodCommand from "./commands/automod.js";
import * as whitelistCommand from "./commands/whitelist.js";
import * as appealCommand from "./commands/appeal.js";
import * as appealsCommand from "./commands/appeals.js";
import * as automodMessage from "./events/messageCreate/automod-message.js";
import * as guildInit from "./events/guildCreate/guild-init.js";

export interface ModerationPluginAPI {
  version: string;
  gateway: ModerationGateway;
  events: ModerationEventBus;
  configService: GuildConfigService;
  whitelistService: RoleWhitelistService;
  detector: RuleDetector;
  ledger: ViolationLedger;
  warningService: WarningService;
  tempSanctions: TemporarySanctionService;
  escalationService: EscalationService;
  modActionService: ModActionService;
  automodEnforcer: AutomodEnforcer;
  appealService: AppealService;
  scheduler: TemporalSanctionScheduler;
  retention: RetentionSweeper;
}

declare module "../../src/types/Plugin.js" {
  interface PluginAPIRegistry {
    moderation: ModerationPluginAPI;
  }
}

/** Spam windows untouched for this long are dropped by the retention sweep */
const IDLE_SPAM_WINDOW_MS = 10 * 60 * 1000;

let api: ModerationPluginAPI | null = null;

export async function onLoad(context: PluginContext): Promise<ModerationPluginAPI> {
  const { client, store, locks, env, logger } = context;

  const gateway = new DiscordModerationGateway(client);
  const events = new ModerationEventBus();
  const configService = new GuildConfigService(store, locks);
  const whitelistService = new RoleWhitelistService(store, locks);
  const detector = new RuleDetector(locks, whitelistService);
  const ledger = new ViolationLedger(store, locks);
  const warningService = new WarningService(store);
  const tempSanctions = new TemporarySanctionService(store, locks);
  const appealService = new AppealService(store, locks, env.NANOID_LENGTH);

  const documents = [configService, whitelistService, ledger, warningService, tempSanctions, appealService];
  for (const service of documents) {
    const outcome = await service.load();
    if (outcome.status === "quarantined") {
      logger.warn(`Document was corrupt and has been reset (backup: ${outcome.backup ?? "none"}): ${outcome.reason}`);
    }
  }

  const escalationService = new EscalationService(gateway, ledger, warningService, events, locks);
  const modActionService = new ModActionService(gateway, escalationService, ledger, warningService, tempSanctions, events, locks);
  const automodEnforcer = new AutomodEnforcer(configService, detector, escalationService, gateway);

  const scheduler = new TemporalSanctionScheduler(tempSanctions, gateway, events, locks, env.SCHEDULER_INTERVAL_MS);
  const retention = new RetentionSweeper(env.RETENTION_SWEEP_INTERVAL_MS);
  retention.register("violations", (now) => ledger.pruneExpired(now));
  retention.register("spam-windows", (now) => detector.pruneIdleWindows(IDLE_SPAM_WINDOW_MS, now));

  for (const guildId of client.guilds.cache.keys()) {
    await configService.ensureGuild(guildId);
  }

  scheduler.start();
  retention.start();

  logger.info("✅ Moderation plugin loaded");

  api = {
    version: "1.0.0",
    gateway,
    events,
    configService,
    whitelistService,
    detector,
    ledger,
    warningService,
    tempSanctions,
    escalationService,
    modActionService,
    automodEnforcer,
    appealService,
    scheduler,
    retention,
  };
  return api;
}

export async function onDisable(logger: PluginLogger): Promise<void> {
  if (api) {
    api.scheduler.stop();
    api.retention.stop();
    await api.events.drain();
    api = null;
  }
  logger.info("🛑 Moderation plugin unloaded");
}

export const manifest: PluginModule<"moderation">["manifest"] = {
  name: "moderation",
  version: "1.0.0",
  description: "Threshold automod, violation escalation and temporary sanctions",
  dependencies: [],
  optionalDependencies: [],
  requiredEnv: [],
  optionalEnv: [],
};

export const commands = [
  warnCommand,
  kickCommand,
  banCommand,
  temproleCommand,
  restrictCommand,
  clearViolationsCommand,
  violationsCommand,
  warningsCommand,
  automodCommand,
  whitelistCommand,
  appealCommand,
  appealsCommand,
];

export const events = [automodMessage.default, guildInit.default];

export const plugin: PluginModule<"moderation"> = { manifest, onLoad, onDisable, commands, events };
