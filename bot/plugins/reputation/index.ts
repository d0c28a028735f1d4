/**
 * Reputation Plugin - Member reputation points and levels.
 *
 * Members reward each other with /giverep; sanctioned violations cost points.
 * History older than 30 days is trimmed by the moderation retention sweep.
 */

import type { PluginContext, PluginLogger, PluginModule } from "../../src/types/Plugin.js";
import { ReputationService } from "./services/ReputationService.js";
import * as repCommand from "./commands/rep.js";
import * as giverepCommand from "./commands/giverep.js";
import * as toprepCommand from "./commands/toprep.js";

export interface ReputationPluginAPI {
  version: string;
  reputationService: ReputationService;
}

declare module "../../src/types/Plugin.js" {
  interface PluginAPIRegistry {
    reputation: ReputationPluginAPI;
  }
}

const RETENTION_TASK = "reputation-history";

let cleanup: (() => void) | null = null;

export async function onLoad(context: PluginContext): Promise<ReputationPluginAPI> {
  const { store, locks, logger, plugins } = context;

  const mod = plugins.get("moderation");
  if (!mod) throw new Error("reputation requires moderation plugin");

  const reputationService = new ReputationService(store, locks);
  const outcome = await reputationService.load();
  if (outcome.status === "quarantined") {
    logger.warn(`Reputation document was corrupt and has been reset: ${outcome.reason}`);
  }

  const unsubscribe = reputationService.subscribe(mod.events);
  mod.retention.register(RETENTION_TASK, (now) => reputationService.trimHistory(now));
  cleanup = () => {
    unsubscribe();
    mod.retention.unregister(RETENTION_TASK);
  };

  logger.info("✅ Reputation plugin loaded");

  return { version: "1.0.0", reputationService };
}

export async function onDisable(logger: PluginLogger): Promise<void> {
  cleanup?.();
  cleanup = null;
  logger.info("🛑 Reputation plugin unloaded");
}

export const manifest: PluginModule<"reputation">["manifest"] = {
  name: "reputation",
  version: "1.0.0",
  description: "Reputation points and levels",
  dependencies: ["moderation"],
  optionalDependencies: [],
  requiredEnv: [],
  optionalEnv: [],
};

export const commands = [repCommand, giverepCommand, toprepCommand];

export const plugin: PluginModule<"reputation"> = { manifest, onLoad, onDisable, commands };
