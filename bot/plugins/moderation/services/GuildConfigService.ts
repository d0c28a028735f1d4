/**
 * GuildConfigService - Per-guild automod thresholds, blocked words and link
 * whitelist, persisted as the `automod_config` document.
 */

import { createLogger } from "../../../src/core/Logger.js";
import { guildKey } from "../../../src/core/locks/ResourceKey.js";
import type { LockRegistry } from "../../../src/core/locks/LockRegistry.js";
import { DocumentSlot, type LoadOutcome } from "../../../src/core/store/DocumentSlot.js";
import type { DocumentStore } from "../../../src/core/store/DocumentStore.js";
import { createGuildConfigDocumentSchema, defaultGuildConfig, THRESHOLD_SCHEMAS, type GuildConfig, type GuildConfigDocument, type ThresholdKey } from "../models/GuildConfig.js";
import { DOCUMENTS } from "../utils/constants.js";
import type { ServiceResult } from "../types/index.js";

const log = createLogger("moderation:config");

const DOMAIN_PATTERN = /^(?:[a-z0-9](?:[a-z0-9-]*[a-z0-9])?\.)+[a-z]{2,}$/;

type ConfigResult = ServiceResult<{ config: GuildConfig }>;

export class GuildConfigService {
  private slot: DocumentSlot<GuildConfigDocument>;
  private repairedOnLoad = false;

  constructor(
    store: DocumentStore,
    private readonly locks: LockRegistry,
  ) {
    this.slot = new DocumentSlot(store, {
      name: DOCUMENTS.CONFIG,
      schema: createGuildConfigDocumentSchema((guildId, fields) => {
        this.repairedOnLoad = true;
        log.warn(`Repaired automod config for guild ${guildId}: reset ${fields.join(", ")} to defaults`);
      }),
      empty: () => ({}),
    });
  }

  async load(): Promise<LoadOutcome> {
    this.repairedOnLoad = false;
    const outcome = await this.slot.load();
    if (this.repairedOnLoad) await this.slot.save();
    return outcome;
  }

  /** Config without creating it */
  peekConfig(guildId: string): GuildConfig | undefined {
    return this.slot.value[guildId];
  }

  /** Config for the guild, created with defaults on first use */
  async getConfig(guildId: string): Promise<GuildConfig> {
    const existing = this.slot.value[guildId];
    if (existing) return existing;

    return this.locks.withLock(guildKey(guildId), async () => {
      const config = this.slot.value[guildId];
      if (config) return config;

      const created = defaultGuildConfig(guildId);
      this.slot.value[guildId] = created;
      await this.slot.save();
      log.info(`Created default automod config for guild ${guildId}`);
      return created;
    });
  }

  /** Guild-join initialization */
  async ensureGuild(guildId: string): Promise<GuildConfig> {
    return this.getConfig(guildId);
  }

  // ── Thresholds ─────────────────────────────────────────

  async setThreshold(guildId: string, key: ThresholdKey, value: number): Promise<ConfigResult> {
    const parsed = THRESHOLD_SCHEMAS[key].safeParse(value);
    if (!parsed.success) {
      const range = key === "capsThreshold" ? "a number between 0 and 1" : "a whole number of at least 0";
      return { success: false, error: `\`${key}\` must be ${range}.` };
    }

    return this.mutate(guildId, (config) => {
      config[key] = parsed.data;
      return null;
    });
  }

  async setEnabled(guildId: string, enabled: boolean): Promise<ConfigResult> {
    return this.mutate(guildId, (config) => {
      config.automodEnabled = enabled;
      return null;
    });
  }

  // ── Blocked words ──────────────────────────────────────

  async addBlockedWord(guildId: string, word: string): Promise<ConfigResult> {
    const normalized = word.trim().toLowerCase();
    if (!normalized) return { success: false, error: "The blocked word cannot be empty." };

    return this.mutate(guildId, (config) => {
      if (config.blockedWords.includes(normalized)) return `\`${normalized}\` is already blocked.`;
      config.blockedWords.push(normalized);
      return null;
    });
  }

  async removeBlockedWord(guildId: string, word: string): Promise<ConfigResult> {
    const normalized = word.trim().toLowerCase();

    return this.mutate(guildId, (config) => {
      const index = config.blockedWords.indexOf(normalized);
      if (index === -1) return `\`${normalized}\` is not blocked.`;
      config.blockedWords.splice(index, 1);
      return null;
    });
  }

  // ── Link whitelist ─────────────────────────────────────

  async addLinkDomain(guildId: string, domain: string): Promise<ConfigResult> {
    const normalized = normalizeDomain(domain);
    if (!DOMAIN_PATTERN.test(normalized)) {
      return { success: false, error: `\`${domain}\` is not a valid domain.` };
    }

    return this.mutate(guildId, (config) => {
      if (config.linkWhitelist.includes(normalized)) return `\`${normalized}\` is already whitelisted.`;
      config.linkWhitelist.push(normalized);
      return null;
    });
  }

  async removeLinkDomain(guildId: string, domain: string): Promise<ConfigResult> {
    const normalized = normalizeDomain(domain);

    return this.mutate(guildId, (config) => {
      const index = config.linkWhitelist.indexOf(normalized);
      if (index === -1) return `\`${normalized}\` is not whitelisted.`;
      config.linkWhitelist.splice(index, 1);
      return null;
    });
  }

  // ── Helpers ────────────────────────────────────────────

  /**
   * Apply `change` to a copy of the guild's config under the guild lock. A
   * returned string rejects the change and becomes the error.
   */
  private async mutate(guildId: string, change: (config: GuildConfig) => string | null): Promise<ConfigResult> {
    return this.locks.withLock(guildKey(guildId), async () => {
      const previous = this.slot.value[guildId];
      const current = previous ?? defaultGuildConfig(guildId);
      const next: GuildConfig = {
        ...current,
        blockedWords: [...current.blockedWords],
        linkWhitelist: [...current.linkWhitelist],
      };

      const rejection = change(next);
      if (rejection) return { success: false, error: rejection };

      this.slot.value[guildId] = next;
      try {
        await this.slot.save();
      } catch (error) {
        log.error(`Failed to save automod config for guild ${guildId}:`, error);
        if (previous) this.slot.value[guildId] = previous;
        else delete this.slot.value[guildId];
        return { success: false, error: "The configuration could not be saved." };
      }
      return { success: true, config: next };
    });
  }
}

/** `https://www.Example.com/path` → `example.com` */
export function normalizeDomain(input: string): string {
  return input
    .trim()
    .toLowerCase()
    .replace(/^[a-z]+:\/\//, "")
    .replace(/^www\./, "")
    .replace(/[/?#].*$/, "");
}
