import { beforeEach, describe, it, expect } from "vitest";
import { defaultGuildConfig, repairGuildConfig } from "../../plugins/moderation/models/GuildConfig.js";
import { GuildConfigService, normalizeDomain } from "../../plugins/moderation/services/GuildConfigService.js";
import { LockRegistry } from "../../src/core/locks/LockRegistry.js";
import { MemoryDocumentStore } from "../../src/core/store/MemoryDocumentStore.js";
import { GUILD } from "../helpers/harness.js";

describe("repairGuildConfig", () => {
  it("keeps a valid entry untouched", () => {
    const stored = { ...defaultGuildConfig(GUILD), maxLines: 20, blockedWords: ["forbidden"] };

    expect(repairGuildConfig(GUILD, stored)).toEqual({ config: stored, repairedFields: [] });
  });

  it("resets only the invalid fields", () => {
    const stored = { ...defaultGuildConfig(GUILD), maxMentions: "lots", capsThreshold: 2, maxLines: 20 };

    const { config, repairedFields } = repairGuildConfig(GUILD, stored);

    expect(repairedFields).toEqual(["maxMentions", "capsThreshold"]);
    expect(config).toEqual({ ...defaultGuildConfig(GUILD), maxLines: 20 });
  });

  it("fills missing fields and takes the guild id from the key", () => {
    const { config } = repairGuildConfig(GUILD, { guildId: "other", maxEmojis: 3 });

    expect(config).toEqual({ ...defaultGuildConfig(GUILD), maxEmojis: 3 });
  });

  it("replaces an entry that is not an object", () => {
    expect(repairGuildConfig(GUILD, "broken").config).toEqual(defaultGuildConfig(GUILD));
  });
});

describe("normalizeDomain", () => {
  it("strips scheme, www and path", () => {
    expect(normalizeDomain(" https://www.Example.com/path?q=1 ")).toBe("example.com");
  });
});

describe("GuildConfigService", () => {
  let store: MemoryDocumentStore;
  let service: GuildConfigService;

  beforeEach(() => {
    store = new MemoryDocumentStore();
    service = new GuildConfigService(store, new LockRegistry());
  });

  it("creates the default config on first use", async () => {
    await expect(service.getConfig(GUILD)).resolves.toEqual(defaultGuildConfig(GUILD));
    expect(JSON.parse(store.getRaw("automod_config") ?? "null")).toEqual({ [GUILD]: defaultGuildConfig(GUILD) });
  });

  it("validates threshold ranges", async () => {
    await expect(service.setThreshold(GUILD, "capsThreshold", 1.5)).resolves.toEqual({
      success: false,
      error: "`capsThreshold` must be a number between 0 and 1.",
    });
    await expect(service.setThreshold(GUILD, "maxLines", 2.5)).resolves.toEqual({
      success: false,
      error: "`maxLines` must be a whole number of at least 0.",
    });
    expect(service.peekConfig(GUILD)).toBeUndefined();
  });

  it("stores a valid threshold", async () => {
    const result = await service.setThreshold(GUILD, "capsThreshold", 0.5);

    expect(result.success).toBe(true);
    expect(service.peekConfig(GUILD)?.capsThreshold).toBe(0.5);
  });

  it("normalizes and deduplicates blocked words", async () => {
    await service.addBlockedWord(GUILD, "  Forbidden ");

    await expect(service.addBlockedWord(GUILD, "FORBIDDEN")).resolves.toEqual({ success: false, error: "`forbidden` is already blocked." });
    await expect(service.addBlockedWord(GUILD, "   ")).resolves.toEqual({ success: false, error: "The blocked word cannot be empty." });
    await expect(service.removeBlockedWord(GUILD, "missing")).resolves.toEqual({ success: false, error: "`missing` is not blocked." });
    expect(service.peekConfig(GUILD)?.blockedWords).toEqual(["forbidden"]);

    await service.removeBlockedWord(GUILD, "Forbidden");
    expect(service.peekConfig(GUILD)?.blockedWords).toEqual([]);
  });

  it("validates whitelisted domains", async () => {
    await expect(service.addLinkDomain(GUILD, "not a domain")).resolves.toEqual({ success: false, error: "`not a domain` is not a valid domain." });

    await service.addLinkDomain(GUILD, "https://www.example.com/");
    expect(service.peekConfig(GUILD)?.linkWhitelist).toEqual(["example.com"]);
  });

  it("repairs a damaged entry on load and writes the repair back", async () => {
    store.setRaw("automod_config", JSON.stringify({ [GUILD]: { ...defaultGuildConfig(GUILD), maxMessages: -3 } }));

    await expect(service.load()).resolves.toEqual({ status: "loaded" });

    expect(service.peekConfig(GUILD)?.maxMessages).toBe(5);
    expect(JSON.parse(store.getRaw("automod_config") ?? "null")[GUILD].maxMessages).toBe(5);
    expect(store.writeCounts.get("automod_config")).toBe(1);
  });

  it("quarantines a document that is not an object", async () => {
    store.setRaw("automod_config", "[1, 2");

    const outcome = await service.load();

    expect(outcome.status).toBe("quarantined");
    expect(service.peekConfig(GUILD)).toBeUndefined();
  });
});
