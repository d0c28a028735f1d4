import { beforeEach, describe, it, expect } from "vitest";
import { LockRegistry } from "../../src/core/locks/LockRegistry.js";
import { MemoryDocumentStore } from "../../src/core/store/MemoryDocumentStore.js";
import { LogChannelType } from "../../plugins/logging/models/LogChannels.js";
import { AuditLogService } from "../../plugins/logging/services/AuditLogService.js";
import { LoggingEventService, type MessageSnapshot } from "../../plugins/logging/services/LoggingEventService.js";
import { truncateField } from "../../plugins/logging/utils/embeds.js";
import { FakeGateway } from "../helpers/FakeGateway.js";
import { GUILD, MEMBER, MODERATOR } from "../helpers/harness.js";

const ALL_CHANNEL = "200000000000000001";
const MEMBER_CHANNEL = "200000000000000003";
const MESSAGE_CHANNEL = "200000000000000004";
const TEXT_CHANNEL = "200000000000000009";

function message(overrides: Partial<MessageSnapshot> = {}): MessageSnapshot {
  return {
    guildId: GUILD,
    channelId: TEXT_CHANNEL,
    messageId: "500000000000000001",
    authorId: MEMBER,
    authorBot: false,
    content: "hello",
    attachments: [],
    ...overrides,
  };
}

describe("LoggingEventService", () => {
  let gateway: FakeGateway;
  let auditLog: AuditLogService;
  let service: LoggingEventService;

  beforeEach(async () => {
    gateway = new FakeGateway();
    auditLog = new AuditLogService(new MemoryDocumentStore(), new LockRegistry(), gateway);
    service = new LoggingEventService(auditLog, () => 1_000);
    await auditLog.setChannel(GUILD, LogChannelType.MEMBER, MEMBER_CHANNEL, MODERATOR);
    await auditLog.setChannel(GUILD, LogChannelType.MESSAGE, MESSAGE_CHANNEL, MODERATOR);
    gateway.sent.length = 0;
  });

  it("logs a join to the member channel", async () => {
    await expect(
      service.handleMemberJoin({ guildId: GUILD, userId: MEMBER, tag: "member#0001", createdAt: new Date(86_400_000), joinedAt: new Date(0), roleIds: [] }),
    ).resolves.toBe(true);

    const [sent] = gateway.sent;
    expect(sent?.channelId).toBe(MEMBER_CHANNEL);
    expect(sent?.embed.title).toBe("👋 Member Joined");
    expect(sent?.embed.timestamp).toBe("1970-01-01T00:00:01.000Z");
    expect(sent?.embed.fields?.map((field) => field.value)).toEqual([`<@${MEMBER}> (\`${MEMBER}\`)`, "<t:86400:R>"]);
  });

  it("lists the roles of a member who left", async () => {
    await service.handleMemberLeave({ guildId: GUILD, userId: MEMBER, tag: "member#0001", createdAt: new Date(0), joinedAt: null, roleIds: ["300000000000000005"] });

    const embed = gateway.sent[0]?.embed;
    expect(embed?.title).toBe("👋 Member Left");
    expect(embed?.fields?.map((field) => [field.name, field.value])).toEqual([
      ["Member", `<@${MEMBER}> (\`${MEMBER}\`)`],
      ["Joined Server", "*Unknown*"],
      ["Roles", "<@&300000000000000005>"],
    ]);
  });

  it("logs a deleted message with its attachments", async () => {
    await service.handleMessageDelete(message({ attachments: [{ name: "a.png", url: "https://cdn.example.com/a.png" }] }));

    const [sent] = gateway.sent;
    expect(sent?.channelId).toBe(MESSAGE_CHANNEL);
    expect(sent?.embed.title).toBe("🗑️ Message Deleted");
    expect(sent?.embed.fields?.slice(3).map((field) => [field.name, field.value])).toEqual([
      ["Content", "hello"],
      ["📎 Attachments (1)", "• [a.png](https://cdn.example.com/a.png)"],
    ]);
  });

  it("notes when a deleted message was not cached", async () => {
    await service.handleMessageDelete(message({ authorId: null, content: null }));

    const embed = gateway.sent[0]?.embed;
    expect(embed?.fields?.[0]?.value).toBe("*Unknown*");
    expect(embed?.fields?.[3]?.value).toBe("*Not available, the message was not cached*");
    expect(embed?.footer).toBeUndefined();
  });

  it("ignores deleted bot messages", async () => {
    await expect(service.handleMessageDelete(message({ authorBot: true }))).resolves.toBe(false);
    expect(gateway.sent).toHaveLength(0);
  });

  it("logs an edit with both versions", async () => {
    await service.handleMessageUpdate(message(), message({ content: "hello there", url: "https://discord.com/channels/1/2/3" }));

    const embed = gateway.sent[0]?.embed;
    expect(embed?.title).toBe("✏️ Message Edited");
    expect(embed?.description).toBe("[Jump to Message](https://discord.com/channels/1/2/3)");
    expect(embed?.fields?.slice(3).map((field) => [field.name, field.value])).toEqual([
      ["Before", "hello"],
      ["After", "hello there"],
    ]);
  });

  it("skips an update that leaves the content unchanged", async () => {
    await expect(service.handleMessageUpdate(message(), message())).resolves.toBe(false);
    expect(gateway.sent).toHaveLength(0);
  });

  it("sends bans to the mod channel, falling back to all", async () => {
    await auditLog.setChannel(GUILD, LogChannelType.ALL, ALL_CHANNEL, MODERATOR);
    gateway.sent.length = 0;

    await service.handleBanAdd({ guildId: GUILD, userId: MEMBER, tag: "member#0001", reason: null });

    const [sent] = gateway.sent;
    expect(sent?.channelId).toBe(ALL_CHANNEL);
    expect(sent?.embed.title).toBe("🔨 Member Banned");
    expect(sent?.embed.fields?.[1]?.value).toBe("No reason provided");
  });

  it("sends nothing for a guild without log channels", async () => {
    await expect(service.handleMemberJoin({ guildId: "100000000000000099", userId: MEMBER, tag: "member#0001", createdAt: new Date(0), joinedAt: null, roleIds: [] })).resolves.toBe(false);
    expect(gateway.sent).toHaveLength(0);
  });
});

describe("truncateField", () => {
  it("keeps short values", () => {
    expect(truncateField("short")).toBe("short");
  });

  it("cuts long values to the field limit", () => {
    const value = truncateField("x".repeat(2_000));
    expect(value).toHaveLength(1024);
    expect(value.endsWith("x...")).toBe(true);
  });
});
