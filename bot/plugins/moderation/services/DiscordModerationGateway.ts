/**
 * DiscordModerationGateway - ModerationGateway over a discord.js client.
 */

import { ChannelType, DiscordAPIError, HTTPError, PermissionFlagsBits, RateLimitError, RESTJSONErrorCodes, type APIEmbed, type Client, type Guild, type GuildMember } from "discord.js";
import { createLogger } from "../../../src/core/Logger.js";
import { CapabilityError, ModerationError, NotFoundError, PlatformTransientError } from "../../../src/core/errors.js";
import type { Capability, MemberSnapshot, ModerationGateway } from "./ModerationGateway.js";

const log = createLogger("moderation:gateway");

const CAPABILITY_FLAGS: Record<Capability, bigint> = {
  moderate: PermissionFlagsBits.ModerateMembers,
  kick: PermissionFlagsBits.KickMembers,
  ban: PermissionFlagsBits.BanMembers,
  manageRoles: PermissionFlagsBits.ManageRoles,
  manageMessages: PermissionFlagsBits.ManageMessages,
  manageGuild: PermissionFlagsBits.ManageGuild,
};

const NOT_FOUND_CODES = new Set<number | string>([
  RESTJSONErrorCodes.UnknownChannel,
  RESTJSONErrorCodes.UnknownGuild,
  RESTJSONErrorCodes.UnknownMember,
  RESTJSONErrorCodes.UnknownMessage,
  RESTJSONErrorCodes.UnknownRole,
  RESTJSONErrorCodes.UnknownUser,
  RESTJSONErrorCodes.UnknownBan,
]);

const CAPABILITY_CODES = new Set<number | string>([RESTJSONErrorCodes.MissingPermissions, RESTJSONErrorCodes.MissingAccess]);

/**
 * Map a discord.js failure onto the moderation error taxonomy
 */
export function translatePlatformError(error: unknown, operation: string): ModerationError {
  if (error instanceof ModerationError) return error;

  if (error instanceof DiscordAPIError) {
    if (NOT_FOUND_CODES.has(error.code)) {
      return new NotFoundError(`${operation}: ${error.message}`, { cause: error });
    }
    if (CAPABILITY_CODES.has(error.code)) {
      return new CapabilityError(`${operation}: missing permission (${error.message})`, { cause: error });
    }
  }

  if (error instanceof RateLimitError) {
    return new PlatformTransientError(`${operation}: rate limited for ${error.timeToReset}ms`, { cause: error });
  }
  if (error instanceof HTTPError) {
    return new PlatformTransientError(`${operation}: HTTP ${error.status}`, { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new PlatformTransientError(`${operation}: ${message}`, { cause: error });
}

export class DiscordModerationGateway implements ModerationGateway {
  constructor(private readonly client: Client) {}

  serviceUserId(): string | null {
    return this.client.user?.id ?? null;
  }

  async guildOwnerId(guildId: string): Promise<string> {
    const guild = await this.guild(guildId);
    return guild.ownerId;
  }

  async fetchMember(guildId: string, userId: string): Promise<MemberSnapshot | null> {
    try {
      const member = await this.member(guildId, userId);
      return {
        userId: member.id,
        tag: member.user.tag,
        bot: member.user.bot,
        roleIds: [...member.roles.cache.keys()],
        highestRolePosition: member.roles.highest.position,
      };
    } catch (error) {
      if (error instanceof NotFoundError) return null;
      throw error;
    }
  }

  async hasCapability(guildId: string, userId: string, capability: Capability): Promise<boolean> {
    try {
      const member = await this.member(guildId, userId);
      return member.permissions.has(CAPABILITY_FLAGS[capability]);
    } catch (error) {
      if (error instanceof NotFoundError) return false;
      throw error;
    }
  }

  async rolePosition(guildId: string, roleId: string): Promise<number | null> {
    const guild = await this.guild(guildId);
    const role = await this.call("fetch role", () => guild.roles.fetch(roleId));
    return role?.position ?? null;
  }

  async deleteMessage(guildId: string, channelId: string, messageId: string): Promise<void> {
    const guild = await this.guild(guildId);
    const channel = await this.call("fetch channel", () => guild.channels.fetch(channelId));
    if (!channel?.isTextBased()) {
      throw new NotFoundError(`Channel ${channelId} is not a text channel in guild ${guildId}`);
    }
    await this.call("delete message", () => channel.messages.delete(messageId));
  }

  async timeoutMember(guildId: string, userId: string, durationMs: number, reason: string): Promise<void> {
    const member = await this.member(guildId, userId);
    await this.call("timeout member", () => member.timeout(durationMs, reason));
  }

  async kickMember(guildId: string, userId: string, reason: string): Promise<void> {
    const member = await this.member(guildId, userId);
    await this.call("kick member", () => member.kick(reason));
  }

  async banMember(guildId: string, userId: string, reason: string): Promise<void> {
    const guild = await this.guild(guildId);
    await this.call("ban member", () => guild.bans.create(userId, { reason }));
  }

  async unbanMember(guildId: string, userId: string, reason: string): Promise<void> {
    const guild = await this.guild(guildId);
    await this.call("unban member", () => guild.bans.remove(userId, reason));
  }

  async addRole(guildId: string, userId: string, roleId: string, reason: string): Promise<void> {
    const member = await this.member(guildId, userId);
    await this.call("add role", () => member.roles.add(roleId, reason));
  }

  async removeRole(guildId: string, userId: string, roleId: string, reason: string): Promise<void> {
    const member = await this.member(guildId, userId);
    await this.call("remove role", () => member.roles.remove(roleId, reason));
  }

  async restrictMember(guildId: string, userId: string, reason: string): Promise<number> {
    const guild = await this.guild(guildId);
    const channels = await this.call("fetch channels", () => guild.channels.fetch());

    let changed = 0;
    for (const channel of channels.values()) {
      if (channel?.type !== ChannelType.GuildText) continue;
      await this.call("restrict member", () => channel.permissionOverwrites.edit(userId, { SendMessages: false }, { reason }));
      changed++;
    }
    return changed;
  }

  async sendEmbed(guildId: string, channelId: string, embed: APIEmbed): Promise<void> {
    const guild = await this.guild(guildId);
    const channel = await this.call("fetch channel", () => guild.channels.fetch(channelId));
    if (!channel?.isTextBased()) {
      throw new NotFoundError(`Channel ${channelId} is not a text channel in guild ${guildId}`);
    }
    await this.call("send embed", () => channel.send({ embeds: [embed] }));
  }

  // ── Helpers ────────────────────────────────────────────

  private guild(guildId: string): Promise<Guild> {
    return this.call("fetch guild", () => this.client.guilds.fetch(guildId));
  }

  private async member(guildId: string, userId: string): Promise<GuildMember> {
    const guild = await this.guild(guildId);
    return this.call("fetch member", () => guild.members.fetch(userId));
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const translated = translatePlatformError(error, operation);
      log.debug(`${operation} failed (${translated.code}):`, error);
      throw translated;
    }
  }
}
