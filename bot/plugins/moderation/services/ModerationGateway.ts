/**
 * ModerationGateway - the platform operations moderation depends on.
 *
 * Implementations translate platform failures into the shared error taxonomy:
 * NotFoundError when the target is gone, CapabilityError when the service
 * identity is refused, PlatformTransientError for everything else.
 */

import type { APIEmbed } from "discord.js";

export type Capability = "moderate" | "kick" | "ban" | "manageRoles" | "manageMessages" | "manageGuild";

export interface MemberSnapshot {
  userId: string;
  tag: string;
  bot: boolean;
  roleIds: string[];
  /** Position of the member's highest role (0 for @everyone only) */
  highestRolePosition: number;
}

export interface ModerationGateway {
  /** The service identity's user id, or null before the client is ready */
  serviceUserId(): string | null;

  guildOwnerId(guildId: string): Promise<string>;

  /** Null when the user is not a member of the guild */
  fetchMember(guildId: string, userId: string): Promise<MemberSnapshot | null>;

  hasCapability(guildId: string, userId: string, capability: Capability): Promise<boolean>;

  /** Null when the role does not exist */
  rolePosition(guildId: string, roleId: string): Promise<number | null>;

  deleteMessage(guildId: string, channelId: string, messageId: string): Promise<void>;
  timeoutMember(guildId: string, userId: string, durationMs: number, reason: string): Promise<void>;
  kickMember(guildId: string, userId: string, reason: string): Promise<void>;
  banMember(guildId: string, userId: string, reason: string): Promise<void>;
  unbanMember(guildId: string, userId: string, reason: string): Promise<void>;
  addRole(guildId: string, userId: string, roleId: string, reason: string): Promise<void>;
  removeRole(guildId: string, userId: string, roleId: string, reason: string): Promise<void>;

  /** Deny the member Send Messages in every text channel; resolves to the number of channels changed */
  restrictMember(guildId: string, userId: string, reason: string): Promise<number>;

  sendEmbed(guildId: string, channelId: string, embed: APIEmbed): Promise<void>;
}
