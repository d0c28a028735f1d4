/**
 * LogChannels Model - audit log destinations per guild.
 *
 * Document shape: `{ [guildId]: { all?, mod?, member?, message? } }`, each a
 * channel id.
 */

import { z } from "zod";

export enum LogChannelType {
  /** Fallback for every audit entry */
  ALL = "all",
  /** Sanctions and moderator actions */
  MOD = "mod",
  /** Joins and leaves */
  MEMBER = "member",
  /** Deleted and edited messages */
  MESSAGE = "message",
}

export const LOG_CHANNEL_TYPES: readonly LogChannelType[] = [LogChannelType.ALL, LogChannelType.MOD, LogChannelType.MEMBER, LogChannelType.MESSAGE];

export function isLogChannelType(value: string): value is LogChannelType {
  return LOG_CHANNEL_TYPES.some((type) => type === value);
}

const ChannelIdSchema = z.string().min(1);

export const GuildLogChannelsSchema = z.object({
  [LogChannelType.ALL]: ChannelIdSchema.optional(),
  [LogChannelType.MOD]: ChannelIdSchema.optional(),
  [LogChannelType.MEMBER]: ChannelIdSchema.optional(),
  [LogChannelType.MESSAGE]: ChannelIdSchema.optional(),
});

export type GuildLogChannels = z.infer<typeof GuildLogChannelsSchema>;

export const LogChannelsDocumentSchema = z.record(z.string(), GuildLogChannelsSchema);

export type LogChannelsDocument = z.infer<typeof LogChannelsDocumentSchema>;

export const LOG_CHANNELS_DOCUMENT = "log_channels";
