/**
 * Typed lock keys. Every kind serializes to its own prefix, so a user id can
 * never collide with a sanction key or a guild id.
 */

export type UserKey = { kind: "user"; guildId: string; userId: string };
export type GuildKey = { kind: "guild"; guildId: string };
export type SanctionKey = { kind: "sanction"; sanctionKey: string };
export type DocumentKey = { kind: "document"; name: string };

export type ResourceKey = UserKey | GuildKey | SanctionKey | DocumentKey;

export const userKey = (guildId: string, userId: string): UserKey => ({ kind: "user", guildId, userId });
export const guildKey = (guildId: string): GuildKey => ({ kind: "guild", guildId });
export const sanctionKey = (key: string): SanctionKey => ({ kind: "sanction", sanctionKey: key });
export const documentKey = (name: string): DocumentKey => ({ kind: "document", name });

export function serializeResourceKey(key: ResourceKey): string {
  switch (key.kind) {
    case "user":
      return `user:${key.guildId}:${key.userId}`;
    case "guild":
      return `guild:${key.guildId}`;
    case "sanction":
      return `sanction:${key.sanctionKey}`;
    case "document":
      return `document:${key.name}`;
  }
}
