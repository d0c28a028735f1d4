/**
 * TemporarySanction Model - time-bounded bans and role grants awaiting reversal.
 *
 * Document shape: `{ [key]: TemporarySanction }` where key is
 * `{guildId}:{userId}` for bans and `{guildId}:{userId}:{roleId}` for roles.
 */

import { z } from "zod";
import { IsoTimestampSchema } from "./Violation.js";

const SanctionBaseSchema = z.object({
  key: z.string().min(1),
  guildId: z.string().min(1),
  userId: z.string().min(1),
  expiresAt: IsoTimestampSchema,
  createdAt: IsoTimestampSchema,
  reason: z.string().optional(),
  moderatorId: z.string().optional(),
});

export const TemporaryBanSchema = SanctionBaseSchema.extend({
  action: z.literal("ban"),
});

export const TemporaryRoleSchema = SanctionBaseSchema.extend({
  action: z.literal("role"),
  roleId: z.string().min(1),
});

export const TemporarySanctionSchema = z.discriminatedUnion("action", [TemporaryBanSchema, TemporaryRoleSchema]);

export type TemporarySanction = z.infer<typeof TemporarySanctionSchema>;

export const TemporarySanctionsDocumentSchema = z.record(z.string(), TemporarySanctionSchema);

export type TemporarySanctionsDocument = z.infer<typeof TemporarySanctionsDocumentSchema>;

export function temporaryBanKey(guildId: string, userId: string): string {
  return `${guildId}:${userId}`;
}

export function temporaryRoleKey(guildId: string, userId: string, roleId: string): string {
  return `${guildId}:${userId}:${roleId}`;
}
