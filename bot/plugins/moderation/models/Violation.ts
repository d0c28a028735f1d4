/**
 * Violation Model - per-guild, per-user append-only violation ledger.
 *
 * Document shape: `{ [guildId]: { [userId]: ViolationRecord[] } }`
 */

import { z } from "zod";

// ── Enums ────────────────────────────────────────────────

export enum ViolationType {
  SPAM = "spam",
  EXCESSIVE_CAPS = "excessive_caps",
  MENTION_SPAM = "mention_spam",
  LINE_SPAM = "line_spam",
  EMOJI_SPAM = "emoji_spam",
  BLOCKED_WORDS = "blocked_words",
  MANUAL_WARNING = "manual_warning",
}

/** Human-readable labels for embeds */
export const VIOLATION_LABELS: Record<ViolationType, string> = {
  [ViolationType.SPAM]: "Spam",
  [ViolationType.EXCESSIVE_CAPS]: "Excessive caps",
  [ViolationType.MENTION_SPAM]: "Mention spam",
  [ViolationType.LINE_SPAM]: "Line spam",
  [ViolationType.EMOJI_SPAM]: "Emoji spam",
  [ViolationType.BLOCKED_WORDS]: "Blocked words",
  [ViolationType.MANUAL_WARNING]: "Manual warning",
};

// ── Schema ───────────────────────────────────────────────

export const IsoTimestampSchema = z.string().datetime({ offset: true });

export const SeveritySchema = z.number().int().min(1).max(5);

export const ViolationRecordSchema = z.object({
  guildId: z.string().min(1),
  userId: z.string().min(1),
  type: z.nativeEnum(ViolationType),
  severity: SeveritySchema,
  timestamp: IsoTimestampSchema,
});

export type ViolationRecord = z.infer<typeof ViolationRecordSchema>;

export const ViolationsDocumentSchema = z.record(z.string(), z.record(z.string(), z.array(ViolationRecordSchema)));

export type ViolationsDocument = z.infer<typeof ViolationsDocumentSchema>;
