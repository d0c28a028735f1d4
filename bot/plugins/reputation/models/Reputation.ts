/**
 * Reputation Model - points, level and recent point changes per member.
 *
 * Document shape: `{ [guildId]: { [userId]: UserReputation } }`
 */

import { z } from "zod";
import { IsoTimestampSchema } from "../../moderation/models/Violation.js";

export const ReputationChangeSchema = z.object({
  change: z.number().int(),
  previousPoints: z.number().int().min(0),
  newPoints: z.number().int().min(0),
  reason: z.string(),
  timestamp: IsoTimestampSchema,
});

export type ReputationChange = z.infer<typeof ReputationChangeSchema>;

export const UserReputationSchema = z.object({
  points: z.number().int().min(0),
  level: z.number().int().min(1),
  history: z.array(ReputationChangeSchema),
});

export type UserReputation = z.infer<typeof UserReputationSchema>;

export const ReputationDocumentSchema = z.record(z.string(), z.record(z.string(), UserReputationSchema));

export type ReputationDocument = z.infer<typeof ReputationDocumentSchema>;

export const REPUTATION_DOCUMENT = "reputation";
