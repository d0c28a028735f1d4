/**
 * Warning Model - audit trail of warnings issued by moderators or by
 * tier-1 auto-escalation.
 *
 * Document shape: `{ [guildId]: { [userId]: WarningRecord[] } }`
 */

import { z } from "zod";
import { IsoTimestampSchema } from "./Violation.js";

export const WarningRecordSchema = z.object({
  guildId: z.string().min(1),
  userId: z.string().min(1),
  reason: z.string(),
  moderatorId: z.string().min(1),
  timestamp: IsoTimestampSchema,
});

export type WarningRecord = z.infer<typeof WarningRecordSchema>;

export const WarningsDocumentSchema = z.record(z.string(), z.record(z.string(), z.array(WarningRecordSchema)));

export type WarningsDocument = z.infer<typeof WarningsDocumentSchema>;
