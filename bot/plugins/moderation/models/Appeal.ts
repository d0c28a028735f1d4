/**
 * Appeal Model - member appeals against sanctions. Storage only; moderators
 * review them by hand.
 *
 * Document shape: `{ [guildId]: Appeal[] }`
 */

import { z } from "zod";
import { IsoTimestampSchema } from "./Violation.js";

export enum AppealStatus {
  PENDING = "pending",
  APPROVED = "approved",
  DENIED = "denied",
}

export const AppealSchema = z.object({
  id: z.string().min(1),
  guildId: z.string().min(1),
  userId: z.string().min(1),
  reason: z.string(),
  status: z.nativeEnum(AppealStatus),
  createdAt: IsoTimestampSchema,
  reviewedBy: z.string().optional(),
  reviewedAt: IsoTimestampSchema.optional(),
});

export type Appeal = z.infer<typeof AppealSchema>;

export const AppealsDocumentSchema = z.record(z.string(), z.array(AppealSchema));

export type AppealsDocument = z.infer<typeof AppealsDocumentSchema>;
