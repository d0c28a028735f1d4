/**
 * RoleWhitelist Model - roles whose holders skip automod entirely.
 *
 * Document shape: `{ [guildId]: roleId[] }`
 */

import { z } from "zod";

export const RoleWhitelistDocumentSchema = z.record(z.string(), z.array(z.string().min(1)));

export type RoleWhitelistDocument = z.infer<typeof RoleWhitelistDocumentSchema>;
