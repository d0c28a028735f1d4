/**
 * GuildConfig Model - Per-guild automod thresholds.
 *
 * Document shape: `{ [guildId]: GuildConfig }`. Entries with bad or missing
 * fields are repaired field by field on load instead of being discarded.
 */

import { z } from "zod";

// ── Defaults ─────────────────────────────────────────────

export const DEFAULT_THRESHOLDS = {
  maxMentions: 5,
  maxMessages: 5,
  timeframeSeconds: 5,
  maxLines: 10,
  maxEmojis: 10,
  capsThreshold: 0.7,
} as const;

export type ThresholdKey = keyof typeof DEFAULT_THRESHOLDS;

export const THRESHOLD_KEYS: readonly ThresholdKey[] = ["maxMentions", "maxMessages", "timeframeSeconds", "maxLines", "maxEmojis", "capsThreshold"];

// ── Schema ───────────────────────────────────────────────

const count = z.number().int().min(0);
const ratio = z.number().min(0).max(1);

export const GuildConfigSchema = z.object({
  guildId: z.string().min(1),
  maxMentions: count,
  maxMessages: count,
  timeframeSeconds: count,
  maxLines: count,
  maxEmojis: count,
  capsThreshold: ratio,
  blockedWords: z.array(z.string()),
  linkWhitelist: z.array(z.string()),
  automodEnabled: z.boolean(),
});

export type GuildConfig = z.infer<typeof GuildConfigSchema>;
export type GuildConfigDocument = Record<string, GuildConfig>;

/** Schema for a single threshold update */
export const THRESHOLD_SCHEMAS: Record<ThresholdKey, z.ZodNumber> = {
  maxMentions: count,
  maxMessages: count,
  timeframeSeconds: count,
  maxLines: count,
  maxEmojis: count,
  capsThreshold: ratio,
};

export function defaultGuildConfig(guildId: string): GuildConfig {
  return {
    guildId,
    ...DEFAULT_THRESHOLDS,
    blockedWords: [],
    linkWhitelist: [],
    automodEnabled: true,
  };
}

// ── Repair ───────────────────────────────────────────────

const ObjectSchema = z.record(z.string(), z.unknown());

const RepairSchema = z.object({
  maxMentions: count.catch(DEFAULT_THRESHOLDS.maxMentions),
  maxMessages: count.catch(DEFAULT_THRESHOLDS.maxMessages),
  timeframeSeconds: count.catch(DEFAULT_THRESHOLDS.timeframeSeconds),
  maxLines: count.catch(DEFAULT_THRESHOLDS.maxLines),
  maxEmojis: count.catch(DEFAULT_THRESHOLDS.maxEmojis),
  capsThreshold: ratio.catch(DEFAULT_THRESHOLDS.capsThreshold),
  blockedWords: z.array(z.string()).catch([]),
  linkWhitelist: z.array(z.string()).catch([]),
  automodEnabled: z.boolean().catch(true),
});

export interface RepairResult {
  config: GuildConfig;
  /** Top-level fields that were replaced by their defaults */
  repairedFields: string[];
}

/**
 * Validate one stored entry, replacing each invalid or missing field with its
 * default. The guild id always comes from the document key.
 */
export function repairGuildConfig(guildId: string, raw: unknown): RepairResult {
  const objectResult = ObjectSchema.safeParse(raw);
  const input = objectResult.success ? { ...objectResult.data, guildId } : { guildId };

  const strict = GuildConfigSchema.safeParse(input);
  if (strict.success) {
    return { config: strict.data, repairedFields: objectResult.success ? [] : ["<root>"] };
  }

  const fields = new Set<string>();
  for (const issue of strict.error.issues) {
    const [field] = issue.path;
    fields.add(field === undefined ? "<root>" : String(field));
  }

  return {
    config: { guildId, ...RepairSchema.parse(input) },
    repairedFields: [...fields],
  };
}

/**
 * Document schema that repairs entries instead of failing; `onRepair` hears
 * about every entry that needed it.
 */
export function createGuildConfigDocumentSchema(onRepair: (guildId: string, fields: string[]) => void): z.ZodType<GuildConfigDocument, z.ZodTypeDef, unknown> {
  return ObjectSchema.transform((entries) => {
    const document: GuildConfigDocument = {};
    for (const [guildId, raw] of Object.entries(entries)) {
      const { config, repairedFields } = repairGuildConfig(guildId, raw);
      if (repairedFields.length > 0) onRepair(guildId, repairedFields);
      document[guildId] = config;
    }
    return document;
  });
}
