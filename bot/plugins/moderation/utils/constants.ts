/**
 * Shared constants for the moderation plugin.
 */

/** Discord's maximum timeout duration (28 days in ms) */
export const MAX_TIMEOUT_MS = 28 * 24 * 60 * 60 * 1000;

/** Longest temporary ban or role (365 days in ms) */
export const MAX_DURATION_MS = 365 * 24 * 60 * 60 * 1000;

/** Violations younger than this count toward the escalation tier (30 days) */
export const ACTIVE_VIOLATION_WINDOW_MS = 30 * 24 * 60 * 60 * 1000;

/** Highest escalation tier */
export const MAX_TIER = 5;

/** Maximum length of a moderator-supplied reason */
export const MAX_REASON_LENGTH = 1000;

export const DEFAULT_REASON = "No reason provided";

/** Per-moderator cooldown on warn, kick, ban, temprole and restrict (seconds) */
export const MOD_COMMAND_COOLDOWN_SECONDS = 3;

/** Persisted document names */
export const DOCUMENTS = {
  CONFIG: "automod_config",
  WARNINGS: "warnings",
  VIOLATIONS: "violations",
  TEMP_ACTIONS: "temp_actions",
  ROLE_WHITELIST: "role_whitelist",
  APPEALS: "appeals",
} as const;

/** Embed colors for different action types */
export const ACTION_COLORS = {
  warn: 0xeab308,
  kick: 0xf97316,
  ban: 0xef4444,
  timeout: 0x8b5cf6,
  unban: 0x22c55e,
  automod: 0x3b82f6,
  escalation: 0xdc2626,
  info: 0x64748b,
} as const;
