/**
 * Escalation tier table. Index 0 is tier 1; the last entry is the cap.
 */

import { MAX_TIER } from "./constants.js";

export type PunishmentAction = "warn" | "timeout" | "ban";

export interface PunishmentSpec {
  action: PunishmentAction;
  /** Only set for timeouts; bans from escalation are permanent */
  durationMs?: number;
}

export const PUNISHMENT_TIERS: readonly PunishmentSpec[] = [
  { action: "warn" },
  { action: "timeout", durationMs: 30 * 60 * 1000 },
  { action: "timeout", durationMs: 2 * 60 * 60 * 1000 },
  { action: "timeout", durationMs: 24 * 60 * 60 * 1000 },
  { action: "ban" },
];

/** Tier for a number of active violations: 0 when clean, capped at MAX_TIER */
export function tierForCount(activeCount: number): number {
  return Math.max(0, Math.min(MAX_TIER, Math.floor(activeCount)));
}

/** Punishment for a tier (1-based); tiers outside the table clamp to its ends */
export function punishmentForTier(tier: number): PunishmentSpec {
  const index = Math.max(1, Math.min(PUNISHMENT_TIERS.length, tier)) - 1;
  const spec = PUNISHMENT_TIERS[index];
  if (!spec) throw new RangeError(`No punishment configured for tier ${tier}`);
  return spec;
}

/** "Warn", "Timeout", "Ban" */
export function actionLabel(action: PunishmentAction): string {
  return action.charAt(0).toUpperCase() + action.slice(1);
}
