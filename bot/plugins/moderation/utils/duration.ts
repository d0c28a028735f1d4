/**
 * Duration strings: one or more `<n><unit>` segments, e.g. `30m`, `1d12h`.
 */

import { ValidationError } from "../../../src/core/errors.js";
import { MAX_DURATION_MS } from "./constants.js";

const UNIT_MS: Record<string, number> = {
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
};

const DURATION_PATTERN = /^(\d+[smhdw])+$/;
const SEGMENT_PATTERN = /(\d+)([smhdw])/g;

/**
 * Parse a duration string into milliseconds.
 * @throws ValidationError when the string is not a positive duration of at most {@link MAX_DURATION_MS}
 */
export function parseDuration(input: string): number {
  const normalized = input.trim().toLowerCase().replace(/\s+/g, "");
  if (!DURATION_PATTERN.test(normalized)) {
    throw new ValidationError(`Invalid duration "${input}". Use a number followed by s, m, h, d or w (e.g. 30m, 1d12h).`);
  }

  let total = 0;
  for (const [, amount, unit] of normalized.matchAll(SEGMENT_PATTERN)) {
    const unitMs = unit === undefined ? undefined : UNIT_MS[unit];
    if (amount === undefined || unitMs === undefined) continue;
    total += Number(amount) * unitMs;
  }

  const problem = durationError(total);
  if (problem) throw new ValidationError(`Invalid duration "${input}". ${problem}`);
  return total;
}

/** Why a sanction of `ms` starting at `now` cannot be tracked, if it cannot */
export function durationError(ms: number, now = 0, subject = "The duration"): string | undefined {
  if (!(ms > 0)) return `${subject} must be greater than zero.`;
  if (ms > MAX_DURATION_MS) return `${subject} must be at most ${formatDuration(MAX_DURATION_MS)}.`;
  if (!Number.isFinite(new Date(now + ms).getTime())) return `${subject} ends past the latest supported date.`;
  return undefined;
}

/** `1d 2h 3m 4s`, omitting zero parts */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const days = Math.floor(totalSeconds / 86400);
  const hours = Math.floor((totalSeconds % 86400) / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (seconds > 0) parts.push(`${seconds}s`);

  return parts.length > 0 ? parts.join(" ") : "0s";
}
