/**
 * Level curve: level n starts at (n - 1)² × 100 points.
 */

export function calculateLevel(points: number): number {
  return Math.max(1, Math.floor(Math.sqrt(Math.max(0, points) / 100)) + 1);
}

/** Points at which `level` begins */
export function levelThreshold(level: number): number {
  return (level - 1) ** 2 * 100;
}

/** Percentage of the way from the current level to the next, 0-100 */
export function levelProgress(points: number, level: number): number {
  const current = levelThreshold(level);
  const next = levelThreshold(level + 1);
  return ((points - current) / (next - current)) * 100;
}
