/**
 * CommandCooldowns - per-user, per-command rate limit for slash commands.
 * Commands opt in through `config.cooldown` (seconds).
 */

export class CommandCooldowns {
  /** `command:user` → time of the last accepted use */
  private readonly lastUsed = new Map<string, number>();
  /** Longest cooldown seen; older uses can no longer block anything */
  private longestMs = 0;

  constructor(private readonly clock: () => number = Date.now) {}

  /**
   * Milliseconds before `userId` may run `command` again. A zero result
   * records the use.
   */
  take(command: string, userId: string, cooldownSeconds: number): number {
    if (cooldownSeconds <= 0) return 0;

    const key = `${command}:${userId}`;
    const now = this.clock();
    const last = this.lastUsed.get(key);
    const remaining = last === undefined ? 0 : last + cooldownSeconds * 1000 - now;
    if (remaining > 0) return remaining;

    this.longestMs = Math.max(this.longestMs, cooldownSeconds * 1000);
    for (const [staleKey, at] of this.lastUsed) {
      if (now - at >= this.longestMs) this.lastUsed.delete(staleKey);
    }
    this.lastUsed.set(key, now);
    return 0;
  }

  /** Uses still tracked */
  get size(): number {
    return this.lastUsed.size;
  }
}
