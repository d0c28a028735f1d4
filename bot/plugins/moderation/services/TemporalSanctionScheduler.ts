/**
 * TemporalSanctionScheduler - Reverses expired temporary sanctions on interval
 *
 * Runs every 60 seconds by default and once immediately on start. Each
 * expired entry gets exactly one reversal attempt; the entry is deleted even
 * when the attempt fails.
 */

import { createLogger } from "../../../src/core/Logger.js";
import { isModerationError, NotFoundError } from "../../../src/core/errors.js";
import { sanctionKey } from "../../../src/core/locks/ResourceKey.js";
import type { LockRegistry } from "../../../src/core/locks/LockRegistry.js";
import type { TemporarySanction } from "../models/TemporarySanction.js";
import { systemClock, type Clock } from "../types/index.js";
import type { ModerationGateway } from "./ModerationGateway.js";
import { ModerationEventType, type ModerationEventBus } from "./ModerationEventBus.js";
import type { TemporarySanctionService } from "./TemporarySanctionService.js";

const log = createLogger("moderation:scheduler");

export interface TickResult {
  /** Entries removed this tick */
  processed: number;
  /** Of those, how many were actually reversed on the platform */
  reversed: number;
}

export class TemporalSanctionScheduler {
  private interval: ReturnType<typeof setInterval> | null = null;
  private processing = false;

  constructor(
    private readonly sanctions: TemporarySanctionService,
    private readonly gateway: ModerationGateway,
    private readonly bus: ModerationEventBus,
    private readonly locks: LockRegistry,
    private readonly intervalMs = 60_000, // 1 minute
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Start the scheduler
   */
  start(): void {
    if (this.interval) {
      log.warn("TemporalSanctionScheduler already running");
      return;
    }

    this.interval = setInterval(() => {
      void this.runTick();
    }, this.intervalMs);
    log.info(`TemporalSanctionScheduler started (every ${this.intervalMs}ms)`);

    // Process immediately on start
    void this.runTick();
  }

  /**
   * Stop the scheduler
   */
  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
    log.info("TemporalSanctionScheduler stopped");
  }

  get running(): boolean {
    return this.interval !== null;
  }

  /**
   * Reverse everything due at `now`. Returns null when a tick is already in
   * progress.
   */
  async tick(now: number = this.clock()): Promise<TickResult | null> {
    // Prevent overlapping ticks
    if (this.processing) {
      log.debug("TemporalSanctionScheduler already processing, skipping");
      return null;
    }

    this.processing = true;
    const result: TickResult = { processed: 0, reversed: 0 };

    try {
      const due = this.sanctions.listExpired(now);
      if (due.length > 0) {
        log.debug(`Processing ${due.length} expired sanction(s)`);
      }

      for (const candidate of due) {
        const outcome = await this.expire(candidate.key, now);
        if (outcome === "skipped") continue;
        result.processed++;
        if (outcome === "reversed") result.reversed++;
      }
    } finally {
      this.processing = false;
    }

    return result;
  }

  private async runTick(): Promise<void> {
    try {
      await this.tick();
    } catch (error) {
      log.error("TemporalSanctionScheduler error:", error);
    }
  }

  private async expire(key: string, now: number): Promise<"reversed" | "failed" | "skipped"> {
    const outcome = await this.locks.withLock(sanctionKey(key), async () => {
      // Removed or replaced since the scan
      const sanction = this.sanctions.get(key);
      if (!sanction || Date.parse(sanction.expiresAt) > now) return null;

      const reversed = await this.reverse(sanction);
      this.sanctions.removeUnlocked(key);
      try {
        await this.sanctions.save();
      } catch (error) {
        log.error(`Failed to persist removal of sanction ${key}:`, error);
      }
      return { sanction, reversed };
    });

    if (!outcome) return "skipped";

    this.bus.publish(ModerationEventType.SANCTION_EXPIRED, {
      guildId: outcome.sanction.guildId,
      userId: outcome.sanction.userId,
      timestamp: new Date(this.clock()),
      sanction: outcome.sanction,
      reversed: outcome.reversed,
    });
    return outcome.reversed ? "reversed" : "failed";
  }

  /** One attempt; a target that is already gone counts as reversed */
  private async reverse(sanction: TemporarySanction): Promise<boolean> {
    try {
      if (sanction.action === "ban") {
        await this.gateway.unbanMember(sanction.guildId, sanction.userId, "Temporary ban expired");
      } else {
        await this.gateway.removeRole(sanction.guildId, sanction.userId, sanction.roleId, "Temporary role expired");
      }
      log.info(`Reversed temporary ${sanction.action} ${sanction.key}`);
      return true;
    } catch (error) {
      if (error instanceof NotFoundError) {
        log.info(`Temporary ${sanction.action} ${sanction.key} had nothing left to reverse: ${error.message}`);
        return true;
      }
      const detail = isModerationError(error) ? `${error.code}: ${error.message}` : error;
      log.warn(`Could not reverse temporary ${sanction.action} ${sanction.key}, dropping it:`, detail);
      return false;
    }
  }
}
