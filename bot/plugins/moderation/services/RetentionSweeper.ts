/**
 * RetentionSweeper - Periodic best-effort cleanup
 *
 * Plugins register named tasks (violation pruning, reputation history
 * trimming, idle spam windows). A failing task is logged and the rest still
 * run.
 */

import { createLogger } from "../../../src/core/Logger.js";

const log = createLogger("moderation:retention");

/** Returns how many items it removed */
export type RetentionTask = (now: number) => Promise<number> | number;

export class RetentionSweeper {
  private interval: ReturnType<typeof setInterval> | null = null;
  private processing = false;
  private tasks = new Map<string, RetentionTask>();

  constructor(private readonly intervalMs = 60 * 60 * 1000) {}

  register(name: string, task: RetentionTask): void {
    if (this.tasks.has(name)) log.warn(`Retention task "${name}" already registered, overwriting`);
    this.tasks.set(name, task);
  }

  unregister(name: string): void {
    this.tasks.delete(name);
  }

  start(): void {
    if (this.interval) {
      log.warn("RetentionSweeper already running");
      return;
    }
    this.interval = setInterval(() => {
      void this.sweep();
    }, this.intervalMs);
    log.info(`RetentionSweeper started (every ${this.intervalMs}ms)`);
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
    log.info("RetentionSweeper stopped");
  }

  /** Run every task once; returns removals per task, or null if already sweeping */
  async sweep(now: number = Date.now()): Promise<Record<string, number> | null> {
    if (this.processing) return null;
    this.processing = true;

    const removed: Record<string, number> = {};
    try {
      for (const [name, task] of this.tasks) {
        try {
          removed[name] = await task(now);
        } catch (error) {
          log.error(`Retention task "${name}" failed:`, error);
        }
      }
    } finally {
      this.processing = false;
    }

    log.debug("Retention sweep finished:", removed);
    return removed;
  }
}
