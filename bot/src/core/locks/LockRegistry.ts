/**
 * LockRegistry - cooperative per-resource mutexes.
 *
 * Each key holds the tail of a promise chain; `withLock` waits for the
 * current tail and appends itself. Entries are dropped once the chain drains,
 * so the map only ever holds keys with queued or running work.
 *
 * Locks are not reentrant: a task must not request a key it already holds.
 */

import { serializeResourceKey, type ResourceKey } from "./ResourceKey.js";

export class LockRegistry {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `task` while holding `key`. Tasks on the same key run one at a time in
   * arrival order; tasks on different keys are independent.
   */
  async withLock<T>(key: ResourceKey, task: () => Promise<T>): Promise<T> {
    const id = serializeResourceKey(key);
    const previous = this.tails.get(id) ?? Promise.resolve();

    let release: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(id, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(id) === tail) {
        this.tails.delete(id);
      }
    }
  }

  isLocked(key: ResourceKey): boolean {
    return this.tails.has(serializeResourceKey(key));
  }

  /** Number of keys with pending or running work */
  get size(): number {
    return this.tails.size;
  }
}
