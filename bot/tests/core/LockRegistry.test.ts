import { describe, it, expect } from "vitest";
import { LockRegistry } from "../../src/core/locks/LockRegistry.js";
import { guildKey, sanctionKey, serializeResourceKey, userKey } from "../../src/core/locks/ResourceKey.js";

/** Resolves after the current microtask queue has drained */
const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("LockRegistry", () => {
  it("runs tasks on the same key one at a time, in arrival order", async () => {
    const locks = new LockRegistry();
    const order: string[] = [];
    let releaseFirst: () => void = () => {};
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = locks.withLock(userKey("g1", "u1"), async () => {
      order.push("first:start");
      await firstGate;
      order.push("first:end");
    });
    const second = locks.withLock(userKey("g1", "u1"), async () => {
      order.push("second");
    });

    await tick();
    expect(order).toEqual(["first:start"]);

    releaseFirst();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not block tasks on different keys", async () => {
    const locks = new LockRegistry();
    let releaseFirst: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const blocked = locks.withLock(userKey("g1", "u1"), () => gate);
    const other = await locks.withLock(userKey("g1", "u2"), async () => "done");

    expect(other).toBe("done");
    releaseFirst();
    await blocked;
  });

  it("releases the key when the task throws", async () => {
    const locks = new LockRegistry();

    await expect(
      locks.withLock(guildKey("g1"), async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(locks.isLocked(guildKey("g1"))).toBe(false);
    await expect(locks.withLock(guildKey("g1"), async () => 42)).resolves.toBe(42);
  });

  it("drops entries once the chain drains", async () => {
    const locks = new LockRegistry();
    await Promise.all([locks.withLock(userKey("g1", "u1"), async () => 1), locks.withLock(userKey("g1", "u1"), async () => 2)]);

    expect(locks.size).toBe(0);
  });

  it("never lets different key kinds collide", () => {
    expect(serializeResourceKey(userKey("1", "2"))).toBe("user:1:2");
    expect(serializeResourceKey(sanctionKey("1:2"))).toBe("sanction:1:2");
    expect(serializeResourceKey(guildKey("1"))).toBe("guild:1");
  });
});
