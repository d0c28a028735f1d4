import { afterEach, describe, it, expect, vi } from "vitest";
import { RetentionSweeper } from "../../plugins/moderation/services/RetentionSweeper.js";

describe("RetentionSweeper", () => {
  const sweeper = new RetentionSweeper(60_000);

  afterEach(() => {
    sweeper.stop();
    sweeper.unregister("first");
    sweeper.unregister("broken");
    sweeper.unregister("last");
  });

  it("runs every task with the same timestamp", async () => {
    const first = vi.fn(() => 2);
    const last = vi.fn(async () => 0);
    sweeper.register("first", first);
    sweeper.register("last", last);

    await expect(sweeper.sweep(1_000)).resolves.toEqual({ first: 2, last: 0 });
    expect(first).toHaveBeenCalledWith(1_000);
    expect(last).toHaveBeenCalledWith(1_000);
  });

  it("keeps going past a failing task", async () => {
    sweeper.register("broken", () => {
      throw new Error("disk full");
    });
    sweeper.register("last", () => 1);

    await expect(sweeper.sweep(1_000)).resolves.toEqual({ last: 1 });
  });

  it("skips an overlapping sweep", async () => {
    let release: () => void = () => {};
    sweeper.register("first", () => new Promise<number>((resolve) => (release = () => resolve(0))));

    const running = sweeper.sweep(1_000);
    await expect(sweeper.sweep(1_000)).resolves.toBeNull();
    release();
    await expect(running).resolves.toEqual({ first: 0 });
  });
});
