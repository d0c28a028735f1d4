import { beforeEach, describe, it, expect } from "vitest";
import { LockRegistry } from "../../src/core/locks/LockRegistry.js";
import { MemoryDocumentStore } from "../../src/core/store/MemoryDocumentStore.js";
import { ViolationType } from "../../plugins/moderation/models/Violation.js";
import { ModerationEventBus, ModerationEventType } from "../../plugins/moderation/services/ModerationEventBus.js";
import { ReputationService } from "../../plugins/reputation/services/ReputationService.js";
import { calculateLevel, levelProgress, levelThreshold } from "../../plugins/reputation/utils/levels.js";
import { DAY_MS, GUILD, MEMBER, MODERATOR, TestClock } from "../helpers/harness.js";

describe("levels", () => {
  it("starts level n at (n - 1)² × 100 points", () => {
    expect([0, 99, 100, 399, 400, 900].map(calculateLevel)).toEqual([1, 1, 2, 2, 3, 4]);
    expect(levelThreshold(3)).toBe(400);
  });

  it("measures progress toward the next level", () => {
    expect(levelProgress(250, 2)).toBe(50);
  });
});

describe("ReputationService", () => {
  let clock: TestClock;
  let store: MemoryDocumentStore;
  let service: ReputationService;

  beforeEach(() => {
    clock = new TestClock();
    store = new MemoryDocumentStore(clock.now);
    service = new ReputationService(store, new LockRegistry(), clock.now);
  });

  it("returns a fresh record for unknown members", () => {
    expect(service.getReputation(GUILD, MEMBER)).toEqual({ points: 0, level: 1, history: [] });
  });

  it("never goes below zero", async () => {
    await expect(service.updatePoints(GUILD, MEMBER, -50, "test")).resolves.toEqual({ previousPoints: 0, points: 0, level: 1, levelChanged: false });
  });

  it("recomputes the level and records history", async () => {
    const update = await service.updatePoints(GUILD, MEMBER, 400, "event winner");

    expect(update).toEqual({ previousPoints: 0, points: 400, level: 3, levelChanged: true });
    expect(service.getReputation(GUILD, MEMBER).history).toEqual([
      { change: 400, previousPoints: 0, newPoints: 400, reason: "event winner", timestamp: new Date(clock.now()).toISOString() },
    ]);
  });

  it("deducts ten points per severity for applied sanctions", async () => {
    await service.updatePoints(GUILD, MEMBER, 100, "seed");
    const bus = new ModerationEventBus();
    service.subscribe(bus);

    bus.publish(ModerationEventType.SANCTION_APPLIED, {
      guildId: GUILD,
      userId: MEMBER,
      timestamp: new Date(clock.now()),
      violationType: ViolationType.BLOCKED_WORDS,
      severity: 3,
      tier: 1,
      action: "warn",
      activeCount: 1,
      actorId: null,
    });
    await bus.drain();

    const reputation = service.getReputation(GUILD, MEMBER);
    expect(reputation.points).toBe(70);
    expect(reputation.history.at(-1)?.reason).toBe("Violation: blocked_words");
  });

  describe("giveReputation", () => {
    const target = { id: MEMBER, bot: false };

    it("rewards with an attributed reason", async () => {
      const result = await service.giveReputation(GUILD, MODERATOR, target, "  great help ", "Mod");

      expect(result).toEqual({ success: true, update: { previousPoints: 0, points: 10, level: 1, levelChanged: false } });
      expect(service.getReputation(GUILD, MEMBER).history[0]?.reason).toBe("Received from Mod: great help");
    });

    it("rejects self, bots and short reasons", async () => {
      await expect(service.giveReputation(GUILD, MEMBER, target, "thanks", "Me")).resolves.toEqual({ success: false, error: "You cannot give reputation to yourself!" });
      await expect(service.giveReputation(GUILD, MODERATOR, { id: MEMBER, bot: true }, "thanks", "Mod")).resolves.toEqual({
        success: false,
        error: "You cannot give reputation to bots!",
      });
      await expect(service.giveReputation(GUILD, MODERATOR, target, " ok ", "Mod")).resolves.toEqual({
        success: false,
        error: "Please provide a valid reason (at least 3 characters)",
      });
    });

    it("enforces the cooldown per giver and target", async () => {
      await service.giveReputation(GUILD, MODERATOR, target, "thanks", "Mod");
      clock.advance(60 * 60 * 1000);

      await expect(service.giveReputation(GUILD, MODERATOR, target, "thanks", "Mod")).resolves.toEqual({
        success: false,
        error: "You can give reputation to this user again in 660 minutes",
      });

      clock.advance(11 * 60 * 60 * 1000);
      await expect(service.giveReputation(GUILD, MODERATOR, target, "thanks", "Mod")).resolves.toMatchObject({ success: true });
    });
  });

  it("ranks members by points", async () => {
    await service.updatePoints(GUILD, "100000000000000021", 50, "seed");
    await service.updatePoints(GUILD, MEMBER, 150, "seed");
    await service.updatePoints(GUILD, "100000000000000022", 5, "seed");

    expect(service.leaderboard(GUILD, 2)).toEqual([
      { userId: MEMBER, points: 150, level: 2 },
      { userId: "100000000000000021", points: 50, level: 1 },
    ]);
  });

  it("trims history older than 30 days", async () => {
    await service.updatePoints(GUILD, MEMBER, 10, "old");
    clock.advance(31 * DAY_MS);
    await service.updatePoints(GUILD, "100000000000000021", 10, "recent");

    await expect(service.trimHistory()).resolves.toBe(1);
    expect(service.getReputation(GUILD, MEMBER)).toEqual({ points: 10, level: 1, history: [] });
  });

  it("survives a reload", async () => {
    await service.updatePoints(GUILD, MEMBER, 120, "seed");
    clock.advance(1_000);
    await service.updatePoints(GUILD, MEMBER, -30, "penalty");
    await service.updatePoints(GUILD, "100000000000000021", 10, "seed");

    const reloaded = new ReputationService(store, new LockRegistry(), clock.now);
    await expect(reloaded.load()).resolves.toEqual({ status: "loaded" });

    expect(reloaded.getReputation(GUILD, MEMBER)).toEqual(service.getReputation(GUILD, MEMBER));
    expect(reloaded.getReputation(GUILD, MEMBER).history.map((entry) => [entry.change, entry.newPoints])).toEqual([
      [120, 120],
      [-30, 90],
    ]);
    expect(reloaded.leaderboard(GUILD)).toEqual(service.leaderboard(GUILD));
  });
});
