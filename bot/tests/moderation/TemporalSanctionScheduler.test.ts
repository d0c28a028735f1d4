import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { PlatformTransientError, ValidationError } from "../../src/core/errors.js";
import { ModerationEventType, type SanctionExpiredPayload } from "../../plugins/moderation/services/ModerationEventBus.js";
import { TemporarySanctionService } from "../../plugins/moderation/services/TemporarySanctionService.js";
import { LockRegistry } from "../../src/core/locks/LockRegistry.js";
import { GUILD, MEMBER, MODERATOR, createModerationHarness, type ModerationHarness } from "../helpers/harness.js";

const ROLE = "300000000000000005";

describe("TemporalSanctionScheduler", () => {
  let h: ModerationHarness;
  let expired: SanctionExpiredPayload[];

  beforeEach(() => {
    h = createModerationHarness();
    expired = [];
    h.bus.on(ModerationEventType.SANCTION_EXPIRED, (payload) => {
      expired.push(payload);
    });
  });

  afterEach(() => {
    h.scheduler.stop();
  });

  it("drops an expired role even when the member has left", async () => {
    await h.tempSanctions.scheduleRole({ guildId: GUILD, userId: MEMBER, roleId: ROLE, durationMs: 1_000, moderatorId: MODERATOR });
    h.clock.advance(2_000);

    await expect(h.scheduler.tick()).resolves.toEqual({ processed: 1, reversed: 1 });

    expect(h.gateway.callsOf("removeRole").map((call) => call.args)).toEqual([[MEMBER, ROLE, "Temporary role expired"]]);
    expect(h.tempSanctions.get(`${GUILD}:${MEMBER}:${ROLE}`)).toBeUndefined();
    expect(JSON.parse(h.store.getRaw("temp_actions") ?? "null")).toEqual({});
  });

  it("does nothing on a second tick", async () => {
    await h.tempSanctions.scheduleRole({ guildId: GUILD, userId: MEMBER, roleId: ROLE, durationMs: 1_000 });
    h.clock.advance(2_000);

    await h.scheduler.tick();
    await expect(h.scheduler.tick()).resolves.toEqual({ processed: 0, reversed: 0 });

    expect(h.gateway.callsOf("removeRole")).toHaveLength(1);
  });

  it("unbans when a temporary ban expires", async () => {
    await h.tempSanctions.scheduleBan({ guildId: GUILD, userId: MEMBER, durationMs: 60_000 });
    h.clock.advance(60_000);

    await expect(h.scheduler.tick()).resolves.toEqual({ processed: 1, reversed: 1 });

    expect(h.gateway.callsOf("unbanMember").map((call) => call.args)).toEqual([[MEMBER, "Temporary ban expired"]]);
  });

  it("removes the entry after a failed reversal without retrying", async () => {
    await h.tempSanctions.scheduleBan({ guildId: GUILD, userId: MEMBER, durationMs: 60_000 });
    h.clock.advance(61_000);
    h.gateway.failNext("unbanMember", new PlatformTransientError("rate limited"));

    await expect(h.scheduler.tick()).resolves.toEqual({ processed: 1, reversed: 0 });
    await expect(h.scheduler.tick()).resolves.toEqual({ processed: 0, reversed: 0 });

    expect(h.tempSanctions.get(`${GUILD}:${MEMBER}`)).toBeUndefined();
    expect(h.gateway.callsOf("unbanMember")).toEqual([]);
  });

  it("leaves entries that are not due yet", async () => {
    await h.tempSanctions.scheduleBan({ guildId: GUILD, userId: MEMBER, durationMs: 60_000 });
    await h.tempSanctions.scheduleRole({ guildId: GUILD, userId: MEMBER, roleId: ROLE, durationMs: 1_000 });
    h.clock.advance(30_000);

    await expect(h.scheduler.tick()).resolves.toEqual({ processed: 1, reversed: 1 });

    expect(h.tempSanctions.listForGuild(GUILD).map((s) => s.key)).toEqual([`${GUILD}:${MEMBER}`]);
  });

  it("publishes sanction_expired with the reversal result", async () => {
    await h.tempSanctions.scheduleBan({ guildId: GUILD, userId: MEMBER, durationMs: 1_000 });
    h.clock.advance(1_000);
    h.gateway.failNext("unbanMember", new PlatformTransientError("rate limited"));

    await h.scheduler.tick();
    await h.bus.drain();

    expect(expired).toHaveLength(1);
    expect(expired[0]).toMatchObject({ guildId: GUILD, userId: MEMBER, reversed: false });
    expect(expired[0]?.sanction.action).toBe("ban");
  });

  it("skips a sanction cancelled while the tick waited for its lock", async () => {
    await h.tempSanctions.scheduleBan({ guildId: GUILD, userId: MEMBER, durationMs: 1_000 });
    h.clock.advance(2_000);

    // Queued ahead of the tick on the same sanction lock
    const cancelled = h.tempSanctions.cancel(`${GUILD}:${MEMBER}`);
    const tick = h.scheduler.tick();

    await expect(cancelled).resolves.toMatchObject({ action: "ban" });
    await expect(tick).resolves.toEqual({ processed: 0, reversed: 0 });
    await h.bus.drain();

    expect(h.gateway.callsOf("unbanMember")).toEqual([]);
    expect(expired).toEqual([]);
  });

  it("keeps a sanction extended while the tick waited for its lock", async () => {
    await h.tempSanctions.scheduleBan({ guildId: GUILD, userId: MEMBER, durationMs: 1_000 });
    h.clock.advance(2_000);

    const extended = h.tempSanctions.scheduleBan({ guildId: GUILD, userId: MEMBER, durationMs: 60_000, reason: "extended" });
    const tick = h.scheduler.tick();

    await extended;
    await expect(tick).resolves.toEqual({ processed: 0, reversed: 0 });

    expect(h.gateway.callsOf("unbanMember")).toEqual([]);
    expect(h.tempSanctions.get(`${GUILD}:${MEMBER}`)).toMatchObject({
      reason: "extended",
      expiresAt: new Date(h.clock.now() + 60_000).toISOString(),
    });

    h.clock.advance(60_000);
    await expect(h.scheduler.tick()).resolves.toEqual({ processed: 1, reversed: 1 });
  });

  it("refuses to track a sanction with an untrackable expiry", async () => {
    await expect(h.tempSanctions.scheduleBan({ guildId: GUILD, userId: MEMBER, durationMs: 400 * 24 * 60 * 60 * 1000 })).rejects.toThrow(ValidationError);
    await expect(h.tempSanctions.scheduleRole({ guildId: GUILD, userId: MEMBER, roleId: ROLE, durationMs: 0 })).rejects.toThrow("The duration must be greater than zero.");

    expect(h.tempSanctions.listForGuild(GUILD)).toEqual([]);
  });

  it("picks up entries loaded from a previous run", async () => {
    await h.tempSanctions.scheduleBan({ guildId: GUILD, userId: MEMBER, durationMs: 1_000 });
    const restarted = new TemporarySanctionService(h.store, new LockRegistry(), h.clock.now);
    await restarted.load();

    expect(restarted.listExpired(h.clock.now() + 1_000).map((s) => s.key)).toEqual([`${GUILD}:${MEMBER}`]);
  });

  it("reports its running state", () => {
    h.scheduler.start();
    expect(h.scheduler.running).toBe(true);
    h.scheduler.stop();
    expect(h.scheduler.running).toBe(false);
  });
});
