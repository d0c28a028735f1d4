import { beforeEach, describe, it, expect } from "vitest";
import { PlatformTransientError } from "../../src/core/errors.js";
import { ViolationType } from "../../plugins/moderation/models/Violation.js";
import { resolveReason } from "../../plugins/moderation/services/ModActionService.js";
import { ModerationEventType, type ModActionPayload } from "../../plugins/moderation/services/ModerationEventBus.js";
import { DAY_MS, GUILD, MEMBER, MODERATOR, createModerationHarness, type ModerationHarness } from "../helpers/harness.js";

const moderator = { id: MODERATOR, tag: "mod#0001" };
const ROLE = "300000000000000005";

describe("resolveReason", () => {
  it("defaults an empty reason", () => {
    expect(resolveReason("   ")).toEqual({ value: "No reason provided" });
    expect(resolveReason(null)).toEqual({ value: "No reason provided" });
    expect(resolveReason(" spamming ")).toEqual({ value: "spamming" });
  });

  it("rejects reasons over the limit", () => {
    expect(resolveReason("x".repeat(1001)).error).toBe("The reason must be at most 1000 characters.");
    expect(resolveReason("x".repeat(1000)).error).toBeUndefined();
  });
});

describe("ModActionService", () => {
  let h: ModerationHarness;

  beforeEach(() => {
    h = createModerationHarness();
    h.gateway.addMember(GUILD, MODERATOR, { highestRolePosition: 10 });
    h.gateway.addMember(GUILD, h.gateway.serviceId ?? "", { highestRolePosition: 20 });
    h.gateway.addMember(GUILD, MEMBER, { highestRolePosition: 1 });
    h.gateway.grant(MODERATOR);
  });

  describe("checks", () => {
    it("refuses self, the bot and the owner as targets", async () => {
      await expect(h.modActions.kick(GUILD, MODERATOR, moderator)).resolves.toEqual({ success: false, error: "You cannot moderate yourself." });
      await expect(h.modActions.kick(GUILD, h.gateway.serviceId ?? "", moderator)).resolves.toEqual({ success: false, error: "I cannot moderate myself." });
      await expect(h.modActions.kick(GUILD, h.gateway.ownerId, moderator)).resolves.toEqual({ success: false, error: "The server owner cannot be moderated." });
    });

    it("requires the permission on both sides", async () => {
      h.gateway.revoke(MODERATOR, "kick");
      await expect(h.modActions.kick(GUILD, MEMBER, moderator)).resolves.toEqual({ success: false, error: "You need the Kick Members permission." });

      h.gateway.grant(MODERATOR, ["kick"]);
      h.gateway.revoke(h.gateway.serviceId ?? "", "kick");
      await expect(h.modActions.kick(GUILD, MEMBER, moderator)).resolves.toEqual({ success: false, error: "I need the Kick Members permission." });
      expect(h.gateway.callsOf("kickMember")).toEqual([]);
    });

    it("enforces the role hierarchy", async () => {
      h.gateway.addMember(GUILD, MEMBER, { highestRolePosition: 10 });
      await expect(h.modActions.kick(GUILD, MEMBER, moderator)).resolves.toEqual({ success: false, error: "That member's highest role is not below yours." });

      h.gateway.addMember(GUILD, MODERATOR, { highestRolePosition: 30 });
      h.gateway.addMember(GUILD, MEMBER, { highestRolePosition: 25 });
      await expect(h.modActions.kick(GUILD, MEMBER, moderator)).resolves.toEqual({ success: false, error: "That member's highest role is not below mine." });
    });

    it("lets the owner act on higher roles", async () => {
      const owner = { id: h.gateway.ownerId, tag: "owner#0001" };
      h.gateway.grant(owner.id);
      h.gateway.addMember(GUILD, MEMBER, { highestRolePosition: 15 });

      await expect(h.modActions.kick(GUILD, MEMBER, owner)).resolves.toEqual({ success: true });
    });

    it("needs the bot to be ready", async () => {
      h.gateway.serviceId = null;
      await expect(h.modActions.kick(GUILD, MEMBER, moderator)).resolves.toEqual({ success: false, error: "The bot is not ready yet." });
    });
  });

  describe("warn", () => {
    it("stores one warning and escalates as a manual warning", async () => {
      const result = await h.modActions.warn(GUILD, MEMBER, moderator, " be nice ");

      expect(result).toMatchObject({ success: true, escalation: { tier: 1, action: "warn", applied: true } });
      expect(h.warnings.getWarnings(GUILD, MEMBER).map((w) => [w.moderatorId, w.reason])).toEqual([[MODERATOR, "be nice"]]);
      expect(h.ledger.allViolations(GUILD, MEMBER).map((v) => [v.type, v.severity])).toEqual([[ViolationType.MANUAL_WARNING, 1]]);
    });

    it("times out on the second warning", async () => {
      await h.modActions.warn(GUILD, MEMBER, moderator, "first");
      const second = await h.modActions.warn(GUILD, MEMBER, moderator, "second");

      expect(second).toMatchObject({ success: true, escalation: { tier: 2, action: "timeout", applied: true } });
      expect(h.gateway.callsOf("timeoutMember").map((call) => call.args)).toEqual([[MEMBER, 1_800_000, "Auto-escalation: manual_warning (Violation tier 2)"]]);
      expect(h.warnings.getWarnings(GUILD, MEMBER)).toHaveLength(2);
    });

    it("credits the moderator on the published sanction", async () => {
      const actors: Array<string | null> = [];
      h.bus.on(ModerationEventType.SANCTION_APPLIED, (payload) => {
        actors.push(payload.actorId);
      });

      await h.modActions.warn(GUILD, MEMBER, moderator);
      await h.bus.drain();

      expect(actors).toEqual([MODERATOR]);
    });

    it("refuses bots and members who left", async () => {
      h.gateway.addMember(GUILD, "100000000000000099", { bot: true });
      await expect(h.modActions.warn(GUILD, "100000000000000099", moderator)).resolves.toEqual({ success: false, error: "You cannot warn bots." });
      await expect(h.modActions.warn(GUILD, "100000000000000098", moderator)).resolves.toEqual({ success: false, error: "User is not in this server." });
    });
  });

  describe("kick", () => {
    it("kicks with an attributed reason and announces it", async () => {
      const actions: ModActionPayload[] = [];
      h.bus.on(ModerationEventType.MOD_ACTION, (payload) => {
        actions.push(payload);
      });

      await expect(h.modActions.kick(GUILD, MEMBER, moderator)).resolves.toEqual({ success: true });
      await h.bus.drain();

      expect(h.gateway.callsOf("kickMember").map((call) => call.args)).toEqual([[MEMBER, `Kicked by mod#0001 (${MODERATOR}) - No reason provided`]]);
      expect(actions).toHaveLength(1);
      expect(actions[0]).toMatchObject({ action: "kick", moderatorId: MODERATOR, reason: "No reason provided" });
    });
  });

  describe("ban", () => {
    it("schedules the unban for a temporary ban", async () => {
      const result = await h.modActions.ban(GUILD, MEMBER, moderator, "raiding", 3_600_000);

      expect(result.success).toBe(true);
      expect(h.tempSanctions.get(`${GUILD}:${MEMBER}`)).toMatchObject({
        action: "ban",
        expiresAt: new Date(h.clock.now() + 3_600_000).toISOString(),
        reason: "raiding",
        moderatorId: MODERATOR,
      });
    });

    it("bans users who are not members", async () => {
      await expect(h.modActions.ban(GUILD, "100000000000000098", moderator)).resolves.toEqual({ success: true, sanction: undefined });
      expect(h.gateway.callsOf("banMember")).toHaveLength(1);
    });

    it("drops a pending unban when the ban becomes permanent", async () => {
      await h.modActions.ban(GUILD, MEMBER, moderator, "raiding", 3_600_000);
      await h.modActions.ban(GUILD, MEMBER, moderator, "again");

      expect(h.tempSanctions.get(`${GUILD}:${MEMBER}`)).toBeUndefined();
    });

    it("rejects a non-positive duration", async () => {
      await expect(h.modActions.ban(GUILD, MEMBER, moderator, null, 0)).resolves.toEqual({ success: false, error: "The ban duration must be greater than zero." });
    });

    it("refuses an oversized duration before banning", async () => {
      await expect(h.modActions.ban(GUILD, MEMBER, moderator, null, 14_300_000 * 7 * DAY_MS)).resolves.toEqual({
        success: false,
        error: "The ban duration must be at most 365d.",
      });

      expect(h.gateway.callsOf("banMember")).toEqual([]);
      expect(h.tempSanctions.listForGuild(GUILD)).toEqual([]);
    });
  });

  describe("temprole", () => {
    it("grants the role and schedules its removal", async () => {
      h.gateway.roles.set(ROLE, 5);

      const result = await h.modActions.temprole(GUILD, MEMBER, ROLE, 86_400_000, moderator, "event");

      expect(result.success).toBe(true);
      expect(h.gateway.callsOf("addRole").map((call) => call.args)).toEqual([[MEMBER, ROLE, `Temporary role by mod#0001 (${MODERATOR}) - event`]]);
      expect(h.tempSanctions.get(`${GUILD}:${MEMBER}:${ROLE}`)?.expiresAt).toBe(new Date(h.clock.now() + 86_400_000).toISOString());
    });

    it("checks the role position against both sides", async () => {
      h.gateway.roles.set(ROLE, 15);
      await expect(h.modActions.temprole(GUILD, MEMBER, ROLE, 1_000, moderator)).resolves.toEqual({ success: false, error: "That role is not below your highest role." });

      h.gateway.roles.set(ROLE, 20);
      await expect(h.modActions.temprole(GUILD, MEMBER, ROLE, 1_000, moderator)).resolves.toEqual({ success: false, error: "That role is not below my highest role." });

      await expect(h.modActions.temprole(GUILD, MEMBER, "300000000000000404", 1_000, moderator)).resolves.toEqual({ success: false, error: "That role does not exist." });
      expect(h.gateway.callsOf("addRole")).toEqual([]);
    });

    it("refuses an oversized duration before granting the role", async () => {
      h.gateway.roles.set(ROLE, 5);

      await expect(h.modActions.temprole(GUILD, MEMBER, ROLE, 366 * DAY_MS, moderator)).resolves.toEqual({
        success: false,
        error: "The duration must be at most 365d.",
      });

      expect(h.gateway.callsOf("addRole")).toEqual([]);
      expect(h.tempSanctions.listForGuild(GUILD)).toEqual([]);
    });
  });

  describe("restrict", () => {
    it("denies sending in every text channel and announces it", async () => {
      const actions: ModActionPayload[] = [];
      h.bus.on(ModerationEventType.MOD_ACTION, (payload) => {
        actions.push(payload);
      });

      await expect(h.modActions.restrict(GUILD, MEMBER, moderator, "flooding")).resolves.toEqual({ success: true, channels: 3 });
      await h.bus.drain();

      expect(h.gateway.callsOf("restrictMember").map((call) => call.args)).toEqual([[MEMBER, `Restricted by mod#0001 (${MODERATOR}) - flooding`]]);
      expect(actions[0]).toMatchObject({ action: "restrict", userId: MEMBER, moderatorId: MODERATOR, reason: "flooding" });
    });

    it("needs Manage Roles and a member target", async () => {
      await expect(h.modActions.restrict(GUILD, "100000000000000098", moderator)).resolves.toEqual({ success: false, error: "User is not in this server." });

      h.gateway.revoke(MODERATOR, "manageRoles");
      await expect(h.modActions.restrict(GUILD, MEMBER, moderator)).resolves.toEqual({ success: false, error: "You need the Manage Roles permission." });
      expect(h.gateway.callsOf("restrictMember")).toEqual([]);
    });

    it("surfaces a platform failure", async () => {
      h.gateway.failNext("restrictMember", new PlatformTransientError("rate limited"));

      await expect(h.modActions.restrict(GUILD, MEMBER, moderator)).resolves.toEqual({
        success: false,
        error: "Discord did not accept the request right now. Try again in a moment.",
      });
    });
  });

  describe("violations", () => {
    it("reports and clears active violations", async () => {
      await h.ledger.recordViolation(GUILD, MEMBER, ViolationType.SPAM, 2);
      await h.ledger.recordViolation(GUILD, MEMBER, ViolationType.EMOJI_SPAM, 1);

      expect(h.modActions.violationsReport(GUILD, MEMBER).tier).toBe(2);
      await expect(h.modActions.clearViolations(GUILD, MEMBER, moderator)).resolves.toEqual({ success: true, removed: 2 });
      expect(h.modActions.violationsReport(GUILD, MEMBER)).toEqual({ active: [], tier: 0 });
    });

    it("requires the timeout permission to clear", async () => {
      h.gateway.revoke(MODERATOR, "moderate");
      await expect(h.modActions.clearViolations(GUILD, MEMBER, moderator)).resolves.toEqual({ success: false, error: "You need the Timeout Members permission." });
    });
  });
});
