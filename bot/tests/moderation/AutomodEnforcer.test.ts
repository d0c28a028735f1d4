import { beforeEach, describe, it, expect } from "vitest";
import { CapabilityError, NotFoundError, PlatformTransientError } from "../../src/core/errors.js";
import { ViolationType } from "../../plugins/moderation/models/Violation.js";
import type { InboundMessage } from "../../plugins/moderation/services/RuleDetector.js";
import { GUILD, MEMBER, createModerationHarness, type ModerationHarness } from "../helpers/harness.js";

const CHANNEL = "200000000000000001";

function message(content: string, mentionCount = 0): InboundMessage {
  return { guildId: GUILD, channelId: CHANNEL, messageId: "400000000000000001", authorId: MEMBER, authorRoleIds: [], content, mentionCount };
}

describe("AutomodEnforcer", () => {
  let h: ModerationHarness;

  beforeEach(() => {
    h = createModerationHarness();
  });

  it("ignores clean messages", async () => {
    await expect(h.enforcer.handleMessage(message("hello there"))).resolves.toBeNull();
    expect(h.gateway.calls).toEqual([]);
  });

  it("deletes the message and escalates the most severe finding", async () => {
    await h.configService.addBlockedWord(GUILD, "forbidden");

    const result = await h.enforcer.handleMessage(message("this is forbidden", 6));

    expect(result).toMatchObject({
      finding: { type: ViolationType.BLOCKED_WORDS, severity: 3 },
      deleted: true,
      escalation: { tier: 1, action: "warn", applied: true },
    });
    expect(h.gateway.callsOf("deleteMessage").map((call) => call.args)).toEqual([[CHANNEL, "400000000000000001"]]);
    expect(h.ledger.allViolations(GUILD, MEMBER).map((v) => v.type)).toEqual([ViolationType.BLOCKED_WORDS]);
  });

  it("counts a redelivered message once", async () => {
    await h.configService.addBlockedWord(GUILD, "forbidden");

    await h.enforcer.handleMessage(message("this is forbidden"));
    h.gateway.failNext("deleteMessage", new NotFoundError("Unknown Message"));
    const again = await h.enforcer.handleMessage(message("this is forbidden"));

    expect(again).toEqual({ finding: { type: ViolationType.BLOCKED_WORDS, severity: 3 }, deleted: false, escalation: null });
    expect(h.ledger.allViolations(GUILD, MEMBER)).toHaveLength(1);
    expect(h.gateway.callsOf("timeoutMember")).toEqual([]);
  });

  it.each([
    ["a missing permission", new CapabilityError("deleteMessage: missing permission")],
    ["a transient failure", new PlatformTransientError("rate limited")],
  ])("does not escalate after %s", async (_label, error) => {
    h.gateway.failNext("deleteMessage", error);

    const result = await h.enforcer.handleMessage(message("hi", 9));

    expect(result).toMatchObject({ deleted: false, escalation: null });
    expect(h.ledger.allViolations(GUILD, MEMBER)).toEqual([]);
    expect(h.warnings.getWarnings(GUILD, MEMBER)).toEqual([]);
  });

  it("creates the guild config on the first message", async () => {
    await h.enforcer.handleMessage(message("hello"));
    expect(h.configService.peekConfig(GUILD)?.automodEnabled).toBe(true);
  });
});
