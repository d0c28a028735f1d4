import { beforeEach, describe, it, expect } from "vitest";
import { defaultGuildConfig, type GuildConfig } from "../../plugins/moderation/models/GuildConfig.js";
import { ViolationType } from "../../plugins/moderation/models/Violation.js";
import { capsRatio, containsBlockedWord, countEmojis, countLines, selectFinding, type InboundMessage } from "../../plugins/moderation/services/RuleDetector.js";
import { GUILD, MEMBER, createModerationHarness, type ModerationHarness } from "../helpers/harness.js";

let nextMessageId = 1;

function message(content: string, overrides: Partial<InboundMessage> = {}): InboundMessage {
  return {
    guildId: GUILD,
    channelId: "200000000000000001",
    messageId: String(nextMessageId++),
    authorId: MEMBER,
    authorRoleIds: [],
    content,
    mentionCount: 0,
    ...overrides,
  };
}

describe("pure checks", () => {
  it("counts custom and unicode emojis", () => {
    expect(countEmojis("hi <:wave:123456> <a:dance:654321> 😀🎉")).toBe(4);
    expect(countEmojis("no emoji here")).toBe(0);
  });

  it("counts lines without a trailing empty line", () => {
    expect(countLines("")).toBe(0);
    expect(countLines("one")).toBe(1);
    expect(countLines("one\ntwo\r\nthree\n")).toBe(3);
  });

  it("only judges caps above ten characters", () => {
    expect(capsRatio("HELLO")).toBeNull();
    expect(capsRatio("ABCDEFGHIJ")).toBeNull();
    expect(capsRatio("ABCDEFGHIJk")).toBeCloseTo(10 / 11);
  });

  it("matches blocked words case-insensitively", () => {
    expect(containsBlockedWord("This is FORBIDDEN text", ["forbidden"])).toBe(true);
    expect(containsBlockedWord("harmless", ["forbidden", ""])).toBe(false);
  });

  it("selects the most severe finding, earliest on ties", () => {
    expect(
      selectFinding([
        { type: ViolationType.LINE_SPAM, severity: 1 },
        { type: ViolationType.SPAM, severity: 2 },
        { type: ViolationType.MENTION_SPAM, severity: 2 },
      ]),
    ).toEqual({ type: ViolationType.SPAM, severity: 2 });
    expect(selectFinding([])).toBeNull();
  });
});

describe("RuleDetector", () => {
  let h: ModerationHarness;
  let config: GuildConfig;

  beforeEach(() => {
    h = createModerationHarness();
    config = defaultGuildConfig(GUILD);
  });

  it("flags the sixth message inside five seconds as spam", async () => {
    const results: ViolationType[][] = [];
    for (let i = 0; i < 6; i++) {
      const findings = await h.detector.detect(message("hello"), config);
      results.push(findings.map((f) => f.type));
      h.clock.advance(500);
    }

    expect(results.slice(0, 5)).toEqual([[], [], [], [], []]);
    expect(results[5]).toEqual([ViolationType.SPAM]);
  });

  it("forgets messages that fall out of the timeframe", async () => {
    for (let i = 0; i < 5; i++) await h.detector.detect(message("hello"), config);
    h.clock.advance(5_000);

    await expect(h.detector.detect(message("hello"), config)).resolves.toEqual([]);
  });

  it("tracks spam per user", async () => {
    for (let i = 0; i < 5; i++) await h.detector.detect(message("hello"), config);

    await expect(h.detector.detect(message("hello", { authorId: "100000000000000021" }), config)).resolves.toEqual([]);
  });

  it("reports every threshold breach in check order", async () => {
    config.blockedWords = ["forbidden"];
    const content = `FORBIDDENABCDEFGHIJKLMNOPQRSTUVWXYZ${"😀".repeat(11)}\n`.repeat(11);

    const findings = await h.detector.detect(message(content, { mentionCount: 6 }), config);

    expect(findings).toEqual([
      { type: ViolationType.MENTION_SPAM, severity: 2 },
      { type: ViolationType.LINE_SPAM, severity: 1 },
      { type: ViolationType.EMOJI_SPAM, severity: 1 },
      { type: ViolationType.EXCESSIVE_CAPS, severity: 1 },
      { type: ViolationType.BLOCKED_WORDS, severity: 3 },
    ]);
  });

  it("allows values at the threshold", async () => {
    const content = "line\n".repeat(10);
    await expect(h.detector.detect(message(content, { mentionCount: 5 }), config)).resolves.toEqual([]);
  });

  it("finds nothing when automod is disabled", async () => {
    config.automodEnabled = false;
    await expect(h.detector.detect(message("x", { mentionCount: 50 }), config)).resolves.toEqual([]);
  });

  it("exempts whitelisted roles entirely", async () => {
    await h.whitelistService.add(GUILD, "300000000000000001");

    const findings = await h.detector.detect(message("x", { mentionCount: 50, authorRoleIds: ["300000000000000001"] }), config);

    expect(findings).toEqual([]);
    expect(h.detector.trackedUsers).toBe(0);
  });

  it("drops idle spam windows", async () => {
    await h.detector.detect(message("hello"), config);
    h.clock.advance(10 * 60 * 1000);

    expect(h.detector.pruneIdleWindows(10 * 60 * 1000)).toBe(1);
    expect(h.detector.trackedUsers).toBe(0);
  });
});
