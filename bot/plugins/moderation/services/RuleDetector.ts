/**
 * RuleDetector - threshold checks for one inbound message.
 *
 * Every check except spam is a pure function of the message and the guild
 * config. Spam keeps a per-user window of recent message times, updated under
 * the user's lock.
 */

import { createLogger } from "../../../src/core/Logger.js";
import { userKey } from "../../../src/core/locks/ResourceKey.js";
import type { LockRegistry } from "../../../src/core/locks/LockRegistry.js";
import type { GuildConfig } from "../models/GuildConfig.js";
import { ViolationType } from "../models/Violation.js";
import { systemClock, type Clock } from "../types/index.js";
import type { RoleWhitelistService } from "./RoleWhitelistService.js";

const log = createLogger("moderation:detector");

const EMOJI_PATTERN = /<a?:\w+:\d+>|[\u{1F300}-\u{1F9FF}]/gu;
const UPPERCASE_PATTERN = /\p{Lu}/u;
const LINE_BREAK_PATTERN = /\r\n|\r|\n/;

/** Caps ratio is only checked above this many characters */
const CAPS_MIN_LENGTH = 10;

export const SEVERITY: Record<Exclude<ViolationType, ViolationType.MANUAL_WARNING>, number> = {
  [ViolationType.SPAM]: 2,
  [ViolationType.MENTION_SPAM]: 2,
  [ViolationType.LINE_SPAM]: 1,
  [ViolationType.EMOJI_SPAM]: 1,
  [ViolationType.EXCESSIVE_CAPS]: 1,
  [ViolationType.BLOCKED_WORDS]: 3,
};

export interface InboundMessage {
  guildId: string;
  channelId: string;
  messageId: string;
  authorId: string;
  authorRoleIds: readonly string[];
  content: string;
  /** Distinct users mentioned */
  mentionCount: number;
}

export interface Finding {
  type: ViolationType;
  severity: number;
}

// ── Pure checks ──────────────────────────────────────────

export function countEmojis(content: string): number {
  return content.match(EMOJI_PATTERN)?.length ?? 0;
}

export function countLines(content: string): number {
  if (content === "") return 0;
  const lines = content.split(LINE_BREAK_PATTERN);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines.length;
}

/** Uppercase letters over total code points; null when too short to judge */
export function capsRatio(content: string): number | null {
  const chars = [...content];
  if (chars.length <= CAPS_MIN_LENGTH) return null;
  const upper = chars.filter((char) => UPPERCASE_PATTERN.test(char)).length;
  return upper / chars.length;
}

export function containsBlockedWord(content: string, blockedWords: readonly string[]): boolean {
  const lowered = content.toLowerCase();
  return blockedWords.some((word) => word !== "" && lowered.includes(word.toLowerCase()));
}

/**
 * Highest severity wins; on a tie the earlier finding wins.
 */
export function selectFinding(findings: readonly Finding[]): Finding | null {
  let selected: Finding | null = null;
  for (const finding of findings) {
    if (!selected || finding.severity > selected.severity) selected = finding;
  }
  return selected;
}

// ── Detector ─────────────────────────────────────────────

export class RuleDetector {
  /** `{guildId}:{userId}` → message timestamps (ms) */
  private windows = new Map<string, number[]>();

  constructor(
    private readonly locks: LockRegistry,
    private readonly whitelist: RoleWhitelistService,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Findings in check order: spam, mentions, lines, emojis, caps, then
   * blocked words. Empty when automod is off or the author is whitelisted.
   */
  async detect(message: InboundMessage, config: GuildConfig): Promise<Finding[]> {
    if (!config.automodEnabled) return [];
    if (this.whitelist.isWhitelisted(message.guildId, message.authorRoleIds)) return [];

    const findings: Finding[] = [];

    if (await this.recordAndCheckSpam(message, config)) {
      findings.push({ type: ViolationType.SPAM, severity: SEVERITY[ViolationType.SPAM] });
    }

    if (message.mentionCount > config.maxMentions) {
      findings.push({ type: ViolationType.MENTION_SPAM, severity: SEVERITY[ViolationType.MENTION_SPAM] });
    }

    if (countLines(message.content) > config.maxLines) {
      findings.push({ type: ViolationType.LINE_SPAM, severity: SEVERITY[ViolationType.LINE_SPAM] });
    }

    if (countEmojis(message.content) > config.maxEmojis) {
      findings.push({ type: ViolationType.EMOJI_SPAM, severity: SEVERITY[ViolationType.EMOJI_SPAM] });
    }

    const ratio = capsRatio(message.content);
    if (ratio !== null && ratio > config.capsThreshold) {
      findings.push({ type: ViolationType.EXCESSIVE_CAPS, severity: SEVERITY[ViolationType.EXCESSIVE_CAPS] });
    }

    if (containsBlockedWord(message.content, config.blockedWords)) {
      findings.push({ type: ViolationType.BLOCKED_WORDS, severity: SEVERITY[ViolationType.BLOCKED_WORDS] });
    }

    if (findings.length > 0) {
      log.debug(`Message ${message.messageId} by ${message.authorId}: ${findings.map((f) => f.type).join(", ")}`);
    }
    return findings;
  }

  /**
   * Drop windows whose newest entry is older than `maxAgeMs`. Returns how many
   * were removed.
   */
  pruneIdleWindows(maxAgeMs: number, now: number = this.clock()): number {
    let removed = 0;
    for (const [key, timestamps] of this.windows) {
      const newest = timestamps[timestamps.length - 1];
      if (newest === undefined || now - newest >= maxAgeMs) {
        this.windows.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Number of users with a live spam window */
  get trackedUsers(): number {
    return this.windows.size;
  }

  private recordAndCheckSpam(message: InboundMessage, config: GuildConfig): Promise<boolean> {
    return this.locks.withLock(userKey(message.guildId, message.authorId), async () => {
      const now = this.clock();
      const timeframeMs = config.timeframeSeconds * 1000;
      const key = `${message.guildId}:${message.authorId}`;

      const window = (this.windows.get(key) ?? []).filter((timestamp) => now - timestamp < timeframeMs);
      window.push(now);
      this.windows.set(key, window);

      return window.length > config.maxMessages;
    });
  }
}
