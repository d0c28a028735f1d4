/**
 * AutomodEnforcer - runs detection on each guild message and escalates the
 * strongest finding.
 *
 * The offending message is deleted first. Escalation only follows a
 * successful delete, so a redelivered message that is already gone counts once.
 */

import type { Message } from "discord.js";
import { createLogger } from "../../../src/core/Logger.js";
import { NotFoundError } from "../../../src/core/errors.js";
import type { GuildConfigService } from "./GuildConfigService.js";
import { selectFinding, type Finding, type InboundMessage, type RuleDetector } from "./RuleDetector.js";
import type { EscalationOutcome, EscalationService } from "./EscalationService.js";
import type { ModerationGateway } from "./ModerationGateway.js";

const log = createLogger("moderation:automod");

export interface EnforcementResult {
  finding: Finding;
  deleted: boolean;
  /** Null when the delete failed and nothing was escalated */
  escalation: EscalationOutcome | null;
}

/** Pull what detection needs out of a guild message */
export function toInboundMessage(message: Message<true>): InboundMessage {
  return {
    guildId: message.guildId,
    channelId: message.channelId,
    messageId: message.id,
    authorId: message.author.id,
    authorRoleIds: message.member ? [...message.member.roles.cache.keys()] : [],
    content: message.content,
    mentionCount: message.mentions.users.size,
  };
}

export class AutomodEnforcer {
  constructor(
    private readonly configService: GuildConfigService,
    private readonly detector: RuleDetector,
    private readonly escalation: EscalationService,
    private readonly gateway: ModerationGateway,
  ) {}

  /**
   * Returns null when nothing was found or processing failed
   */
  async handleMessage(message: InboundMessage): Promise<EnforcementResult | null> {
    try {
      const config = await this.configService.getConfig(message.guildId);
      const findings = await this.detector.detect(message, config);
      const finding = selectFinding(findings);
      if (!finding) return null;

      const deleted = await this.deleteMessage(message);
      if (!deleted) return { finding, deleted, escalation: null };

      const escalation = await this.escalation.applyEscalation({
        guildId: message.guildId,
        userId: message.authorId,
        type: finding.type,
        severity: finding.severity,
      });

      return { finding, deleted, escalation };
    } catch (error) {
      log.error("handleMessage error:", error);
      return null;
    }
  }

  private async deleteMessage(message: InboundMessage): Promise<boolean> {
    try {
      await this.gateway.deleteMessage(message.guildId, message.channelId, message.messageId);
      return true;
    } catch (error) {
      if (error instanceof NotFoundError) {
        log.debug(`Message ${message.messageId} was already gone, skipping escalation`);
      } else {
        log.warn(`Could not delete message ${message.messageId}, skipping escalation:`, error);
      }
      return false;
    }
  }
}
