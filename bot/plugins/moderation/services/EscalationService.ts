/**
 * EscalationService - records a violation and applies the punishment for the
 * user's resulting tier.
 *
 * Record, compute tier, act and persist all happen under the user's lock.
 * The sanction_applied event is published after the lock is released.
 * Automatic escalation is exempt from role hierarchy but fails closed when the
 * service identity lacks the permission.
 */

import { createLogger } from "../../../src/core/Logger.js";
import { describeError, NotFoundError } from "../../../src/core/errors.js";
import { userKey } from "../../../src/core/locks/ResourceKey.js";
import type { LockRegistry } from "../../../src/core/locks/LockRegistry.js";
import type { ViolationType } from "../models/Violation.js";
import { MAX_TIMEOUT_MS } from "../utils/constants.js";
import { punishmentForTier, tierForCount, type PunishmentAction } from "../utils/punishment-tiers.js";
import { systemClock, type Clock } from "../types/index.js";
import type { Capability, ModerationGateway } from "./ModerationGateway.js";
import { ModerationEventType, type ModerationEventBus } from "./ModerationEventBus.js";
import type { ViolationLedger } from "./ViolationLedger.js";
import type { WarningService } from "./WarningService.js";

const log = createLogger("moderation:escalation");

/** Recorded as the moderator of automatic warnings before the client is ready */
const AUTOMOD_ACTOR = "automod";

const ACTION_CAPABILITY: Record<PunishmentAction, Capability | null> = {
  warn: null,
  timeout: "moderate",
  ban: "ban",
};

export interface EscalationInput {
  guildId: string;
  userId: string;
  type: ViolationType;
  severity: number;
  /** Moderator behind a manual warning; omitted for automod */
  moderatorId?: string;
}

export interface EscalationOutcome {
  tier: number;
  action: PunishmentAction;
  durationMs?: number;
  /** False when the platform refused or the capability was missing */
  applied: boolean;
  /** Active violations including the one just recorded */
  activeCount: number;
  severity: number;
  error?: string;
}

export class EscalationService {
  constructor(
    private readonly gateway: ModerationGateway,
    private readonly ledger: ViolationLedger,
    private readonly warnings: WarningService,
    private readonly bus: ModerationEventBus,
    private readonly locks: LockRegistry,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Full escalation for one violation. Never throws for platform failures;
   * the outcome says whether the punishment was applied.
   */
  async applyEscalation(input: EscalationInput): Promise<EscalationOutcome> {
    const outcome = await this.locks.withLock(userKey(input.guildId, input.userId), () => this.escalateLocked(input));
    this.publishOutcome(input, outcome);
    return outcome;
  }

  /**
   * Escalation body for callers that already hold the user's lock. The
   * caller publishes the outcome once it has released the lock.
   */
  async escalateLocked(input: EscalationInput): Promise<EscalationOutcome> {
    const { guildId, userId, type } = input;
    const now = this.clock();

    const record = this.ledger.append(guildId, userId, type, input.severity, now);
    const activeCount = this.ledger.activeViolations(guildId, userId, now).length;
    const tier = tierForCount(activeCount);
    const punishment = punishmentForTier(tier);
    const reason = `Auto-escalation: ${type} (Violation tier ${tier})`;

    const outcome: EscalationOutcome = {
      tier,
      action: punishment.action,
      durationMs: punishment.durationMs,
      applied: false,
      activeCount,
      severity: record.severity,
    };

    let warningAdded = false;
    try {
      const serviceId = this.gateway.serviceUserId();
      const capability = ACTION_CAPABILITY[punishment.action];

      if (capability) {
        if (!serviceId) throw new NotFoundError("The client is not ready");
        const capable = await this.gateway.hasCapability(guildId, serviceId, capability);
        if (!capable) {
          outcome.error = `Missing the ${capability} permission for ${punishment.action}`;
          log.warn(`Escalation for ${guildId}/${userId} failed closed: ${outcome.error}`);
          return outcome;
        }
      }

      switch (punishment.action) {
        case "warn":
          // Manual warnings are stored by the moderator's own record
          if (input.moderatorId === undefined) {
            this.warnings.append(guildId, userId, serviceId ?? AUTOMOD_ACTOR, reason, now);
            warningAdded = true;
          }
          break;
        case "timeout":
          await this.gateway.timeoutMember(guildId, userId, Math.min(punishment.durationMs ?? MAX_TIMEOUT_MS, MAX_TIMEOUT_MS), reason);
          break;
        case "ban":
          await this.gateway.banMember(guildId, userId, reason);
          break;
      }

      outcome.applied = true;
      log.info(`Escalated ${guildId}/${userId} to tier ${tier} (${punishment.action}) for ${type}`);
    } catch (error) {
      outcome.error = describeError(error);
      log.warn(`Escalation ${punishment.action} for ${guildId}/${userId} was not applied: ${outcome.error}`);
    } finally {
      await this.persist(guildId, userId, warningAdded);
    }

    return outcome;
  }

  /** Publish sanction_applied for an applied outcome */
  publishOutcome(input: EscalationInput, outcome: EscalationOutcome): void {
    if (!outcome.applied) return;

    this.bus.publish(ModerationEventType.SANCTION_APPLIED, {
      guildId: input.guildId,
      userId: input.userId,
      timestamp: new Date(this.clock()),
      violationType: input.type,
      severity: outcome.severity,
      tier: outcome.tier,
      action: outcome.action,
      durationMs: outcome.durationMs,
      activeCount: outcome.activeCount,
      actorId: input.moderatorId ?? this.gateway.serviceUserId(),
    });
  }

  private async persist(guildId: string, userId: string, warningAdded: boolean): Promise<void> {
    try {
      await this.ledger.save();
      if (warningAdded) await this.warnings.save();
    } catch (error) {
      log.error(`Failed to persist escalation for ${guildId}/${userId}:`, error);
    }
  }
}
