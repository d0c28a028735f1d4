/**
 * ModActionService - moderator commands: warn, kick, ban, temprole, restrict
 * and violation housekeeping.
 *
 * Every action checks, in order: the target is neither the invoker, the
 * service identity nor the guild owner; invoker and service identity both
 * hold the permission; the target's highest role sits below both of theirs.
 */

import { createLogger } from "../../../src/core/Logger.js";
import { describeError } from "../../../src/core/errors.js";
import { userKey } from "../../../src/core/locks/ResourceKey.js";
import type { LockRegistry } from "../../../src/core/locks/LockRegistry.js";
import { ViolationType, type ViolationRecord } from "../models/Violation.js";
import type { WarningRecord } from "../models/Warning.js";
import { temporaryBanKey, type TemporarySanction } from "../models/TemporarySanction.js";
import { DEFAULT_REASON, MAX_REASON_LENGTH } from "../utils/constants.js";
import { durationError } from "../utils/duration.js";
import { systemClock, type Clock, type ServiceResult } from "../types/index.js";
import type { Capability, MemberSnapshot, ModerationGateway } from "./ModerationGateway.js";
import { ModerationEventType, type ModActionPayload, type ModerationEventBus } from "./ModerationEventBus.js";
import type { EscalationOutcome, EscalationService } from "./EscalationService.js";
import type { ViolationLedger } from "./ViolationLedger.js";
import type { WarningService } from "./WarningService.js";
import type { TemporarySanctionService } from "./TemporarySanctionService.js";

const log = createLogger("moderation:actions");

export const CAPABILITY_NAMES: Record<Capability, string> = {
  moderate: "Timeout Members",
  kick: "Kick Members",
  ban: "Ban Members",
  manageRoles: "Manage Roles",
  manageMessages: "Manage Messages",
  manageGuild: "Manage Server",
};

/** Who is acting */
export interface Moderator {
  id: string;
  tag: string;
}

interface ActionContext {
  serviceId: string;
  ownerId: string;
  invoker: MemberSnapshot | null;
  service: MemberSnapshot | null;
  target: MemberSnapshot | null;
}

type Checked = { ok: true; context: ActionContext } | { ok: false; error: string };

export class ModActionService {
  constructor(
    private readonly gateway: ModerationGateway,
    private readonly escalation: EscalationService,
    private readonly ledger: ViolationLedger,
    private readonly warnings: WarningService,
    private readonly tempSanctions: TemporarySanctionService,
    private readonly bus: ModerationEventBus,
    private readonly locks: LockRegistry,
    private readonly clock: Clock = systemClock,
  ) {}

  // ── Warn ───────────────────────────────────────────────

  async warn(
    guildId: string,
    targetId: string,
    moderator: Moderator,
    reason?: string | null,
  ): Promise<ServiceResult<{ warning: WarningRecord; escalation: EscalationOutcome }>> {
    const resolvedReason = resolveReason(reason);
    if (resolvedReason.error) return { success: false, error: resolvedReason.error };

    const checked = await this.check(guildId, moderator.id, targetId, "moderate", { requireMember: true });
    if (!checked.ok) return { success: false, error: checked.error };
    if (checked.context.target?.bot) return { success: false, error: "You cannot warn bots." };

    const input = { guildId, userId: targetId, type: ViolationType.MANUAL_WARNING, severity: 1, moderatorId: moderator.id };

    const { warning, escalation } = await this.locks.withLock(userKey(guildId, targetId), async () => {
      const warning = this.warnings.append(guildId, targetId, moderator.id, resolvedReason.value, this.clock());
      const escalation = await this.escalation.escalateLocked(input);
      try {
        await this.warnings.save();
      } catch (error) {
        log.error(`Failed to save warning for ${guildId}/${targetId}:`, error);
      }
      return { warning, escalation };
    });

    this.escalation.publishOutcome(input, escalation);
    return { success: true, warning, escalation };
  }

  // ── Kick ───────────────────────────────────────────────

  async kick(guildId: string, targetId: string, moderator: Moderator, reason?: string | null): Promise<ServiceResult> {
    const resolvedReason = resolveReason(reason);
    if (resolvedReason.error) return { success: false, error: resolvedReason.error };

    const checked = await this.check(guildId, moderator.id, targetId, "kick", { requireMember: true });
    if (!checked.ok) return { success: false, error: checked.error };

    try {
      await this.gateway.kickMember(guildId, targetId, `Kicked by ${moderator.tag} (${moderator.id}) - ${resolvedReason.value}`);
    } catch (error) {
      log.error("Kick failed:", error);
      return { success: false, error: describeError(error) };
    }

    this.publishModAction({ guildId, userId: targetId, action: "kick", moderatorId: moderator.id, reason: resolvedReason.value });
    return { success: true };
  }

  // ── Ban ────────────────────────────────────────────────

  /**
   * Ban a user, member or not. With a duration the ban is tracked and lifted
   * by the scheduler; a permanent ban drops any earlier temporary one.
   */
  async ban(
    guildId: string,
    targetId: string,
    moderator: Moderator,
    reason?: string | null,
    durationMs?: number,
  ): Promise<ServiceResult<{ sanction?: TemporarySanction }>> {
    const resolvedReason = resolveReason(reason);
    if (resolvedReason.error) return { success: false, error: resolvedReason.error };
    if (durationMs !== undefined) {
      const problem = durationError(durationMs, this.clock(), "The ban duration");
      if (problem) return { success: false, error: problem };
    }

    const checked = await this.check(guildId, moderator.id, targetId, "ban", { requireMember: false });
    if (!checked.ok) return { success: false, error: checked.error };

    try {
      await this.gateway.banMember(guildId, targetId, `Banned by ${moderator.tag} (${moderator.id}) - ${resolvedReason.value}`);
    } catch (error) {
      log.error("Ban failed:", error);
      return { success: false, error: describeError(error) };
    }

    let sanction: TemporarySanction | undefined;
    try {
      if (durationMs !== undefined) {
        sanction = await this.tempSanctions.scheduleBan({ guildId, userId: targetId, durationMs, reason: resolvedReason.value, moderatorId: moderator.id });
      } else {
        await this.tempSanctions.cancel(temporaryBanKey(guildId, targetId));
      }
    } catch (error) {
      log.error(`Ban applied but tracking failed for ${guildId}/${targetId}:`, error);
      return { success: false, error: "The member was banned, but the unban could not be scheduled." };
    }

    this.publishModAction({ guildId, userId: targetId, action: "ban", moderatorId: moderator.id, reason: resolvedReason.value, durationMs });
    return { success: true, sanction };
  }

  // ── Temporary role ─────────────────────────────────────

  async temprole(
    guildId: string,
    targetId: string,
    roleId: string,
    durationMs: number,
    moderator: Moderator,
    reason?: string | null,
  ): Promise<ServiceResult<{ sanction: TemporarySanction }>> {
    const resolvedReason = resolveReason(reason);
    if (resolvedReason.error) return { success: false, error: resolvedReason.error };
    const problem = durationError(durationMs, this.clock());
    if (problem) return { success: false, error: problem };

    const checked = await this.check(guildId, moderator.id, targetId, "manageRoles", { requireMember: true });
    if (!checked.ok) return { success: false, error: checked.error };
    const { context } = checked;

    try {
      const position = await this.gateway.rolePosition(guildId, roleId);
      if (position === null) return { success: false, error: "That role does not exist." };
      if (position >= (context.service?.highestRolePosition ?? 0)) {
        return { success: false, error: "That role is not below my highest role." };
      }
      if (moderator.id !== context.ownerId && position >= (context.invoker?.highestRolePosition ?? 0)) {
        return { success: false, error: "That role is not below your highest role." };
      }

      await this.gateway.addRole(guildId, targetId, roleId, `Temporary role by ${moderator.tag} (${moderator.id}) - ${resolvedReason.value}`);
      const sanction = await this.tempSanctions.scheduleRole({ guildId, userId: targetId, roleId, durationMs, reason: resolvedReason.value, moderatorId: moderator.id });

      this.publishModAction({ guildId, userId: targetId, action: "temprole", moderatorId: moderator.id, reason: resolvedReason.value, durationMs, roleId });
      return { success: true, sanction };
    } catch (error) {
      log.error("Temprole failed:", error);
      return { success: false, error: describeError(error) };
    }
  }

  // ── Restrict ───────────────────────────────────────────

  /** Deny the member Send Messages in every text channel */
  async restrict(guildId: string, targetId: string, moderator: Moderator, reason?: string | null): Promise<ServiceResult<{ channels: number }>> {
    const resolvedReason = resolveReason(reason);
    if (resolvedReason.error) return { success: false, error: resolvedReason.error };

    const checked = await this.check(guildId, moderator.id, targetId, "manageRoles", { requireMember: true });
    if (!checked.ok) return { success: false, error: checked.error };

    let channels: number;
    try {
      channels = await this.gateway.restrictMember(guildId, targetId, `Restricted by ${moderator.tag} (${moderator.id}) - ${resolvedReason.value}`);
    } catch (error) {
      log.error("Restrict failed:", error);
      return { success: false, error: describeError(error) };
    }

    this.publishModAction({ guildId, userId: targetId, action: "restrict", moderatorId: moderator.id, reason: resolvedReason.value });
    return { success: true, channels };
  }

  // ── Violations ─────────────────────────────────────────

  async clearViolations(guildId: string, targetId: string, moderator: Moderator): Promise<ServiceResult<{ removed: number }>> {
    const capable = await this.gateway.hasCapability(guildId, moderator.id, "moderate");
    if (!capable) return { success: false, error: `You need the ${CAPABILITY_NAMES.moderate} permission.` };

    try {
      const removed = await this.ledger.clearViolations(guildId, targetId);
      return { success: true, removed };
    } catch (error) {
      log.error("Clear violations failed:", error);
      return { success: false, error: describeError(error) };
    }
  }

  violationsReport(guildId: string, userId: string): { active: ViolationRecord[]; tier: number } {
    const now = this.clock();
    const active = this.ledger.activeViolations(guildId, userId, now);
    return { active, tier: this.ledger.tierFor(guildId, userId, now) };
  }

  warningsReport(guildId: string, userId: string): WarningRecord[] {
    return this.warnings.getWarnings(guildId, userId);
  }

  // ── Helpers ────────────────────────────────────────────

  private async check(guildId: string, invokerId: string, targetId: string, capability: Capability, options: { requireMember: boolean }): Promise<Checked> {
    try {
      const serviceId = this.gateway.serviceUserId();
      if (!serviceId) return { ok: false, error: "The bot is not ready yet." };

      if (targetId === invokerId) return { ok: false, error: "You cannot moderate yourself." };
      if (targetId === serviceId) return { ok: false, error: "I cannot moderate myself." };

      const ownerId = await this.gateway.guildOwnerId(guildId);
      if (targetId === ownerId) return { ok: false, error: "The server owner cannot be moderated." };

      const permission = CAPABILITY_NAMES[capability];
      if (!(await this.gateway.hasCapability(guildId, invokerId, capability))) {
        return { ok: false, error: `You need the ${permission} permission.` };
      }
      if (!(await this.gateway.hasCapability(guildId, serviceId, capability))) {
        return { ok: false, error: `I need the ${permission} permission.` };
      }

      const [invoker, service, target] = await Promise.all([
        this.gateway.fetchMember(guildId, invokerId),
        this.gateway.fetchMember(guildId, serviceId),
        this.gateway.fetchMember(guildId, targetId),
      ]);

      if (!target) {
        if (options.requireMember) return { ok: false, error: "User is not in this server." };
      } else {
        if (invokerId !== ownerId && target.highestRolePosition >= (invoker?.highestRolePosition ?? 0)) {
          return { ok: false, error: "That member's highest role is not below yours." };
        }
        if (target.highestRolePosition >= (service?.highestRolePosition ?? 0)) {
          return { ok: false, error: "That member's highest role is not below mine." };
        }
      }

      return { ok: true, context: { serviceId, ownerId, invoker, service, target } };
    } catch (error) {
      log.error(`Permission check failed in ${guildId}:`, error);
      return { ok: false, error: describeError(error) };
    }
  }

  private publishModAction(payload: { guildId: string; userId: string; action: ModActionPayload["action"]; moderatorId: string; reason: string; durationMs?: number; roleId?: string }): void {
    this.bus.publish(ModerationEventType.MOD_ACTION, { ...payload, timestamp: new Date(this.clock()) });
  }
}

/**
 * Default an empty reason and enforce the length limit
 */
export function resolveReason(reason?: string | null): { value: string; error?: string } {
  const trimmed = reason?.trim() ?? "";
  if (trimmed.length > MAX_REASON_LENGTH) {
    return { value: trimmed, error: `The reason must be at most ${MAX_REASON_LENGTH} characters.` };
  }
  return { value: trimmed || DEFAULT_REASON };
}
