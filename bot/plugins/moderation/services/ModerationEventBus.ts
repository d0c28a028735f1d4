/**
 * Moderation Event Bus - In-memory outbox for sanction side effects
 *
 * Sanctions are applied first; consumers (reputation, audit log) hear about
 * them afterwards and cannot roll them back:
 * - sanction_applied: escalation applied a warn, timeout or ban
 * - sanction_expired: the scheduler reversed a temporary sanction
 * - mod_action: a moderator issued a kick, ban, temporary role or restriction
 */

import { createLogger } from "../../../src/core/Logger.js";
import type { ViolationType } from "../models/Violation.js";
import type { TemporarySanction } from "../models/TemporarySanction.js";
import type { PunishmentAction } from "../utils/punishment-tiers.js";

const log = createLogger("moderation:events");

export enum ModerationEventType {
  SANCTION_APPLIED = "sanction_applied",
  SANCTION_EXPIRED = "sanction_expired",
  MOD_ACTION = "mod_action",
}

export interface ModerationEventPayload {
  guildId: string;
  userId: string;
  timestamp: Date;
}

export interface SanctionAppliedPayload extends ModerationEventPayload {
  violationType: ViolationType;
  severity: number;
  tier: number;
  action: PunishmentAction;
  durationMs?: number;
  /** Active violations at the time of the sanction, including this one */
  activeCount: number;
  /** Moderator for manual warnings; the service identity for automod */
  actorId: string | null;
}

export interface SanctionExpiredPayload extends ModerationEventPayload {
  sanction: TemporarySanction;
  /** False when reversal failed and the record was dropped anyway */
  reversed: boolean;
}

export interface ModActionPayload extends ModerationEventPayload {
  action: "kick" | "ban" | "temprole" | "restrict";
  moderatorId: string;
  reason: string;
  durationMs?: number;
  roleId?: string;
}

export interface ModerationEventMap {
  [ModerationEventType.SANCTION_APPLIED]: SanctionAppliedPayload;
  [ModerationEventType.SANCTION_EXPIRED]: SanctionExpiredPayload;
  [ModerationEventType.MOD_ACTION]: ModActionPayload;
}

export type ModerationEventCallback<E extends ModerationEventType> = (payload: ModerationEventMap[E]) => void | Promise<void>;

type ListenerTable = { [E in ModerationEventType]: Set<ModerationEventCallback<E>> };

export class ModerationEventBus {
  private listeners: ListenerTable = {
    [ModerationEventType.SANCTION_APPLIED]: new Set(),
    [ModerationEventType.SANCTION_EXPIRED]: new Set(),
    [ModerationEventType.MOD_ACTION]: new Set(),
  };
  private pending = new Set<Promise<void>>();

  on<E extends ModerationEventType>(event: E, callback: ModerationEventCallback<E>): () => void {
    const set: Set<ModerationEventCallback<E>> = this.listeners[event];
    set.add(callback);
    return () => this.off(event, callback);
  }

  off<E extends ModerationEventType>(event: E, callback: ModerationEventCallback<E>): void {
    const set: Set<ModerationEventCallback<E>> = this.listeners[event];
    set.delete(callback);
  }

  /**
   * Deliver to every listener without waiting. Listener failures are logged
   * and never reach the publisher.
   */
  publish<E extends ModerationEventType>(event: E, payload: ModerationEventMap[E]): void {
    const set: Set<ModerationEventCallback<E>> = this.listeners[event];
    log.debug(`Publishing ${event} for ${payload.guildId}/${payload.userId} to ${set.size} listener(s)`);

    for (const callback of set) {
      const delivery = Promise.resolve()
        .then(() => callback(payload))
        .catch((error: unknown) => {
          log.error(`Listener for ${event} failed:`, error);
        })
        .finally(() => {
          this.pending.delete(delivery);
        });
      this.pending.add(delivery);
    }
  }

  /** Wait until every delivery started so far has settled */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  getStats(): { totalListeners: number; eventBreakdown: Record<string, number> } {
    const eventBreakdown: Record<string, number> = {};
    let totalListeners = 0;

    for (const event of Object.values(ModerationEventType)) {
      const size = this.listeners[event].size;
      eventBreakdown[event] = size;
      totalListeners += size;
    }

    return { totalListeners, eventBreakdown };
  }
}
