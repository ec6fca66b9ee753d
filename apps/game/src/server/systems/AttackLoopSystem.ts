/**
 * AttackLoopSystem.ts - Scheduled auto-attacks.
 *
 * Architecture:
 * - An allowed Attack intent schedules one repeating attack per attacker
 * - Every swing re-runs the legality check; nothing is trusted from scheduling time
 * - Resolution (hit/miss/damage) is delegated to an AttackResolver
 * - Each resolved swing refreshes engagement for both sides
 *
 * Swing Flow (once per server tick, before the engagement sweep):
 * 1. Count down the swing delay; nothing happens while it is above zero
 * 2. Allowed: resolve, refresh both timers, reset the delay
 * 3. Denied for good (dead, illegal, region): cancel and end the engagement
 * 4. Denied for now (range, sight, status): keep pursuing until the attacker's
 *    window lapses, then end the engagement and let the sweep cancel
 *
 * Cancelling is a plain synchronous delete; there is nothing in flight.
 */

import type { ActionKind } from "../../protocol/enums/ActionKind";
import { TRANSIENT_DENY_REASONS } from "../../protocol/enums/DenyReason";
import { SceneRuleFlag } from "../../protocol/enums/SceneRules";
import type { ServerClock } from "../../world/ServerClock";
import type { EventBus } from "../events/EventBus";
import {
  createAttackCancelledEvent,
  createAttackResolvedEvent,
  createAttackScheduledEvent,
  type AttackOutcomeKind
} from "../events/GameEvents";
import type { AttackLegalityValidator } from "../services/AttackLegalityValidator";
import type { ActorLookup } from "../state/ActorState";
import { snapshotAllows, type SceneRuleSource } from "../services/SceneRuleGate";
import type { CombatStateTracker } from "./CombatStateTracker";

export interface AttackOutcome {
  kind: AttackOutcomeKind;
  targetDied: boolean;
}

/**
 * Hit/miss/damage lives outside the legality core. Implementations
 * report what happened; this system only reacts to it.
 */
export interface AttackResolver {
  resolve(attackerId: number, targetId: number, actionKind: ActionKind): AttackOutcome;
}

/**
 * Resolver that lands every swing without dealing damage.
 */
export const harmlessAttackResolver: AttackResolver = {
  resolve: () => ({ kind: "Hit", targetDied: false })
};

export interface ScheduledAttack {
  readonly targetId: number;
  readonly actionKind: ActionKind;
  readonly maxRange: number;
  /** Ticks left before the next swing. */
  ticksUntilSwing: number;
}

export interface AttackLoopSystemConfig {
  clock: ServerClock;
  eventBus: EventBus;
  actors: ActorLookup;
  validator: AttackLegalityValidator;
  tracker: CombatStateTracker;
  sceneRules: SceneRuleSource;
  resolver: AttackResolver;
  /** Ticks between two swings of the same attacker. */
  attackIntervalTicks: number;
}

export class AttackLoopSystem {
  private readonly scheduled = new Map<number, ScheduledAttack>();

  constructor(private readonly config: AttackLoopSystemConfig) {}

  /**
   * Schedules (or replaces) the attacker's auto-attack. The first swing
   * happens on the next update.
   */
  schedule(attackerId: number, targetId: number, actionKind: ActionKind, maxRange: number): void {
    const existing = this.scheduled.get(attackerId);
    if (existing && existing.targetId !== targetId) {
      this.cancel(attackerId);
    }

    this.scheduled.set(attackerId, {
      targetId,
      actionKind,
      maxRange,
      ticksUntilSwing: existing?.targetId === targetId ? existing.ticksUntilSwing : 0
    });
    this.config.eventBus.emit(createAttackScheduledEvent(attackerId, targetId, actionKind));
  }

  /**
   * @returns true if an attack was cancelled
   */
  cancel(attackerId: number): boolean {
    const attack = this.scheduled.get(attackerId);
    if (!attack) return false;
    this.scheduled.delete(attackerId);
    this.config.eventBus.emit(createAttackCancelledEvent(attackerId, attack.targetId));
    return true;
  }

  /**
   * Cancels every attack aimed at `targetId`.
   * @returns ids of the attackers whose attack was cancelled
   */
  cancelAttacksOn(targetId: number): number[] {
    const attackers: number[] = [];
    for (const [attackerId, attack] of this.scheduled) {
      if (attack.targetId === targetId) attackers.push(attackerId);
    }
    for (const attackerId of attackers) {
      this.cancel(attackerId);
    }
    return attackers;
  }

  getScheduled(attackerId: number): Readonly<ScheduledAttack> | null {
    return this.scheduled.get(attackerId) ?? null;
  }

  hasScheduled(attackerId: number): boolean {
    return this.scheduled.has(attackerId);
  }

  /**
   * Processes every scheduled attack. Called once per server tick.
   */
  update(): void {
    for (const [attackerId, attack] of Array.from(this.scheduled)) {
      // An earlier swing this tick may have cancelled this one (target killed the attacker)
      if (this.scheduled.get(attackerId) !== attack) continue;

      if (attack.ticksUntilSwing > 0) {
        attack.ticksUntilSwing--;
        continue;
      }

      const result = this.config.validator.canAttack({
        attackerId,
        targetId: attack.targetId,
        actionKind: attack.actionKind,
        maxRange: attack.maxRange
      });

      if (result.allowed) {
        this.swing(attackerId, attack);
        continue;
      }

      if (!TRANSIENT_DENY_REASONS.has(result.reason)) {
        this.cancel(attackerId);
        this.config.tracker.onEngagementEnded(attackerId);
        continue;
      }

      // Still pursuing; give up once the attacker's window has run out
      const engagement = this.config.tracker.getEngagement(attackerId);
      if (this.config.clock.now() >= engagement.combatUntilTime) {
        this.config.tracker.onEngagementEnded(attackerId);
      }
    }
  }

  private swing(attackerId: number, attack: ScheduledAttack): void {
    const outcome = this.config.resolver.resolve(attackerId, attack.targetId, attack.actionKind);
    attack.ticksUntilSwing = Math.max(0, this.config.attackIntervalTicks - 1);

    this.config.tracker.onHostileResolution(attackerId, attack.targetId);
    this.config.eventBus.emit(
      createAttackResolvedEvent(attackerId, attack.targetId, attack.actionKind, outcome.kind)
    );

    if (outcome.targetDied) {
      const target = this.config.actors.get(attack.targetId);
      if (target && snapshotAllows(this.config.sceneRules.getSnapshot(target.regionId), SceneRuleFlag.DeathAllowed)) {
        this.config.tracker.markDead(attack.targetId);
      } else {
        console.warn(`[AttackLoopSystem] Ignoring death of ${attack.targetId}: region does not allow death`);
      }
    }
  }
}
