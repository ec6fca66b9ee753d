/**
 * CombatStateTracker.ts - Per-actor engagement timers and the combat state machine.
 *
 * States: Peaceful, InCombat, Dead.
 * Derived state: InCombat while `hasActiveHostileEngagement || now < combatUntilTime`,
 * otherwise Peaceful; Dead overrides both until the respawn pipeline clears it.
 *
 * Transitions into InCombat publish immediately. Transitions back to Peaceful
 * are published only by the fixed-interval sweep (or by a hard override), and
 * the sweep runs after every same-tick refresh so it never expires an
 * engagement that was just extended.
 *
 * Selection alone never refreshes engagement.
 */

import { CombatState } from "../../protocol/enums/CombatState";
import { SceneRuleFlag } from "../../protocol/enums/SceneRules";
import type { ServerClock } from "../../world/ServerClock";
import { snapshotAllows, type SceneRuleSnapshot, type SceneRuleSource } from "../services/SceneRuleGate";
import type { ActorRegistry } from "../services/ActorRegistry";
import type { StateMachine } from "../StateMachine";
import type { ActorState, EngagementState } from "../state/ActorState";

export interface CombatStateTrackerConfig {
  clock: ServerClock;
  actors: ActorRegistry;
  sceneRules: SceneRuleSource;
  stateMachine: StateMachine;
  /** Length of the disengage window. */
  disengageSeconds: number;
  /**
   * When true, a validated hostile intent also refreshes the victim's timer.
   * Off unless a design decision turns it on.
   */
  engagementOnTargeted: boolean;
}

export interface CombatStateView {
  state: CombatState;
  /** Display only; never feed this back into a decision. */
  remainingSeconds: number;
}

export class CombatStateTracker {
  private readonly engagements = new Map<number, EngagementState>();

  constructor(private readonly config: CombatStateTrackerConfig) {}

  private get disengageMs(): number {
    return Math.max(0, this.config.disengageSeconds) * 1000;
  }

  // ============================================================================
  // Engagement Events
  // ============================================================================

  /**
   * An Attack or harmful cast by `attackerId` was allowed.
   * Marks the attacker as actively engaged and extends its window.
   */
  onHostileIntentValidated(attackerId: number, victimId?: number): void {
    const attacker = this.getCombatCapableActor(attackerId);
    if (!attacker) return;

    const engagement = this.ensureEngagement(attackerId);
    engagement.hasActiveHostileEngagement = true;
    this.refreshWindow(engagement);
    this.publishEngaged(attacker);

    if (this.config.engagementOnTargeted && victimId !== undefined && victimId !== attackerId) {
      const victim = this.getCombatCapableActor(victimId);
      if (victim) {
        this.refreshWindow(this.ensureEngagement(victimId));
        this.publishEngaged(victim);
      }
    }
  }

  /**
   * A scheduled hostile action completed (hit, miss or damage applied).
   * Extends the window of both sides; leaves the engagement flag alone.
   */
  onHostileResolution(attackerId: number, victimId: number): void {
    for (const actorId of attackerId === victimId ? [attackerId] : [attackerId, victimId]) {
      const actor = this.getCombatCapableActor(actorId);
      if (!actor) continue;
      this.refreshWindow(this.ensureEngagement(actorId));
      this.publishEngaged(actor);
    }
  }

  /**
   * The attacker stopped pursuing (explicit cancel, or the target became
   * dead, despawned or illegal). The timer is left to expire naturally.
   */
  onEngagementEnded(attackerId: number): void {
    const engagement = this.engagements.get(attackerId);
    if (engagement) {
      engagement.hasActiveHostileEngagement = false;
    }
  }

  // ============================================================================
  // Death Pipeline Hooks
  // ============================================================================

  markDead(actorId: number): void {
    if (!this.config.actors.setAlive(actorId, false)) return;
    this.engagements.set(actorId, { combatUntilTime: 0, hasActiveHostileEngagement: false });
    this.config.stateMachine.setState(actorId, CombatState.Dead);
  }

  markRespawned(actorId: number): void {
    if (!this.config.actors.setAlive(actorId, true)) return;
    this.engagements.set(actorId, { combatUntilTime: 0, hasActiveHostileEngagement: false });
    this.config.stateMachine.setState(actorId, CombatState.Peaceful);
  }

  // ============================================================================
  // Scene Overrides
  // ============================================================================

  /**
   * Called on every region transition. A region without combat forces the
   * actor out of combat immediately, whatever its timer says.
   */
  onRegionEntered(actorId: number, snapshot: SceneRuleSnapshot): void {
    if (!snapshotAllows(snapshot, SceneRuleFlag.CombatAllowed)) {
      this.forcePeaceful(actorId);
    }
  }

  /**
   * Applies the hard override to every actor in a region that disallows combat.
   * @returns number of actors forced peaceful
   */
  applySceneOverride(regionId: string): number {
    if (snapshotAllows(this.config.sceneRules.getSnapshot(regionId), SceneRuleFlag.CombatAllowed)) {
      return 0;
    }
    const actors = this.config.actors.getActorsInRegion(regionId);
    for (const actor of actors) {
      this.forcePeaceful(actor.id);
    }
    return actors.length;
  }

  /**
   * Zeroes the engagement, cancels pending attacks and clears
   * attack-driven selection. Dead actors stay Dead.
   */
  forcePeaceful(actorId: number): void {
    const actor = this.config.actors.get(actorId);
    if (!actor) return;

    this.engagements.set(actorId, { combatUntilTime: 0, hasActiveHostileEngagement: false });
    if (actor.isAlive && actor.combatState !== CombatState.Peaceful) {
      this.config.stateMachine.setState(actorId, CombatState.Peaceful);
    } else {
      this.config.stateMachine.forceDisengage(actorId);
    }
  }

  // ============================================================================
  // Sweep
  // ============================================================================

  /**
   * Publishes derived state changes for every actor. InCombat -> Peaceful
   * transitions run the disengage cleanup through the state machine.
   *
   * Called on a fixed interval, after the tick's attack resolutions.
   */
  sweep(): void {
    for (const actor of this.config.actors.values()) {
      const engagement = this.engagements.get(actor.id);
      if (
        engagement &&
        (engagement.hasActiveHostileEngagement || engagement.combatUntilTime > 0) &&
        !snapshotAllows(this.config.sceneRules.getSnapshot(actor.regionId), SceneRuleFlag.CombatAllowed)
      ) {
        this.forcePeaceful(actor.id);
        continue;
      }

      const derived = this.deriveState(actor);
      if (derived !== actor.combatState) {
        this.config.stateMachine.setState(actor.id, derived);
      }
    }
  }

  // ============================================================================
  // Queries
  // ============================================================================

  /**
   * Live derived state. May run ahead of the published state by at most
   * one sweep interval.
   */
  getCombatState(actorId: number): CombatState {
    const actor = this.config.actors.get(actorId);
    if (!actor) return CombatState.Peaceful;
    return this.deriveState(actor);
  }

  isInCombat(actorId: number): boolean {
    return this.getCombatState(actorId) === CombatState.InCombat;
  }

  getCombatStateView(actorId: number): CombatStateView {
    return {
      state: this.getCombatState(actorId),
      remainingSeconds: this.remainingSeconds(actorId)
    };
  }

  remainingSeconds(actorId: number): number {
    const engagement = this.engagements.get(actorId);
    if (!engagement) return 0;
    return Math.max(0, engagement.combatUntilTime - this.config.clock.now()) / 1000;
  }

  getEngagement(actorId: number): Readonly<EngagementState> {
    const engagement = this.engagements.get(actorId);
    return engagement
      ? { ...engagement }
      : { combatUntilTime: 0, hasActiveHostileEngagement: false };
  }

  forget(actorId: number): void {
    this.engagements.delete(actorId);
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private deriveState(actor: ActorState): CombatState {
    if (!actor.isAlive) return CombatState.Dead;
    const engagement = this.engagements.get(actor.id);
    if (!engagement) return CombatState.Peaceful;
    if (engagement.hasActiveHostileEngagement || this.config.clock.now() < engagement.combatUntilTime) {
      return CombatState.InCombat;
    }
    return CombatState.Peaceful;
  }

  private refreshWindow(engagement: EngagementState): void {
    const desiredUntil = this.config.clock.now() + this.disengageMs;
    engagement.combatUntilTime = Math.max(engagement.combatUntilTime, desiredUntil);
  }

  private ensureEngagement(actorId: number): EngagementState {
    let engagement = this.engagements.get(actorId);
    if (!engagement) {
      engagement = { combatUntilTime: 0, hasActiveHostileEngagement: false };
      this.engagements.set(actorId, engagement);
    }
    return engagement;
  }

  /**
   * Alive and standing in a region that permits combat; the scene gate
   * wins over every engagement event.
   */
  private getCombatCapableActor(actorId: number): ActorState | undefined {
    const actor = this.config.actors.get(actorId);
    if (!actor || !actor.isAlive) return undefined;
    const snapshot = this.config.sceneRules.getSnapshot(actor.regionId);
    if (!snapshotAllows(snapshot, SceneRuleFlag.CombatAllowed)) return undefined;
    return actor;
  }

  private publishEngaged(actor: ActorState): void {
    if (actor.combatState !== CombatState.InCombat) {
      this.config.stateMachine.setState(actor.id, CombatState.InCombat);
    }
  }
}
