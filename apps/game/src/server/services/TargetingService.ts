import type { EventBus } from "../events/EventBus";
import { createSelectionChangedEvent } from "../events/GameEvents";
import type { ActorLookup } from "../state/ActorState";

/**
 * What an actor currently has selected, and why.
 */
export interface Selection {
  readonly targetId: number;
  /**
   * True when an attack intent produced the selection. Only these are
   * cleared when the actor drops out of combat.
   */
  readonly attackDriven: boolean;
}

export interface TargetingServiceDependencies {
  eventBus: EventBus;
  actors: ActorLookup;
}

/**
 * Service for managing actor selection.
 *
 * **Architecture**:
 * - This is the SINGLE SOURCE OF TRUTH for selection state
 * - All selection changes and SelectionChanged emissions happen here
 * - Selection is never engagement: nothing in this service touches combat timers
 *
 * **Selection kinds**:
 * - Passive (Select/Interact): survives the actor leaving combat
 * - Attack-driven: cleared by the disengage sweep and the scene override
 */
export class TargetingService {
  private readonly selections = new Map<number, Selection>();

  constructor(private readonly deps: TargetingServiceDependencies) {}

  // ============================================================================
  // Selection Methods
  // ============================================================================

  /**
   * Sets an actor's selection.
   *
   * Behavior:
   * - Same target, same kind: no-op
   * - Same target, passive -> attack-driven: upgraded, event emitted
   * - Same target, attack-driven -> passive: kept attack-driven (re-clicking
   *   your own attack target must not protect it from the disengage sweep)
   * - Different target: replaced, event emitted
   *
   * @returns false if either actor is unknown
   *
   * @example
   * // Player clicks a monster to inspect it
   * targetingService.select(playerId, monsterId, { attackDriven: false });
   */
  select(actorId: number, targetId: number, options: { attackDriven: boolean }): boolean {
    if (!this.deps.actors.get(actorId) || !this.deps.actors.get(targetId)) {
      console.warn(`[TargetingService] Cannot select - actor ${actorId} or target ${targetId} not found`);
      return false;
    }

    const current = this.selections.get(actorId);
    if (current && current.targetId === targetId) {
      if (current.attackDriven || !options.attackDriven) {
        return true;
      }
    }

    const next: Selection = Object.freeze({ targetId, attackDriven: options.attackDriven });
    this.selections.set(actorId, next);
    this.deps.eventBus.emit(
      createSelectionChangedEvent(actorId, current?.targetId ?? null, targetId, next.attackDriven)
    );
    return true;
  }

  getSelection(actorId: number): Selection | null {
    return this.selections.get(actorId) ?? null;
  }

  /**
   * Clears any selection.
   * @returns true if something was cleared
   */
  clearSelection(actorId: number): boolean {
    const current = this.selections.get(actorId);
    if (!current) return false;
    this.selections.delete(actorId);
    this.deps.eventBus.emit(createSelectionChangedEvent(actorId, current.targetId, null, false));
    return true;
  }

  /**
   * Clears the selection only if an attack produced it. Passive
   * selections are preserved.
   */
  clearAttackDrivenSelection(actorId: number): boolean {
    const current = this.selections.get(actorId);
    if (!current || !current.attackDriven) return false;
    return this.clearSelection(actorId);
  }

  /**
   * Clears every selection pointing at `targetId` (despawn, region change).
   * @returns ids of the actors whose selection was cleared
   */
  clearSelectionsOf(targetId: number): number[] {
    const cleared: number[] = [];
    for (const [actorId, selection] of this.selections) {
      if (selection.targetId === targetId) cleared.push(actorId);
    }
    for (const actorId of cleared) {
      this.clearSelection(actorId);
    }
    return cleared;
  }

  /**
   * Drops an actor's own selection without notification, for despawn.
   */
  forget(actorId: number): void {
    this.selections.delete(actorId);
  }
}
