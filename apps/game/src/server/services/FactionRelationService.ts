import { ActorType } from "../../protocol/enums/ActorType";
import { FactionRelation } from "../../protocol/enums/FactionRelation";
import type { FactionRelationMatrix, LawEnforcementRules } from "../../world/factions/FactionCatalog";
import type { ActorLookup, ActorView } from "../state/ActorState";

export interface FactionRelationServiceDependencies {
  matrix: FactionRelationMatrix;
  law: LawEnforcementRules;
  actors: ActorLookup;
}

/**
 * Pure relationship rules between two actors.
 *
 * Order is fixed:
 * 1. Controller inheritance - summons and pets stand in for their controller
 * 2. Law overrides - flagged players are hostile to law-enforcing factions
 * 3. Baseline matrix lookup
 *
 * Knows nothing about regions, range or liveness; those belong to the
 * targeting resolver and the attack validator.
 */
export class FactionRelationService {
  constructor(private readonly deps: FactionRelationServiceDependencies) {}

  relation(viewer: ActorView, target: ActorView): FactionRelation {
    const viewerStanding = this.resolveStanding(viewer);
    const targetStanding = this.resolveStanding(target);

    // A pet looking at its own controller, or two summons of one owner
    if (viewerStanding.id === targetStanding.id) {
      return FactionRelation.Friendly;
    }

    if (this.isLawHostile(viewerStanding, targetStanding)) {
      return FactionRelation.Hostile;
    }

    return this.deps.matrix.get(viewerStanding.factionId, targetStanding.factionId);
  }

  isHostile(viewer: ActorView, target: ActorView): boolean {
    return this.relation(viewer, target) === FactionRelation.Hostile;
  }

  /**
   * The actor whose faction and law flags count for hostility purposes.
   * One hop only; an unregistered controller leaves the actor standing for itself.
   */
  resolveStanding(actor: ActorView): ActorView {
    if (actor.controllerActorId === null) return actor;
    return this.deps.actors.get(actor.controllerActorId) ?? actor;
  }

  private isLawHostile(viewer: ActorView, target: ActorView): boolean {
    if (target.type !== ActorType.Player) return false;
    if (target.isMurderer && this.deps.law.murdererHostileTo.has(viewer.factionId)) {
      return true;
    }
    if (target.isCriminal && this.deps.law.criminalHostileTo.has(viewer.factionId)) {
      return true;
    }
    return false;
  }
}
