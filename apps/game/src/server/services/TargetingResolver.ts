import { ActorType } from "../../protocol/enums/ActorType";
import { DenyReason } from "../../protocol/enums/DenyReason";
import { Disposition } from "../../protocol/enums/Disposition";
import { FactionRelation } from "../../protocol/enums/FactionRelation";
import { SceneRuleFlag } from "../../protocol/enums/SceneRules";
import type { ActorLookup, ActorView } from "../state/ActorState";
import type { FactionRelationService } from "./FactionRelationService";
import { snapshotAllows, type SceneRuleSnapshot, type SceneRuleSource } from "./SceneRuleGate";
import type { VisibilitySource } from "./VisibilityService";

/**
 * Optional geometric gate applied last during eligibility.
 */
export type RangeGate = (viewer: ActorView, target: ActorView) => boolean;

export interface EligibilityResult {
  readonly eligible: boolean;
  readonly denyReason: DenyReason | null;
}

export interface DispositionResult {
  readonly eligible: boolean;
  readonly disposition: Disposition;
  readonly denyReason: DenyReason | null;
}

export interface TargetingResolverDependencies {
  actors: ActorLookup;
  factions: FactionRelationService;
  sceneRules: SceneRuleSource;
  visibility: VisibilitySource;
}

const ELIGIBLE: EligibilityResult = Object.freeze({ eligible: true, denyReason: null });

function ineligible(reason: DenyReason): EligibilityResult {
  return Object.freeze({ eligible: false, denyReason: reason });
}

function dispositionResult(
  eligible: boolean,
  disposition: Disposition,
  denyReason: DenyReason | null
): DispositionResult {
  return Object.freeze({ eligible, disposition, denyReason });
}

const DISPOSITION_BY_RELATION: Readonly<Record<FactionRelation, Disposition>> = {
  [FactionRelation.Friendly]: Disposition.Friendly,
  [FactionRelation.Neutral]: Disposition.Neutral,
  [FactionRelation.Hostile]: Disposition.Hostile
};

/**
 * Two-phase targeting evaluation: eligibility, then disposition.
 *
 * Both phases are pure queries over the actor registry, the faction rules
 * and the viewer's region snapshot. The disposition order is locked so the
 * same pair never flickers between hostile and not hostile:
 *
 * 1. identity -> Self
 * 2. eligibility failure -> Invalid (with reason)
 * 3. base relation from the faction rules
 * 4. region disallows hostile actors -> Hostile becomes Neutral
 * 5. player vs player in a region without PvP -> Hostile becomes Neutral
 * 6. relation -> disposition
 *
 * Overrides downgrade instead of deny so passive UI still gets a label
 * where an attack would be illegal.
 */
export class TargetingResolver {
  constructor(private readonly deps: TargetingResolverDependencies) {}

  /**
   * Eligibility checks, first failure wins:
   * null guard -> self -> target alive -> perceivable -> optional range gate.
   */
  evaluateEligibility(viewerId: number, targetId: number, rangeGate?: RangeGate): EligibilityResult {
    const viewer = this.deps.actors.get(viewerId);
    const target = this.deps.actors.get(targetId);
    if (!viewer || !target) {
      return ineligible(DenyReason.NullActor);
    }

    if (viewer.id === target.id) {
      return ELIGIBLE;
    }

    if (!target.isAlive) {
      return ineligible(DenyReason.TargetDead);
    }

    if (!this.deps.visibility.canPerceive(viewer.id, target.id)) {
      return ineligible(DenyReason.TargetNotVisible);
    }

    if (rangeGate && !rangeGate(viewer, target)) {
      return ineligible(DenyReason.RangeOrLoS);
    }

    return ELIGIBLE;
  }

  /**
   * Resolves how `viewerId` perceives `targetId` right now.
   *
   * @example
   * const result = resolver.resolveDisposition(playerId, monsterId);
   * if (result.disposition === Disposition.Hostile) {
   *   // show the attack cursor
   * }
   */
  resolveDisposition(viewerId: number, targetId: number, rangeGate?: RangeGate): DispositionResult {
    if (viewerId === targetId) {
      return dispositionResult(true, Disposition.Self, null);
    }

    const eligibility = this.evaluateEligibility(viewerId, targetId, rangeGate);
    const viewer = this.deps.actors.get(viewerId);
    const target = this.deps.actors.get(targetId);
    if (!eligibility.eligible || !viewer || !target) {
      return dispositionResult(false, Disposition.Invalid, eligibility.denyReason ?? DenyReason.NullActor);
    }

    const snapshot = this.deps.sceneRules.getSnapshot(viewer.regionId);
    const relation = this.applySceneOverrides(
      this.deps.factions.relation(viewer, target),
      viewer,
      target,
      snapshot
    );

    return dispositionResult(true, DISPOSITION_BY_RELATION[relation], null);
  }

  private applySceneOverrides(
    relation: FactionRelation,
    viewer: ActorView,
    target: ActorView,
    snapshot: SceneRuleSnapshot
  ): FactionRelation {
    if (relation !== FactionRelation.Hostile) {
      return relation;
    }

    if (!snapshotAllows(snapshot, SceneRuleFlag.HostileActorsAllowed)) {
      return FactionRelation.Neutral;
    }

    if (
      viewer.type === ActorType.Player &&
      target.type === ActorType.Player &&
      !snapshotAllows(snapshot, SceneRuleFlag.PvPAllowed)
    ) {
      return FactionRelation.Neutral;
    }

    return relation;
  }
}
