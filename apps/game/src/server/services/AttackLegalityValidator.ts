import type { ActionKind } from "../../protocol/enums/ActionKind";
import { ActorType } from "../../protocol/enums/ActorType";
import { DenyReason } from "../../protocol/enums/DenyReason";
import { Disposition } from "../../protocol/enums/Disposition";
import { SceneRuleFlag } from "../../protocol/enums/SceneRules";
import type { LineOfSightProvider } from "../../world/LineOfSight";
import { isWithinRange } from "../../world/Location";
import type { ActorLookup, ActorView } from "../state/ActorState";
import type { StatusSource } from "../systems/StatusGateSystem";
import { snapshotAllows, type SceneRuleSource } from "./SceneRuleGate";
import type { TargetingResolver } from "./TargetingResolver";
import type { VisibilitySource } from "./VisibilityService";

export interface AttackQuery {
  readonly attackerId: number;
  readonly targetId: number;
  readonly actionKind: ActionKind;
  /** Maximum Chebyshev tile distance for this action. */
  readonly maxRange: number;
}

export type AttackResult =
  | { readonly allowed: true }
  | { readonly allowed: false; readonly reason: DenyReason };

export interface AttackLegalityValidatorDependencies {
  actors: ActorLookup;
  sceneRules: SceneRuleSource;
  resolver: TargetingResolver;
  status: StatusSource;
  visibility: VisibilitySource;
  /** Null means every line is clear. */
  lineOfSight: LineOfSightProvider | null;
}

const ALLOWED: AttackResult = Object.freeze({ allowed: true });

function denied(reason: DenyReason): AttackResult {
  return Object.freeze({ allowed: false, reason });
}

/**
 * Single allow/deny decision for a hostile intent.
 *
 * The chain short-circuits in this order, each step mapping to exactly one reason:
 * null actors -> attacker alive -> target alive -> region combat -> region damage
 * -> PvP (player vs player only) -> range/LoS -> status gate -> perception
 * -> disposition is Hostile.
 *
 * Region checks read the attacker's region. This is a pure query; it never
 * touches actor or engagement state, so callers may re-issue it freely.
 */
export class AttackLegalityValidator {
  constructor(private readonly deps: AttackLegalityValidatorDependencies) {}

  canAttack(query: AttackQuery): AttackResult {
    const attacker = this.deps.actors.get(query.attackerId);
    const target = this.deps.actors.get(query.targetId);
    if (!attacker || !target) {
      return denied(DenyReason.NullActor);
    }

    if (!attacker.isAlive) {
      return denied(DenyReason.AttackerDead);
    }

    if (!target.isAlive) {
      return denied(DenyReason.TargetDead);
    }

    const snapshot = this.deps.sceneRules.getSnapshot(attacker.regionId);
    if (!snapshotAllows(snapshot, SceneRuleFlag.CombatAllowed)) {
      return denied(DenyReason.SceneDisallowsCombat);
    }

    if (!snapshotAllows(snapshot, SceneRuleFlag.DamageAllowed)) {
      return denied(DenyReason.SceneDisallowsDamage);
    }

    if (
      attacker.type === ActorType.Player &&
      target.type === ActorType.Player &&
      !snapshotAllows(snapshot, SceneRuleFlag.PvPAllowed)
    ) {
      return denied(DenyReason.PvPNotAllowed);
    }

    if (!this.isInRangeAndSight(attacker, target, query.maxRange)) {
      return denied(DenyReason.RangeOrLoS);
    }

    if (this.deps.status.isActionBlocked(attacker.id, query.actionKind)) {
      return denied(DenyReason.StatusGated);
    }

    if (!this.deps.visibility.canPerceive(attacker.id, target.id)) {
      return denied(DenyReason.TargetNotVisible);
    }

    // Range already checked above, so no range gate here
    const disposition = this.deps.resolver.resolveDisposition(attacker.id, target.id);
    if (disposition.disposition !== Disposition.Hostile) {
      return denied(DenyReason.NotHostile);
    }

    return ALLOWED;
  }

  /**
   * Range and line of sight between two actors. Actors in different
   * regions are never in range.
   */
  isInRangeAndSight(attacker: ActorView, target: ActorView, maxRange: number): boolean {
    if (attacker.regionId !== target.regionId) return false;
    if (!isWithinRange(attacker.position, target.position, maxRange)) return false;
    if (!this.deps.lineOfSight) return true;
    return this.deps.lineOfSight.checkLOS(attacker.position, target.position, attacker.regionId).hasLOS;
  }
}
