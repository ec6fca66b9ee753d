/**
 * Stable reason codes for every refused targeting or attack intent.
 * Values go over the wire and into the audit table; never renumber.
 */
export enum DenyReason {
  NullActor = "NullActor",
  TargetDead = "TargetDead",
  AttackerDead = "AttackerDead",
  TargetNotVisible = "TargetNotVisible",
  SceneDisallowsHostileActors = "SceneDisallowsHostileActors",
  SceneDisallowsCombat = "SceneDisallowsCombat",
  SceneDisallowsDamage = "SceneDisallowsDamage",
  PvPNotAllowed = "PvPNotAllowed",
  NotHostile = "NotHostile",
  RangeOrLoS = "RangeOrLoS",
  StatusGated = "StatusGated"
}

/**
 * Denials that can clear up without the intent changing (the target walks
 * back into range, a stun wears off). Everything else ends the engagement.
 */
export const TRANSIENT_DENY_REASONS: ReadonlySet<DenyReason> = new Set([
  DenyReason.RangeOrLoS,
  DenyReason.TargetNotVisible,
  DenyReason.StatusGated
]);
