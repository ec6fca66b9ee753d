/**
 * Canonical region context taxonomy. Every region declares exactly one.
 */
export enum SceneContext {
  Housing = "Housing",
  Village = "Village",
  Dungeon = "Dungeon"
}

/**
 * Hard permission gates. A missing flag means the server refuses
 * intents that would violate it.
 */
export enum SceneRuleFlag {
  CombatAllowed = "CombatAllowed",
  DamageAllowed = "DamageAllowed",
  DeathAllowed = "DeathAllowed",
  DurabilityLossAllowed = "DurabilityLossAllowed",
  ResourceGatheringAllowed = "ResourceGatheringAllowed",
  SkillGainAllowed = "SkillGainAllowed",
  HostileActorsAllowed = "HostileActorsAllowed",
  PvPAllowed = "PvPAllowed"
}

export const ALL_SCENE_RULE_FLAGS: readonly SceneRuleFlag[] = Object.freeze(Object.values(SceneRuleFlag));

/**
 * Context to flag mapping. Safe contexts grant nothing; dungeons grant everything.
 */
export const CONTEXT_FLAGS: Readonly<Record<SceneContext, readonly SceneRuleFlag[]>> = {
  [SceneContext.Housing]: Object.freeze([]),
  [SceneContext.Village]: Object.freeze([]),
  [SceneContext.Dungeon]: ALL_SCENE_RULE_FLAGS
};
