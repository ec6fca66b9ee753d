export { CombatCore, type CombatCoreConfig, type SpawnResult } from "./server/CombatCore";
export { GameServer } from "./server/GameServer";
export { loadServerConfig, type ServerConfig } from "./server/config";
export { EventBus } from "./server/events/EventBus";
export type { GameEvent, GameEventType, GameEventOf } from "./server/events/GameEvents";
export { ActorRegistry, ActorRegistryError } from "./server/services/ActorRegistry";
export {
  AttackLegalityValidator,
  type AttackQuery,
  type AttackResult
} from "./server/services/AttackLegalityValidator";
export { FactionRelationService } from "./server/services/FactionRelationService";
export { SceneRuleGate, type SceneRuleSnapshot, type SceneRuleSource } from "./server/services/SceneRuleGate";
export { TargetingResolver, type DispositionResult, type EligibilityResult } from "./server/services/TargetingResolver";
export type { VisibilitySource } from "./server/services/VisibilityService";
export type { ActorSpawn, ActorView } from "./server/state/ActorState";
export { CombatStateTracker, type CombatStateView } from "./server/systems/CombatStateTracker";
export type { AttackOutcome, AttackResolver } from "./server/systems/AttackLoopSystem";
export type { StatusSource } from "./server/systems/StatusGateSystem";
export { FactionCatalog } from "./world/factions/FactionCatalog";
export { RegionCatalog } from "./world/regions/RegionCatalog";
export type { LineOfSightProvider } from "./world/LineOfSight";
export type { ServerClock } from "./world/ServerClock";
export { ActionKind } from "./protocol/enums/ActionKind";
export { ActorType } from "./protocol/enums/ActorType";
export { CombatState } from "./protocol/enums/CombatState";
export { DenyReason } from "./protocol/enums/DenyReason";
export { Disposition } from "./protocol/enums/Disposition";
export { FactionId } from "./protocol/enums/FactionId";
export { FactionRelation } from "./protocol/enums/FactionRelation";
export { SceneContext, SceneRuleFlag } from "./protocol/enums/SceneRules";
