import { ACTION_RANGE_TILES, type ActionKind } from "../protocol/enums/ActionKind";
import { HOSTILE_ACTOR_TYPES } from "../protocol/enums/ActorType";
import { DenyReason } from "../protocol/enums/DenyReason";
import { SceneRuleFlag } from "../protocol/enums/SceneRules";
import type { FactionCatalog } from "../world/factions/FactionCatalog";
import { TileLineOfSight } from "../world/LineOfSight";
import type { Position } from "../world/Location";
import type { RegionCatalog, RegionDefinition } from "../world/regions/RegionCatalog";
import type { ServerClock } from "../world/ServerClock";
import { EventBus } from "./events/EventBus";
import { createTargetIntentDeniedEvent } from "./events/GameEvents";
import { ActorRegistry } from "./services/ActorRegistry";
import { AttackLegalityValidator, type AttackQuery, type AttackResult } from "./services/AttackLegalityValidator";
import { FactionRelationService } from "./services/FactionRelationService";
import { SceneRuleGate, type SceneRuleRegistration } from "./services/SceneRuleGate";
import { TargetingResolver, type DispositionResult } from "./services/TargetingResolver";
import { TargetingService } from "./services/TargetingService";
import { TravelService, type TravelResult } from "./services/TravelService";
import { VisibilityService } from "./services/VisibilityService";
import type { ActorSpawn, ActorView } from "./state/ActorState";
import { StateMachine, type StateMachineContext } from "./StateMachine";
import { AggroSystem } from "./systems/AggroSystem";
import { AttackLoopSystem, harmlessAttackResolver, type AttackResolver } from "./systems/AttackLoopSystem";
import { CombatStateTracker, type CombatStateView } from "./systems/CombatStateTracker";
import { StatusGateSystem } from "./systems/StatusGateSystem";

export type CombatCoreConfig = {
  clock: ServerClock;
  factions: FactionCatalog;
  regions: RegionCatalog;
  disengageSeconds: number;
  engagementOnTargeted: boolean;
  /** Ticks between two swings of one auto-attack. */
  attackIntervalTicks: number;
  /** The engagement sweep runs every N ticks. */
  sweepIntervalTicks: number;
  /** How long aggression records survive (ms). Defaults to the disengage window. */
  aggroRetentionMs?: number;
  attackResolver?: AttackResolver;
  eventBus?: EventBus;
};

export type SpawnResult =
  | { ok: true; actor: ActorView }
  | { ok: false; reason: DenyReason };

/**
 * Wires the legality engine together and exposes the operations the
 * server shell calls. Owns every piece of mutable combat state; the
 * socket layer never writes to a service directly.
 *
 * Tick order:
 * 1. Status effects expire
 * 2. Scheduled attacks swing (each resolution refreshes engagement)
 * 3. Aggression records age out
 * 4. Engagement sweep, every `sweepIntervalTicks`
 */
export class CombatCore {
  readonly eventBus: EventBus;
  readonly actors: ActorRegistry;
  readonly factionRelations: FactionRelationService;
  readonly sceneRules: SceneRuleGate;
  readonly visibility: VisibilityService;
  readonly status: StatusGateSystem;
  readonly lineOfSight: TileLineOfSight;
  readonly resolver: TargetingResolver;
  readonly validator: AttackLegalityValidator;
  readonly targeting: TargetingService;
  readonly aggro: AggroSystem;
  readonly stateMachine: StateMachine;
  readonly tracker: CombatStateTracker;
  readonly attackLoop: AttackLoopSystem;
  readonly travel: TravelService;

  private tickCount = 0;

  constructor(private readonly config: CombatCoreConfig) {
    const { clock } = config;
    this.eventBus = config.eventBus ?? new EventBus();
    this.actors = new ActorRegistry({ eventBus: this.eventBus });
    this.sceneRules = new SceneRuleGate({ eventBus: this.eventBus });
    this.visibility = new VisibilityService();
    this.status = new StatusGateSystem({ clock });
    this.lineOfSight = new TileLineOfSight();

    this.factionRelations = new FactionRelationService({
      matrix: config.factions.matrix,
      law: config.factions.law,
      actors: this.actors
    });

    this.resolver = new TargetingResolver({
      actors: this.actors,
      factions: this.factionRelations,
      sceneRules: this.sceneRules,
      visibility: this.visibility
    });

    this.validator = new AttackLegalityValidator({
      actors: this.actors,
      sceneRules: this.sceneRules,
      resolver: this.resolver,
      status: this.status,
      visibility: this.visibility,
      lineOfSight: this.lineOfSight
    });

    this.targeting = new TargetingService({ eventBus: this.eventBus, actors: this.actors });

    this.aggro = new AggroSystem({
      clock,
      retentionMs: config.aggroRetentionMs ?? Math.max(0, config.disengageSeconds) * 1000
    });

    this.stateMachine = new StateMachine(this.createStateMachineContext());

    this.tracker = new CombatStateTracker({
      clock,
      actors: this.actors,
      sceneRules: this.sceneRules,
      stateMachine: this.stateMachine,
      disengageSeconds: config.disengageSeconds,
      engagementOnTargeted: config.engagementOnTargeted
    });

    this.attackLoop = new AttackLoopSystem({
      clock,
      eventBus: this.eventBus,
      actors: this.actors,
      validator: this.validator,
      tracker: this.tracker,
      sceneRules: this.sceneRules,
      resolver: config.attackResolver ?? harmlessAttackResolver,
      attackIntervalTicks: config.attackIntervalTicks
    });

    this.travel = new TravelService({
      actors: this.actors,
      regions: config.regions,
      sceneRules: this.sceneRules,
      tracker: this.tracker,
      eventBus: this.eventBus,
      disengageTraveler: (actorId) => this.disengageTraveler(actorId)
    });

    for (const region of config.regions.getRegions()) {
      this.registerRegion(region);
    }
  }

  // ============================================================================
  // Regions
  // ============================================================================

  /**
   * Installs (or replaces) a region's rule snapshot and sight blockers,
   * then applies the hard override to anyone already standing there.
   */
  registerRegion(region: RegionDefinition): SceneRuleRegistration {
    const registration = this.sceneRules.registerRegion(region.id, region.ruleProviders);
    this.lineOfSight.setBlockedTiles(region.id, region.blockedTiles);
    this.tracker.applySceneOverride(region.id);
    return registration;
  }

  // ============================================================================
  // Actor Lifecycle
  // ============================================================================

  /**
   * Spawns an actor. Hostile actor types are refused in regions that do
   * not allow them.
   *
   * @throws ActorRegistryError if the id is already in use
   */
  spawnActor(spawn: ActorSpawn): SpawnResult {
    if (
      HOSTILE_ACTOR_TYPES.has(spawn.type) &&
      !this.sceneRules.allows(spawn.regionId, SceneRuleFlag.HostileActorsAllowed)
    ) {
      console.warn(
        `[CombatCore] Refusing to spawn ${spawn.type} ${spawn.id} in '${spawn.regionId}': hostile actors not allowed`
      );
      return { ok: false, reason: DenyReason.SceneDisallowsHostileActors };
    }
    return { ok: true, actor: this.actors.spawn(spawn) };
  }

  /**
   * Spawns the actors each region places at startup.
   * @returns number of actors spawned
   */
  spawnPlacedActors(): number {
    let spawned = 0;
    for (const region of this.config.regions.getRegions()) {
      for (const placement of region.actors) {
        const result = this.spawnActor({
          id: placement.id,
          type: placement.type,
          factionId: placement.factionId,
          regionId: region.id,
          position: { x: placement.x, y: placement.y }
        });
        if (result.ok) spawned++;
      }
    }
    console.log(`[CombatCore] Spawned ${spawned} placed actors`);
    return spawned;
  }

  /**
   * Removes an actor and every reference other systems hold to it.
   * Attackers chasing it stop pursuing; their timers run out on their own.
   */
  despawnActor(actorId: number): boolean {
    if (!this.actors.has(actorId)) return false;

    this.attackLoop.cancel(actorId);
    for (const attackerId of this.attackLoop.cancelAttacksOn(actorId)) {
      this.tracker.onEngagementEnded(attackerId);
    }
    this.targeting.clearSelectionsOf(actorId);
    this.targeting.forget(actorId);
    this.aggro.clearFor(actorId);
    this.visibility.forget(actorId);
    this.status.clear(actorId);
    this.tracker.forget(actorId);
    return this.actors.despawn(actorId);
  }

  /**
   * Death pipeline entry for damage dealt outside the attack loop.
   * @returns false if the actor's region does not allow death
   */
  killActor(actorId: number): boolean {
    const actor = this.actors.get(actorId);
    if (!actor || !actor.isAlive) return false;
    if (!this.sceneRules.allows(actor.regionId, SceneRuleFlag.DeathAllowed)) {
      console.warn(`[CombatCore] Ignoring death of ${actorId}: region '${actor.regionId}' does not allow death`);
      return false;
    }
    this.tracker.markDead(actorId);
    return true;
  }

  respawnActor(actorId: number, regionId: string, position: Position): boolean {
    const actor = this.actors.get(actorId);
    if (!actor || actor.isAlive) return false;
    this.tracker.markRespawned(actorId);
    return this.travel.enterRegion(actorId, regionId, position);
  }

  // ============================================================================
  // Queries
  // ============================================================================

  resolveDisposition(viewerId: number, targetId: number): DispositionResult {
    return this.resolver.resolveDisposition(viewerId, targetId);
  }

  canAttack(query: AttackQuery): AttackResult {
    return this.validator.canAttack(query);
  }

  getCombatState(actorId: number): CombatStateView {
    return this.tracker.getCombatStateView(actorId);
  }

  // ============================================================================
  // Intents
  // ============================================================================

  /**
   * Passive selection. Never engages. Switching away from the current
   * attack target stops that attack.
   */
  selectTarget(actorId: number, targetId: number): DispositionResult {
    const result = this.resolver.resolveDisposition(actorId, targetId);
    if (!result.eligible) {
      this.eventBus.emit(
        createTargetIntentDeniedEvent(actorId, targetId, "Select", result.denyReason ?? DenyReason.NullActor)
      );
      return result;
    }

    const scheduled = this.attackLoop.getScheduled(actorId);
    if (scheduled && scheduled.targetId !== targetId) {
      this.stopAttack(actorId);
    }
    this.targeting.select(actorId, targetId, { attackDriven: false });
    return result;
  }

  clearSelection(actorId: number): boolean {
    this.stopAttack(actorId);
    return this.targeting.clearSelection(actorId);
  }

  /**
   * Validates an attack intent and, if legal, engages and schedules it.
   *
   * @example
   * const result = core.requestAttack(playerId, monsterId, ActionKind.Melee);
   * if (!result.allowed) {
   *   console.log(result.reason); // e.g. "RangeOrLoS"
   * }
   */
  requestAttack(attackerId: number, targetId: number, actionKind: ActionKind): AttackResult {
    const maxRange = ACTION_RANGE_TILES[actionKind];
    const result = this.validator.canAttack({ attackerId, targetId, actionKind, maxRange });
    if (!result.allowed) {
      this.eventBus.emit(createTargetIntentDeniedEvent(attackerId, targetId, "Attack", result.reason));
      return result;
    }

    this.targeting.select(attackerId, targetId, { attackDriven: true });
    this.aggro.recordAggression(attackerId, targetId);
    this.tracker.onHostileIntentValidated(attackerId, targetId);
    this.attackLoop.schedule(attackerId, targetId, actionKind, maxRange);
    return result;
  }

  /**
   * @returns true if an attack was cancelled
   */
  stopAttack(attackerId: number): boolean {
    const cancelled = this.attackLoop.cancel(attackerId);
    this.tracker.onEngagementEnded(attackerId);
    return cancelled;
  }

  usePortal(actorId: number, portalId: string): TravelResult {
    return this.travel.usePortal(actorId, portalId);
  }

  enterRegion(actorId: number, regionId: string, position: Position): boolean {
    return this.travel.enterRegion(actorId, regionId, position);
  }

  // ============================================================================
  // Tick
  // ============================================================================

  tick(): void {
    this.tickCount++;
    this.status.update();
    this.attackLoop.update();
    this.aggro.update();
    if (this.tickCount % Math.max(1, this.config.sweepIntervalTicks) === 0) {
      this.tracker.sweep();
    }
  }

  get currentTick(): number {
    return this.tickCount;
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private disengageTraveler(actorId: number): void {
    this.stopAttack(actorId);
    for (const attackerId of this.attackLoop.cancelAttacksOn(actorId)) {
      this.tracker.onEngagementEnded(attackerId);
    }
    this.targeting.clearSelection(actorId);
    this.targeting.clearSelectionsOf(actorId);
  }

  private createStateMachineContext(): StateMachineContext {
    return {
      eventBus: this.eventBus,
      getActor: (actorId: number) => {
        return this.actors.get(actorId);
      },
      setActorCombatState: (actorId, state) => {
        this.actors.setCombatState(actorId, state);
      },
      cancelAutoAttack: (actorId: number) => {
        // Safe to access here since state transitions happen after initialization
        this.attackLoop.cancel(actorId);
      },
      clearAttackDrivenSelection: (actorId: number) => {
        this.targeting.clearAttackDrivenSelection(actorId);
      },
      clearAggression: (actorId: number) => {
        this.aggro.clearFor(actorId);
      }
    };
  }
}
