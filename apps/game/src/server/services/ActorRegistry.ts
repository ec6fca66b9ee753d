import { CombatState } from "../../protocol/enums/CombatState";
import type { Position } from "../../world/Location";
import type { EventBus } from "../events/EventBus";
import { createActorDespawnedEvent, createActorSpawnedEvent } from "../events/GameEvents";
import type { ActorLookup, ActorSpawn, ActorState } from "../state/ActorState";

export class ActorRegistryError extends Error {
  constructor(
    public readonly actorId: number,
    public readonly msg: string
  ) {
    super(msg);
    this.name = "ActorRegistryError";
  }
}

export interface ActorRegistryDependencies {
  eventBus: EventBus;
}

/**
 * Authoritative store of actor identity and per-actor state.
 *
 * Records are created on spawn and removed on despawn. Everything in
 * between is written through the narrow setters below, which the
 * authoritative systems (tracker, travel, death pipeline) call.
 */
export class ActorRegistry implements ActorLookup {
  private readonly actors = new Map<number, ActorState>();

  constructor(private readonly deps: ActorRegistryDependencies) {}

  /**
   * @throws ActorRegistryError if the id is already registered
   */
  spawn(spawn: ActorSpawn): ActorState {
    if (this.actors.has(spawn.id)) {
      throw new ActorRegistryError(spawn.id, `Actor ${spawn.id} is already registered`);
    }

    const isAlive = spawn.isAlive ?? true;
    const actor: ActorState = {
      id: spawn.id,
      type: spawn.type,
      factionId: spawn.factionId,
      isAlive,
      combatState: isAlive ? CombatState.Peaceful : CombatState.Dead,
      controllerActorId: spawn.controllerActorId ?? null,
      isCriminal: spawn.isCriminal ?? false,
      isMurderer: spawn.isMurderer ?? false,
      regionId: spawn.regionId,
      position: { x: spawn.position.x, y: spawn.position.y }
    };
    this.actors.set(actor.id, actor);
    this.deps.eventBus.emit(createActorSpawnedEvent(actor.id, actor.type, actor.regionId));
    return actor;
  }

  /**
   * Removes an actor. Controllers that disappear leave their summons
   * pointing at nothing; standing lookups fall back to the summon itself.
   */
  despawn(actorId: number): boolean {
    const actor = this.actors.get(actorId);
    if (!actor) return false;
    this.actors.delete(actorId);
    this.deps.eventBus.emit(createActorDespawnedEvent(actorId, actor.regionId));
    return true;
  }

  get(actorId: number): ActorState | undefined {
    return this.actors.get(actorId);
  }

  has(actorId: number): boolean {
    return this.actors.has(actorId);
  }

  values(): IterableIterator<ActorState> {
    return this.actors.values();
  }

  getActorsInRegion(regionId: string): ActorState[] {
    const result: ActorState[] = [];
    for (const actor of this.actors.values()) {
      if (actor.regionId === regionId) result.push(actor);
    }
    return result;
  }

  /**
   * Ids of actors whose controller is `controllerId`.
   */
  getControlledActorIds(controllerId: number): number[] {
    const result: number[] = [];
    for (const actor of this.actors.values()) {
      if (actor.controllerActorId === controllerId) result.push(actor.id);
    }
    return result;
  }

  setAlive(actorId: number, isAlive: boolean): boolean {
    const actor = this.actors.get(actorId);
    if (!actor) return false;
    actor.isAlive = isAlive;
    return true;
  }

  setCombatState(actorId: number, state: CombatState): boolean {
    const actor = this.actors.get(actorId);
    if (!actor) return false;
    actor.combatState = state;
    return true;
  }

  setLocation(actorId: number, regionId: string, position: Position): boolean {
    const actor = this.actors.get(actorId);
    if (!actor) return false;
    actor.regionId = regionId;
    actor.position = { x: position.x, y: position.y };
    return true;
  }

  setPosition(actorId: number, position: Position): boolean {
    const actor = this.actors.get(actorId);
    if (!actor) return false;
    actor.position = { x: position.x, y: position.y };
    return true;
  }

  setLawFlags(actorId: number, flags: { isCriminal?: boolean; isMurderer?: boolean }): boolean {
    const actor = this.actors.get(actorId);
    if (!actor) return false;
    if (flags.isCriminal !== undefined) actor.isCriminal = flags.isCriminal;
    if (flags.isMurderer !== undefined) actor.isMurderer = flags.isMurderer;
    return true;
  }

  setController(actorId: number, controllerActorId: number | null): boolean {
    const actor = this.actors.get(actorId);
    if (!actor) return false;
    actor.controllerActorId = controllerActorId;
    return true;
  }

  size(): number {
    return this.actors.size;
  }
}
