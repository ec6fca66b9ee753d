import { TravelDenyReason } from "../../protocol/enums/TravelDenyReason";
import { isWithinRange, type Position } from "../../world/Location";
import type { RegionCatalog } from "../../world/regions/RegionCatalog";
import type { EventBus } from "../events/EventBus";
import { createRegionEnteredEvent, createTravelDeniedEvent } from "../events/GameEvents";
import type { CombatStateTracker } from "../systems/CombatStateTracker";
import type { ActorRegistry } from "./ActorRegistry";
import type { SceneRuleSource } from "./SceneRuleGate";

/** Actors must stand on or next to a portal to use it. */
const PORTAL_INTERACT_RANGE = 1;

export interface TravelServiceDependencies {
  actors: ActorRegistry;
  regions: RegionCatalog;
  sceneRules: SceneRuleSource;
  tracker: CombatStateTracker;
  eventBus: EventBus;
  /**
   * Drops the traveler's attack, its engagement flag and selections that
   * cross the region boundary. Timers are left to the destination's rules.
   */
  disengageTraveler: (actorId: number) => void;
}

export type TravelResult =
  | { ok: true; regionId: string; position: Position }
  | { ok: false; reason: TravelDenyReason };

/**
 * Service for region transitions.
 * Gates portal use on combat state and applies the destination's
 * rule snapshot the moment the actor arrives.
 */
export class TravelService {
  constructor(private readonly deps: TravelServiceDependencies) {}

  /**
   * Walks an actor through a portal.
   *
   * Refused when the actor is unknown or dead, is not standing at the
   * portal, or is still InCombat and the portal requires otherwise.
   */
  usePortal(actorId: number, portalId: string): TravelResult {
    const actor = this.deps.actors.get(actorId);
    if (!actor) {
      return this.deny(actorId, portalId, TravelDenyReason.UnknownActor);
    }

    const entry = this.deps.regions.getPortal(portalId);
    if (!entry) {
      return this.deny(actorId, portalId, TravelDenyReason.UnknownPortal);
    }

    if (!actor.isAlive) {
      return this.deny(actorId, portalId, TravelDenyReason.ActorDead);
    }

    const { regionId, portal } = entry;
    if (actor.regionId !== regionId || !isWithinRange(actor.position, portal, PORTAL_INTERACT_RANGE)) {
      return this.deny(actorId, portalId, TravelDenyReason.NotAtPortal);
    }

    if (portal.requireOutOfCombat && this.deps.tracker.isInCombat(actorId)) {
      return this.deny(actorId, portalId, TravelDenyReason.InCombat);
    }

    this.enterRegion(actorId, portal.destinationRegionId, portal.destination);
    return { ok: true, regionId: portal.destinationRegionId, position: { ...portal.destination } };
  }

  /**
   * Moves an actor into a region unconditionally (portal arrival, respawn,
   * admin move) and applies the region's hard overrides.
   */
  enterRegion(actorId: number, regionId: string, position: Position): boolean {
    const actor = this.deps.actors.get(actorId);
    if (!actor) return false;

    if (actor.regionId !== regionId) {
      this.deps.disengageTraveler(actorId);
    }
    this.deps.actors.setLocation(actorId, regionId, position);

    const snapshot = this.deps.sceneRules.getSnapshot(regionId);
    this.deps.tracker.onRegionEntered(actorId, snapshot);
    this.deps.eventBus.emit(createRegionEnteredEvent(actorId, regionId, snapshot.context));
    return true;
  }

  private deny(actorId: number, portalId: string, reason: TravelDenyReason): TravelResult {
    this.deps.eventBus.emit(createTravelDeniedEvent(actorId, portalId, reason));
    return { ok: false, reason };
  }
}
