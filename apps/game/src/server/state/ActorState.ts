/**
 * ActorState.ts - Runtime state types for actors taking part in targeting and combat.
 *
 * Only the authoritative systems mutate these records; every query path
 * receives them through the read-only `ActorView` type.
 */

import type { ActorType } from "../../protocol/enums/ActorType";
import type { CombatState } from "../../protocol/enums/CombatState";
import type { FactionId } from "../../protocol/enums/FactionId";
import type { Position } from "../../world/Location";

export interface ActorState {
  readonly id: number;
  readonly type: ActorType;
  factionId: FactionId;
  isAlive: boolean;
  /** Last published combat state. The tracker derives the live value on demand. */
  combatState: CombatState;
  /** Summons and pets point at the actor whose social standing they inherit. */
  controllerActorId: number | null;
  isCriminal: boolean;
  isMurderer: boolean;
  regionId: string;
  position: Position;
}

export type ActorView = Readonly<Omit<ActorState, "position">> & { readonly position: Readonly<Position> };

/**
 * Data needed to spawn an actor. Law flags and controller default to unset.
 */
export interface ActorSpawn {
  id: number;
  type: ActorType;
  factionId: FactionId;
  regionId: string;
  position: Position;
  controllerActorId?: number | null;
  isCriminal?: boolean;
  isMurderer?: boolean;
  isAlive?: boolean;
}

/**
 * Read access to actors, as consumed by the pure rule services.
 */
export interface ActorLookup {
  get(actorId: number): ActorView | undefined;
}

/**
 * Per-actor engagement timer record.
 */
export interface EngagementState {
  /** Absolute server clock value (ms) until which the actor stays in combat. */
  combatUntilTime: number;
  /** Attacker-side marker for an active hostile pursuit. */
  hasActiveHostileEngagement: boolean;
}
