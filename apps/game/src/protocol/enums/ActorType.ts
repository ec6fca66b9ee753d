/**
 * Kinds of simulated participants the legality engine reasons about.
 */
export enum ActorType {
  Player = "Player",
  Monster = "Monster",
  NPC = "NPC",
  Guard = "Guard",
  Summon = "Summon",
  Pet = "Pet",
  Destructible = "Destructible"
}

/**
 * Actor types that may never be hostile actors in a region that disallows them.
 */
export const HOSTILE_ACTOR_TYPES: ReadonlySet<ActorType> = new Set([ActorType.Monster]);
