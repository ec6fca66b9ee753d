/**
 * Baseline social relation between two factions.
 * Never contains Self or Invalid; those only exist on a disposition.
 */
export enum FactionRelation {
  Friendly = "Friendly",
  Neutral = "Neutral",
  Hostile = "Hostile"
}
