/**
 * Relationship label a viewer perceives toward a target.
 */
export enum Disposition {
  Self = "Self",
  Friendly = "Friendly",
  Neutral = "Neutral",
  Hostile = "Hostile",
  Invalid = "Invalid"
}
