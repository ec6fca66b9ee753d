export enum CombatState {
  Peaceful = "Peaceful",
  InCombat = "InCombat",
  /** Terminal until the respawn pipeline clears it. */
  Dead = "Dead"
}
