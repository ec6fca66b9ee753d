/**
 * Hostile action categories. Status effects gate these individually
 * (a silence blocks HarmfulSpell, a disarm blocks Melee and Ranged).
 */
export enum ActionKind {
  Melee = "Melee",
  Ranged = "Ranged",
  HarmfulSpell = "HarmfulSpell"
}

/**
 * Maximum Chebyshev tile distance for each action kind.
 */
export const ACTION_RANGE_TILES: Readonly<Record<ActionKind, number>> = {
  [ActionKind.Melee]: 1,
  [ActionKind.Ranged]: 7,
  [ActionKind.HarmfulSpell]: 10
};
