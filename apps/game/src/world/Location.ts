/**
 * A tile position inside a region.
 */
export interface Position {
  x: number;
  y: number;
}

/**
 * Tile distance used by every range gate (max of dx, dy).
 */
export function chebyshevDistance(a: Position, b: Position): number {
  return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

export function isWithinRange(a: Position, b: Position, range: number): boolean {
  return chebyshevDistance(a, b) <= range;
}
