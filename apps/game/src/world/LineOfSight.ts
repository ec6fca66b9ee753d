import type { Position } from "./Location";

/**
 * Result of a line of sight check
 */
export interface LOSResult {
  hasLOS: boolean;
  blockedAt?: Position;
}

/**
 * Anything that can answer "is the straight line between two tiles clear".
 * The legality validator treats a missing provider as always clear.
 */
export interface LineOfSightProvider {
  checkLOS(from: Position, to: Position, regionId: string): LOSResult;
}

/**
 * Line of Sight system using Bresenham's Line Algorithm over per-region
 * sets of sight-blocking tiles.
 *
 * Only tiles strictly between the two endpoints are tested, so an actor
 * standing in a doorway can still be seen.
 */
export class TileLineOfSight implements LineOfSightProvider {
  private readonly blockersByRegion = new Map<string, ReadonlySet<string>>();

  /**
   * Replaces the blocker set for one region.
   */
  setBlockedTiles(regionId: string, tiles: readonly Position[]): void {
    this.blockersByRegion.set(regionId, new Set(tiles.map(tileKey)));
  }

  checkLOS(from: Position, to: Position, regionId: string): LOSResult {
    const blockers = this.blockersByRegion.get(regionId);
    if (!blockers || blockers.size === 0) {
      // No blockers registered - assume LOS is clear
      return { hasLOS: true };
    }

    const linePoints = bresenhamLine(
      Math.floor(from.x),
      Math.floor(from.y),
      Math.floor(to.x),
      Math.floor(to.y)
    );

    for (let i = 1; i < linePoints.length - 1; i++) {
      const point = linePoints[i];
      if (blockers.has(tileKey(point))) {
        return { hasLOS: false, blockedAt: point };
      }
    }

    return { hasLOS: true };
  }
}

function tileKey(p: Position): string {
  return `${p.x},${p.y}`;
}

/**
 * Bresenham's Line Algorithm
 * Returns all integer grid points along the line from (x0, y0) to (x1, y1),
 * both endpoints included.
 */
export function bresenhamLine(x0: number, y0: number, x1: number, y1: number): Position[] {
  const points: Position[] = [];

  const dx = Math.abs(x1 - x0);
  const dy = Math.abs(y1 - y0);

  const sx = x0 < x1 ? 1 : -1;
  const sy = y0 < y1 ? 1 : -1;

  let err = dx - dy;
  let x = x0;
  let y = y0;

  while (true) {
    points.push({ x, y });

    if (x === x1 && y === y1) {
      break;
    }

    const e2 = 2 * err;

    if (e2 > -dy) {
      err -= dy;
      x += sx;
    }

    if (e2 < dx) {
      err += dx;
      y += sy;
    }
  }

  return points;
}
