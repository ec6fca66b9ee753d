import { describe, expect, it } from "vitest";
import { TileLineOfSight, bresenhamLine } from "./LineOfSight";
import { chebyshevDistance, isWithinRange } from "./Location";

describe("bresenhamLine", () => {
  it("includes both endpoints", () => {
    expect(bresenhamLine(0, 0, 3, 1)).toEqual([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 2, y: 1 },
      { x: 3, y: 1 }
    ]);
  });

  it("returns a single point for a zero-length line", () => {
    expect(bresenhamLine(2, 2, 2, 2)).toEqual([{ x: 2, y: 2 }]);
  });
});

describe("TileLineOfSight", () => {
  const los = new TileLineOfSight();
  los.setBlockedTiles("crypt", [{ x: 5, y: 1 }]);

  it("is blocked by a tile between the endpoints", () => {
    expect(los.checkLOS({ x: 4, y: 1 }, { x: 6, y: 1 }, "crypt")).toEqual({
      hasLOS: false,
      blockedAt: { x: 5, y: 1 }
    });
  });

  it("ignores blockers on the endpoints themselves", () => {
    expect(los.checkLOS({ x: 5, y: 1 }, { x: 7, y: 1 }, "crypt")).toEqual({ hasLOS: true });
  });

  it("only applies blockers of the given region", () => {
    expect(los.checkLOS({ x: 4, y: 1 }, { x: 6, y: 1 }, "meadow")).toEqual({ hasLOS: true });
  });

  it("replaces a region's blockers wholesale", () => {
    const local = new TileLineOfSight();
    local.setBlockedTiles("crypt", [{ x: 1, y: 0 }]);
    local.setBlockedTiles("crypt", []);
    expect(local.checkLOS({ x: 0, y: 0 }, { x: 2, y: 0 }, "crypt").hasLOS).toBe(true);
  });
});

describe("Location", () => {
  it("measures Chebyshev distance", () => {
    expect(chebyshevDistance({ x: 0, y: 0 }, { x: 3, y: -5 })).toBe(5);
    expect(isWithinRange({ x: 0, y: 0 }, { x: 1, y: 1 }, 1)).toBe(true);
    expect(isWithinRange({ x: 0, y: 0 }, { x: 2, y: 1 }, 1)).toBe(false);
  });
});
