import { describe, expect, it } from "vitest";
import { ActorType } from "../../protocol/enums/ActorType";
import { DenyReason } from "../../protocol/enums/DenyReason";
import { Disposition } from "../../protocol/enums/Disposition";
import { FactionId } from "../../protocol/enums/FactionId";
import { createTestCore, placeActor, placeMonster, placePlayer } from "../../testing/TestWorld";

describe("TargetingResolver", () => {
  describe("evaluateEligibility", () => {
    it("denies unknown actors", () => {
      const { core } = createTestCore();
      placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
      expect(core.resolver.evaluateEligibility(1, 2)).toEqual({ eligible: false, denyReason: DenyReason.NullActor });
      expect(core.resolver.evaluateEligibility(2, 1)).toEqual({ eligible: false, denyReason: DenyReason.NullActor });
    });

    it("checks liveness before perception", () => {
      const { core } = createTestCore();
      placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
      placeMonster(core, 2, "dungeon", { x: 1, y: 0 }, { isAlive: false });
      core.visibility.setHidden(2, true);

      expect(core.resolver.evaluateEligibility(1, 2).denyReason).toBe(DenyReason.TargetDead);
    });

    it("denies targets the viewer cannot perceive", () => {
      const { core } = createTestCore();
      placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
      placeMonster(core, 2, "dungeon", { x: 1, y: 0 });
      core.visibility.setHidden(2, true);

      expect(core.resolver.evaluateEligibility(1, 2).denyReason).toBe(DenyReason.TargetNotVisible);
      core.visibility.reveal(2, 1);
      expect(core.resolver.evaluateEligibility(1, 2).eligible).toBe(true);
    });

    it("applies the range gate last", () => {
      const { core } = createTestCore();
      placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
      placeMonster(core, 2, "dungeon", { x: 1, y: 0 });

      expect(core.resolver.evaluateEligibility(1, 2, () => false)).toEqual({
        eligible: false,
        denyReason: DenyReason.RangeOrLoS
      });
      expect(core.resolver.evaluateEligibility(1, 2, () => true).eligible).toBe(true);
    });
  });

  describe("resolveDisposition", () => {
    it("returns Self for the viewer itself", () => {
      const { core } = createTestCore();
      placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
      expect(core.resolveDisposition(1, 1)).toEqual({ eligible: true, disposition: Disposition.Self, denyReason: null });
    });

    it("returns Invalid with the eligibility reason", () => {
      const { core } = createTestCore();
      placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
      placeMonster(core, 2, "dungeon", { x: 1, y: 0 }, { isAlive: false });

      expect(core.resolveDisposition(1, 2)).toEqual({
        eligible: false,
        disposition: Disposition.Invalid,
        denyReason: DenyReason.TargetDead
      });
    });

    it.each(Object.values(FactionId))("returns Invalid for a dead %s target whatever the relation", (factionId) => {
      const { core } = createTestCore();
      placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
      placeActor(core, 2, ActorType.NPC, FactionId.Village, "dungeon", { x: 0, y: 1 });
      Object.values(ActorType).forEach((type, i) => {
        placeActor(core, 10 + i, type, factionId, "dungeon", { x: i + 1, y: 0 }, { isAlive: false });
      });

      for (let i = 0; i < Object.values(ActorType).length; i++) {
        for (const viewerId of [1, 2]) {
          expect(core.resolveDisposition(viewerId, 10 + i)).toEqual({
            eligible: false,
            disposition: Disposition.Invalid,
            denyReason: DenyReason.TargetDead
          });
        }
      }
    });

    it("returns Invalid for a dead villager seen by a fellow villager", () => {
      const { core } = createTestCore();
      placeActor(core, 1, ActorType.NPC, FactionId.Village, "town", { x: 0, y: 0 });
      placeActor(core, 2, ActorType.NPC, FactionId.Village, "town", { x: 1, y: 0 });
      expect(core.resolveDisposition(1, 2).disposition).toBe(Disposition.Friendly);

      core.actors.setAlive(2, false);
      expect(core.resolveDisposition(1, 2)).toEqual({
        eligible: false,
        disposition: Disposition.Invalid,
        denyReason: DenyReason.TargetDead
      });
    });

    it("reports hostile factions as Hostile where hostile actors are allowed", () => {
      const { core } = createTestCore();
      placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
      placeMonster(core, 2, "dungeon", { x: 1, y: 0 });
      expect(core.resolveDisposition(1, 2).disposition).toBe(Disposition.Hostile);
    });

    it("downgrades Hostile to Neutral where hostile actors are not allowed", () => {
      const { core } = createTestCore();
      placePlayer(core, 1, "sanctuary", { x: 0, y: 0 });
      placeMonster(core, 2, "sanctuary", { x: 1, y: 0 });

      expect(core.resolveDisposition(1, 2)).toEqual({
        eligible: true,
        disposition: Disposition.Neutral,
        denyReason: null
      });
    });

    it("downgrades player against player where PvP is off", () => {
      const { core } = createTestCore();
      placePlayer(core, 1, "wilds", { x: 0, y: 0 });
      placePlayer(core, 2, "wilds", { x: 1, y: 0 }, { isMurderer: true });
      placePlayer(core, 3, "dungeon", { x: 0, y: 0 });
      placePlayer(core, 4, "dungeon", { x: 1, y: 0 }, { isMurderer: true });

      expect(core.resolveDisposition(1, 2).disposition).toBe(Disposition.Neutral);
      expect(core.resolveDisposition(3, 4).disposition).toBe(Disposition.Hostile);
    });

    it("reads the viewer's region", () => {
      const { core } = createTestCore();
      placePlayer(core, 1, "sanctuary", { x: 0, y: 0 });
      placeMonster(core, 2, "dungeon", { x: 1, y: 0 });

      expect(core.resolveDisposition(1, 2).disposition).toBe(Disposition.Neutral);
      expect(core.resolveDisposition(2, 1).disposition).toBe(Disposition.Hostile);
    });

    it("keeps Friendly and Neutral relations unchanged", () => {
      const { core } = createTestCore();
      placePlayer(core, 1, "town", { x: 0, y: 0 });
      placePlayer(core, 2, "town", { x: 1, y: 0 });
      expect(core.resolveDisposition(1, 2).disposition).toBe(Disposition.Friendly);
    });

    it("answers the same way on every call", () => {
      const { core } = createTestCore();
      placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
      placeMonster(core, 2, "dungeon", { x: 1, y: 0 });
      const first = core.resolveDisposition(1, 2);
      for (let i = 0; i < 5; i++) {
        expect(core.resolveDisposition(1, 2)).toEqual(first);
      }
    });
  });
});
