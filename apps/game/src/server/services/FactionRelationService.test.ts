import { describe, expect, it } from "vitest";
import { ActorType } from "../../protocol/enums/ActorType";
import { FactionId } from "../../protocol/enums/FactionId";
import { FactionRelation } from "../../protocol/enums/FactionRelation";
import { createTestCore, placeActor, placeMonster, placePlayer } from "../../testing/TestWorld";

function setup() {
  const { core } = createTestCore();
  return { core, relations: core.factionRelations };
}

describe("FactionRelationService", () => {
  it("reads the baseline matrix", () => {
    const { core, relations } = setup();
    const player = placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
    const monster = placeMonster(core, 2, "dungeon", { x: 1, y: 0 });
    const villager = placeActor(core, 3, ActorType.NPC, FactionId.Village, "dungeon", { x: 2, y: 0 });

    expect(relations.relation(player, monster)).toBe(FactionRelation.Hostile);
    expect(relations.relation(monster, player)).toBe(FactionRelation.Hostile);
    expect(relations.relation(player, villager)).toBe(FactionRelation.Neutral);
  });

  it("treats members of one faction as friendly", () => {
    const { core, relations } = setup();
    const a = placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
    const b = placePlayer(core, 2, "dungeon", { x: 1, y: 0 });
    expect(relations.relation(a, b)).toBe(FactionRelation.Friendly);
  });

  it("keeps neutral factions neutral to everyone", () => {
    const { core, relations } = setup();
    const crate = placeActor(core, 1, ActorType.Destructible, FactionId.Neutral, "dungeon", { x: 0, y: 0 });
    const monster = placeMonster(core, 2, "dungeon", { x: 1, y: 0 });
    expect(relations.relation(monster, crate)).toBe(FactionRelation.Neutral);
    expect(relations.relation(crate, monster)).toBe(FactionRelation.Neutral);
  });

  it("lets a pet stand in for its controller", () => {
    const { core, relations } = setup();
    const owner = placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
    const pet = placeActor(core, 2, ActorType.Pet, FactionId.Neutral, "dungeon", { x: 1, y: 0 }, { controllerActorId: 1 });
    const monster = placeMonster(core, 3, "dungeon", { x: 2, y: 0 });

    expect(relations.relation(pet, monster)).toBe(FactionRelation.Hostile);
    expect(relations.relation(monster, pet)).toBe(FactionRelation.Hostile);
    expect(relations.relation(pet, owner)).toBe(FactionRelation.Friendly);
    expect(relations.resolveStanding(pet).id).toBe(1);
  });

  it("follows a pet to its new controller", () => {
    const { core, relations } = setup();
    placeActor(core, 1, ActorType.NPC, FactionId.Village, "dungeon", { x: 0, y: 0 });
    placePlayer(core, 2, "dungeon", { x: 1, y: 0 });
    const pet = placeActor(core, 3, ActorType.Pet, FactionId.Neutral, "dungeon", { x: 2, y: 0 }, { controllerActorId: 1 });
    const monster = placeMonster(core, 4, "dungeon", { x: 3, y: 0 });

    expect(relations.relation(monster, pet)).toBe(FactionRelation.Neutral);

    expect(core.actors.setController(3, 2)).toBe(true);
    expect(relations.resolveStanding(pet).id).toBe(2);
    expect(relations.relation(monster, pet)).toBe(FactionRelation.Hostile);

    expect(core.actors.setController(3, null)).toBe(true);
    expect(relations.resolveStanding(pet).id).toBe(3);
    expect(relations.relation(monster, pet)).toBe(FactionRelation.Neutral);
  });

  it("treats two summons of one owner as friendly", () => {
    const { core, relations } = setup();
    placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
    const a = placeActor(core, 2, ActorType.Summon, FactionId.Neutral, "dungeon", { x: 1, y: 0 }, { controllerActorId: 1 });
    const b = placeActor(core, 3, ActorType.Summon, FactionId.Neutral, "dungeon", { x: 2, y: 0 }, { controllerActorId: 1 });
    expect(relations.relation(a, b)).toBe(FactionRelation.Friendly);
  });

  it("falls back to the summon itself when the controller is gone", () => {
    const { core, relations } = setup();
    const orphan = placeActor(core, 2, ActorType.Summon, FactionId.Neutral, "dungeon", { x: 1, y: 0 }, { controllerActorId: 999 });
    const monster = placeMonster(core, 3, "dungeon", { x: 2, y: 0 });

    expect(relations.resolveStanding(orphan).id).toBe(2);
    expect(relations.relation(monster, orphan)).toBe(FactionRelation.Neutral);
  });

  it("makes murderers hostile to every law-enforcing faction", () => {
    const { core, relations } = setup();
    const murderer = placePlayer(core, 1, "dungeon", { x: 0, y: 0 }, { isMurderer: true });
    const guard = placeActor(core, 2, ActorType.Guard, FactionId.Guards, "dungeon", { x: 1, y: 0 });
    const player = placePlayer(core, 3, "dungeon", { x: 2, y: 0 });

    expect(relations.relation(guard, murderer)).toBe(FactionRelation.Hostile);
    expect(relations.relation(player, murderer)).toBe(FactionRelation.Hostile);
    // Law overrides look at the target only
    expect(relations.relation(murderer, player)).toBe(FactionRelation.Friendly);
  });

  it("makes criminals hostile to guards only", () => {
    const { core, relations } = setup();
    const criminal = placePlayer(core, 1, "dungeon", { x: 0, y: 0 }, { isCriminal: true });
    const guard = placeActor(core, 2, ActorType.Guard, FactionId.Guards, "dungeon", { x: 1, y: 0 });
    const player = placePlayer(core, 3, "dungeon", { x: 2, y: 0 });

    expect(relations.relation(guard, criminal)).toBe(FactionRelation.Hostile);
    expect(relations.relation(player, criminal)).toBe(FactionRelation.Friendly);
  });

  it("applies law flags to players only", () => {
    const { core, relations } = setup();
    const flaggedVillager = placeActor(core, 1, ActorType.NPC, FactionId.Village, "dungeon", { x: 0, y: 0 }, {
      isCriminal: true,
      isMurderer: true
    });
    const guard = placeActor(core, 2, ActorType.Guard, FactionId.Guards, "dungeon", { x: 1, y: 0 });

    expect(relations.relation(guard, flaggedVillager)).toBe(FactionRelation.Neutral);
  });

  it("carries the controller's law flags onto its summon", () => {
    const { core, relations } = setup();
    placePlayer(core, 1, "dungeon", { x: 0, y: 0 }, { isMurderer: true });
    const summon = placeActor(core, 2, ActorType.Summon, FactionId.Neutral, "dungeon", { x: 1, y: 0 }, { controllerActorId: 1 });
    const guard = placeActor(core, 3, ActorType.Guard, FactionId.Guards, "dungeon", { x: 2, y: 0 });

    expect(relations.isHostile(guard, summon)).toBe(true);
  });
});
