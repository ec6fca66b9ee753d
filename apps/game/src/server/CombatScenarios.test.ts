import { describe, expect, it } from "vitest";
import { ActionKind } from "../protocol/enums/ActionKind";
import { ActorType } from "../protocol/enums/ActorType";
import { CombatState } from "../protocol/enums/CombatState";
import { DenyReason } from "../protocol/enums/DenyReason";
import { Disposition } from "../protocol/enums/Disposition";
import { FactionId } from "../protocol/enums/FactionId";
import { createTestCore, placeActor, placeMonster, placePlayer } from "../testing/TestWorld";

/**
 * End-to-end walkthroughs of a player and a monster across the test regions,
 * with a ten second disengage window.
 */
describe("combat scenarios", () => {
  it("a monster is hostile to a player where hostile actors are allowed", () => {
    const { core } = createTestCore();
    placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
    placeMonster(core, 2, "dungeon", { x: 1, y: 0 });

    expect(core.resolveDisposition(1, 2)).toEqual({ eligible: true, disposition: Disposition.Hostile, denyReason: null });
  });

  it("the same pair is only neutral where hostile actors are not allowed", () => {
    const { core } = createTestCore();
    placePlayer(core, 1, "sanctuary", { x: 0, y: 0 });
    placeMonster(core, 2, "sanctuary", { x: 1, y: 0 });
    placePlayer(core, 3, "town", { x: 0, y: 0 });
    placeMonster(core, 4, "town", { x: 1, y: 0 });
    const melee = { actionKind: ActionKind.Melee, maxRange: 1 };

    expect(core.resolveDisposition(1, 2).disposition).toBe(Disposition.Neutral);
    expect(core.canAttack({ attackerId: 1, targetId: 2, ...melee })).toEqual({
      allowed: false,
      reason: DenyReason.NotHostile
    });

    expect(core.resolveDisposition(3, 4).disposition).toBe(Disposition.Neutral);
    expect(core.canAttack({ attackerId: 3, targetId: 4, ...melee })).toEqual({
      allowed: false,
      reason: DenyReason.SceneDisallowsCombat
    });
  });

  it("an unanswered attack lapses into peace when the window closes", () => {
    const { core, clock } = createTestCore();
    placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
    placeMonster(core, 2, "dungeon", { x: 1, y: 0 });

    core.requestAttack(1, 2, ActionKind.Melee);
    expect(core.tracker.getEngagement(1).combatUntilTime).toBe(10_000);
    expect(core.actors.get(1)?.combatState).toBe(CombatState.InCombat);

    // The monster steps out of reach; no swing lands again
    core.actors.setPosition(2, { x: 6, y: 6 });

    clock.set(9999);
    core.tick();
    expect(core.actors.get(1)?.combatState).toBe(CombatState.InCombat);
    expect(core.attackLoop.hasScheduled(1)).toBe(true);

    clock.set(10_000);
    core.tick();
    expect(core.actors.get(1)?.combatState).toBe(CombatState.Peaceful);
    expect(core.attackLoop.hasScheduled(1)).toBe(false);
    expect(core.targeting.getSelection(1)).toBeNull();
  });

  it("a resolution extends both sides to the later deadline", () => {
    const { core, clock } = createTestCore();
    placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
    placeMonster(core, 2, "dungeon", { x: 1, y: 0 });

    core.requestAttack(1, 2, ActionKind.Melee);
    clock.set(8000);
    core.tracker.onHostileResolution(1, 2);

    expect(core.tracker.getEngagement(1).combatUntilTime).toBe(18_000);
    expect(core.tracker.getEngagement(2).combatUntilTime).toBe(18_000);
    expect(core.getCombatState(2)).toEqual({ state: CombatState.InCombat, remainingSeconds: 10 });
  });

  it("walking into a region without combat ends it at once", () => {
    const { core, clock } = createTestCore();
    placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
    placeMonster(core, 2, "dungeon", { x: 1, y: 0 });
    const transitions: Array<[CombatState, CombatState]> = [];
    core.eventBus.on("CombatStateChanged", (event) => {
      if (event.actorId === 1) transitions.push([event.oldState, event.newState]);
    });

    core.requestAttack(1, 2, ActionKind.Melee);
    clock.set(5000);
    core.enterRegion(1, "town", { x: 0, y: 0 });

    expect(core.tracker.getEngagement(1)).toEqual({ combatUntilTime: 0, hasActiveHostileEngagement: false });
    expect(core.actors.get(1)?.combatState).toBe(CombatState.Peaceful);
    expect(transitions).toEqual([
      [CombatState.Peaceful, CombatState.InCombat],
      [CombatState.InCombat, CombatState.Peaceful]
    ]);
  });

  it("selecting alone never starts combat", () => {
    const { core, clock } = createTestCore();
    placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
    placeMonster(core, 2, "dungeon", { x: 1, y: 0 });

    core.selectTarget(1, 2);
    for (let i = 0; i < 5; i++) {
      clock.advance(600);
      core.tick();
    }

    expect(core.getCombatState(1).state).toBe(CombatState.Peaceful);
    expect(core.getCombatState(2).state).toBe(CombatState.Peaceful);
    expect(core.targeting.getSelection(1)).toEqual({ targetId: 2, attackDriven: false });
  });

  it("a passive selection survives the sweep that ends combat", () => {
    const { core, clock } = createTestCore();
    placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
    placeMonster(core, 2, "dungeon", { x: 1, y: 0 });
    placeMonster(core, 3, "dungeon", { x: 0, y: 1 });

    core.requestAttack(1, 2, ActionKind.Melee);
    core.selectTarget(1, 3);
    clock.set(10_000);
    core.tick();

    expect(core.actors.get(1)?.combatState).toBe(CombatState.Peaceful);
    expect(core.targeting.getSelection(1)).toEqual({ targetId: 3, attackDriven: false });
  });

  it("no actor type is ever hostile where hostile actors are not allowed", () => {
    const { core } = createTestCore();
    const cast: Array<[ActorType, FactionId]> = [
      [ActorType.Player, FactionId.Players],
      [ActorType.Monster, FactionId.Monsters],
      [ActorType.Guard, FactionId.Guards],
      [ActorType.NPC, FactionId.Village]
    ];
    cast.forEach(([type, faction], i) => {
      placeActor(core, i + 1, type, faction, "sanctuary", { x: i, y: 0 }, { isMurderer: true, isCriminal: true });
    });

    for (let viewer = 1; viewer <= cast.length; viewer++) {
      for (let target = 1; target <= cast.length; target++) {
        expect(core.resolveDisposition(viewer, target).disposition).not.toBe(Disposition.Hostile);
      }
    }
  });

  it("the dead stay dead until respawned, whatever happens around them", () => {
    const { core, clock } = createTestCore();
    placePlayer(core, 1, "dungeon", { x: 0, y: 0 });
    placeMonster(core, 2, "dungeon", { x: 1, y: 0 });
    core.requestAttack(2, 1, ActionKind.Melee);
    core.killActor(1);

    core.tracker.onHostileResolution(2, 1);
    clock.set(20_000);
    core.tick();

    expect(core.actors.get(1)?.combatState).toBe(CombatState.Dead);
    expect(core.requestAttack(1, 2, ActionKind.Melee)).toEqual({ allowed: false, reason: DenyReason.AttackerDead });
  });
});
