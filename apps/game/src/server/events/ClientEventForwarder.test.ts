import { describe, expect, it } from "vitest";
import { ActionKind } from "../../protocol/enums/ActionKind";
import { ActorType } from "../../protocol/enums/ActorType";
import { CombatState } from "../../protocol/enums/CombatState";
import { DenyReason } from "../../protocol/enums/DenyReason";
import { GameAction } from "../../protocol/enums/GameAction";
import { SceneContext } from "../../protocol/enums/SceneRules";
import { TravelDenyReason } from "../../protocol/enums/TravelDenyReason";
import { ClientEventForwarder } from "./ClientEventForwarder";
import { EventBus } from "./EventBus";
import {
  createActorSpawnedEvent,
  createAttackResolvedEvent,
  createCombatStateChangedEvent,
  createRegionEnteredEvent,
  createSelectionChangedEvent,
  createTargetIntentDeniedEvent,
  createTravelDeniedEvent
} from "./GameEvents";

function setup() {
  const eventBus = new EventBus();
  const sent: Array<[number, GameAction, unknown]> = [];
  const forwarder = new ClientEventForwarder({
    eventBus,
    enqueueUserMessage: (actorId, action, payload) => sent.push([actorId, action, payload])
  });
  forwarder.attach();
  return { eventBus, sent, forwarder };
}

describe("ClientEventForwarder", () => {
  it("sends each actor-scoped event to its actor", () => {
    const { eventBus, sent } = setup();

    eventBus.emit(createSelectionChangedEvent(1, null, 2, true));
    eventBus.emit(createTargetIntentDeniedEvent(1, 3, "Attack", DenyReason.NotHostile));
    eventBus.emit(createCombatStateChangedEvent(1, CombatState.Peaceful, CombatState.InCombat));
    eventBus.emit(createTravelDeniedEvent(1, "gate", TravelDenyReason.InCombat));
    eventBus.emit(createRegionEnteredEvent(1, "crypt", SceneContext.Dungeon));

    expect(sent).toEqual([
      [1, GameAction.SelectionChanged, { previousTargetId: null, targetId: 2, attackDriven: true }],
      [1, GameAction.TargetIntentDenied, { targetId: 3, intent: "Attack", reason: DenyReason.NotHostile }],
      [1, GameAction.CombatStateChanged, { oldState: CombatState.Peaceful, newState: CombatState.InCombat }],
      [1, GameAction.TravelDenied, { portalId: "gate", reason: TravelDenyReason.InCombat }],
      [1, GameAction.RegionEntered, { regionId: "crypt", context: SceneContext.Dungeon }]
    ]);
  });

  it("sends attack results to both sides", () => {
    const { eventBus, sent } = setup();
    eventBus.emit(createAttackResolvedEvent(1, 2, ActionKind.Melee, "Hit"));

    const payload = { attackerId: 1, targetId: 2, actionKind: ActionKind.Melee, outcome: "Hit" };
    expect(sent).toEqual([
      [1, GameAction.AttackResolved, payload],
      [2, GameAction.AttackResolved, payload]
    ]);
  });

  it("keeps internal events to itself", () => {
    const { eventBus, sent } = setup();
    eventBus.emit(createActorSpawnedEvent(1, ActorType.Player, "town"));
    expect(sent).toEqual([]);
  });

  it("subscribes once and stops on detach", () => {
    const { eventBus, sent, forwarder } = setup();
    forwarder.attach();
    eventBus.emit(createSelectionChangedEvent(1, 2, null, false));
    expect(sent).toHaveLength(1);

    forwarder.detach();
    eventBus.emit(createSelectionChangedEvent(1, 2, null, false));
    expect(sent).toHaveLength(1);
  });
});
