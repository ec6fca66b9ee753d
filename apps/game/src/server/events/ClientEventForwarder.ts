import { GameAction } from "../../protocol/enums/GameAction";
import type { EventBus } from "./EventBus";

export interface ClientEventForwarderDependencies {
  eventBus: EventBus;
  /** Queues a message for the actor's connection; actors without one are skipped at flush. */
  enqueueUserMessage: (actorId: number, action: GameAction, payload: unknown) => void;
}

/**
 * Turns engine notifications into client messages.
 *
 * Each event goes only to the actors it concerns. Nothing here reads or
 * writes engine state.
 */
export class ClientEventForwarder {
  private readonly unsubscribers: Array<() => void> = [];

  constructor(private readonly deps: ClientEventForwarderDependencies) {}

  attach(): void {
    if (this.unsubscribers.length > 0) return;
    const { eventBus } = this.deps;
    const send = this.deps.enqueueUserMessage;

    this.unsubscribers.push(
      eventBus.on("SelectionChanged", (event) => {
        send(event.actorId, GameAction.SelectionChanged, {
          previousTargetId: event.previousTargetId,
          targetId: event.targetId,
          attackDriven: event.attackDriven
        });
      }),

      eventBus.on("TargetIntentDenied", (event) => {
        send(event.actorId, GameAction.TargetIntentDenied, {
          targetId: event.targetId,
          intent: event.intent,
          reason: event.reason
        });
      }),

      eventBus.on("CombatStateChanged", (event) => {
        send(event.actorId, GameAction.CombatStateChanged, {
          oldState: event.oldState,
          newState: event.newState
        });
      }),

      eventBus.on("TravelDenied", (event) => {
        send(event.actorId, GameAction.TravelDenied, {
          portalId: event.portalId,
          reason: event.reason
        });
      }),

      eventBus.on("RegionEntered", (event) => {
        send(event.actorId, GameAction.RegionEntered, {
          regionId: event.regionId,
          context: event.context
        });
      }),

      eventBus.on("AttackResolved", (event) => {
        const payload = {
          attackerId: event.attackerId,
          targetId: event.targetId,
          actionKind: event.actionKind,
          outcome: event.outcome
        };
        send(event.attackerId, GameAction.AttackResolved, payload);
        if (event.targetId !== event.attackerId) {
          send(event.targetId, GameAction.AttackResolved, payload);
        }
      })
    );
  }

  detach(): void {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers.length = 0;
  }
}
