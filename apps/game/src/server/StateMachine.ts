import { CombatState } from "../protocol/enums/CombatState";
import type { EventBus } from "./events/EventBus";
import { createCombatStateChangedEvent } from "./events/GameEvents";
import type { ActorState } from "./state/ActorState";

/**
 * Context interface for combat state transitions.
 * Provides the cleanup hooks of the systems that react to disengage,
 * without handing the state machine those systems themselves.
 */
export interface StateMachineContext {
    /**
     * Event bus for emitting state change events.
     */
    eventBus: EventBus;

    /**
     * Gets an actor by id.
     */
    getActor(actorId: number): ActorState | undefined;

    /**
     * Writes the published combat state onto the actor record.
     */
    setActorCombatState(actorId: number, state: CombatState): void;

    /**
     * Cancels a scheduled auto-attack, if any.
     */
    cancelAutoAttack(actorId: number): void;

    /**
     * Clears the actor's selection only if an attack produced it.
     */
    clearAttackDrivenSelection(actorId: number): void;

    /**
     * Clears aggression bookkeeping involving the actor.
     */
    clearAggression(actorId: number): void;
}

/**
 * State Machine for published combat states.
 * Handles enter/exit logic so disengage cleanup lives in one place.
 * Emits CombatStateChangedEvent when states change for other systems to react.
 *
 * Movement is never touched by any transition here.
 */
export class StateMachine {
    constructor(private readonly context: StateMachineContext) {}

    /**
     * Sets the published combat state for an actor, handling exit and enter logic.
     * @param actorId The actor whose state is changing
     * @param newState The new state to transition to
     * @returns true if the state was changed, false if already in that state or unknown
     */
    setState(actorId: number, newState: CombatState): boolean {
        const actor = this.context.getActor(actorId);
        if (!actor) {
            return false;
        }

        const currentState = actor.combatState;
        if (currentState === newState) {
            return false;
        }

        // Exit current state
        this.exitState(actorId, currentState);

        // Update state
        this.context.setActorCombatState(actorId, newState);

        // Emit state change event (other systems can react to this)
        this.context.eventBus.emit(createCombatStateChangedEvent(actorId, currentState, newState));

        // Enter new state
        this.enterState(actorId, newState);

        return true;
    }

    /**
     * Gets the published combat state of an actor.
     */
    getCurrentState(actorId: number): CombatState {
        return this.context.getActor(actorId)?.combatState ?? CombatState.Peaceful;
    }

    /**
     * Runs the disengage cleanup without a state change. Used by the scene
     * override on actors that are already published as Peaceful.
     */
    forceDisengage(actorId: number): void {
        this.disengage(actorId);
    }

    /**
     * Handles cleanup when exiting a state.
     */
    private exitState(actorId: number, state: CombatState): void {
        switch (state) {
            case CombatState.InCombat:
                this.disengage(actorId);
                break;

            case CombatState.Peaceful:
            case CombatState.Dead:
                break;
        }
    }

    /**
     * Handles setup when entering a state.
     */
    private enterState(actorId: number, state: CombatState): void {
        switch (state) {
            case CombatState.Dead:
                // Dead actors never keep swinging, even if they were published Peaceful
                this.context.cancelAutoAttack(actorId);
                break;

            case CombatState.Peaceful:
            case CombatState.InCombat:
                break;
        }
    }

    private disengage(actorId: number): void {
        this.context.cancelAutoAttack(actorId);
        this.context.clearAttackDrivenSelection(actorId);
        this.context.clearAggression(actorId);
    }
}
