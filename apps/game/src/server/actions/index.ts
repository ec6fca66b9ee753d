import { ClientActionTypes, isClientActionType, type ClientActionType } from "../../protocol/enums/ClientActionType";
import type { ActionContext, ActionDefinition } from "./types";
import { handleSelectTarget } from "./handleSelectTarget";
import { handleClearSelection } from "./handleClearSelection";
import { handleAttackTarget } from "./handleAttackTarget";
import { handleStopAttack } from "./handleStopAttack";
import { handleUsePortal } from "./handleUsePortal";
import { handleQueryDisposition } from "./handleQueryDisposition";

// Re-export types for convenience
export type { ActionContext, ActionDefinition, ActionHandler } from "./types";

// ============================================================================
// Action Registry
// ============================================================================
// Register all client action handlers here. Each action can specify:
// - handler: The function to execute
// - requiresAuth: Whether actorId must be set (default: true)
// - description: Short description for documentation

const ACTIONS: Record<ClientActionType, ActionDefinition> = {
  [ClientActionTypes.SelectTarget]: {
    handler: handleSelectTarget,
    requiresAuth: true,
    description: "Passively select a target"
  },

  [ClientActionTypes.ClearSelection]: {
    handler: handleClearSelection,
    requiresAuth: true,
    description: "Clear the current selection"
  },

  [ClientActionTypes.AttackTarget]: {
    handler: handleAttackTarget,
    requiresAuth: true,
    description: "Validate and schedule an auto-attack"
  },

  [ClientActionTypes.StopAttack]: {
    handler: handleStopAttack,
    requiresAuth: true,
    description: "Cancel the auto-attack"
  },

  [ClientActionTypes.UsePortal]: {
    handler: handleUsePortal,
    requiresAuth: true,
    description: "Travel through a portal"
  },

  [ClientActionTypes.QueryDisposition]: {
    handler: handleQueryDisposition,
    requiresAuth: true,
    description: "Ask how the player perceives a target"
  }
};

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Dispatches a client action to its handler.
 *
 * @param actionType - Raw action type from the client
 * @param ctx - Action context
 * @param actionData - Raw action payload
 * @returns true if a handler ran
 */
export function dispatchClientAction(actionType: number, ctx: ActionContext, actionData: unknown): boolean {
  if (!isClientActionType(actionType)) {
    console.warn(`[actions] Unknown action type: ${actionType}`);
    return false;
  }

  const actionDef = ACTIONS[actionType];
  if ((actionDef.requiresAuth ?? true) && ctx.actorId === null) {
    console.warn(`[actions] Action ${actionType} requires authentication`);
    return false;
  }

  actionDef.handler(ctx, actionData);
  return true;
}

/**
 * Get all registered action types (for debugging/documentation)
 */
export function getRegisteredActions(): ClientActionType[] {
  return Object.values(ClientActionTypes);
}

/**
 * Check if an action type has a registered handler
 */
export function hasHandler(actionType: number): boolean {
  return isClientActionType(actionType);
}
