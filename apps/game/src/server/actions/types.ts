import type { GameAction } from "../../protocol/enums/GameAction";
import type { CombatCore } from "../CombatCore";

/**
 * Context passed to client action handlers, providing access to necessary systems
 * without exposing the entire GameServer instance.
 */
export interface ActionContext {
  /** The actor bound to this connection (null if not authenticated) */
  actorId: number | null;

  /** Current server tick */
  currentTick: number;

  core: CombatCore;

  /** Queue a message to this connection for the next flush */
  reply: (action: GameAction, payload: unknown) => void;
}

/**
 * A client action handler function.
 * Receives the action context and the raw action data payload.
 *
 * @param ctx - Action context with utilities and system references
 * @param actionData - Raw action data from the client (needs decoding)
 */
export type ActionHandler = (ctx: ActionContext, actionData: unknown) => void;

/**
 * Client action definition with metadata.
 */
export interface ActionDefinition {
  /** Handler function */
  handler: ActionHandler;

  /** Whether this action requires authentication (actorId must be set) */
  requiresAuth?: boolean;

  /** Description for documentation/debugging */
  description?: string;
}
