import type { ActionHandler } from "./types";

/**
 * Stops pursuing. The combat window keeps running and expires on its own.
 */
export const handleStopAttack: ActionHandler = (ctx) => {
  if (ctx.actorId === null) return;
  ctx.core.stopAttack(ctx.actorId);
};
