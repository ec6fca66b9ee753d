import type { ActionHandler } from "./types";

export const handleClearSelection: ActionHandler = (ctx) => {
  if (ctx.actorId === null) return;
  ctx.core.clearSelection(ctx.actorId);
};
