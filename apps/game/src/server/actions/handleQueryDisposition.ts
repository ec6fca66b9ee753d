import { GameAction } from "../../protocol/enums/GameAction";
import { decodePayload, targetPayloadSchema } from "../../protocol/payloads/ClientPayloads";
import type { ActionHandler } from "./types";

/**
 * Read-only: replies with how the actor currently perceives a target.
 * Touches no selection or engagement state.
 */
export const handleQueryDisposition: ActionHandler = (ctx, actionData) => {
  if (ctx.actorId === null) return;
  const payload = decodePayload(targetPayloadSchema, actionData, "QueryDisposition");
  if (!payload) return;

  const result = ctx.core.resolveDisposition(ctx.actorId, payload.targetId);
  ctx.reply(GameAction.DispositionResult, {
    targetId: payload.targetId,
    eligible: result.eligible,
    disposition: result.disposition,
    denyReason: result.denyReason
  });
};
