import { decodePayload, targetPayloadSchema } from "../../protocol/payloads/ClientPayloads";
import type { ActionHandler } from "./types";

/**
 * Passive selection (inspect, talk). Never starts combat; a refused
 * selection surfaces as TargetIntentDenied through the event bus.
 */
export const handleSelectTarget: ActionHandler = (ctx, actionData) => {
  if (ctx.actorId === null) return;
  const payload = decodePayload(targetPayloadSchema, actionData, "SelectTarget");
  if (!payload) return;

  ctx.core.selectTarget(ctx.actorId, payload.targetId);
};
