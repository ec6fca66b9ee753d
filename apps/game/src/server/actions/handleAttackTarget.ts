import { attackTargetPayloadSchema, decodePayload } from "../../protocol/payloads/ClientPayloads";
import type { ActionHandler } from "./types";

/**
 * Attack intent. Legality is decided by the core; on success the attack
 * is scheduled and the first swing lands on the next tick.
 */
export const handleAttackTarget: ActionHandler = (ctx, actionData) => {
  if (ctx.actorId === null) return;
  const payload = decodePayload(attackTargetPayloadSchema, actionData, "AttackTarget");
  if (!payload) return;

  ctx.core.requestAttack(ctx.actorId, payload.targetId, payload.actionKind);
};
