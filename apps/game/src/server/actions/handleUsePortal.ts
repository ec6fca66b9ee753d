import { decodePayload, usePortalPayloadSchema } from "../../protocol/payloads/ClientPayloads";
import type { ActionHandler } from "./types";

export const handleUsePortal: ActionHandler = (ctx, actionData) => {
  if (ctx.actorId === null) return;
  const payload = decodePayload(usePortalPayloadSchema, actionData, "UsePortal");
  if (!payload) return;

  // Denials and arrivals reach the client as TravelDenied / RegionEntered events
  ctx.core.usePortal(ctx.actorId, payload.portalId);
};
