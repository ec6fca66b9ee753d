import { z } from "zod";
import { ActionKind } from "../enums/ActionKind";

export const loginPayloadSchema = z.object({
  token: z.string().min(1)
});

/**
 * Envelope of every `GameAction.ClientAction` message.
 */
export const clientActionPayloadSchema = z.object({
  type: z.number().int(),
  data: z.unknown().optional()
});

export const targetPayloadSchema = z.object({
  targetId: z.number().int()
});

export const attackTargetPayloadSchema = targetPayloadSchema.extend({
  actionKind: z.nativeEnum(ActionKind).default(ActionKind.Melee)
});

export const usePortalPayloadSchema = z.object({
  portalId: z.string().min(1)
});

export type LoginPayload = z.infer<typeof loginPayloadSchema>;
export type ClientActionPayload = z.infer<typeof clientActionPayloadSchema>;
export type TargetPayload = z.infer<typeof targetPayloadSchema>;
export type AttackTargetPayload = z.infer<typeof attackTargetPayloadSchema>;
export type UsePortalPayload = z.infer<typeof usePortalPayloadSchema>;

/**
 * Decodes a client payload, logging and returning null when it does not fit.
 */
export function decodePayload<T extends z.ZodTypeAny>(schema: T, payload: unknown, name: string): z.output<T> | null {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    console.warn(`[protocol] invalid ${name} payload: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
    return null;
  }
  return parsed.data;
}
