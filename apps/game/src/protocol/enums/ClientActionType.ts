export const ClientActionTypes = {
  SelectTarget: 0,
  ClearSelection: 1,
  AttackTarget: 2,
  StopAttack: 3,
  UsePortal: 4,
  QueryDisposition: 5
} as const;

export type ClientActionType = (typeof ClientActionTypes)[keyof typeof ClientActionTypes];

const CLIENT_ACTION_TYPE_VALUES = new Set<number>(Object.values(ClientActionTypes));

export function isClientActionType(value: number): value is ClientActionType {
  return CLIENT_ACTION_TYPE_VALUES.has(value);
}
