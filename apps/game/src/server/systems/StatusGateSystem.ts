/**
 * StatusGateSystem.ts - Timed conditions that block hostile actions.
 *
 * Conditions:
 * - Stun / Paralyze: block every hostile action
 * - Silence: blocks harmful spells only
 * - Disarm: blocks melee and ranged attacks
 *
 * Expiry is read against the authoritative clock, so a query made after the
 * deadline is unblocked even before `update()` prunes the entry.
 */

import { ActionKind } from "../../protocol/enums/ActionKind";
import type { ServerClock } from "../../world/ServerClock";

/**
 * Answers whether a status effect currently prevents an action kind.
 */
export interface StatusSource {
  isActionBlocked(actorId: number, actionKind: ActionKind): boolean;
}

export enum StatusCondition {
  Stun = "stun",
  Paralyze = "paralyze",
  Silence = "silence",
  Disarm = "disarm"
}

const BLOCKED_ACTION_KINDS: Readonly<Record<StatusCondition, ReadonlySet<ActionKind>>> = {
  [StatusCondition.Stun]: new Set(Object.values(ActionKind)),
  [StatusCondition.Paralyze]: new Set(Object.values(ActionKind)),
  [StatusCondition.Silence]: new Set([ActionKind.HarmfulSpell]),
  [StatusCondition.Disarm]: new Set([ActionKind.Melee, ActionKind.Ranged])
};

export interface StatusGateSystemConfig {
  clock: ServerClock;
}

export class StatusGateSystem implements StatusSource {
  /** actorId -> condition -> absolute expiry (ms) */
  private readonly conditions = new Map<number, Map<StatusCondition, number>>();

  constructor(private readonly config: StatusGateSystemConfig) {}

  /**
   * Applies a condition. Re-applying never shortens an active one.
   */
  apply(actorId: number, condition: StatusCondition, durationMs: number): void {
    const until = this.config.clock.now() + Math.max(0, durationMs);
    let active = this.conditions.get(actorId);
    if (!active) {
      active = new Map();
      this.conditions.set(actorId, active);
    }
    active.set(condition, Math.max(active.get(condition) ?? 0, until));
  }

  clear(actorId: number, condition?: StatusCondition): void {
    if (condition === undefined) {
      this.conditions.delete(actorId);
      return;
    }
    this.conditions.get(actorId)?.delete(condition);
  }

  isActionBlocked(actorId: number, actionKind: ActionKind): boolean {
    const active = this.conditions.get(actorId);
    if (!active) return false;
    const now = this.config.clock.now();
    for (const [condition, until] of active) {
      if (until > now && BLOCKED_ACTION_KINDS[condition].has(actionKind)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Drops expired conditions. Called once per server tick.
   */
  update(): void {
    const now = this.config.clock.now();
    for (const [actorId, active] of this.conditions) {
      for (const [condition, until] of active) {
        if (until <= now) active.delete(condition);
      }
      if (active.size === 0) this.conditions.delete(actorId);
    }
  }
}
