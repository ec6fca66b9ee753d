/**
 * AggroSystem.ts - Transient aggression bookkeeping.
 *
 * **Purpose**: remembers who has recently committed hostile intent against whom
 * - Recorded when an attack intent is validated
 * - Read by AI and UI ("who is attacking me")
 * - Cleared for an actor when it drops out of combat
 * - Entries older than the retention window are pruned every tick
 *
 * This is bookkeeping only. It never decides legality and never refreshes
 * engagement timers.
 */

import type { ServerClock } from "../../world/ServerClock";

export type AggroSystemConfig = {
  clock: ServerClock;
  /** How long an aggression record survives without being refreshed (ms). */
  retentionMs: number;
};

export class AggroSystem {
  /** victimId -> attackerId -> last aggression time (ms) */
  private readonly aggressorsByVictim = new Map<number, Map<number, number>>();

  constructor(private readonly config: AggroSystemConfig) {}

  recordAggression(attackerId: number, victimId: number): void {
    let aggressors = this.aggressorsByVictim.get(victimId);
    if (!aggressors) {
      aggressors = new Map();
      this.aggressorsByVictim.set(victimId, aggressors);
    }
    aggressors.set(attackerId, this.config.clock.now());
  }

  /**
   * Actors that have shown hostile intent toward `victimId`, most recent first.
   */
  getAggressors(victimId: number): number[] {
    const aggressors = this.aggressorsByVictim.get(victimId);
    if (!aggressors) return [];
    return Array.from(aggressors.entries())
      .sort((a, b) => b[1] - a[1])
      .map(([attackerId]) => attackerId);
  }

  hasAggressionAgainst(attackerId: number, victimId: number): boolean {
    return this.aggressorsByVictim.get(victimId)?.has(attackerId) ?? false;
  }

  /**
   * Forgets everything involving `actorId`, as attacker or as victim.
   */
  clearFor(actorId: number): void {
    this.aggressorsByVictim.delete(actorId);
    for (const [victimId, aggressors] of this.aggressorsByVictim) {
      aggressors.delete(actorId);
      if (aggressors.size === 0) this.aggressorsByVictim.delete(victimId);
    }
  }

  /**
   * Prunes stale records. Called once per server tick.
   */
  update(): void {
    const cutoff = this.config.clock.now() - this.config.retentionMs;
    for (const [victimId, aggressors] of this.aggressorsByVictim) {
      for (const [attackerId, at] of aggressors) {
        if (at < cutoff) aggressors.delete(attackerId);
      }
      if (aggressors.size === 0) this.aggressorsByVictim.delete(victimId);
    }
  }
}
