import { CONTEXT_FLAGS, SceneContext, SceneRuleFlag } from "../../protocol/enums/SceneRules";
import type { SceneRuleProviderDefinition } from "../../world/regions/RegionCatalog";
import type { EventBus } from "../events/EventBus";
import { createRegionRulesRegisteredEvent } from "../events/GameEvents";

/**
 * Immutable permission snapshot for one region. Replaced wholesale, never edited.
 */
export interface SceneRuleSnapshot {
  readonly regionId: string;
  /** Null when registration was refused. */
  readonly context: SceneContext | null;
  readonly flags: readonly SceneRuleFlag[];
  /** False for the maximally restrictive fallback. */
  readonly isValid: boolean;
}

/**
 * Read side of the gate, as consumed by the resolver, validator and tracker.
 */
export interface SceneRuleSource {
  getSnapshot(regionId: string): SceneRuleSnapshot;
}

export function createSceneRuleSnapshot(
  regionId: string,
  context: SceneContext | null,
  flags: readonly SceneRuleFlag[],
  isValid: boolean
): SceneRuleSnapshot {
  return Object.freeze({
    regionId,
    context,
    flags: Object.freeze(Array.from(new Set(flags))),
    isValid
  });
}

/**
 * The "no usable rules" snapshot: nothing is permitted.
 */
export function restrictiveSnapshot(regionId: string): SceneRuleSnapshot {
  return createSceneRuleSnapshot(regionId, null, [], false);
}

export function snapshotAllows(snapshot: SceneRuleSnapshot, flag: SceneRuleFlag): boolean {
  return snapshot.flags.includes(flag);
}

/**
 * Flags a single provider resolves to. An explicit list replaces the context mapping.
 */
export function resolveProviderFlags(provider: SceneRuleProviderDefinition): readonly SceneRuleFlag[] {
  return provider.flags ?? CONTEXT_FLAGS[provider.context];
}

export interface SceneRuleGateDependencies {
  eventBus: EventBus;
}

export type SceneRuleRegistration =
  | { ok: true; snapshot: SceneRuleSnapshot }
  | { ok: false; snapshot: SceneRuleSnapshot; error: string };

/**
 * Holds the active rule snapshot of every loaded region.
 *
 * Each region must declare exactly one rule provider. Anything else is a
 * configuration error: registration is refused and the region falls back to
 * the restrictive snapshot, so a broken region can never allow combat.
 */
export class SceneRuleGate implements SceneRuleSource {
  private readonly snapshots = new Map<string, SceneRuleSnapshot>();

  constructor(private readonly deps: SceneRuleGateDependencies) {}

  registerRegion(regionId: string, providers: readonly SceneRuleProviderDefinition[]): SceneRuleRegistration {
    if (providers.length !== 1) {
      const error =
        providers.length === 0
          ? `Region '${regionId}' has NO rule provider. Add exactly one provider.`
          : `Region '${regionId}' has MULTIPLE rule providers (${providers.length}). Keep exactly one.`;
      console.error(`[SceneRuleGate] CRITICAL: ${error}`);
      const snapshot = restrictiveSnapshot(regionId);
      this.snapshots.set(regionId, snapshot);
      this.deps.eventBus.emit(createRegionRulesRegisteredEvent(regionId, false));
      return { ok: false, snapshot, error };
    }

    const provider = providers[0];
    const snapshot = createSceneRuleSnapshot(regionId, provider.context, resolveProviderFlags(provider), true);
    this.snapshots.set(regionId, snapshot);
    console.log(
      `[SceneRuleGate] Registered region '${regionId}' context='${provider.context}' flags='${snapshot.flags.join("|") || "None"}'`
    );
    this.deps.eventBus.emit(createRegionRulesRegisteredEvent(regionId, true));
    return { ok: true, snapshot };
  }

  unregisterRegion(regionId: string): boolean {
    return this.snapshots.delete(regionId);
  }

  /**
   * Unknown regions resolve to the restrictive snapshot.
   */
  getSnapshot(regionId: string): SceneRuleSnapshot {
    return this.snapshots.get(regionId) ?? restrictiveSnapshot(regionId);
  }

  allows(regionId: string, flag: SceneRuleFlag): boolean {
    return snapshotAllows(this.getSnapshot(regionId), flag);
  }

  hasRegion(regionId: string): boolean {
    return this.snapshots.has(regionId);
  }
}
