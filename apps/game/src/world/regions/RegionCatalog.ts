import { z } from "zod";
import { ActorType } from "../../protocol/enums/ActorType";
import { FactionId } from "../../protocol/enums/FactionId";
import { SceneContext, SceneRuleFlag } from "../../protocol/enums/SceneRules";
import { DataLoadError } from "../DataLoadError";
import type { Position } from "../Location";
import { readStaticJson } from "../staticAssets";

const REGIONS_FILENAME = process.env.REGIONS_FILE || "regions.json";

const positionSchema = z.object({
  x: z.number().int(),
  y: z.number().int()
});

const ruleProviderSchema = z.object({
  context: z.nativeEnum(SceneContext),
  /** Explicit flag set; replaces the context's default mapping when present. */
  flags: z.array(z.nativeEnum(SceneRuleFlag)).optional()
});

const portalSchema = z.object({
  id: z.string().min(1),
  x: z.number().int(),
  y: z.number().int(),
  destinationRegionId: z.string().min(1),
  destination: positionSchema,
  requireOutOfCombat: z.boolean().default(true)
});

const actorPlacementSchema = z.object({
  id: z.number().int().positive(),
  type: z.nativeEnum(ActorType),
  factionId: z.nativeEnum(FactionId),
  x: z.number().int(),
  y: z.number().int()
});

const regionSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  ruleProviders: z.array(ruleProviderSchema),
  blockedTiles: z.array(positionSchema).default([]),
  portals: z.array(portalSchema).default([]),
  /** Actors placed when the shard starts. */
  actors: z.array(actorPlacementSchema).default([])
});

const regionDataSchema = z.object({
  playerSpawn: positionSchema.extend({ regionId: z.string().min(1) }),
  regions: z.array(regionSchema)
});

export type SceneRuleProviderDefinition = z.infer<typeof ruleProviderSchema>;
export type PortalDefinition = z.infer<typeof portalSchema>;
export type ActorPlacement = z.infer<typeof actorPlacementSchema>;
export type RegionDefinition = z.infer<typeof regionSchema>;

export interface SpawnPoint extends Position {
  regionId: string;
}

/**
 * Catalog for region definitions: rule providers, sight blockers and portals.
 */
export class RegionCatalog {
  private readonly regionsById = new Map<string, RegionDefinition>();
  private readonly portalsById = new Map<string, { regionId: string; portal: PortalDefinition }>();

  private constructor(
    regions: RegionDefinition[],
    readonly playerSpawn: SpawnPoint
  ) {
    for (const region of regions) {
      this.regionsById.set(region.id, region);
      for (const portal of region.portals) {
        this.portalsById.set(portal.id, { regionId: region.id, portal });
      }
    }
  }

  static async load(staticAssetsDir?: string): Promise<RegionCatalog> {
    const { file, data } = await readStaticJson(REGIONS_FILENAME, staticAssetsDir);
    const catalog = RegionCatalog.fromData(data, file);
    console.log(`[RegionCatalog] Loaded ${catalog.regionsById.size} regions from ${file}`);
    return catalog;
  }

  static fromData(raw: unknown, source = "regions data"): RegionCatalog {
    const parsed = regionDataSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DataLoadError(source, parsed.error.message);
    }

    const { regions, playerSpawn } = parsed.data;
    const seen = new Set<string>();
    for (const region of regions) {
      if (seen.has(region.id)) {
        throw new DataLoadError(source, `duplicate region id "${region.id}"`);
      }
      seen.add(region.id);
    }
    const actorIds = new Set<number>();
    const portalIds = new Set<string>();
    for (const region of regions) {
      for (const actor of region.actors) {
        if (actorIds.has(actor.id)) {
          throw new DataLoadError(source, `duplicate actor id ${actor.id} in region "${region.id}"`);
        }
        actorIds.add(actor.id);
      }
      for (const portal of region.portals) {
        if (portalIds.has(portal.id)) {
          throw new DataLoadError(source, `duplicate portal id "${portal.id}" in region "${region.id}"`);
        }
        portalIds.add(portal.id);
        if (!seen.has(portal.destinationRegionId)) {
          throw new DataLoadError(
            source,
            `portal "${portal.id}" leads to unknown region "${portal.destinationRegionId}"`
          );
        }
      }
    }
    if (!seen.has(playerSpawn.regionId)) {
      throw new DataLoadError(source, `player spawn region "${playerSpawn.regionId}" is not defined`);
    }

    return new RegionCatalog(regions, playerSpawn);
  }

  getRegion(regionId: string): RegionDefinition | undefined {
    return this.regionsById.get(regionId);
  }

  getRegions(): RegionDefinition[] {
    return Array.from(this.regionsById.values());
  }

  /**
   * Finds a portal and the region it stands in.
   */
  getPortal(portalId: string): { regionId: string; portal: PortalDefinition } | undefined {
    return this.portalsById.get(portalId);
  }
}
