import { z } from "zod";
import { FactionId } from "../../protocol/enums/FactionId";
import { FactionRelation } from "../../protocol/enums/FactionRelation";
import { DataLoadError } from "../DataLoadError";
import { readStaticJson } from "../staticAssets";

const FACTIONS_FILENAME = process.env.FACTIONS_FILE || "factions.json";

const factionRelationRowSchema = z.object({
  viewer: z.nativeEnum(FactionId),
  target: z.nativeEnum(FactionId),
  relation: z.nativeEnum(FactionRelation)
});

const factionDataSchema = z.object({
  neutralFactions: z.array(z.nativeEnum(FactionId)),
  sameFactionRelation: z.nativeEnum(FactionRelation),
  defaultRelation: z.nativeEnum(FactionRelation),
  relations: z.array(factionRelationRowSchema),
  law: z.object({
    murdererHostileTo: z.array(z.nativeEnum(FactionId)),
    criminalHostileTo: z.array(z.nativeEnum(FactionId))
  })
});

export type RawFactionData = z.infer<typeof factionDataSchema>;

/**
 * Which viewer factions treat flagged players as hostile regardless of the matrix.
 */
export interface LawEnforcementRules {
  readonly murdererHostileTo: ReadonlySet<FactionId>;
  readonly criminalHostileTo: ReadonlySet<FactionId>;
}

/**
 * Immutable (viewer, target) -> relation table. Every pair is resolved at
 * construction so lookups never fall through to rule evaluation.
 */
export class FactionRelationMatrix {
  private readonly relations: ReadonlyMap<string, FactionRelation>;

  constructor(data: RawFactionData) {
    const neutral = new Set(data.neutralFactions);
    const explicit = new Map<string, FactionRelation>();
    for (const row of data.relations) {
      explicit.set(pairKey(row.viewer, row.target), row.relation);
    }

    const table = new Map<string, FactionRelation>();
    for (const viewer of Object.values(FactionId)) {
      for (const target of Object.values(FactionId)) {
        const key = pairKey(viewer, target);
        // Neutral baseline first, even for a faction viewing itself
        if (neutral.has(viewer) || neutral.has(target)) {
          table.set(key, FactionRelation.Neutral);
        } else if (viewer === target) {
          table.set(key, data.sameFactionRelation);
        } else {
          table.set(key, explicit.get(key) ?? data.defaultRelation);
        }
      }
    }
    this.relations = table;
    Object.freeze(this);
  }

  get(viewer: FactionId, target: FactionId): FactionRelation {
    return this.relations.get(pairKey(viewer, target)) ?? FactionRelation.Neutral;
  }
}

function pairKey(viewer: FactionId, target: FactionId): string {
  return `${viewer}->${target}`;
}

/**
 * Catalog for faction relationship data. Loaded once per process.
 */
export class FactionCatalog {
  private constructor(
    readonly matrix: FactionRelationMatrix,
    readonly law: LawEnforcementRules
  ) {}

  static async load(staticAssetsDir?: string): Promise<FactionCatalog> {
    const { file, data } = await readStaticJson(FACTIONS_FILENAME, staticAssetsDir);
    const catalog = FactionCatalog.fromData(data, file);
    console.log(`[FactionCatalog] Loaded faction relations from ${file}`);
    return catalog;
  }

  static fromData(raw: unknown, source = "factions data"): FactionCatalog {
    const parsed = factionDataSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DataLoadError(source, parsed.error.message);
    }
    const data = parsed.data;
    return new FactionCatalog(new FactionRelationMatrix(data), {
      murdererHostileTo: new Set(data.law.murdererHostileTo),
      criminalHostileTo: new Set(data.law.criminalHostileTo)
    });
  }
}
