import fs from "fs/promises";
import path from "path";
import { DataLoadError } from "./DataLoadError";

// Static data path - configurable via environment variable
const DEFAULT_STATIC_ASSETS_DIR = path.resolve(__dirname, "..", "..", "data");

export function resolveStaticAssetsDir(override?: string): string {
  if (override) return path.resolve(override);
  return process.env.STATIC_ASSETS_PATH
    ? path.resolve(process.env.STATIC_ASSETS_PATH)
    : DEFAULT_STATIC_ASSETS_DIR;
}

/**
 * Reads and parses a JSON file from the static assets directory.
 * Shape validation is left to the caller.
 */
export async function readStaticJson(
  filename: string,
  staticAssetsDir?: string
): Promise<{ file: string; data: unknown }> {
  const file = path.join(resolveStaticAssetsDir(staticAssetsDir), filename);
  let content: string;
  try {
    content = await fs.readFile(file, "utf8");
  } catch (error) {
    throw new DataLoadError(file, error instanceof Error ? error.message : String(error));
  }

  try {
    const data: unknown = JSON.parse(content);
    return { file, data };
  } catch (error) {
    throw new DataLoadError(file, error instanceof Error ? error.message : String(error));
  }
}
