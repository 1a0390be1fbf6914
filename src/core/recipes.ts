import { existsSync, readdirSync } from "node:fs";
import { join } from "node:path";
import type { Recipe, RecipeIndex } from "./types.js";
import { compareVersions, isVersion } from "../utils/version.js";

/**
 * Version encoded in a recipe filename, or null when `fileName` does not
 * follow `<packageName>-<version>.<extension>`.
 */
export function parseRecipeFilename(
  packageName: string,
  fileName: string,
  extension: string
): string | null {
  const prefix = `${packageName}-`;
  const suffix = `.${extension}`;
  if (!fileName.startsWith(prefix) || !fileName.endsWith(suffix)) return null;
  if (fileName.length <= prefix.length + suffix.length) return null;

  const version = fileName.slice(prefix.length, fileName.length - suffix.length);
  return isVersion(version) ? version : null;
}

export function recipePath(
  root: string,
  name: string,
  version: string,
  extension: string
): string {
  return join(root, name, `${name}-${version}.${extension}`);
}

/**
 * Scan `<root>/<package>/<package>-<version>.<ext>` files into an index.
 * Anything not following the convention is skipped.
 */
export function scanRecipes(root: string, extension: string): RecipeIndex {
  const index: RecipeIndex = new Map();
  if (!existsSync(root)) return index;

  for (const dir of readdirSync(root, { withFileTypes: true })) {
    if (!dir.isDirectory()) continue;

    const recipes: Recipe[] = [];
    const files = readdirSync(join(root, dir.name), { withFileTypes: true })
      .filter((f) => f.isFile())
      .map((f) => f.name)
      .sort();

    for (const fileName of files) {
      const version = parseRecipeFilename(dir.name, fileName, extension);
      if (!version) continue;
      // "1.0" and "1.0.0" name the same release; first one wins
      if (recipes.some((r) => compareVersions(r.version, version) === 0)) continue;

      recipes.push({
        name: dir.name,
        version,
        path: join(root, dir.name, fileName),
      });
    }

    if (recipes.length === 0) continue;
    recipes.sort((a, b) => compareVersions(a.version, b.version));
    index.set(dir.name, recipes);
  }

  return index;
}
