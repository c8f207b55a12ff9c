import { hashEntry } from "./assets-fs.js";
import { extractAsset } from "./extractor.js";
import { categoryDirs, listCategoryCandidates } from "./layouts.js";
import { ASSET_CATEGORIES, assetKey, type AssetCategory, type DiscoveryWarning, type InstalledEntry } from "./types.js";
import { errorMessage } from "../shared/log.js";

/**
 * Reads the installed entries of one category. Active locations come before
 * inactive ones; when a name occurs twice the first location wins and
 * `onShadowed` is told about the other.
 *
 * Throws if an existing category directory cannot be listed.
 */
export function readCategoryEntries(
  rootPath: string,
  category: AssetCategory,
  hooks: {
    onNestedError?: (nestedPath: string, err: unknown) => void;
    onShadowed?: (kept: InstalledEntry, shadowedPath: string) => void;
  } = {}
): InstalledEntry[] {
  const byName = new Map<string, InstalledEntry>();

  for (const { dir, active } of categoryDirs(rootPath, category)) {
    for (const candidate of listCategoryCandidates(category, dir, hooks.onNestedError)) {
      const existing = byName.get(candidate.derivedName);
      if (existing) {
        hooks.onShadowed?.(existing, candidate.path);
        continue;
      }

      const extracted = extractAsset(candidate.path, category, { namespace: candidate.namespace });
      byName.set(candidate.derivedName, {
        category,
        name: candidate.derivedName,
        location: candidate.path,
        fingerprint: hashEntry(candidate.path),
        version: extracted.ok ? extracted.asset.version : undefined,
        active,
      });
    }
  }

  return [...byName.values()];
}

/**
 * Looks up the live entry for one asset. Throws if the category directory
 * cannot be read.
 */
export function readInstalledEntry(
  rootPath: string,
  category: AssetCategory,
  name: string
): InstalledEntry | undefined {
  return readCategoryEntries(rootPath, category).find((entry) => entry.name === name);
}

/**
 * Builds the index of everything installed under `rootPath`. Unreadable parts
 * are reported as warnings and left out of the index.
 */
export function readInstalledIndex(rootPath: string): {
  index: Map<string, InstalledEntry>;
  warnings: DiscoveryWarning[];
} {
  const index = new Map<string, InstalledEntry>();
  const warnings: DiscoveryWarning[] = [];

  for (const category of ASSET_CATEGORIES) {
    let entries: InstalledEntry[];
    try {
      entries = readCategoryEntries(rootPath, category, {
        onNestedError: (nestedPath, err) => {
          warnings.push({ path: nestedPath, message: `Cannot read ${nestedPath}: ${errorMessage(err)}` });
        },
        onShadowed: (kept, shadowedPath) => {
          warnings.push({
            path: shadowedPath,
            message: `Ignoring ${shadowedPath}: ${category} "${kept.name}" is already installed at ${kept.location}`,
          });
        },
      });
    } catch (err) {
      warnings.push({
        path: rootPath,
        message: `Cannot read ${category} entries under ${rootPath}: ${errorMessage(err)}`,
      });
      continue;
    }

    for (const entry of entries) {
      index.set(assetKey(category, entry.name), entry);
    }
  }

  return { index, warnings };
}
