import { CatalogError, ExtractionError } from "./errors.js";
import { extractAsset } from "./extractor.js";
import { listCategoryCandidates, type CategoryCandidate } from "./layouts.js";
import { ASSET_CATEGORIES, assetKey, type Asset, type AssetCategory } from "./types.js";
import { errorMessage, logEvent } from "../shared/log.js";

export interface Catalog {
  assets: Map<string, Asset>;
  /** Assets that could not be read; the rest of the catalog is still usable. */
  warnings: ExtractionError[];
}

function insertAsset(assets: Map<string, Asset>, asset: Asset): void {
  const key = assetKey(asset.category, asset.name);
  const existing = assets.get(key);
  if (existing) {
    throw CatalogError.duplicate(key, existing.sourcePath, asset.sourcePath);
  }
  assets.set(key, asset);
}

/**
 * Builds a catalog from asset values, rejecting duplicate keys.
 */
export function createCatalog(assets: Iterable<Asset>, warnings: ExtractionError[] = []): Catalog {
  const byKey = new Map<string, Asset>();
  for (const asset of assets) {
    insertAsset(byKey, asset);
  }
  return { assets: byKey, warnings };
}

/**
 * Walks each category root and extracts every asset found there.
 *
 * A missing category root contributes nothing. A root that exists but cannot be
 * listed, or two assets sharing a `(category, name)`, fail the whole build with
 * `CatalogError`; a single unreadable asset only adds a warning.
 */
export function buildCatalog(categoryRoots: ReadonlyMap<AssetCategory, string>): Catalog {
  const assets = new Map<string, Asset>();
  const warnings: ExtractionError[] = [];

  for (const category of ASSET_CATEGORIES) {
    const rootDir = categoryRoots.get(category);
    if (!rootDir) continue;

    let candidates: CategoryCandidate[];
    try {
      candidates = listCategoryCandidates(category, rootDir, (nestedPath, err) => {
        warnings.push(
          new ExtractionError({ kind: "unreadable", path: nestedPath, category, detail: errorMessage(err) })
        );
      });
    } catch (err) {
      throw new CatalogError(
        "category-root-unreadable",
        `Cannot read ${category} directory ${rootDir}: ${errorMessage(err)}`,
        { paths: [rootDir] }
      );
    }

    for (const candidate of candidates) {
      const result = extractAsset(candidate.path, category, { namespace: candidate.namespace });
      if (!result.ok) {
        warnings.push(result.error);
        logEvent("warn", "catalog-extract-failed", {
          category,
          path: candidate.path,
          reason: result.error.kind,
          error: result.error.message,
        });
        continue;
      }
      insertAsset(assets, result.asset);
    }
  }

  logEvent("debug", "catalog-built", { assets: assets.size, warnings: warnings.length });
  return { assets, warnings };
}

export function getCatalogAsset(catalog: Catalog, category: AssetCategory, name: string): Asset | undefined {
  return catalog.assets.get(assetKey(category, name));
}

/**
 * All assets, ordered by category then name.
 */
export function listCatalogAssets(catalog: Catalog, category?: AssetCategory): Asset[] {
  const order = new Map(ASSET_CATEGORIES.map((c, i) => [c, i]));
  return [...catalog.assets.values()]
    .filter((asset) => category === undefined || asset.category === category)
    .sort((a, b) => {
      const byCategory = (order.get(a.category) ?? 0) - (order.get(b.category) ?? 0);
      if (byCategory !== 0) return byCategory;
      return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
    });
}
