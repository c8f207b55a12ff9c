import { getCatalogAsset, type Catalog } from "./catalog.js";
import { assetKey, type Asset, type AssetRef } from "./types.js";

export interface DependencyResolution {
  /** Dependencies first, `asset` last; each asset once. */
  order: Asset[];
  /** References that are not in the catalog. */
  missing: AssetRef[];
}

/**
 * Depth-first walk over declared dependencies. A cycle is cut at the first
 * revisit.
 */
export function resolveDependencies(catalog: Catalog, asset: Asset): DependencyResolution {
  const order: Asset[] = [];
  const missing: AssetRef[] = [];
  const visited = new Set<string>();
  const missingKeys = new Set<string>();

  const visit = (current: Asset): void => {
    const key = assetKey(current.category, current.name);
    if (visited.has(key)) return;
    visited.add(key);

    for (const ref of current.dependencies) {
      const dep = getCatalogAsset(catalog, ref.category, ref.name);
      if (dep) {
        visit(dep);
        continue;
      }
      const refKey = assetKey(ref.category, ref.name);
      if (!missingKeys.has(refKey)) {
        missingKeys.add(refKey);
        missing.push(ref);
      }
    }
    order.push(current);
  };

  visit(asset);
  return { order, missing };
}
