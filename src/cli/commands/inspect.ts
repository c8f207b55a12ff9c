import { assetKey, diff, listCatalogAssets, type InstallationRoot } from "../../assets/index.js";
import { errorMessage } from "../../shared/log.js";
import { formatAssetStatus, formatAssetSummary, formatDiff, formatRootSummary } from "../format.js";
import {
  loadCatalog,
  loadRoots,
  parseAssetRef,
  parseCategory,
  parseScope,
  requireCatalogAsset,
  selectTargetRoot,
} from "./context.js";

export interface ListAssetsOptions {
  category?: string;
}

export interface ListRootsOptions {
  dir?: string;
}

export interface ShowStatusOptions {
  dir?: string;
  category?: string;
  assets?: string[];
}

export interface ShowDiffOptions {
  dir?: string;
  scope?: string;
  asset: string;
}

export function listAssets(options: ListAssetsOptions): void {
  try {
    const category = parseCategory(options.category);
    const assets = listCatalogAssets(loadCatalog(), category);
    if (assets.length === 0) {
      console.log("no-assets: (none)");
      return;
    }
    console.log(assets.map(formatAssetSummary).join("\n\n"));
  } catch (err) {
    console.error("error:", errorMessage(err));
    process.exit(1);
  }
}

export function listRoots(options: ListRootsOptions): void {
  try {
    console.log(loadRoots(options.dir).map(formatRootSummary).join("\n\n"));
  } catch (err) {
    console.error("error:", errorMessage(err));
    process.exit(1);
  }
}

export function showStatus(options: ShowStatusOptions): void {
  try {
    const catalog = loadCatalog();
    const roots: InstallationRoot[] = loadRoots(options.dir).filter((root) => root.exists);
    const refs = options.assets ?? [];
    const assets =
      refs.length > 0
        ? refs.map((raw) => requireCatalogAsset(catalog, parseAssetRef(raw)))
        : listCatalogAssets(catalog, parseCategory(options.category));

    if (roots.length === 0) {
      console.log("roots: (none)");
      return;
    }
    console.log(assets.map((asset) => formatAssetStatus(asset, roots)).join("\n\n"));
  } catch (err) {
    console.error("error:", errorMessage(err));
    process.exit(1);
  }
}

export function showDiff(options: ShowDiffOptions): void {
  try {
    const catalog = loadCatalog();
    const ref = parseAssetRef(options.asset);
    const asset = requireCatalogAsset(catalog, ref);
    const root = selectTargetRoot(loadRoots(options.dir), parseScope(options.scope), options.dir);
    const key = assetKey(ref.category, ref.name);
    const entry = root.installedIndex.get(key);
    if (!entry) {
      throw new Error(`${key} is not installed in ${root.path}`);
    }
    console.log(formatDiff(diff(asset, entry.location)));
  } catch (err) {
    console.error("error:", errorMessage(err));
    process.exit(1);
  }
}
