export { ASSET_CATEGORIES, InstallStatus, assetKey, isAssetCategory } from "./types.js";
export type {
  Asset,
  AssetCategory,
  AssetRef,
  DiscoveryWarning,
  InstallOptions,
  InstallationRoot,
  InstalledEntry,
  OperationFailureKind,
  OperationKind,
  OperationOutcome,
  OperationResult,
  PlannedOperation,
  RootScope,
} from "./types.js";

export { AssetError, CatalogError, ExtractionError, OperationFailure, classifyFsError } from "./errors.js";
export type { CatalogErrorKind, ExtractionErrorKind, ParsePosition } from "./errors.js";

export { createAsset } from "./asset.js";
export { extractAsset } from "./extractor.js";
export type { ExtractionResult } from "./extractor.js";
export { buildCatalog, createCatalog, getCatalogAsset, listCatalogAssets } from "./catalog.js";
export type { Catalog } from "./catalog.js";
export { CATEGORY_LAYOUTS, getPluginCategoryRoots, installTargetPath } from "./layouts.js";
export { createInstallationRoot, discoverRoots, refreshRoot } from "./roots.js";
export type { DiscoverOptions } from "./roots.js";
export { readInstalledIndex } from "./installed-index.js";
export { status, statusOfEntry, toComparableVersion } from "./status.js";
export { diff } from "./diff.js";
export type { AssetDiff } from "./diff.js";
export { install, uninstall, update } from "./installer.js";
export { runBulk } from "./bulk.js";
export { resolveDependencies } from "./dependencies.js";
export type { DependencyResolution } from "./dependencies.js";
