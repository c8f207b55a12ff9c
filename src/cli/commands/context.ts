import * as path from "node:path";

import {
  buildCatalog,
  discoverRoots,
  getCatalogAsset,
  getPluginCategoryRoots,
  isAssetCategory,
  type Asset,
  type AssetCategory,
  type AssetRef,
  type Catalog,
  type InstallationRoot,
} from "../../assets/index.js";
import { DEFAULT_ROOT_MARKER_DIRNAME } from "../../shared/defaults.js";
import { resolveGlobalDir, resolvePluginRoot } from "../../shared/assetctl-paths.js";
import { logEvent } from "../../shared/log.js";

export type TargetScope = "project" | "global";

export function parseCategory(raw: string | undefined): AssetCategory | undefined {
  if (raw === undefined) return undefined;
  const category = parseCategoryOrNull(raw);
  if (category) return category;
  throw new Error(`Invalid --category (expected hook, command, agent, skill, mode, or workflow): ${raw}`);
}

export function parseScope(raw: string | undefined): TargetScope {
  const value = (raw ?? "project").trim().toLowerCase();
  if (value === "project" || value === "global") return value;
  throw new Error(`Invalid --scope (expected project or global): ${raw}`);
}

/**
 * Parses `<category>/<name>` (the category may be plural, `skills/foo`).
 */
export function parseAssetRef(raw: string): AssetRef {
  const trimmed = raw.trim();
  const idx = trimmed.indexOf("/");
  if (idx > 0) {
    const name = trimmed.slice(idx + 1).trim();
    const category = parseCategoryOrNull(trimmed.slice(0, idx));
    if (category && name) return { category, name };
  }
  throw new Error(`Invalid asset reference (expected <category>/<name>, e.g. skill/pdf): ${raw}`);
}

function parseCategoryOrNull(raw: string): AssetCategory | null {
  const trimmed = raw.trim().toLowerCase();
  if (isAssetCategory(trimmed)) return trimmed;
  const singular = trimmed.endsWith("s") ? trimmed.slice(0, -1) : "";
  return isAssetCategory(singular) ? singular : null;
}

export function loadCatalog(): Catalog {
  const pluginRoot = resolvePluginRoot();
  if (!pluginRoot.ok) throw new Error(pluginRoot.error);

  const catalog = buildCatalog(getPluginCategoryRoots(pluginRoot.dir));
  for (const warning of catalog.warnings) {
    console.error(`warning: ${warning.message}`);
  }
  return catalog;
}

export function loadRoots(dir: string | undefined): InstallationRoot[] {
  const globalDir = resolveGlobalDir();
  if (!globalDir.ok) throw new Error(globalDir.error);
  return discoverRoots(path.resolve(dir ?? process.cwd()), { globalDir: globalDir.dir });
}

/**
 * The root an operation writes to. With no `.claude` directory found, the
 * project root is `<dir>/.claude`, created on first install.
 */
export function selectTargetRoot(roots: InstallationRoot[], scope: TargetScope, dir: string | undefined): InstallationRoot {
  const found = roots.find((root) => root.scope === scope);
  if (found) return found;

  const rootPath = path.join(path.resolve(dir ?? process.cwd()), DEFAULT_ROOT_MARKER_DIRNAME);
  logEvent("debug", "project-root-created", { root: rootPath });
  return {
    path: rootPath,
    scope: "project",
    exists: false,
    displayName: `./${DEFAULT_ROOT_MARKER_DIRNAME} (project)`,
    installedIndex: new Map(),
    warnings: [],
  };
}

export function requireCatalogAsset(catalog: Catalog, ref: AssetRef): Asset {
  const asset = getCatalogAsset(catalog, ref.category, ref.name);
  if (!asset) {
    throw new Error(`Unknown asset ${ref.category}/${ref.name} (run "assetctl list" to see what is available)`);
  }
  return asset;
}
