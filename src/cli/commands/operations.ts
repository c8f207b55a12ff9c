import { confirm } from "@inquirer/prompts";

import {
  InstallStatus,
  assetKey,
  listCatalogAssets,
  resolveDependencies,
  runBulk,
  status,
  type Asset,
  type Catalog,
  type InstallationRoot,
  type OperationResult,
  type PlannedOperation,
} from "../../assets/index.js";
import { errorMessage } from "../../shared/log.js";
import { formatOperationResult } from "../format.js";
import { loadCatalog, loadRoots, parseAssetRef, parseScope, requireCatalogAsset, selectTargetRoot } from "./context.js";

export interface InstallAssetsOptions {
  assets: string[];
  dir?: string;
  scope?: string;
  inactive?: boolean;
  withDeps?: boolean;
}

export interface UninstallAssetsOptions {
  assets: string[];
  dir?: string;
  scope?: string;
}

export interface UpdateAssetsOptions {
  assets: string[];
  dir?: string;
  scope?: string;
  all?: boolean;
  yes?: boolean;
}

/**
 * Install operations for `assets`, each preceded by its dependencies when
 * `withDeps` is set. Every asset appears once.
 */
export function planInstallOperations(params: {
  catalog: Catalog;
  assets: readonly Asset[];
  root: InstallationRoot;
  withDeps: boolean;
  activate: boolean;
}): { operations: PlannedOperation[]; missing: string[] } {
  const operations: PlannedOperation[] = [];
  const missing: string[] = [];
  const planned = new Set<string>();

  for (const requested of params.assets) {
    const resolution = params.withDeps
      ? resolveDependencies(params.catalog, requested)
      : { order: [requested], missing: [] };

    for (const ref of resolution.missing) {
      const key = assetKey(ref.category, ref.name);
      if (!missing.includes(key)) missing.push(key);
    }

    for (const asset of resolution.order) {
      const key = assetKey(asset.category, asset.name);
      if (planned.has(key)) continue;
      planned.add(key);
      operations.push({ kind: "install", asset, root: params.root, activate: params.activate });
    }
  }

  return { operations, missing };
}

/**
 * Installed assets whose content differs from the catalog.
 */
export function findOutdatedAssets(catalog: Catalog, root: InstallationRoot): Asset[] {
  return listCatalogAssets(catalog).filter((asset) => {
    const current = status(asset, root);
    return current !== InstallStatus.NOT_INSTALLED && current !== InstallStatus.INSTALLED_SAME;
  });
}

function printResults(results: OperationResult[]): void {
  if (results.length === 0) {
    console.log("operations: (none)");
    return;
  }
  console.log(results.map(formatOperationResult).join("\n\n"));
  if (results.some((result) => result.outcome === "failed")) {
    process.exitCode = 1;
  }
}

export function installAssets(options: InstallAssetsOptions): void {
  try {
    const catalog = loadCatalog();
    const root = selectTargetRoot(loadRoots(options.dir), parseScope(options.scope), options.dir);
    const assets = options.assets.map((raw) => requireCatalogAsset(catalog, parseAssetRef(raw)));

    const plan = planInstallOperations({
      catalog,
      assets,
      root,
      withDeps: Boolean(options.withDeps),
      activate: !options.inactive,
    });
    for (const key of plan.missing) {
      console.error(`warning: dependency ${key} is not in the catalog`);
    }
    printResults(runBulk(plan.operations));
  } catch (err) {
    console.error("error:", errorMessage(err));
    process.exit(1);
  }
}

export function uninstallAssets(options: UninstallAssetsOptions): void {
  try {
    const root = selectTargetRoot(loadRoots(options.dir), parseScope(options.scope), options.dir);
    const operations: PlannedOperation[] = options.assets.map((raw) => {
      const ref = parseAssetRef(raw);
      return { kind: "uninstall", category: ref.category, name: ref.name, root };
    });
    printResults(runBulk(operations));
  } catch (err) {
    console.error("error:", errorMessage(err));
    process.exit(1);
  }
}

export async function updateAssets(options: UpdateAssetsOptions): Promise<void> {
  try {
    const catalog = loadCatalog();
    const root = selectTargetRoot(loadRoots(options.dir), parseScope(options.scope), options.dir);

    if (options.all && options.assets.length > 0) {
      throw new Error("Use either --all or asset references, not both");
    }
    if (!options.all && options.assets.length === 0) {
      throw new Error("Missing asset reference (or pass --all)");
    }

    const assets = options.all
      ? findOutdatedAssets(catalog, root)
      : options.assets.map((raw) => requireCatalogAsset(catalog, parseAssetRef(raw)));

    if (assets.length === 0) {
      console.log("operations: (none)");
      return;
    }

    if (!options.yes) {
      for (const asset of assets) {
        console.log(`- ${assetKey(asset.category, asset.name)}: ${status(asset, root)}`);
      }
      const proceed = await confirm({
        message: `Replace ${assets.length} installed asset(s) in ${root.displayName}?`,
        default: false,
      });
      if (!proceed) {
        console.log("aborted: true");
        return;
      }
    }

    printResults(runBulk(assets.map((asset): PlannedOperation => ({ kind: "update", asset, root }))));
  } catch (err) {
    console.error("error:", errorMessage(err));
    process.exit(1);
  }
}
