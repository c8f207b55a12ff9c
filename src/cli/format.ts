import {
  assetKey,
  status,
  type Asset,
  type AssetDiff,
  type InstallationRoot,
  type OperationResult,
} from "../assets/index.js";

export function formatAssetSummary(asset: Asset): string {
  const lines: string[] = [];
  lines.push(`asset: ${assetKey(asset.category, asset.name)}`);
  lines.push(`version: ${asset.version ?? "(none)"}`);
  lines.push(`description: ${asset.description || "(none)"}`);
  if (asset.dependencies.length > 0) {
    lines.push(`depends-on: ${asset.dependencies.map((dep) => assetKey(dep.category, dep.name)).join(", ")}`);
  }
  return lines.join("\n");
}

export function formatRootSummary(root: InstallationRoot): string {
  const lines: string[] = [];
  lines.push(`root: ${root.path}`);
  lines.push(`name: ${root.displayName}`);
  lines.push(`scope: ${root.scope}`);
  lines.push(`exists: ${root.exists ? "true" : "false"}`);
  lines.push(`installed: ${root.installedIndex.size}`);
  for (const warning of root.warnings) {
    lines.push(`warning: ${warning.message}`);
  }
  return lines.join("\n");
}

/**
 * One block per asset, one line per root.
 */
export function formatAssetStatus(asset: Asset, roots: readonly InstallationRoot[]): string {
  const lines: string[] = [`asset: ${assetKey(asset.category, asset.name)}`];
  for (const root of roots) {
    lines.push(`- ${root.displayName}: ${status(asset, root)}`);
  }
  return lines.join("\n");
}

export function formatOperationResult(result: OperationResult): string {
  const lines: string[] = [];
  lines.push(`operation: ${result.operation}`);
  lines.push(`asset: ${result.assetKey}`);
  lines.push(`root: ${result.rootPath}`);
  lines.push(`outcome: ${result.outcome}`);
  if (result.failure) {
    lines.push(`failure: ${result.failure}`);
  }
  lines.push(`message: ${result.message}`);
  return lines.join("\n");
}

export function formatDiff(result: AssetDiff): string {
  if (result.kind === "binary-unavailable") {
    return `binary file, no text diff: ${result.path}`;
  }
  return result.text ? result.text.trimEnd() : "(no differences)";
}
