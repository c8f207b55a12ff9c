export const ASSET_CATEGORIES = ["hook", "command", "agent", "skill", "mode", "workflow"] as const;

export type AssetCategory = (typeof ASSET_CATEGORIES)[number];

export function isAssetCategory(value: string): value is AssetCategory {
  return (ASSET_CATEGORIES as readonly string[]).includes(value);
}

export interface AssetRef {
  category: AssetCategory;
  name: string;
}

export interface Asset {
  readonly name: string;
  readonly category: AssetCategory;
  readonly sourcePath: string;
  readonly version?: string;
  readonly dependencies: readonly AssetRef[];
  readonly description: string;
  /** Every declared metadata field, including ones this engine does not use. */
  readonly metadata: Readonly<Record<string, unknown>>;
  /** Set for commands living under `commands/<namespace>/`. */
  readonly namespace?: string;
  /** Hashed on first access, then cached. */
  readonly contentFingerprint: string;
}

export type RootScope = "project" | "ancestor" | "global";

export interface InstalledEntry {
  category: AssetCategory;
  name: string;
  location: string;
  fingerprint: string;
  version?: string;
  /** False for agents and modes parked under `inactive/`. */
  active: boolean;
}

export interface DiscoveryWarning {
  path: string;
  message: string;
}

export interface InstallationRoot {
  path: string;
  scope: RootScope;
  exists: boolean;
  displayName: string;
  installedIndex: Map<string, InstalledEntry>;
  warnings: DiscoveryWarning[];
}

export const InstallStatus = {
  NOT_INSTALLED: "not-installed",
  INSTALLED_SAME: "installed-same",
  INSTALLED_DIFFERENT: "installed-different",
  INSTALLED_NEWER: "installed-newer",
  INSTALLED_OLDER: "installed-older",
} as const;

export type InstallStatus = (typeof InstallStatus)[keyof typeof InstallStatus];

export type OperationKind = "install" | "uninstall" | "update";

export type OperationOutcome = "success" | "failed" | "skipped";

export type OperationFailureKind =
  | "permission-denied"
  | "disk-full"
  | "concurrent-modification"
  | "settings-corrupt"
  | "io-error";

export interface OperationResult {
  operation: OperationKind;
  assetKey: string;
  rootPath: string;
  outcome: OperationOutcome;
  message: string;
  failure?: OperationFailureKind;
}

export interface InstallOptions {
  /** Agents and modes only: install under `inactive/` when false. */
  activate?: boolean;
}

export type PlannedOperation =
  | { kind: "install"; asset: Asset; root: InstallationRoot; activate?: boolean }
  | { kind: "update"; asset: Asset; root: InstallationRoot }
  | { kind: "uninstall"; category: AssetCategory; name: string; root: InstallationRoot };

export function assetKey(category: AssetCategory, name: string): string {
  return `${category}/${name}`;
}
