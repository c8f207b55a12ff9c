import semver from "semver";

import { InstallStatus, assetKey, type Asset, type InstallationRoot, type InstalledEntry } from "./types.js";

const PARTIAL_VERSION = /^v?\d+(?:\.\d+){0,2}$/;

/**
 * Normalizes a declared version for comparison. Full semver and short numeric
 * forms ("1.2", "v2") are comparable; anything else is not.
 */
export function toComparableVersion(raw: string | undefined): string | null {
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  if (!trimmed) return null;

  const strict = semver.valid(trimmed);
  if (strict) return strict;
  if (PARTIAL_VERSION.test(trimmed)) {
    return semver.coerce(trimmed)?.version ?? null;
  }
  return null;
}

/**
 * Status of `asset` against one installed entry (or none).
 */
export function statusOfEntry(asset: Asset, entry: InstalledEntry | undefined): InstallStatus {
  if (!entry) return InstallStatus.NOT_INSTALLED;
  if (entry.fingerprint === asset.contentFingerprint) return InstallStatus.INSTALLED_SAME;

  const installed = toComparableVersion(entry.version);
  const available = toComparableVersion(asset.version);
  if (installed !== null && available !== null) {
    const order = semver.compare(installed, available);
    if (order < 0) return InstallStatus.INSTALLED_OLDER;
    if (order > 0) return InstallStatus.INSTALLED_NEWER;
  }

  return InstallStatus.INSTALLED_DIFFERENT;
}

/**
 * Reconciles one asset against one root's installed index. Pure: the answer
 * only depends on the fingerprints and versions it is given.
 */
export function status(asset: Asset, root: InstallationRoot): InstallStatus {
  return statusOfEntry(asset, root.installedIndex.get(assetKey(asset.category, asset.name)));
}
