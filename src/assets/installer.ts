/**
 * Install, update and uninstall one asset in one installation root.
 *
 * Every write is staged inside the root and moved into place with rename, so
 * the target only ever sees the old or the new entry. Content lands before the
 * settings document on install; on uninstall the settings document is
 * rewritten first. A hook's JSON sidecar is installed and removed with its
 * script, so the installed version can be read back. The live entry is re-read
 * right before writing and compared with the caller's index: a mismatch is
 * reported as `concurrent-modification` rather than overwritten. There is no cross-process lock; the re-check only
 * narrows the window.
 */

import * as fs from "node:fs";
import * as path from "node:path";

import {
  DEFAULT_SETTINGS_BACKUP_SUFFIX,
  DEFAULT_SETTINGS_FILENAME,
  DEFAULT_STAGING_PREFIX,
} from "../shared/defaults.js";
import { errorMessage, logEvent } from "../shared/log.js";
import { copyEntry, ensureDirectory, makeExecutable, newRunId, removeEntry, writeTextFileAtomic } from "./assets-fs.js";
import { OperationFailure, classifyFsError } from "./errors.js";
import {
  detectIndent,
  hasHookRegistration,
  hookCommandFor,
  hookRegistrationFor,
  mergeHookRegistration,
  parseSettings,
  readSettingsText,
  removeHookRegistration,
  serializeSettings,
  type SettingsDocument,
} from "./hook-settings.js";
import { hookSidecarPath } from "./hook-metadata.js";
import { readInstalledEntry } from "./installed-index.js";
import { installTargetPath, layoutFor } from "./layouts.js";
import { statusOfEntry } from "./status.js";
import {
  InstallStatus,
  assetKey,
  type Asset,
  type AssetCategory,
  type InstallOptions,
  type InstallationRoot,
  type InstalledEntry,
  type OperationFailureKind,
  type OperationKind,
  type OperationOutcome,
  type OperationResult,
} from "./types.js";

interface OperationContext {
  operation: OperationKind;
  key: string;
  root: InstallationRoot;
}

interface SettingsCommit {
  settingsPath: string;
  tmpPath: string;
  originalText: string | null;
}

const FAILURE_LABELS: Record<OperationFailureKind, string> = {
  "permission-denied": "permission denied",
  "disk-full": "disk full",
  "concurrent-modification": "changed concurrently",
  "settings-corrupt": "settings document is corrupt",
  "io-error": "filesystem error",
};

function done(ctx: OperationContext, outcome: OperationOutcome, message: string): OperationResult {
  return { operation: ctx.operation, assetKey: ctx.key, rootPath: ctx.root.path, outcome, message };
}

function failed(ctx: OperationContext, err: unknown): OperationResult {
  const kind = classifyFsError(err);
  const reason = err instanceof OperationFailure ? err.message : `${FAILURE_LABELS[kind]} (${errorMessage(err)})`;
  const message = `Could not ${ctx.operation} ${ctx.key} in ${ctx.root.path}: ${reason}`;

  logEvent("warn", "asset-operation-failed", {
    operation: ctx.operation,
    asset: ctx.key,
    root: ctx.root.path,
    failure: kind,
    error: errorMessage(err),
  });

  return { ...done(ctx, "failed", message), failure: kind };
}

function recordEntry(root: InstallationRoot, key: string, entry: InstalledEntry | undefined): void {
  if (entry) {
    root.installedIndex.set(key, entry);
  } else {
    root.installedIndex.delete(key);
  }
}

function describeEntry(entry: InstalledEntry | undefined): string {
  return entry ? `installed at ${entry.location}` : "not installed";
}

function sameEntry(a: InstalledEntry | undefined, b: InstalledEntry | undefined): boolean {
  if (!a || !b) return a === b;
  return a.fingerprint === b.fingerprint && path.resolve(a.location) === path.resolve(b.location);
}

function assertUnchanged(ctx: OperationContext, live: InstalledEntry | undefined): void {
  const expected = ctx.root.installedIndex.get(ctx.key);
  if (sameEntry(expected, live)) return;
  throw new OperationFailure(
    "concurrent-modification",
    `${ctx.key} changed since it was last inspected (expected ${describeEntry(expected)}, found ${describeEntry(live)}); re-run discovery and retry`
  );
}

function settingsPathOf(rootPath: string): string {
  return path.join(rootPath, DEFAULT_SETTINGS_FILENAME);
}

/**
 * Writes the transformed settings document to a temporary file beside the
 * real one. Returns null when the transform changes nothing.
 */
function stageSettings(
  rootPath: string,
  runId: string,
  transform: (settings: SettingsDocument) => SettingsDocument
): SettingsCommit | null {
  const settingsPath = settingsPathOf(rootPath);
  const originalText = readSettingsText(settingsPath);
  const parsed = parseSettings(originalText);
  if (!parsed.ok) {
    throw new OperationFailure(
      "settings-corrupt",
      `cannot merge into ${settingsPath} (${parsed.error}); the file was left unchanged`
    );
  }

  const next = transform(parsed.settings);
  if (next === parsed.settings) return null;

  const tmpPath = `${settingsPath}.tmp-${runId}`;
  fs.writeFileSync(tmpPath, serializeSettings(next, detectIndent(originalText)), "utf8");
  return { settingsPath, tmpPath, originalText };
}

function commitSettings(commit: SettingsCommit): void {
  if (commit.originalText !== null) {
    fs.copyFileSync(commit.settingsPath, `${commit.settingsPath}${DEFAULT_SETTINGS_BACKUP_SUFFIX}`);
  }
  fs.renameSync(commit.tmpPath, commit.settingsPath);
}

function discardSettings(commit: SettingsCommit | null): void {
  if (commit && fs.existsSync(commit.tmpPath)) {
    fs.rmSync(commit.tmpPath, { force: true });
  }
}

function stagingDirFor(rootPath: string, runId: string): string {
  return path.join(rootPath, `${DEFAULT_STAGING_PREFIX}${runId}`);
}

function rollbackStep(step: string, ctx: { root: string; target: string }, run: () => void): boolean {
  try {
    run();
    return true;
  } catch (err) {
    logEvent("error", "asset-rollback-failed", { step, root: ctx.root, target: ctx.target, error: errorMessage(err) });
    return false;
  }
}

/**
 * Removes the staging directory once the operation has taken effect. A
 * leftover directory is logged; the operation's outcome stands.
 */
function cleanupStaging(rootPath: string, stagingDir: string): void {
  try {
    removeEntry(stagingDir);
  } catch (err) {
    logEvent("warn", "asset-staging-cleanup-failed", { root: rootPath, staging: stagingDir, error: errorMessage(err) });
  }
}

/** Existing metadata sidecars next to any of `scriptPaths`, without duplicates. */
function existingSidecars(scriptPaths: string[]): string[] {
  const found = new Set<string>();
  for (const scriptPath of scriptPaths) {
    const sidecar = path.resolve(hookSidecarPath(scriptPath));
    if (fs.existsSync(sidecar)) found.add(sidecar);
  }
  return [...found];
}

/**
 * Re-adds a hook's settings registration when its content is already in place.
 * Returns true if the settings document was rewritten.
 */
function ensureHookRegistered(asset: Asset, root: InstallationRoot, live: InstalledEntry): boolean {
  const registration = hookRegistrationFor(asset, live.location);
  const commit = stageSettings(root.path, newRunId(), (settings) =>
    hasHookRegistration(settings, registration) ? settings : mergeHookRegistration(settings, registration)
  );
  if (!commit) return false;
  try {
    commitSettings(commit);
  } finally {
    discardSettings(commit);
  }
  return true;
}

/**
 * Stages `asset`, then swaps it in at `targetPath`, moving `previous` aside
 * first. A hook's JSON sidecar travels with the script. On failure everything
 * moved is put back.
 */
function writeAsset(params: {
  asset: Asset;
  root: InstallationRoot;
  targetPath: string;
  previous?: InstalledEntry;
}): void {
  const { asset, root, targetPath, previous } = params;
  const runId = newRunId();
  const stagingDir = stagingDirFor(root.path, runId);
  const stagedContent = path.join(stagingDir, "content");
  const stagedSidecar = path.join(stagingDir, "content.json");
  const asidePath = path.join(stagingDir, "previous");
  const targetSidecar = hookSidecarPath(targetPath);

  let settingsCommit: SettingsCommit | null = null;
  let hasSidecar = false;
  let movedAside = false;
  const sidecarsAside: { from: string; to: string }[] = [];
  let placed = false;
  let sidecarPlaced = false;
  let keepStaging = false;

  try {
    ensureDirectory(stagingDir);
    copyEntry(asset.sourcePath, stagedContent);

    if (asset.category === "hook") {
      makeExecutable(stagedContent);
      const sourceSidecar = hookSidecarPath(asset.sourcePath);
      if (fs.existsSync(sourceSidecar)) {
        fs.copyFileSync(sourceSidecar, stagedSidecar);
        hasSidecar = true;
      }
      const registration = hookRegistrationFor(asset, targetPath);
      const replaced =
        previous && path.resolve(previous.location) !== path.resolve(targetPath)
          ? [hookCommandFor(previous.location)]
          : [];
      settingsCommit = stageSettings(root.path, runId, (settings) =>
        mergeHookRegistration(settings, registration, replaced)
      );
    }

    const replacesTarget = previous !== undefined && path.resolve(previous.location) === path.resolve(targetPath);
    if (!replacesTarget && fs.existsSync(targetPath)) {
      throw new OperationFailure(
        "io-error",
        `${targetPath} already exists but is not a recognized ${layoutFor(asset.category).label.toLowerCase()}`
      );
    }

    if (previous) {
      fs.renameSync(previous.location, asidePath);
      movedAside = true;
    }
    if (asset.category === "hook") {
      const scripts = previous ? [previous.location, targetPath] : hasSidecar ? [targetPath] : [];
      for (const [index, sidecar] of existingSidecars(scripts).entries()) {
        const aside = path.join(stagingDir, `previous-${index}.json`);
        fs.renameSync(sidecar, aside);
        sidecarsAside.push({ from: sidecar, to: aside });
      }
    }

    ensureDirectory(path.dirname(targetPath));
    fs.renameSync(stagedContent, targetPath);
    placed = true;
    if (hasSidecar) {
      fs.renameSync(stagedSidecar, targetSidecar);
      sidecarPlaced = true;
    }

    if (settingsCommit) {
      commitSettings(settingsCommit);
    }
  } catch (err) {
    const ctx = { root: root.path, target: targetPath };
    if (sidecarPlaced) {
      rollbackStep("remove-new-sidecar", ctx, () => removeEntry(targetSidecar));
    }
    if (placed) {
      rollbackStep("remove-new-content", ctx, () => removeEntry(targetPath));
    }
    if (movedAside && previous) {
      const restored = rollbackStep("restore-previous-content", ctx, () => fs.renameSync(asidePath, previous.location));
      // The previous content only survives in staging now; leave it for the user.
      if (!restored) keepStaging = true;
    }
    for (const { from, to } of sidecarsAside) {
      if (!rollbackStep("restore-previous-sidecar", ctx, () => fs.renameSync(to, from))) keepStaging = true;
    }
    throw err;
  } finally {
    discardSettings(settingsCommit);
    if (!keepStaging) {
      cleanupStaging(root.path, stagingDir);
    }
  }
}

function assetLabel(category: AssetCategory, name: string): string {
  return `${layoutFor(category).label.toLowerCase()} ${name}`;
}

/**
 * Installs `asset` into `root`. Installing over identical content is a no-op
 * success; installing over different content is skipped (use `update`).
 */
export function install(asset: Asset, root: InstallationRoot, options: InstallOptions = {}): OperationResult {
  const key = assetKey(asset.category, asset.name);
  const ctx: OperationContext = { operation: "install", key, root };

  try {
    const live = readInstalledEntry(root.path, asset.category, asset.name);
    if (live && live.fingerprint === asset.contentFingerprint) {
      const restored = asset.category === "hook" && ensureHookRegistered(asset, root, live);
      recordEntry(root, key, live);
      return done(
        ctx,
        "success",
        restored
          ? `${assetLabel(asset.category, asset.name)} is already up to date in ${root.path}; restored its settings registration`
          : `${assetLabel(asset.category, asset.name)} is already up to date in ${root.path}`
      );
    }

    assertUnchanged(ctx, live);

    const current = statusOfEntry(asset, live);
    if (live && current !== InstallStatus.NOT_INSTALLED) {
      return done(
        ctx,
        "skipped",
        `${assetLabel(asset.category, asset.name)} is already installed at ${live.location} (${current}); use update to replace it`
      );
    }

    const targetPath = installTargetPath(root.path, asset, { active: options.activate ?? true });
    writeAsset({ asset, root, targetPath });
    recordEntry(root, key, readInstalledEntry(root.path, asset.category, asset.name));

    logEvent("info", "asset-installed", { asset: key, root: root.path, target: targetPath });
    return done(ctx, "success", `Installed ${assetLabel(asset.category, asset.name)} into ${targetPath}`);
  } catch (err) {
    return failed(ctx, err);
  }
}

/**
 * Replaces an installed copy of `asset` with the catalog version, keeping its
 * active/inactive placement. Reported as one operation.
 */
export function update(asset: Asset, root: InstallationRoot): OperationResult {
  const key = assetKey(asset.category, asset.name);
  const ctx: OperationContext = { operation: "update", key, root };

  try {
    const live = readInstalledEntry(root.path, asset.category, asset.name);
    if (!live) {
      recordEntry(root, key, undefined);
      return done(ctx, "skipped", `${assetLabel(asset.category, asset.name)} is not installed in ${root.path}; use install`);
    }

    if (live.fingerprint === asset.contentFingerprint) {
      const restored = asset.category === "hook" && ensureHookRegistered(asset, root, live);
      recordEntry(root, key, live);
      return done(
        ctx,
        "success",
        restored
          ? `${assetLabel(asset.category, asset.name)} is already up to date in ${root.path}; restored its settings registration`
          : `${assetLabel(asset.category, asset.name)} is already up to date in ${root.path}`
      );
    }

    assertUnchanged(ctx, live);

    const before = statusOfEntry(asset, live);
    const targetPath = installTargetPath(root.path, asset, { active: live.active });
    writeAsset({ asset, root, targetPath, previous: live });
    recordEntry(root, key, readInstalledEntry(root.path, asset.category, asset.name));

    logEvent("info", "asset-updated", { asset: key, root: root.path, target: targetPath, "previous-status": before });
    return done(ctx, "success", `Updated ${assetLabel(asset.category, asset.name)} at ${targetPath} (was ${before})`);
  } catch (err) {
    return failed(ctx, err);
  }
}

function pruneEmptyNamespaceDir(category: AssetCategory, rootPath: string, removedPath: string): void {
  const layout = layoutFor(category);
  if (!layout.namespaced) return;
  const parent = path.dirname(removedPath);
  if (path.resolve(parent) === path.resolve(rootPath, layout.dirName)) return;
  if (fs.readdirSync(parent).length === 0) {
    fs.rmdirSync(parent);
  }
}

/**
 * Removes an installed asset. For hooks the settings registration is dropped
 * first, leaving every other entry of the settings document as it was.
 */
export function uninstall(category: AssetCategory, name: string, root: InstallationRoot): OperationResult {
  const key = assetKey(category, name);
  const ctx: OperationContext = { operation: "uninstall", key, root };

  try {
    const live = readInstalledEntry(root.path, category, name);
    if (!live) {
      recordEntry(root, key, undefined);
      return done(ctx, "skipped", `${assetLabel(category, name)} is not installed in ${root.path}`);
    }

    assertUnchanged(ctx, live);

    const runId = newRunId();
    const stagingDir = stagingDirFor(root.path, runId);
    const asidePath = path.join(stagingDir, "removed");
    let settingsCommit: SettingsCommit | null = null;
    let settingsCommitted = false;
    const sidecarsAside: { from: string; to: string }[] = [];

    try {
      ensureDirectory(stagingDir);
      if (category === "hook") {
        const command = hookCommandFor(live.location);
        settingsCommit = stageSettings(root.path, runId, (settings) => removeHookRegistration(settings, command).settings);
        if (settingsCommit) {
          commitSettings(settingsCommit);
          settingsCommitted = true;
        }
        for (const [index, sidecar] of existingSidecars([live.location]).entries()) {
          const aside = path.join(stagingDir, `removed-${index}.json`);
          fs.renameSync(sidecar, aside);
          sidecarsAside.push({ from: sidecar, to: aside });
        }
      }
      fs.renameSync(live.location, asidePath);
    } catch (err) {
      const rollbackCtx = { root: root.path, target: live.location };
      for (const { from, to } of sidecarsAside) {
        rollbackStep("restore-sidecar", rollbackCtx, () => fs.renameSync(to, from));
      }
      const commit = settingsCommit;
      if (settingsCommitted && commit && commit.originalText !== null) {
        const originalText = commit.originalText;
        rollbackStep("restore-settings", { root: root.path, target: commit.settingsPath }, () =>
          writeTextFileAtomic(commit.settingsPath, originalText, runId)
        );
      }
      throw err;
    } finally {
      discardSettings(settingsCommit);
      cleanupStaging(root.path, stagingDir);
    }

    pruneEmptyNamespaceDir(category, root.path, live.location);
    recordEntry(root, key, undefined);

    logEvent("info", "asset-uninstalled", { asset: key, root: root.path, location: live.location });
    return done(ctx, "success", `Uninstalled ${assetLabel(category, name)} from ${live.location}`);
  } catch (err) {
    return failed(ctx, err);
  }
}
