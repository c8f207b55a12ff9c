import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { DEFAULT_ROOT_MARKER_DIRNAME, getDefaultGlobalDir } from "../shared/defaults.js";
import { errorMessage, logEvent } from "../shared/log.js";
import { isDirectory } from "./assets-fs.js";
import { readInstalledIndex } from "./installed-index.js";
import type { DiscoveryWarning, InstallationRoot, InstalledEntry, RootScope } from "./types.js";
import { assetKey } from "./types.js";

export interface DiscoverOptions {
  /** The global installation root; defaults to `~/.claude`. */
  globalDir?: string;
  /** Directory name that marks an installation root at each level. */
  marker?: string;
}

function formatDisplayName(rootPath: string, scope: RootScope, startDir: string): string {
  if (scope === "global") {
    const home = os.homedir();
    const rel = path.relative(home, rootPath);
    if (rel && !rel.startsWith("..") && !path.isAbsolute(rel)) {
      return `~/${rel.split(path.sep).join("/")} (global)`;
    }
    return `${rootPath} (global)`;
  }

  const rel = path.relative(startDir, rootPath);
  if (path.isAbsolute(rel)) return `${rootPath} (${scope})`;
  const shown = rel.startsWith("..") ? rel : `./${rel}`;
  return `${shown.split(path.sep).join("/")} (${scope})`;
}

function loadRoot(rootPath: string, scope: RootScope, displayName: string): InstallationRoot {
  const warnings: DiscoveryWarning[] = [];
  let installedIndex = new Map<string, InstalledEntry>();
  const exists = isDirectory(rootPath);

  if (exists) {
    let readable = true;
    try {
      fs.readdirSync(rootPath);
    } catch (err) {
      readable = false;
      warnings.push({ path: rootPath, message: `Cannot read installation root ${rootPath}: ${errorMessage(err)}` });
    }

    if (readable) {
      const loaded = readInstalledIndex(rootPath);
      installedIndex = loaded.index;
      warnings.push(...loaded.warnings);
    }
  }

  for (const warning of warnings) {
    logEvent("warn", "root-discovery-warning", { root: rootPath, scope, message: warning.message });
  }

  return { path: rootPath, scope, exists, displayName, installedIndex, warnings };
}

/**
 * Finds every installation root visible from `startDir`, nearest first: the
 * closest marker directory is `project`, the ones above it `ancestor`, and the
 * global root is always last, whether or not it exists yet.
 */
export function discoverRoots(startDir: string, options: DiscoverOptions = {}): InstallationRoot[] {
  const marker = options.marker ?? DEFAULT_ROOT_MARKER_DIRNAME;
  const globalDir = path.resolve(options.globalDir ?? getDefaultGlobalDir());
  const start = path.resolve(startDir);

  const roots: InstallationRoot[] = [];
  const seen = new Set<string>();
  let current = start;

  while (true) {
    const candidate = path.join(current, marker);
    if (candidate !== globalDir && !seen.has(candidate) && isDirectory(candidate)) {
      seen.add(candidate);
      const scope: RootScope = roots.length === 0 ? "project" : "ancestor";
      roots.push(loadRoot(candidate, scope, formatDisplayName(candidate, scope, start)));
    }

    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }

  roots.push(loadRoot(globalDir, "global", formatDisplayName(globalDir, "global", start)));

  logEvent("debug", "roots-discovered", { start, count: roots.length });
  return roots;
}

/**
 * Re-reads a root from disk, returning a new value.
 */
export function refreshRoot(root: InstallationRoot): InstallationRoot {
  return loadRoot(root.path, root.scope, root.displayName);
}

/**
 * Builds a root value without touching the filesystem.
 */
export function createInstallationRoot(params: {
  path: string;
  scope: RootScope;
  entries?: InstalledEntry[];
  displayName?: string;
}): InstallationRoot {
  const installedIndex = new Map<string, InstalledEntry>();
  for (const entry of params.entries ?? []) {
    installedIndex.set(assetKey(entry.category, entry.name), entry);
  }
  return {
    path: path.resolve(params.path),
    scope: params.scope,
    exists: true,
    displayName: params.displayName ?? `${params.path} (${params.scope})`,
    installedIndex,
    warnings: [],
  };
}
