import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import { ASSETCTL_GLOBAL_DIR_ENV, ASSETCTL_PLUGIN_ROOT_ENV } from "./env.js";
import { DEFAULT_PLUGIN_DIRNAME, getDefaultGlobalDir } from "./defaults.js";

export type ResolvedDir = { ok: true; dir: string } | { ok: false; error: string };

export function expandTilde(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/") || p.startsWith("~\\")) {
    return path.join(os.homedir(), p.slice(2));
  }
  return p;
}

function resolveDirFromEnv(envName: string, fallback: () => string | null): ResolvedDir {
  const raw = (process.env[envName] ?? "").trim();
  if (!raw) {
    const dir = fallback();
    if (!dir) return { ok: false, error: `${envName} is not set and no default is available` };
    return { ok: true, dir };
  }

  const expanded = expandTilde(raw);
  if (!path.isAbsolute(expanded)) {
    return { ok: false, error: `Invalid ${envName} (must be an absolute path or start with ~): ${raw}` };
  }

  return { ok: true, dir: expanded };
}

function findNearestPackageRoot(startDir: string): string | null {
  let current = startDir;

  while (true) {
    const packageJsonPath = path.join(current, "package.json");
    if (fs.existsSync(packageJsonPath)) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

/**
 * The plugin directory shipping the assets: `$ASSETCTL_PLUGIN_ROOT`, or
 * `plugin/` in the package this module was loaded from.
 */
export function resolvePluginRoot(): ResolvedDir {
  return resolveDirFromEnv(ASSETCTL_PLUGIN_ROOT_ENV, () => {
    const packageRoot = findNearestPackageRoot(path.dirname(fileURLToPath(import.meta.url)));
    return packageRoot ? path.join(packageRoot, DEFAULT_PLUGIN_DIRNAME) : null;
  });
}

export function resolveGlobalDir(): ResolvedDir {
  return resolveDirFromEnv(ASSETCTL_GLOBAL_DIR_ENV, getDefaultGlobalDir);
}
