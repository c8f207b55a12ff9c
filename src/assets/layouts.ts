import * as fs from "node:fs";
import * as path from "node:path";

import { DEFAULT_INACTIVE_DIRNAME, SKILL_MANIFEST_FILENAME } from "../shared/defaults.js";
import { ASSET_CATEGORIES, type Asset, type AssetCategory } from "./types.js";

export type MetadataFormat = "frontmatter" | "skill-directory" | "workflow-yaml" | "hook-script";

export interface CategoryLayout {
  category: AssetCategory;
  /** Directory under an installation root. */
  dirName: string;
  /** Directory under the plugin root holding the shipped assets. */
  pluginDir: string;
  entryKind: "file" | "directory";
  extensions: readonly string[];
  format: MetadataFormat;
  /** Agents and modes can be parked under `inactive/<dirName>`. */
  supportsInactive: boolean;
  /** Commands may be grouped in one level of namespace directories. */
  namespaced: boolean;
  label: string;
}

export const CATEGORY_LAYOUTS: Record<AssetCategory, CategoryLayout> = {
  hook: {
    category: "hook",
    dirName: "hooks",
    pluginDir: path.join("hooks", "examples"),
    entryKind: "file",
    extensions: [".py", ".sh", ".js"],
    format: "hook-script",
    supportsInactive: false,
    namespaced: false,
    label: "Hook",
  },
  command: {
    category: "command",
    dirName: "commands",
    pluginDir: "commands",
    entryKind: "file",
    extensions: [".md"],
    format: "frontmatter",
    supportsInactive: false,
    namespaced: true,
    label: "Command",
  },
  agent: {
    category: "agent",
    dirName: "agents",
    pluginDir: "agents",
    entryKind: "file",
    extensions: [".md"],
    format: "frontmatter",
    supportsInactive: true,
    namespaced: false,
    label: "Agent",
  },
  skill: {
    category: "skill",
    dirName: "skills",
    pluginDir: "skills",
    entryKind: "directory",
    extensions: [],
    format: "skill-directory",
    supportsInactive: false,
    namespaced: false,
    label: "Skill",
  },
  mode: {
    category: "mode",
    dirName: "modes",
    pluginDir: "modes",
    entryKind: "file",
    extensions: [".md"],
    format: "frontmatter",
    supportsInactive: true,
    namespaced: false,
    label: "Mode",
  },
  workflow: {
    category: "workflow",
    dirName: "workflows",
    pluginDir: "workflows",
    entryKind: "file",
    extensions: [".yaml", ".yml"],
    format: "workflow-yaml",
    supportsInactive: false,
    namespaced: false,
    label: "Workflow",
  },
};

const IGNORED_FILE_NAMES = new Set(["README.md", "dependencies.map"]);
const IGNORED_DIR_NAMES = new Set(["community", "__pycache__", "node_modules"]);

export interface CategoryCandidate {
  path: string;
  derivedName: string;
  namespace?: string;
}

export function layoutFor(category: AssetCategory): CategoryLayout {
  return CATEGORY_LAYOUTS[category];
}

/**
 * Maps every category to its conventional directory under a plugin root.
 */
export function getPluginCategoryRoots(pluginRoot: string): Map<AssetCategory, string> {
  return new Map(
    ASSET_CATEGORIES.map((category) => [category, path.join(pluginRoot, CATEGORY_LAYOUTS[category].pluginDir)])
  );
}

export function stripExtension(fileName: string): string {
  const ext = path.extname(fileName);
  return ext ? fileName.slice(0, -ext.length) : fileName;
}

function isCandidateFile(layout: CategoryLayout, fileName: string): boolean {
  if (fileName.startsWith(".") || IGNORED_FILE_NAMES.has(fileName)) return false;
  return layout.extensions.includes(path.extname(fileName));
}

function readSortedDir(dirPath: string): fs.Dirent[] {
  return fs
    .readdirSync(dirPath, { withFileTypes: true })
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Lists the entries of one category directory that look like assets.
 * Throws when `dirPath` exists but cannot be read; a missing directory has no entries.
 */
export function listCategoryCandidates(
  category: AssetCategory,
  dirPath: string,
  onNestedError?: (nestedPath: string, err: unknown) => void
): CategoryCandidate[] {
  if (!fs.existsSync(dirPath)) return [];

  const layout = CATEGORY_LAYOUTS[category];
  const candidates: CategoryCandidate[] = [];

  for (const entry of readSortedDir(dirPath)) {
    const entryPath = path.join(dirPath, entry.name);

    if (layout.entryKind === "directory") {
      if (!entry.isDirectory() || entry.name.startsWith(".") || IGNORED_DIR_NAMES.has(entry.name)) continue;
      if (!fs.existsSync(path.join(entryPath, SKILL_MANIFEST_FILENAME))) continue;
      candidates.push({ path: entryPath, derivedName: entry.name });
      continue;
    }

    if (entry.isDirectory()) {
      if (!layout.namespaced || entry.name.startsWith(".") || IGNORED_DIR_NAMES.has(entry.name)) continue;

      let nested: fs.Dirent[];
      try {
        nested = readSortedDir(entryPath);
      } catch (err) {
        if (!onNestedError) throw err;
        onNestedError(entryPath, err);
        continue;
      }
      for (const child of nested) {
        if (!child.isFile() || !isCandidateFile(layout, child.name)) continue;
        candidates.push({
          path: path.join(entryPath, child.name),
          derivedName: `${entry.name}:${stripExtension(child.name)}`,
          namespace: entry.name,
        });
      }
      continue;
    }

    if (!entry.isFile() || !isCandidateFile(layout, entry.name)) continue;
    candidates.push({ path: entryPath, derivedName: stripExtension(entry.name) });
  }

  return candidates;
}

export function categoryDirs(rootPath: string, category: AssetCategory): Array<{ dir: string; active: boolean }> {
  const layout = CATEGORY_LAYOUTS[category];
  const dirs = [{ dir: path.join(rootPath, layout.dirName), active: true }];
  if (layout.supportsInactive) {
    dirs.push({ dir: path.join(rootPath, DEFAULT_INACTIVE_DIRNAME, layout.dirName), active: false });
  }
  return dirs;
}

export function splitCommandName(name: string): { namespace?: string; stem: string } {
  const idx = name.indexOf(":");
  if (idx < 0) return { stem: name };
  return { namespace: name.slice(0, idx), stem: name.slice(idx + 1) };
}

/**
 * Where `asset` lands inside an installation root.
 */
export function installTargetPath(rootPath: string, asset: Asset, options: { active: boolean }): string {
  const layout = CATEGORY_LAYOUTS[asset.category];

  if (layout.entryKind === "directory") {
    return path.join(rootPath, layout.dirName, asset.name);
  }

  const ext = path.extname(asset.sourcePath) || layout.extensions[0] || "";
  const baseDir =
    layout.supportsInactive && !options.active
      ? path.join(rootPath, DEFAULT_INACTIVE_DIRNAME, layout.dirName)
      : path.join(rootPath, layout.dirName);

  if (layout.namespaced) {
    const { namespace, stem } = splitCommandName(asset.name);
    return namespace ? path.join(baseDir, namespace, `${stem}${ext}`) : path.join(baseDir, `${stem}${ext}`);
  }

  return path.join(baseDir, `${asset.name}${ext}`);
}
