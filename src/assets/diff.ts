import * as fs from "node:fs";
import * as path from "node:path";
import { createTwoFilesPatch } from "diff";

import { DEFAULT_DIFF_CONTEXT_LINES } from "../shared/defaults.js";
import { fsErrorCode } from "./errors.js";
import { isBinaryBuffer, isDirectory, listFilesRecursive } from "./assets-fs.js";
import type { Asset } from "./types.js";

export type AssetDiff =
  | { kind: "unified"; text: string }
  | { kind: "binary-unavailable"; path: string };

function readIfExists(filePath: string): Buffer | null {
  try {
    return fs.readFileSync(filePath);
  } catch (err) {
    const code = fsErrorCode(err);
    if (code === "ENOENT" || code === "EISDIR") return null;
    throw err;
  }
}

function patch(label: string, installed: string, source: string): string {
  return createTwoFilesPatch(
    `installed/${label}`,
    `source/${label}`,
    installed,
    source,
    undefined,
    undefined,
    { context: DEFAULT_DIFF_CONTEXT_LINES }
  );
}

function diffDirectory(asset: Asset, installedDir: string): string {
  const installedFiles = isDirectory(installedDir) ? listFilesRecursive(installedDir) : [];
  const sourceFiles = listFilesRecursive(asset.sourcePath);
  const relPaths = [...new Set([...installedFiles, ...sourceFiles])].sort();

  const sections: string[] = [];
  for (const rel of relPaths) {
    const installed = readIfExists(path.join(installedDir, ...rel.split("/")));
    const source = readIfExists(path.join(asset.sourcePath, ...rel.split("/")));
    if (installed && source && installed.equals(source)) continue;

    const label = `${asset.name}/${rel}`;
    if ((installed && isBinaryBuffer(installed)) || (source && isBinaryBuffer(source))) {
      sections.push(`Binary files installed/${label} and source/${label} differ\n`);
      continue;
    }
    sections.push(patch(label, installed?.toString("utf8") ?? "", source?.toString("utf8") ?? ""));
  }
  return sections.join("");
}

/**
 * Unified diff from the installed copy to the asset's source, three lines of
 * context. Directory assets get one section per differing file. Identical
 * content yields empty text.
 */
export function diff(asset: Asset, installedLocation: string): AssetDiff {
  if (isDirectory(asset.sourcePath)) {
    return { kind: "unified", text: diffDirectory(asset, installedLocation) };
  }

  const installed = readIfExists(installedLocation) ?? Buffer.alloc(0);
  const source = readIfExists(asset.sourcePath) ?? Buffer.alloc(0);
  if (installed.equals(source)) {
    return { kind: "unified", text: "" };
  }
  if (isBinaryBuffer(installed) || isBinaryBuffer(source)) {
    return { kind: "binary-unavailable", path: installedLocation };
  }

  return { kind: "unified", text: patch(asset.name, installed.toString("utf8"), source.toString("utf8")) };
}
