import * as fs from "fs";
import * as path from "path";
import { createHash } from "node:crypto";
import { BINARY_SNIFF_BYTES } from "../shared/defaults.js";

function ensureDir(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

function sortedDirectoryEntries(dirPath: string): fs.Dirent[] {
  return fs
    .readdirSync(dirPath, { withFileTypes: true })
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

function hashFile(filePath: string): string {
  const hash = createHash("sha256");
  hash.update("file\n");

  const fd = fs.openSync(filePath, "r");
  const buffer = Buffer.allocUnsafe(64 * 1024);
  try {
    while (true) {
      const read = fs.readSync(fd, buffer, 0, buffer.length, null);
      if (read <= 0) break;
      hash.update(buffer.subarray(0, read));
    }
  } finally {
    fs.closeSync(fd);
  }

  return hash.digest("hex");
}

function hashSymlink(linkPath: string): string {
  const hash = createHash("sha256");
  hash.update("symlink\n");
  hash.update(fs.readlinkSync(linkPath), "utf8");
  return hash.digest("hex");
}

function hashDirectory(dirPath: string): string {
  const hash = createHash("sha256");
  hash.update("dir\n");
  for (const entry of sortedDirectoryEntries(dirPath)) {
    const fullPath = path.join(dirPath, entry.name);
    hash.update(entry.name, "utf8");
    hash.update("\n");

    const stat = fs.lstatSync(fullPath);
    if (stat.isDirectory()) {
      hash.update(hashDirectory(fullPath), "utf8");
      continue;
    }
    if (stat.isSymbolicLink()) {
      hash.update(hashSymlink(fullPath), "utf8");
      continue;
    }
    if (stat.isFile()) {
      hash.update(hashFile(fullPath), "utf8");
      continue;
    }

    hash.update(hashSpecialEntry(stat), "utf8");
  }
  return hash.digest("hex");
}

// Special files are fingerprinted by type and size only, so the same layout
// hashes identically in the source tree and in an installation root.
function hashSpecialEntry(stat: fs.Stats): string {
  const hash = createHash("sha256");
  hash.update("special\n");
  hash.update(String(stat.mode & fs.constants.S_IFMT), "utf8");
  hash.update("\n");
  hash.update(String(stat.size), "utf8");
  return hash.digest("hex");
}

/**
 * Content fingerprint of a file or directory tree. File modes and the entry's
 * own name are not part of the hash; names of nested entries are.
 */
export function hashEntry(entryPath: string): string {
  const stat = fs.lstatSync(entryPath);
  if (stat.isDirectory()) {
    return hashDirectory(entryPath);
  }
  if (stat.isSymbolicLink()) {
    return hashSymlink(entryPath);
  }
  if (!stat.isFile()) {
    return hashSpecialEntry(stat);
  }
  return hashFile(entryPath);
}

/**
 * Relative paths (forward slashes) of every file below `dirPath`, sorted.
 */
export function listFilesRecursive(dirPath: string): string[] {
  if (!fs.existsSync(dirPath)) {
    return [];
  }

  const files: string[] = [];
  const walk = (current: string, prefix: string) => {
    for (const entry of sortedDirectoryEntries(current)) {
      const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        walk(path.join(current, entry.name), rel);
      } else {
        files.push(rel);
      }
    }
  };
  walk(dirPath, "");
  return files.sort();
}

export function isDirectory(entryPath: string): boolean {
  try {
    return fs.statSync(entryPath).isDirectory();
  } catch {
    return false;
  }
}

export function removeEntry(entryPath: string): void {
  if (!fs.existsSync(entryPath)) {
    return;
  }
  fs.rmSync(entryPath, { recursive: true, force: true });
}

export function copyEntry(srcPath: string, destPath: string): void {
  ensureDir(path.dirname(destPath));
  fs.cpSync(srcPath, destPath, { recursive: true, force: true });
}

export function makeExecutable(filePath: string): void {
  const mode = fs.statSync(filePath).mode;
  fs.chmodSync(filePath, mode | 0o111);
}

export function newRunId(): string {
  return `${process.pid}-${Date.now()}-${Math.random().toString(16).slice(2)}`;
}

export function writeTextFileAtomic(filePath: string, text: string, runId: string = newRunId()): void {
  ensureDir(path.dirname(filePath));

  const tmpPath = `${filePath}.tmp-${runId}`;
  try {
    fs.writeFileSync(tmpPath, text, "utf8");
    fs.renameSync(tmpPath, filePath);
  } finally {
    if (fs.existsSync(tmpPath)) {
      fs.rmSync(tmpPath, { force: true });
    }
  }
}

export function isBinaryBuffer(buffer: Buffer): boolean {
  const limit = Math.min(buffer.length, BINARY_SNIFF_BYTES);
  for (let i = 0; i < limit; i++) {
    if (buffer[i] === 0) return true;
  }
  return false;
}

export function ensureDirectory(dirPath: string): void {
  ensureDir(dirPath);
}
