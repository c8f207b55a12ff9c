import * as fs from "node:fs";
import * as path from "node:path";

import { SKILL_MANIFEST_FILENAME } from "../shared/defaults.js";
import { isValidAssetName } from "../shared/validation.js";
import { createAsset, normalizeVersion, parseDependencies, truncateDescription } from "./asset.js";
import { ExtractionError } from "./errors.js";
import { firstBodyLine, parseJsonObject, parseYamlMapping, splitFrontMatter } from "./frontmatter.js";
import { hookSidecarPath, parseHookHeader } from "./hook-metadata.js";
import { CATEGORY_LAYOUTS, stripExtension, type MetadataFormat } from "./layouts.js";
import type { Asset, AssetCategory } from "./types.js";

export type ExtractionResult = { ok: true; asset: Asset } | { ok: false; error: ExtractionError };

export interface ExtractOptions {
  /** Namespace directory for commands under `commands/<namespace>/`. */
  namespace?: string;
}

/** What a format reader hands back before the shared normalization step. */
interface RawMetadata {
  declared: Record<string, unknown>;
  derivedName: string;
  /** Description found in the content itself, used when none is declared. */
  contentDescription?: string;
}

type FormatReader = (rawPath: string, category: AssetCategory) => RawMetadata;

function readText(rawPath: string, category: AssetCategory): string {
  try {
    return fs.readFileSync(rawPath, "utf8");
  } catch (err) {
    throw new ExtractionError({
      kind: "unreadable",
      path: rawPath,
      category,
      detail: err instanceof Error ? err.message : String(err),
    });
  }
}

function readFrontMatterDocument(
  filePath: string,
  category: AssetCategory
): { declared: Record<string, unknown>; body: string } {
  const split = splitFrontMatter(readText(filePath, category));
  if (split.yaml === null) {
    return { declared: {}, body: split.body };
  }

  const parsed = parseYamlMapping(split.yaml, split.yamlStartLine - 1);
  if (!parsed.ok) {
    throw new ExtractionError({
      kind: "parse-failure",
      path: filePath,
      category,
      detail: parsed.detail,
      position: parsed.position,
    });
  }
  return { declared: parsed.value, body: split.body };
}

function purposeLine(body: string): string {
  let inPurpose = false;
  for (const line of body.split("\n")) {
    if (line.includes("**Purpose**:")) {
      return (line.split("**Purpose**:").pop() ?? "").trim();
    }
    if (line.trim().toLowerCase() === "## purpose") {
      inPurpose = true;
      continue;
    }
    if (inPurpose && line.trim()) {
      return line.trim();
    }
  }
  return "";
}

const readMarkdownAsset: FormatReader = (rawPath, category) => {
  const { declared, body } = readFrontMatterDocument(rawPath, category);
  const contentDescription = category === "mode" ? purposeLine(body) : category === "agent" ? "" : firstBodyLine(body);
  return { declared, derivedName: stripExtension(path.basename(rawPath)), contentDescription };
};

const readSkillDirectory: FormatReader = (rawPath, category) => {
  const manifestPath = path.join(rawPath, SKILL_MANIFEST_FILENAME);
  if (!fs.existsSync(manifestPath)) {
    throw new ExtractionError({
      kind: "unreadable",
      path: rawPath,
      category,
      detail: `missing ${SKILL_MANIFEST_FILENAME}`,
    });
  }
  const { declared, body } = readFrontMatterDocument(manifestPath, category);
  return { declared, derivedName: path.basename(rawPath), contentDescription: firstBodyLine(body) };
};

const readWorkflowDocument: FormatReader = (rawPath, category) => {
  const parsed = parseYamlMapping(readText(rawPath, category));
  if (!parsed.ok) {
    throw new ExtractionError({
      kind: "parse-failure",
      path: rawPath,
      category,
      detail: parsed.detail,
      position: parsed.position,
    });
  }
  return { declared: parsed.value, derivedName: stripExtension(path.basename(rawPath)) };
};

const readHookScript: FormatReader = (rawPath, category) => {
  const header = parseHookHeader(rawPath, readText(rawPath, category));
  let declared: Record<string, unknown> = { ...header.fields };

  const sidecarPath = hookSidecarPath(rawPath);
  if (fs.existsSync(sidecarPath)) {
    const parsed = parseJsonObject(readText(sidecarPath, category));
    if (!parsed.ok) {
      throw new ExtractionError({
        kind: "parse-failure",
        path: sidecarPath,
        category,
        detail: parsed.detail,
        position: parsed.position,
      });
    }
    declared = { ...declared, ...parsed.value };
  }

  return {
    declared,
    derivedName: stripExtension(path.basename(rawPath)),
    contentDescription: header.docstring ?? header.title,
  };
};

const FORMAT_READERS: Record<MetadataFormat, FormatReader> = {
  "frontmatter": readMarkdownAsset,
  "skill-directory": readSkillDirectory,
  "workflow-yaml": readWorkflowDocument,
  "hook-script": readHookScript,
};

function withNamespace(name: string, namespace: string | undefined): string {
  return namespace && !name.includes(":") ? `${namespace}:${name}` : name;
}

/**
 * Declared names win when they can key a file; a display title such as
 * "Feature Development" falls back to the path-derived name and stays in
 * `metadata.name`.
 */
function resolveName(
  raw: RawMetadata,
  rawPath: string,
  category: AssetCategory,
  namespace: string | undefined
): string {
  if ("name" in raw.declared && raw.declared.name !== undefined) {
    const declaredName = raw.declared.name;
    if (typeof declaredName !== "string" || !declaredName.trim()) {
      throw new ExtractionError({
        kind: "missing-name",
        path: rawPath,
        category,
        detail: "declared name must be a non-empty string",
      });
    }
    const candidate = withNamespace(declaredName.trim(), namespace);
    if (isValidAssetName(candidate)) {
      return candidate;
    }
  }

  const derived = raw.derivedName.trim();
  if (!derived) {
    throw new ExtractionError({ kind: "missing-name", path: rawPath, category });
  }

  const name = withNamespace(derived, namespace);
  if (!isValidAssetName(name)) {
    throw new ExtractionError({
      kind: "invalid-name",
      path: rawPath,
      category,
      detail: `"${name}" cannot be used as a file name`,
    });
  }
  return name;
}

function resolveDescription(raw: RawMetadata, category: AssetCategory, name: string): string {
  const declared = category === "agent" ? raw.declared.summary ?? raw.declared.description : raw.declared.description;
  if (typeof declared === "string" && declared.trim()) {
    return truncateDescription(declared);
  }
  if (raw.contentDescription) {
    return truncateDescription(raw.contentDescription);
  }
  return category === "command" || category === "skill" ? "" : `${CATEGORY_LAYOUTS[category].label}: ${name}`;
}

/**
 * Reads one raw asset (file, or directory for skills) into an `Asset`.
 * Never throws for asset-level problems; they come back as `ExtractionError`.
 */
export function extractAsset(rawPath: string, category: AssetCategory, options: ExtractOptions = {}): ExtractionResult {
  const absolutePath = path.resolve(rawPath);
  try {
    const reader = FORMAT_READERS[CATEGORY_LAYOUTS[category].format];
    const raw = reader(absolutePath, category);
    const name = resolveName(raw, absolutePath, category, options.namespace);

    const asset = createAsset({
      name,
      category,
      sourcePath: absolutePath,
      version: normalizeVersion(raw.declared.version),
      dependencies: parseDependencies(raw.declared.dependencies, category),
      description: resolveDescription(raw, category, name),
      metadata: raw.declared,
      namespace: options.namespace,
    });
    return { ok: true, asset };
  } catch (err) {
    if (err instanceof ExtractionError) {
      return { ok: false, error: err };
    }
    return {
      ok: false,
      error: new ExtractionError({
        kind: "unreadable",
        path: absolutePath,
        category,
        detail: err instanceof Error ? err.message : String(err),
      }),
    };
  }
}
