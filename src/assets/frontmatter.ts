import { parse as parseYaml, YAMLError } from "yaml";
import { isPlainObject } from "../shared/validation.js";
import type { ParsePosition } from "./errors.js";

export interface FrontMatterSplit {
  /** Raw YAML between the delimiters; null when the document has no front matter. */
  yaml: string | null;
  body: string;
  /** 1-based line number of the first YAML line in the original text. */
  yamlStartLine: number;
}

export type YamlMappingResult =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; detail: string; position?: ParsePosition };

/**
 * Splits a Markdown document into its `---` delimited YAML front matter and body.
 */
export function splitFrontMatter(text: string): FrontMatterSplit {
  const normalized = text.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n");
  const lines = normalized.split("\n");

  if (lines[0]?.trim() !== "---") {
    return { yaml: null, body: normalized, yamlStartLine: 0 };
  }

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i]?.trim();
    if (line === "---" || line === "...") {
      return {
        yaml: lines.slice(1, i).join("\n"),
        body: lines.slice(i + 1).join("\n"),
        yamlStartLine: 2,
      };
    }
  }

  // An opening delimiter without a closing one is treated as plain Markdown.
  return { yaml: null, body: normalized, yamlStartLine: 0 };
}

/**
 * Parses YAML that must be a mapping (or empty). Positions are shifted by
 * `lineOffset` so they point into the containing file.
 */
export function parseYamlMapping(source: string, lineOffset = 0): YamlMappingResult {
  let parsed: unknown;
  try {
    parsed = parseYaml(source);
  } catch (err) {
    if (err instanceof YAMLError) {
      const pos = err.linePos?.[0];
      const detail = err.message.split("\n")[0] ?? err.message;
      return {
        ok: false,
        detail,
        position: pos ? { line: pos.line + lineOffset, column: pos.col } : undefined,
      };
    }
    return { ok: false, detail: err instanceof Error ? err.message : String(err) };
  }

  if (parsed === null || parsed === undefined) {
    return { ok: true, value: {} };
  }
  if (!isPlainObject(parsed)) {
    return { ok: false, detail: "expected a YAML mapping at the top level" };
  }
  return { ok: true, value: parsed };
}

/**
 * Parses a JSON object, converting V8's "at position N" into line/column.
 */
export function parseJsonObject(source: string): YamlMappingResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(source);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return { ok: false, detail, position: jsonErrorPosition(source, detail) };
  }

  if (!isPlainObject(parsed)) {
    return { ok: false, detail: "expected a JSON object at the top level" };
  }
  return { ok: true, value: parsed };
}

function jsonErrorPosition(source: string, message: string): ParsePosition | undefined {
  const lineCol = /line (\d+) column (\d+)/.exec(message);
  if (lineCol) {
    return { line: Number(lineCol[1]), column: Number(lineCol[2]) };
  }

  const offset = /at position (\d+)/.exec(message);
  if (!offset) return undefined;

  const index = Math.min(Number(offset[1]), source.length);
  const before = source.slice(0, index).split("\n");
  const lastLine = before[before.length - 1] ?? "";
  return { line: before.length, column: lastLine.length + 1 };
}

/**
 * First non-empty line of a Markdown body that is not a heading or delimiter.
 */
export function firstBodyLine(body: string): string {
  for (const line of body.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#") || trimmed.startsWith("---")) continue;
    return trimmed;
  }
  return "";
}
