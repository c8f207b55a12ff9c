import * as path from "node:path";

const HEADER_FIELD = /^([A-Za-z][A-Za-z0-9 _-]*?)\s*:\s*(.*)$/;
const PY_DOCSTRING = /^\s*(?:"""|''')([\s\S]*?)(?:"""|''')/;

export interface HookHeader {
  fields: Record<string, string>;
  /** First comment line that is not a `Key: value` pair. */
  title?: string;
  /** First line of a leading Python docstring. */
  docstring?: string;
}

function commentPrefix(ext: string): string {
  return ext === ".js" ? "//" : "#";
}

function normalizeKey(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s_]+/g, "-");
}

/**
 * Reads the leading comment block of a hook script (after any shebang).
 * `# Key: value` lines become fields with kebab-case keys.
 */
export function parseHookHeader(filePath: string, content: string): HookHeader {
  const prefix = commentPrefix(path.extname(filePath));
  const lines = content.replace(/\r\n/g, "\n").split("\n");
  const fields: Record<string, string> = {};
  let title: string | undefined;

  let index = 0;
  if (lines[0]?.startsWith("#!")) index = 1;

  for (; index < lines.length; index++) {
    const line = lines[index] ?? "";
    const trimmed = line.trim();
    if (!trimmed) {
      // A blank line ends the header once something has been read.
      if (title !== undefined || Object.keys(fields).length > 0) break;
      continue;
    }
    if (!trimmed.startsWith(prefix)) break;

    const text = trimmed.slice(prefix.length).trim();
    if (!text) continue;

    const match = HEADER_FIELD.exec(text);
    if (match && match[1] && !text.includes("://")) {
      const key = normalizeKey(match[1]);
      if (!(key in fields)) fields[key] = (match[2] ?? "").trim();
      continue;
    }
    if (title === undefined) title = text;
  }

  let docstring: string | undefined;
  if (path.extname(filePath) === ".py") {
    const rest = lines.slice(index).join("\n");
    const doc = PY_DOCSTRING.exec(rest);
    const first = doc?.[1]?.trim().split("\n")[0]?.trim();
    if (first) docstring = first;
  }

  return { fields, title, docstring };
}

export function hookSidecarPath(scriptPath: string): string {
  const ext = path.extname(scriptPath);
  return `${scriptPath.slice(0, scriptPath.length - ext.length)}.json`;
}
