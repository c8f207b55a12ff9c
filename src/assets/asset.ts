import { DEFAULT_DESCRIPTION_MAX_CHARS } from "../shared/defaults.js";
import { isPlainObject } from "../shared/validation.js";
import { hashEntry } from "./assets-fs.js";
import { isAssetCategory, type Asset, type AssetCategory, type AssetRef } from "./types.js";

export interface CreateAssetParams {
  name: string;
  category: AssetCategory;
  sourcePath: string;
  version?: string;
  dependencies?: readonly AssetRef[];
  description?: string;
  metadata?: Record<string, unknown>;
  namespace?: string;
  /** Known fingerprint; when omitted the source is hashed on first access. */
  fingerprint?: string;
}

export function createAsset(params: CreateAssetParams): Asset {
  let fingerprint: string | null = params.fingerprint ?? null;
  const sourcePath = params.sourcePath;

  return {
    name: params.name,
    category: params.category,
    sourcePath,
    version: params.version,
    dependencies: params.dependencies ?? [],
    description: params.description ?? "",
    metadata: params.metadata ?? {},
    namespace: params.namespace,
    get contentFingerprint(): string {
      if (fingerprint === null) {
        fingerprint = hashEntry(sourcePath);
      }
      return fingerprint;
    },
  };
}

export function truncateDescription(text: string, max: number = DEFAULT_DESCRIPTION_MAX_CHARS): string {
  const trimmed = text.trim();
  return trimmed.length > max ? `${trimmed.slice(0, max)}...` : trimmed;
}

export function normalizeVersion(raw: unknown): string | undefined {
  if (typeof raw === "string") {
    const trimmed = raw.trim();
    return trimmed ? trimmed : undefined;
  }
  if (typeof raw === "number" && Number.isFinite(raw)) {
    return String(raw);
  }
  return undefined;
}

function parseDependencyString(raw: string, owner: AssetCategory): AssetRef | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;

  for (const separator of ["/", ":"]) {
    const idx = trimmed.indexOf(separator);
    if (idx <= 0) continue;
    const head = trimmed.slice(0, idx);
    const rest = trimmed.slice(idx + 1).trim();
    if (isAssetCategory(head) && rest) {
      return { category: head, name: rest };
    }
    // Plural directory names ("skills/foo") are accepted as well.
    const singular = head.slice(0, -1);
    if (head.endsWith("s") && isAssetCategory(singular) && rest) {
      return { category: singular, name: rest };
    }
  }

  return { category: owner, name: trimmed };
}

/**
 * Reads a declared dependency list. Entries that cannot be understood are
 * dropped; the raw list stays available in the asset's metadata.
 */
export function parseDependencies(raw: unknown, owner: AssetCategory): AssetRef[] {
  const items = typeof raw === "string" ? [raw] : Array.isArray(raw) ? raw : [];
  const refs: AssetRef[] = [];

  for (const item of items) {
    if (typeof item === "string") {
      const ref = parseDependencyString(item, owner);
      if (ref) refs.push(ref);
      continue;
    }
    if (isPlainObject(item) && typeof item.name === "string" && item.name.trim()) {
      const category = typeof item.category === "string" && isAssetCategory(item.category) ? item.category : owner;
      refs.push({ category, name: item.name.trim() });
    }
  }

  return refs;
}
