export const ASSET_NAME_REGEX = /^[A-Za-z0-9_][A-Za-z0-9._-]*(?::[A-Za-z0-9_][A-Za-z0-9._-]*)?$/;

export function isValidAssetName(name: string): boolean {
  return ASSET_NAME_REGEX.test(name);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
