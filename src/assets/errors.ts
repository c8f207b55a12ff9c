/**
 * Typed errors for the asset engine.
 */

import type { AssetCategory, OperationFailureKind } from "./types.js";

export class AssetError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = "AssetError";
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export type ExtractionErrorKind = "missing-name" | "invalid-name" | "parse-failure" | "unreadable";

export interface ParsePosition {
  line: number;
  column: number;
}

export class ExtractionError extends AssetError {
  public readonly kind: ExtractionErrorKind;
  public readonly path: string;
  public readonly category: AssetCategory;
  public readonly detail?: string;
  public readonly position?: ParsePosition;

  constructor(params: {
    kind: ExtractionErrorKind;
    path: string;
    category: AssetCategory;
    detail?: string;
    position?: ParsePosition;
  }) {
    super(formatExtractionMessage(params), "EXTRACTION_FAILED");
    this.name = "ExtractionError";
    this.kind = params.kind;
    this.path = params.path;
    this.category = params.category;
    this.detail = params.detail;
    this.position = params.position;
  }
}

function formatExtractionMessage(params: {
  kind: ExtractionErrorKind;
  path: string;
  category: AssetCategory;
  detail?: string;
  position?: ParsePosition;
}): string {
  const where = params.position
    ? `${params.path}:${params.position.line}:${params.position.column}`
    : params.path;
  switch (params.kind) {
    case "missing-name":
      return `Cannot read ${params.category} at ${where}: no usable name${params.detail ? ` (${params.detail})` : ""}`;
    case "invalid-name":
      return `Cannot read ${params.category} at ${where}: invalid name${params.detail ? ` (${params.detail})` : ""}`;
    case "parse-failure":
      return `Cannot parse ${params.category} metadata at ${where}${params.detail ? `: ${params.detail}` : ""}`;
    case "unreadable":
      return `Cannot read ${params.category} at ${where}${params.detail ? `: ${params.detail}` : ""}`;
  }
}

export type CatalogErrorKind = "duplicate-asset" | "category-root-unreadable";

export class CatalogError extends AssetError {
  public readonly kind: CatalogErrorKind;
  public readonly key?: string;
  public readonly paths: string[];

  constructor(kind: CatalogErrorKind, message: string, opts?: { key?: string; paths?: string[] }) {
    super(message, kind === "duplicate-asset" ? "DUPLICATE_ASSET" : "CATEGORY_ROOT_UNREADABLE");
    this.name = "CatalogError";
    this.kind = kind;
    this.key = opts?.key;
    this.paths = opts?.paths ?? [];
  }

  static duplicate(key: string, firstPath: string, secondPath: string): CatalogError {
    return new CatalogError(
      "duplicate-asset",
      `Duplicate asset ${key}: ${firstPath} and ${secondPath}`,
      { key, paths: [firstPath, secondPath] }
    );
  }
}

export class OperationFailure extends AssetError {
  public readonly kind: OperationFailureKind;

  constructor(kind: OperationFailureKind, message: string) {
    super(message, kind.toUpperCase().replace(/-/g, "_"));
    this.name = "OperationFailure";
    this.kind = kind;
  }
}

const PERMISSION_CODES = new Set(["EACCES", "EPERM", "EROFS"]);
const DISK_FULL_CODES = new Set(["ENOSPC", "EDQUOT"]);

export function fsErrorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  const code = err.code;
  return typeof code === "string" ? code : undefined;
}

export function classifyFsError(err: unknown): OperationFailureKind {
  if (err instanceof OperationFailure) return err.kind;
  const code = fsErrorCode(err);
  if (code && PERMISSION_CODES.has(code)) return "permission-denied";
  if (code && DISK_FULL_CODES.has(code)) return "disk-full";
  return "io-error";
}
