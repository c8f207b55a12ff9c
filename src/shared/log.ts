import { nowLocalIso } from "./time.js";
import { ASSETCTL_LOG_LEVEL_ENV } from "./env.js";
import { DEFAULT_LOG_LEVEL } from "./defaults.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SAFE_VALUE = /^[A-Za-z0-9._:@/+-]+$/;

let minLevel: LogLevel | null = null;

export function isLogLevel(value: string): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

export function setLogLevel(level: LogLevel | null): void {
  minLevel = level;
}

function resolveMinLevel(): LogLevel {
  if (minLevel !== null) return minLevel;
  const raw = (process.env[ASSETCTL_LOG_LEVEL_ENV] ?? "").trim().toLowerCase();
  return isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL;
}

function formatValue(value: unknown): string | null {
  if (value === undefined) return null;
  if (value === null) return "none";

  if (typeof value === "boolean") return value ? "true" : "false";

  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : "none";
  }

  const raw = typeof value === "string" ? value : JSON.stringify(value);
  if (SAFE_VALUE.test(raw)) return raw;
  return JSON.stringify(raw);
}

function normalizeField(key: string, value: unknown): { key: string; value: unknown } {
  if (key === "duration-ms") {
    if (typeof value === "number" && Number.isFinite(value)) {
      return { key: "duration", value: `${(value / 1000).toFixed(3)}s` };
    }
    return { key: "duration", value };
  }

  return { key, value };
}

export function formatLogLine(level: LogLevel, event: string, fields?: Record<string, unknown>): string {
  const parts: string[] = [`ts=${nowLocalIso()}`, `level=${level}`, `event=${event}`];
  const seenKeys = new Set(parts.map((p) => p.split("=")[0]));

  for (const [key, value] of Object.entries(fields ?? {})) {
    const normalized = normalizeField(key, value);
    if (seenKeys.has(normalized.key)) continue;

    const formatted = formatValue(normalized.value);
    if (formatted === null) continue;
    parts.push(`${normalized.key}=${formatted}`);
    seenKeys.add(normalized.key);
  }

  return parts.join(" ");
}

/**
 * Emit one `key=value` event line on stderr. Stdout is left to command output.
 */
export function logEvent(level: LogLevel, event: string, fields?: Record<string, unknown>): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[resolveMinLevel()]) return;
  process.stderr.write(`${formatLogLine(level, event, fields)}\n`);
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || "unknown error";
  if (typeof err === "string") return err || "unknown error";
  try {
    return JSON.stringify(err);
  } catch {
    return "unknown error";
  }
}
