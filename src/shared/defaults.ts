import * as os from "os";
import * as path from "path";

// ==================== Installation Roots ====================

export const DEFAULT_ROOT_MARKER_DIRNAME = ".claude";
export const DEFAULT_SETTINGS_FILENAME = "settings.json";
export const DEFAULT_SETTINGS_BACKUP_SUFFIX = ".bak";
export const DEFAULT_INACTIVE_DIRNAME = "inactive";
export const DEFAULT_STAGING_PREFIX = ".assetctl-staging-";

export function getDefaultGlobalDir(): string {
  return path.join(os.homedir(), DEFAULT_ROOT_MARKER_DIRNAME);
}

// ==================== Plugin ====================

export const DEFAULT_PLUGIN_DIRNAME = "plugin";

// ==================== Asset Metadata ====================

export const DEFAULT_HOOK_EVENT = "UserPromptSubmit" as const;
export const DEFAULT_HOOK_MATCHER = "" as const;
export const DEFAULT_DESCRIPTION_MAX_CHARS = 100 as const;
export const SKILL_MANIFEST_FILENAME = "SKILL.md";

// ==================== Diff ====================

export const DEFAULT_DIFF_CONTEXT_LINES = 3 as const;
export const BINARY_SNIFF_BYTES = 8000 as const;

// ==================== Logging ====================

export const DEFAULT_LOG_LEVEL = "warn" as const;
