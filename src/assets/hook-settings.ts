/**
 * Hook registrations in a root's `settings.json`.
 *
 * Layout: `{ "hooks": { "<Event>": [ { "matcher": "...", "hooks": [ { "type": "command", "command": "..." } ] } ] } }`.
 * A registration is identified by its `command`. Every key this module does not
 * manage is carried through untouched, and groups it does not change keep
 * their identity.
 */

import * as fs from "node:fs";

import { DEFAULT_HOOK_EVENT, DEFAULT_HOOK_MATCHER } from "../shared/defaults.js";
import { isPlainObject } from "../shared/validation.js";
import { fsErrorCode } from "./errors.js";
import type { Asset } from "./types.js";

export type SettingsDocument = Record<string, unknown>;

export interface HookRegistration {
  event: string;
  matcher: string;
  command: string;
  timeout?: number;
}

export type SettingsParseResult = { ok: true; settings: SettingsDocument } | { ok: false; error: string };

const HOOKS_KEY = "hooks";

export function hookCommandFor(installedPath: string): string {
  return /\s/.test(installedPath) ? JSON.stringify(installedPath) : installedPath;
}

function stringField(metadata: Readonly<Record<string, unknown>>, key: string): string | undefined {
  const value = metadata[key];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

export function hookRegistrationFor(asset: Asset, installedPath: string): HookRegistration {
  const registration: HookRegistration = {
    event: stringField(asset.metadata, "event") ?? DEFAULT_HOOK_EVENT,
    matcher: stringField(asset.metadata, "matcher") ?? DEFAULT_HOOK_MATCHER,
    command: hookCommandFor(installedPath),
  };

  const rawTimeout = asset.metadata.timeout;
  const timeout = typeof rawTimeout === "string" ? Number(rawTimeout) : rawTimeout;
  if (typeof timeout === "number" && Number.isFinite(timeout) && timeout > 0) {
    registration.timeout = timeout;
  }
  return registration;
}

/**
 * Parses a settings document. An empty or missing file is an empty document;
 * anything this module could not merge into safely is an error.
 */
export function parseSettings(text: string | null): SettingsParseResult {
  if (text === null || !text.trim()) {
    return { ok: true, settings: {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }

  if (!isPlainObject(parsed)) {
    return { ok: false, error: "top-level value is not a JSON object" };
  }

  const hooks = parsed[HOOKS_KEY];
  if (hooks !== undefined) {
    if (!isPlainObject(hooks)) {
      return { ok: false, error: `"${HOOKS_KEY}" is not an object` };
    }
    for (const [event, groups] of Object.entries(hooks)) {
      if (!Array.isArray(groups)) {
        return { ok: false, error: `"${HOOKS_KEY}.${event}" is not a list` };
      }
    }
  }

  return { ok: true, settings: parsed };
}

export function readSettingsText(settingsPath: string): string | null {
  try {
    return fs.readFileSync(settingsPath, "utf8");
  } catch (err) {
    if (fsErrorCode(err) === "ENOENT") return null;
    throw err;
  }
}

const DEFAULT_SETTINGS_INDENT = "  ";

/**
 * Indentation of the first nested line of an existing document, so a rewrite
 * keeps the user's style. Key order and values of untouched entries are kept;
 * other formatting (inline arrays, trailing spaces) is normalized.
 */
export function detectIndent(text: string | null): string {
  if (!text) return DEFAULT_SETTINGS_INDENT;
  const match = /^[{[][ \t]*\r?\n([ \t]+)\S/.exec(text.trimStart());
  return match?.[1] ?? DEFAULT_SETTINGS_INDENT;
}

export function serializeSettings(settings: SettingsDocument, indent: string = DEFAULT_SETTINGS_INDENT): string {
  return `${JSON.stringify(settings, null, indent)}\n`;
}

function hooksSection(settings: SettingsDocument): Record<string, unknown[]> {
  const hooks = settings[HOOKS_KEY];
  const section: Record<string, unknown[]> = {};
  if (!isPlainObject(hooks)) return section;
  for (const [event, groups] of Object.entries(hooks)) {
    section[event] = Array.isArray(groups) ? groups : [];
  }
  return section;
}

function commandOf(hook: unknown): string | undefined {
  return isPlainObject(hook) && typeof hook.command === "string" ? hook.command : undefined;
}

function groupHooks(group: unknown): unknown[] | undefined {
  return isPlainObject(group) && Array.isArray(group.hooks) ? group.hooks : undefined;
}

/**
 * Drops every hook whose command is in `commands`. Groups left empty are
 * removed, and so are event lists this removal emptied.
 */
function withoutCommands(
  section: Record<string, unknown[]>,
  commands: ReadonlySet<string>
): { section: Record<string, unknown[]>; removed: number } {
  const next: Record<string, unknown[]> = {};
  let removed = 0;

  for (const [event, groups] of Object.entries(section)) {
    let changed = false;
    const kept: unknown[] = [];

    for (const group of groups) {
      const hooks = groupHooks(group);
      if (!hooks || !isPlainObject(group)) {
        kept.push(group);
        continue;
      }
      const remaining = hooks.filter((hook) => {
        const command = commandOf(hook);
        return command === undefined || !commands.has(command);
      });
      if (remaining.length === hooks.length) {
        kept.push(group);
        continue;
      }
      removed += hooks.length - remaining.length;
      changed = true;
      if (remaining.length > 0) {
        kept.push({ ...group, hooks: remaining });
      }
    }

    if (changed && kept.length === 0) continue;
    next[event] = changed ? kept : groups;
  }

  return { section: next, removed };
}

function withSection(settings: SettingsDocument, section: Record<string, unknown[]>): SettingsDocument {
  return { ...settings, [HOOKS_KEY]: section };
}

function hookEntryFor(registration: HookRegistration, existing?: Record<string, unknown>): Record<string, unknown> {
  const entry: Record<string, unknown> = { ...(existing ?? {}), type: "command", command: registration.command };
  if (registration.timeout !== undefined) {
    entry.timeout = registration.timeout;
  }
  return entry;
}

/**
 * Adds or replaces the registration for `registration.command`. An existing
 * entry under the same event is updated in place; otherwise a new group is
 * appended to that event's list. Entries for `replaceCommands` (an earlier
 * install path of the same hook) are dropped.
 */
export function mergeHookRegistration(
  settings: SettingsDocument,
  registration: HookRegistration,
  replaceCommands: readonly string[] = []
): SettingsDocument {
  const ours = new Set([registration.command, ...replaceCommands]);
  const isOurs = (hook: unknown): boolean => {
    const command = commandOf(hook);
    return command !== undefined && ours.has(command);
  };
  const section = hooksSection(settings);
  const groups = section[registration.event] ?? [];

  let slot: { groupIndex: number; hookIndex: number } | null = null;
  for (let g = 0; g < groups.length && !slot; g++) {
    const hooks = groupHooks(groups[g]);
    if (!hooks) continue;
    const h = hooks.findIndex(isOurs);
    if (h >= 0) slot = { groupIndex: g, hookIndex: h };
  }

  if (!slot) {
    const cleaned = withoutCommands(section, ours).section;
    const target = cleaned[registration.event] ?? [];
    cleaned[registration.event] = [
      ...target,
      { matcher: registration.matcher, hooks: [hookEntryFor(registration)] },
    ];
    return withSection(settings, cleaned);
  }

  const { groupIndex, hookIndex } = slot;
  const group = groups[groupIndex];
  const hooks = groupHooks(group);
  if (!hooks || !isPlainObject(group)) return settings;

  const existingHook = hooks[hookIndex];
  const replacement = hookEntryFor(registration, isPlainObject(existingHook) ? existingHook : undefined);

  // A group holding only this hook follows its matcher; a shared group keeps its own.
  const updatedGroup: Record<string, unknown> = hooks.every(isOurs)
    ? { ...group, matcher: registration.matcher, hooks: [replacement] }
    : {
        ...group,
        hooks: hooks.flatMap((hook, index): unknown[] => (index === hookIndex ? [replacement] : isOurs(hook) ? [] : [hook])),
      };

  const placeholder = Symbol("slot");
  const withPlaceholder: Record<string, unknown[]> = {
    ...section,
    [registration.event]: groups.map((g, index) => (index === groupIndex ? placeholder : g)),
  };
  const cleaned = withoutCommands(withPlaceholder, ours).section;
  cleaned[registration.event] = (cleaned[registration.event] ?? []).map((g) => (g === placeholder ? updatedGroup : g));
  return withSection(settings, cleaned);
}

/**
 * Removes every registration of `command`. Returns the settings unchanged
 * (same object) when nothing matched.
 */
export function removeHookRegistration(
  settings: SettingsDocument,
  command: string
): { settings: SettingsDocument; removed: number } {
  if (!isPlainObject(settings[HOOKS_KEY])) {
    return { settings, removed: 0 };
  }
  const result = withoutCommands(hooksSection(settings), new Set([command]));
  if (result.removed === 0) {
    return { settings, removed: 0 };
  }
  return { settings: withSection(settings, result.section), removed: result.removed };
}

export function hasHookRegistration(settings: SettingsDocument, registration: HookRegistration): boolean {
  const groups = hooksSection(settings)[registration.event] ?? [];
  return groups.some((group) => {
    if (!isPlainObject(group)) return false;
    const matcher = typeof group.matcher === "string" ? group.matcher : DEFAULT_HOOK_MATCHER;
    if (matcher !== registration.matcher) return false;
    return (groupHooks(group) ?? []).some((hook) => commandOf(hook) === registration.command);
  });
}
