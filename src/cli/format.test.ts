import assert from "node:assert/strict";
import test from "node:test";
import { createAsset } from "../assets/asset.js";
import { createInstallationRoot } from "../assets/roots.js";
import { formatAssetStatus, formatAssetSummary, formatDiff, formatOperationResult, formatRootSummary } from "./format.js";

const foo = createAsset({
  name: "foo",
  category: "skill",
  sourcePath: "/plugin/skills/foo",
  version: "1.2",
  description: "Does foo",
  dependencies: [{ category: "command", name: "git:commit" }],
  fingerprint: "h1",
});

test("asset summaries list key, version, description and dependencies", () => {
  assert.equal(
    formatAssetSummary(foo),
    ["asset: skill/foo", "version: 1.2", "description: Does foo", "depends-on: command/git:commit"].join("\n")
  );

  const bare = createAsset({ name: "bar", category: "mode", sourcePath: "/plugin/modes/bar.md", fingerprint: "h2" });
  assert.equal(formatAssetSummary(bare), ["asset: mode/bar", "version: (none)", "description: (none)"].join("\n"));
});

test("status blocks show one line per root", () => {
  const project = createInstallationRoot({
    path: "/work/.claude",
    scope: "project",
    displayName: "./.claude (project)",
    entries: [
      { category: "skill", name: "foo", location: "/work/.claude/skills/foo", fingerprint: "h1", active: true },
    ],
  });
  const global = createInstallationRoot({ path: "/home/user/.claude", scope: "global", displayName: "~/.claude (global)" });

  assert.equal(
    formatAssetStatus(foo, [project, global]),
    ["asset: skill/foo", "- ./.claude (project): installed-same", "- ~/.claude (global): not-installed"].join("\n")
  );
  assert.equal(
    formatRootSummary(global),
    ["root: /home/user/.claude", "name: ~/.claude (global)", "scope: global", "exists: true", "installed: 0"].join("\n")
  );
});

test("operation results include the failure kind when there is one", () => {
  assert.equal(
    formatOperationResult({
      operation: "install",
      assetKey: "hook/guard",
      rootPath: "/work/.claude",
      outcome: "failed",
      message: "settings document is corrupt",
      failure: "settings-corrupt",
    }),
    [
      "operation: install",
      "asset: hook/guard",
      "root: /work/.claude",
      "outcome: failed",
      "failure: settings-corrupt",
      "message: settings document is corrupt",
    ].join("\n")
  );
});

test("diffs print their text, a placeholder, or the binary notice", () => {
  assert.equal(formatDiff({ kind: "unified", text: "" }), "(no differences)");
  assert.equal(formatDiff({ kind: "unified", text: "-a\n+b\n" }), "-a\n+b");
  assert.equal(formatDiff({ kind: "binary-unavailable", path: "/work/.claude/hooks/tool" }), "binary file, no text diff: /work/.claude/hooks/tool");
});
