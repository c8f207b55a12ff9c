import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { extractAsset } from "./extractor.js";

function withTempDir(run: (dir: string) => void): void {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "assetctl-extract-test-"));
  try {
    run(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

function writeFile(filePath: string, text: string): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, text, "utf8");
  return filePath;
}

test("reads command front matter and keeps unknown fields", () => {
  withTempDir((dir) => {
    const file = writeFile(
      path.join(dir, "review.md"),
      ["---", "description: Review staged changes", "version: 1.2.0", "owner: team-a", "---", "", "# Review", "Body"].join("\n")
    );

    const result = extractAsset(file, "command");
    assert.equal(result.ok, true);
    if (!result.ok) return;
    assert.equal(result.asset.name, "review");
    assert.equal(result.asset.category, "command");
    assert.equal(result.asset.version, "1.2.0");
    assert.equal(result.asset.description, "Review staged changes");
    assert.equal(result.asset.metadata.owner, "team-a");
    assert.equal(result.asset.sourcePath, file);
  });
});

test("an empty declared name is a missing-name error", () => {
  withTempDir((dir) => {
    const file = writeFile(path.join(dir, "helper.md"), ["---", 'name: ""', "---", "text"].join("\n"));

    const result = extractAsset(file, "agent");
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.kind, "missing-name");
    assert.equal(result.error.path, file);
  });
});

test("a declared name that is not a usable file name falls back to the file stem", () => {
  withTempDir((dir) => {
    const file = writeFile(path.join(dir, "helper.md"), ["---", "name: ../evil", "---"].join("\n"));

    const result = extractAsset(file, "agent");
    assert.equal(result.ok, true);
    if (!result.ok) return;
    assert.equal(result.asset.name, "helper");
    assert.equal(result.asset.metadata.name, "../evil");
  });
});

test("a title-style workflow name keys the asset by its file stem", () => {
  withTempDir((dir) => {
    const file = writeFile(
      path.join(dir, "feature.yaml"),
      ["name: Feature Development", "description: Plan and ship a feature", "steps: []"].join("\n")
    );

    const result = extractAsset(file, "workflow");
    assert.equal(result.ok, true);
    if (!result.ok) return;
    assert.equal(result.asset.name, "feature");
    assert.equal(result.asset.description, "Plan and ship a feature");
    assert.equal(result.asset.metadata.name, "Feature Development");
  });
});

test("a path-derived name that is not a usable file name is rejected", () => {
  withTempDir((dir) => {
    const file = writeFile(path.join(dir, "my helper.md"), "Helps.\n");

    const result = extractAsset(file, "agent");
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.kind, "invalid-name");
    assert.equal(result.error.detail, '"my helper" cannot be used as a file name');
  });
});

test("malformed YAML reports a parse failure with a position in the file", () => {
  withTempDir((dir) => {
    const file = writeFile(
      path.join(dir, "broken.md"),
      ["---", "name: broken", "description: [unclosed", "---", "body"].join("\n")
    );

    const result = extractAsset(file, "command");
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.kind, "parse-failure");
    assert.ok(result.error.position);
    assert.ok(result.error.position.line >= 2);
  });
});

test("namespaced commands are named <namespace>:<stem>", () => {
  withTempDir((dir) => {
    const file = writeFile(path.join(dir, "git", "commit.md"), "# Commit\n\nWrite a commit message.\n");

    const result = extractAsset(file, "command", { namespace: "git" });
    assert.equal(result.ok, true);
    if (!result.ok) return;
    assert.equal(result.asset.name, "git:commit");
    assert.equal(result.asset.namespace, "git");
    assert.equal(result.asset.description, "Write a commit message.");
  });
});

test("skills are read from SKILL.md and fingerprint the whole directory", () => {
  withTempDir((dir) => {
    const skillDir = path.join(dir, "pdf");
    writeFile(path.join(skillDir, "SKILL.md"), ["---", "description: Work with PDFs", "version: 0.1.0", "---"].join("\n"));
    writeFile(path.join(skillDir, "reference.md"), "one\n");

    const first = extractAsset(skillDir, "skill");
    const second = extractAsset(skillDir, "skill");
    assert.ok(first.ok && second.ok);
    assert.equal(first.asset.name, "pdf");
    assert.equal(first.asset.description, "Work with PDFs");
    assert.equal(first.asset.contentFingerprint, second.asset.contentFingerprint);

    fs.writeFileSync(path.join(skillDir, "reference.md"), "two\n", "utf8");
    const changed = extractAsset(skillDir, "skill");
    assert.ok(changed.ok);
    assert.notEqual(changed.asset.contentFingerprint, first.asset.contentFingerprint);
  });
});

test("a skill directory without SKILL.md is unreadable", () => {
  withTempDir((dir) => {
    const skillDir = path.join(dir, "empty");
    fs.mkdirSync(skillDir);

    const result = extractAsset(skillDir, "skill");
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.kind, "unreadable");
  });
});

test("hook sidecar fields override the comment header", () => {
  withTempDir((dir) => {
    const script = writeFile(
      path.join(dir, "guard.py"),
      ["#!/usr/bin/env python3", "# Event: UserPromptSubmit", '"""Block risky writes."""', 'print("ok")'].join("\n")
    );
    writeFile(path.join(dir, "guard.json"), JSON.stringify({ event: "PreToolUse", version: "2.0.0" }));

    const result = extractAsset(script, "hook");
    assert.equal(result.ok, true);
    if (!result.ok) return;
    assert.equal(result.asset.name, "guard");
    assert.equal(result.asset.metadata.event, "PreToolUse");
    assert.equal(result.asset.version, "2.0.0");
    assert.equal(result.asset.description, "Block risky writes.");
  });
});

test("shell hooks read Key: value comment lines", () => {
  withTempDir((dir) => {
    const script = writeFile(
      path.join(dir, "stamp.sh"),
      ["#!/usr/bin/env bash", "# Prompt timestamp", "# Event: UserPromptSubmit", "# Version: 1.0.0", "", "date"].join("\n")
    );

    const result = extractAsset(script, "hook");
    assert.equal(result.ok, true);
    if (!result.ok) return;
    assert.equal(result.asset.version, "1.0.0");
    assert.equal(result.asset.metadata.event, "UserPromptSubmit");
    assert.equal(result.asset.description, "Prompt timestamp");
  });
});

test("modes without front matter use their Purpose line", () => {
  withTempDir((dir) => {
    const file = writeFile(path.join(dir, "focus.md"), "# Focus\n\n**Purpose**: Stay on one task\n");

    const result = extractAsset(file, "mode");
    assert.equal(result.ok, true);
    if (!result.ok) return;
    assert.equal(result.asset.description, "Stay on one task");
  });
});

test("agents prefer summary and fall back to a label", () => {
  withTempDir((dir) => {
    const withSummary = writeFile(
      path.join(dir, "a.md"),
      ["---", "summary: Short summary", "description: Long description", "---"].join("\n")
    );
    const bare = writeFile(path.join(dir, "helper.md"), ["---", "version: 1", "---", "You help."].join("\n"));

    const first = extractAsset(withSummary, "agent");
    const second = extractAsset(bare, "agent");
    assert.ok(first.ok && second.ok);
    assert.equal(first.asset.description, "Short summary");
    assert.equal(second.asset.description, "Agent: helper");
    assert.equal(second.asset.version, "1");
  });
});

test("long descriptions are truncated to 100 characters", () => {
  withTempDir((dir) => {
    const file = writeFile(path.join(dir, "long.md"), ["---", `description: ${"a".repeat(150)}`, "---"].join("\n"));

    const result = extractAsset(file, "command");
    assert.ok(result.ok);
    assert.equal(result.asset.description, `${"a".repeat(100)}...`);
  });
});

test("workflows must be YAML mappings", () => {
  withTempDir((dir) => {
    const list = writeFile(path.join(dir, "list.yaml"), "- a\n- b\n");
    const mapping = writeFile(path.join(dir, "release.yml"), "description: Cut a release\nsteps:\n  - run: test\n");

    const bad = extractAsset(list, "workflow");
    assert.equal(bad.ok, false);
    if (!bad.ok) assert.equal(bad.error.kind, "parse-failure");

    const good = extractAsset(mapping, "workflow");
    assert.ok(good.ok);
    assert.equal(good.asset.name, "release");
    assert.equal(good.asset.description, "Cut a release");
    assert.deepEqual(good.asset.metadata.steps, [{ run: "test" }]);
  });
});

test("dependencies accept category/name, category:name and bare names", () => {
  withTempDir((dir) => {
    const file = writeFile(
      path.join(dir, "writer.md"),
      ["---", "dependencies:", "  - skill/pdf", "  - commands:review", "  - helper", "---"].join("\n")
    );

    const result = extractAsset(file, "agent");
    assert.ok(result.ok);
    assert.deepEqual(result.asset.dependencies, [
      { category: "skill", name: "pdf" },
      { category: "command", name: "review" },
      { category: "agent", name: "helper" },
    ]);
  });
});
