import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { createInstallationRoot, discoverRoots, refreshRoot } from "./roots.js";
import { setLogLevel } from "../shared/log.js";

setLogLevel("error");

function withTree(run: (base: string) => void): void {
  const base = fs.mkdtempSync(path.join(os.tmpdir(), "assetctl-roots-test-"));
  try {
    run(base);
  } finally {
    fs.rmSync(base, { recursive: true, force: true });
  }
}

function writeFile(filePath: string, text: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, text, "utf8");
}

test("finds the project root, its ancestors, and the global root last", () => {
  withTree((base) => {
    const start = path.join(base, "proj", "src");
    fs.mkdirSync(start, { recursive: true });
    fs.mkdirSync(path.join(base, "proj", ".claude"));
    fs.mkdirSync(path.join(base, ".claude"));
    const globalDir = path.join(base, "home", ".claude");

    const roots = discoverRoots(start, { globalDir });

    assert.equal(roots[0]?.path, path.join(base, "proj", ".claude"));
    assert.equal(roots[0]?.scope, "project");
    assert.equal(roots[0]?.displayName, "../.claude (project)");
    assert.equal(roots[1]?.path, path.join(base, ".claude"));
    assert.equal(roots[1]?.scope, "ancestor");
    assert.equal(roots[1]?.displayName, "../../.claude (ancestor)");

    const last = roots[roots.length - 1];
    assert.equal(last?.path, globalDir);
    assert.equal(last?.scope, "global");
    assert.equal(last?.exists, false);
    assert.equal(last?.installedIndex.size, 0);
    assert.equal(roots.filter((root) => root.scope === "global").length, 1);
  });
});

test("the global root is never reported as a project root", () => {
  withTree((base) => {
    const globalDir = path.join(base, "home", ".claude");
    const start = path.join(base, "home", "work");
    fs.mkdirSync(globalDir, { recursive: true });
    fs.mkdirSync(start, { recursive: true });

    const roots = discoverRoots(start, { globalDir });

    assert.equal(roots.filter((root) => root.path === globalDir).length, 1);
    const last = roots[roots.length - 1];
    assert.equal(last?.path, globalDir);
    assert.equal(last?.scope, "global");
    assert.equal(last?.exists, true);
  });
});

test("reads the installed index including inactive and namespaced entries", () => {
  withTree((base) => {
    const root = path.join(base, ".claude");
    writeFile(path.join(root, "agents", "helper.md"), "---\nversion: 1.1.0\n---\nHelp.\n");
    writeFile(path.join(root, "inactive", "agents", "parked.md"), "Parked.\n");
    writeFile(path.join(root, "commands", "git", "commit.md"), "Commit.\n");
    writeFile(path.join(root, "skills", "pdf", "SKILL.md"), "---\ndescription: PDFs\n---\n");
    writeFile(path.join(root, "skills", "scratch", "notes.md"), "not a skill\n");

    const loaded = refreshRoot(createInstallationRoot({ path: root, scope: "project" }));

    assert.deepEqual([...loaded.installedIndex.keys()].sort(), [
      "agent/helper",
      "agent/parked",
      "command/git:commit",
      "skill/pdf",
    ]);
    assert.equal(loaded.installedIndex.get("agent/helper")?.version, "1.1.0");
    assert.equal(loaded.installedIndex.get("agent/helper")?.active, true);
    assert.equal(loaded.installedIndex.get("agent/parked")?.active, false);
    assert.equal(
      loaded.installedIndex.get("command/git:commit")?.location,
      path.join(root, "commands", "git", "commit.md")
    );
    assert.deepEqual(loaded.warnings, []);
  });
});

test("an unreadable category becomes a warning and the rest of the index loads", () => {
  withTree((base) => {
    const root = path.join(base, ".claude");
    writeFile(path.join(root, "agents"), "not a directory");
    writeFile(path.join(root, "commands", "review.md"), "Review.\n");

    const loaded = refreshRoot(createInstallationRoot({ path: root, scope: "project" }));

    assert.deepEqual([...loaded.installedIndex.keys()], ["command/review"]);
    assert.equal(loaded.warnings.length, 1);
    assert.equal(loaded.warnings[0]?.path, root);
  });
});

test("a root that exists but cannot be listed has an empty index and one warning", () => {
  if (process.getuid?.() === 0) return;
  withTree((base) => {
    const root = path.join(base, ".claude");
    writeFile(path.join(root, "commands", "review.md"), "Review.\n");
    fs.chmodSync(root, 0o000);
    try {
      const loaded = refreshRoot(createInstallationRoot({ path: root, scope: "project" }));

      assert.equal(loaded.exists, true);
      assert.equal(loaded.installedIndex.size, 0);
      assert.equal(loaded.warnings.length, 1);
      assert.equal(loaded.warnings[0]?.path, root);
      assert.ok(loaded.warnings[0]?.message.startsWith(`Cannot read installation root ${root}: `));
    } finally {
      fs.chmodSync(root, 0o755);
    }
  });
});
