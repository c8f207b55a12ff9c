import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { createAsset } from "./asset.js";
import { buildCatalog, createCatalog, getCatalogAsset, listCatalogAssets } from "./catalog.js";
import { CatalogError } from "./errors.js";
import { getPluginCategoryRoots } from "./layouts.js";
import type { AssetCategory } from "./types.js";
import { setLogLevel } from "../shared/log.js";

setLogLevel("error");

function withPluginDir(run: (dir: string) => void): void {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "assetctl-catalog-test-"));
  try {
    run(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

function writeFile(filePath: string, text: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, text, "utf8");
}

test("builds a catalog across categories and skips non-asset entries", () => {
  withPluginDir((dir) => {
    writeFile(path.join(dir, "commands", "review.md"), "---\ndescription: Review\n---\n");
    writeFile(path.join(dir, "commands", "git", "commit.md"), "Commit.\n");
    writeFile(path.join(dir, "commands", "README.md"), "# Commands\n");
    writeFile(path.join(dir, "skills", "pdf", "SKILL.md"), "---\ndescription: PDFs\n---\n");
    writeFile(path.join(dir, "skills", "notes", "draft.md"), "not a skill\n");
    writeFile(path.join(dir, "hooks", "examples", "guard.sh"), "#!/bin/sh\n# Guard\nexit 0\n");
    writeFile(path.join(dir, "hooks", "examples", "guard.json"), "{}");
    writeFile(path.join(dir, "agents", ".hidden.md"), "---\nname: hidden\n---\n");

    const catalog = buildCatalog(getPluginCategoryRoots(dir));

    assert.deepEqual(
      listCatalogAssets(catalog).map((asset) => `${asset.category}/${asset.name}`),
      ["hook/guard", "command/git:commit", "command/review", "skill/pdf"]
    );
    assert.deepEqual(catalog.warnings, []);
    assert.equal(getCatalogAsset(catalog, "command", "review")?.description, "Review");
    assert.deepEqual(
      listCatalogAssets(catalog, "command").map((asset) => asset.name),
      ["git:commit", "review"]
    );
  });
});

test("assets that cannot be read become warnings", () => {
  withPluginDir((dir) => {
    writeFile(path.join(dir, "agents", "broken.md"), "---\nname: [oops\n---\n");
    writeFile(path.join(dir, "agents", "fine.md"), "---\nsummary: Fine\n---\n");

    const catalog = buildCatalog(getPluginCategoryRoots(dir));

    assert.deepEqual([...catalog.assets.keys()], ["agent/fine"]);
    assert.equal(catalog.warnings.length, 1);
    assert.equal(catalog.warnings[0]?.kind, "parse-failure");
    assert.equal(catalog.warnings[0]?.path, path.join(dir, "agents", "broken.md"));
  });
});

test("duplicate names within a category are rejected", () => {
  withPluginDir((dir) => {
    writeFile(path.join(dir, "commands", "other.md"), "---\nname: review\n---\n");
    writeFile(path.join(dir, "commands", "review.md"), "Review.\n");

    assert.throws(
      () => buildCatalog(getPluginCategoryRoots(dir)),
      (err: unknown) =>
        err instanceof CatalogError &&
        err.kind === "duplicate-asset" &&
        err.key === "command/review" &&
        err.paths[0] === path.join(dir, "commands", "other.md") &&
        err.paths[1] === path.join(dir, "commands", "review.md")
    );
  });
});

test("the same name in two categories is not a duplicate", () => {
  withPluginDir((dir) => {
    writeFile(path.join(dir, "commands", "helper.md"), "Help.\n");
    writeFile(path.join(dir, "agents", "helper.md"), "Help.\n");

    const catalog = buildCatalog(getPluginCategoryRoots(dir));
    assert.deepEqual([...catalog.assets.keys()].sort(), ["agent/helper", "command/helper"]);
  });
});

test("missing category roots contribute nothing; unreadable ones fail the build", () => {
  withPluginDir((dir) => {
    assert.equal(buildCatalog(getPluginCategoryRoots(path.join(dir, "missing"))).assets.size, 0);

    const notADir = path.join(dir, "commands-file");
    writeFile(notADir, "plain file");
    assert.throws(
      () => buildCatalog(new Map<AssetCategory, string>([["command", notADir]])),
      (err: unknown) => err instanceof CatalogError && err.kind === "category-root-unreadable"
    );
  });
});

test("createCatalog rejects duplicates from values", () => {
  const a = createAsset({ name: "foo", category: "skill", sourcePath: "/plugin/skills/foo", fingerprint: "h1" });
  const b = createAsset({ name: "foo", category: "skill", sourcePath: "/plugin/other/foo", fingerprint: "h2" });

  assert.throws(() => createCatalog([a, b]), CatalogError);
  assert.equal(createCatalog([a]).assets.get("skill/foo"), a);
});
