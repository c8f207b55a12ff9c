import assert from "node:assert/strict";
import test from "node:test";
import { createAsset } from "./asset.js";
import { createInstallationRoot } from "./roots.js";
import { status, toComparableVersion } from "./status.js";
import { InstallStatus, type InstalledEntry } from "./types.js";

function skill(version: string | undefined, fingerprint: string) {
  return createAsset({ name: "foo", category: "skill", sourcePath: "/plugin/skills/foo", version, fingerprint });
}

function rootWith(entry?: Partial<InstalledEntry>) {
  return createInstallationRoot({
    path: "/work/.claude",
    scope: "project",
    entries: entry
      ? [
          {
            category: "skill",
            name: "foo",
            location: "/work/.claude/skills/foo",
            fingerprint: "h0",
            active: true,
            ...entry,
          },
        ]
      : [],
  });
}

test("no entry is not-installed", () => {
  assert.equal(status(skill("1.2", "h1"), rootWith()), InstallStatus.NOT_INSTALLED);
});

test("equal fingerprints are installed-same whatever the versions say", () => {
  assert.equal(status(skill("1.2", "h1"), rootWith({ fingerprint: "h1", version: "0.9" })), InstallStatus.INSTALLED_SAME);
});

test("comparable versions decide older and newer", () => {
  assert.equal(status(skill("1.2", "h1"), rootWith({ version: "1.1" })), InstallStatus.INSTALLED_OLDER);
  assert.equal(status(skill("1.2", "h1"), rootWith({ version: "1.10.0" })), InstallStatus.INSTALLED_NEWER);
  assert.equal(status(skill("v2.0.0", "h1"), rootWith({ version: "1.9.9" })), InstallStatus.INSTALLED_OLDER);
});

test("equal versions with different content are installed-different", () => {
  assert.equal(status(skill("v1.2", "h1"), rootWith({ version: "1.2.0" })), InstallStatus.INSTALLED_DIFFERENT);
});

test("missing or non-semver versions are installed-different", () => {
  assert.equal(status(skill(undefined, "h1"), rootWith({ version: "1.0.0" })), InstallStatus.INSTALLED_DIFFERENT);
  assert.equal(status(skill("1.2", "h1"), rootWith({ version: "latest" })), InstallStatus.INSTALLED_DIFFERENT);
});

test("status only looks at the root it is given", () => {
  const asset = skill("1.2", "h1");
  const project = rootWith({ fingerprint: "h1" });
  const global = createInstallationRoot({ path: "/home/user/.claude", scope: "global" });

  assert.equal(status(asset, project), InstallStatus.INSTALLED_SAME);
  assert.equal(status(asset, global), InstallStatus.NOT_INSTALLED);
});

test("short numeric versions are coerced; other strings are not comparable", () => {
  assert.equal(toComparableVersion("v1.2"), "1.2.0");
  assert.equal(toComparableVersion("3"), "3.0.0");
  assert.equal(toComparableVersion("1.2.3-rc.1"), "1.2.3-rc.1");
  assert.equal(toComparableVersion("latest"), null);
  assert.equal(toComparableVersion("1.2.x"), null);
  assert.equal(toComparableVersion(undefined), null);
});
