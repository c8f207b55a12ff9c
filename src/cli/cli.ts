import { Command } from "commander";
import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import {
  installAssets,
  listAssets,
  listRoots,
  showDiff,
  showStatus,
  uninstallAssets,
  updateAssets,
} from "./commands/index.js";
import { ASSETCTL_LOG_LEVEL_ENV } from "../shared/env.js";
import { errorMessage, isLogLevel, logEvent, setLogLevel } from "../shared/log.js";
import { isPlainObject } from "../shared/validation.js";

function readPackageVersion(): string {
  // Works from both `src/` (dev) and `dist/` (built) by walking up until the
  // nearest package.json is found.
  let current = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    const packageJsonPath = path.join(current, "package.json");
    if (fs.existsSync(packageJsonPath)) {
      try {
        const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, "utf8"));
        if (isPlainObject(parsed) && typeof parsed.version === "string" && parsed.version.trim()) {
          return parsed.version.trim();
        }
      } catch (err) {
        logEvent("debug", "package-version-unreadable", { path: packageJsonPath, error: errorMessage(err) });
      }
    }

    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return "0.0.0";
}

interface LocationOptions {
  dir?: string;
  scope?: string;
}

const program = new Command();

program
  .name("assetctl")
  .description("Install, update and reconcile hooks, commands, agents, skills, modes and workflows")
  .version(readPackageVersion())
  .option("--log-level <level>", `Log level on stderr: debug, info, warn, error (defaults to $${ASSETCTL_LOG_LEVEL_ENV} or warn)`);
program.helpCommand(false);

program.hook("preAction", () => {
  const raw: unknown = program.opts().logLevel;
  if (typeof raw !== "string") return;
  const level = raw.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new Error(`Invalid --log-level (expected debug, info, warn, or error): ${raw}`);
  }
  setLogLevel(level);
});

program
  .command("list")
  .description("List the assets shipped in the plugin directory")
  .option("--category <category>", "Only this category (hook, command, agent, skill, mode, workflow)")
  .action((options: { category?: string }) => {
    listAssets({ category: options.category });
  });

program
  .command("roots")
  .description("Show the installation roots visible from a directory")
  .option("--dir <path>", "Start directory (default: current directory)")
  .action((options: { dir?: string }) => {
    listRoots({ dir: options.dir });
  });

program
  .command("status")
  .description("Show the install status of assets in every existing root")
  .argument("[assets...]", "Asset references (<category>/<name>); default: all")
  .option("--dir <path>", "Start directory (default: current directory)")
  .option("--category <category>", "Only this category when no assets are given")
  .action((assets: string[], options: { dir?: string; category?: string }) => {
    showStatus({ assets, dir: options.dir, category: options.category });
  });

program
  .command("diff")
  .description("Show how an installed asset differs from the shipped version")
  .argument("<asset>", "Asset reference (<category>/<name>)")
  .option("--dir <path>", "Start directory (default: current directory)")
  .option("--scope <scope>", "Root to compare against: project (default) or global")
  .action((asset: string, options: LocationOptions) => {
    showDiff({ asset, dir: options.dir, scope: options.scope });
  });

program
  .command("install")
  .description("Install assets into a root")
  .argument("<assets...>", "Asset references (<category>/<name>)")
  .option("--dir <path>", "Start directory (default: current directory)")
  .option("--scope <scope>", "Target root: project (default) or global")
  .option("--inactive", "Install agents and modes under inactive/")
  .option("--with-deps", "Install declared dependencies first")
  .action((assets: string[], options: LocationOptions & { inactive?: boolean; withDeps?: boolean }) => {
    installAssets({
      assets,
      dir: options.dir,
      scope: options.scope,
      inactive: Boolean(options.inactive),
      withDeps: Boolean(options.withDeps),
    });
  });

program
  .command("uninstall")
  .description("Remove installed assets from a root")
  .argument("<assets...>", "Asset references (<category>/<name>)")
  .option("--dir <path>", "Start directory (default: current directory)")
  .option("--scope <scope>", "Target root: project (default) or global")
  .action((assets: string[], options: LocationOptions) => {
    uninstallAssets({ assets, dir: options.dir, scope: options.scope });
  });

program
  .command("update")
  .description("Replace installed assets with the shipped versions")
  .argument("[assets...]", "Asset references (<category>/<name>)")
  .option("--dir <path>", "Start directory (default: current directory)")
  .option("--scope <scope>", "Target root: project (default) or global")
  .option("--all", "Update every installed asset that differs from the shipped version")
  .option("-y, --yes", "Do not ask for confirmation")
  .action(async (assets: string[], options: LocationOptions & { all?: boolean; yes?: boolean }) => {
    await updateAssets({
      assets,
      dir: options.dir,
      scope: options.scope,
      all: Boolean(options.all),
      yes: Boolean(options.yes),
    });
  });

export { program };
