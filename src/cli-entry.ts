#!/usr/bin/env node
import { program } from "./cli/cli.js";
import { errorMessage } from "./shared/log.js";

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error("error:", errorMessage(err));
  process.exit(1);
});
