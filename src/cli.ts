#!/usr/bin/env node
import { Command } from "commander";
import { uprevCommand } from "./commands/uprev.js";
import { statusCommand } from "./commands/status.js";
import { lintCommand } from "./commands/lint.js";
import { PROGRAM_NAME, VERSION } from "./utils/constants.js";

const program = new Command();

program
  .name(PROGRAM_NAME)
  .description(
    "Keep Cargo.lock and package build recipes in step, and lint with a curated allow-list"
  )
  .version(VERSION)
  .enablePositionalOptions();

program
  .command("uprev")
  .description(
    "Reconcile lockfile versions with recipe files, asking before each change"
  )
  .action(uprevCommand);

program
  .command("status")
  .description("Show what uprev would do — exit 1 if lockfile and recipes disagree")
  .option("--json", "Output pending decisions as JSON")
  .option("-v, --verbose", "Also list lockfile entries that were skipped")
  .action(statusCommand);

program
  .command("lint")
  .description(
    "Run the static-analysis tool with suppressed lints; fails on any warning"
  )
  .argument("[args...]", "Arguments forwarded verbatim to the tool")
  .option("--use-cache", "Reuse cached build state instead of cleaning first")
  .passThroughOptions()
  .allowUnknownOption()
  .helpOption(false)
  // Commander drops a leading "--"; take the raw arguments instead
  .action(() => lintCommand(process.argv.slice(process.argv.indexOf("lint", 2) + 1)));

await program.parseAsync();
