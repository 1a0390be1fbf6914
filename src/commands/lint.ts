import ora from "ora";
import { discoverConfig } from "../parsers/config-discovery.js";
import { allowedLints, runLint, splitLintArgs, type LintResult } from "../core/linter.js";
import { spawnRunner } from "../core/runner.js";
import { log } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import { EXIT_OK, EXIT_DRIFT, EXIT_ERROR } from "../utils/constants.js";

export async function lintCommand(argv: string[]): Promise<void> {
  let result: LintResult;
  const spinner = ora();
  try {
    const config = discoverConfig();
    log.dim(`${allowedLints(config.lint).length} lint(s) suppressed`);

    result = runLint(
      splitLintArgs(argv),
      config.lint,
      {
        runner: spawnRunner,
        cwd: process.cwd(),
        onStep: (step, detail) => {
          if (step === "clean") spinner.start("Clearing cached build state...");
          else if (step === "sysroot") spinner.start(`Resolving sysroot (${detail})...`);
          else spinner.stop();
        },
      }
    );
  } catch (err) {
    spinner.stop();
    log.error(errorMessage(err));
    process.exit(EXIT_ERROR);
  }

  if (result.status !== 0) {
    console.log();
    log.error(`Lint failed (exit ${result.status}) — fix or suppress the warnings above.`);
    process.exit(EXIT_DRIFT);
  }

  log.success("No lint warnings");
  process.exit(EXIT_OK);
}
