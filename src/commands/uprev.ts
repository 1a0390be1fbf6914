import ora from "ora";
import { relative } from "node:path";
import { discoverConfig } from "../parsers/config-discovery.js";
import { runUprev, type Prompter } from "../core/uprev.js";
import { spawnRunner } from "../core/runner.js";
import type { ActionableDecision } from "../core/types.js";
import { decisionBadge, packageLabel, pathLabel, versionChange } from "../reporters/console.js";
import { log } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import { EXIT_OK, EXIT_ERROR } from "../utils/constants.js";

const stdinPrompter: Prompter = {
  async confirm(message) {
    const { confirm } = await import("@inquirer/prompts");
    return confirm({ message, default: false });
  },
};

export async function uprevCommand(): Promise<void> {
  const cwd = process.cwd();
  const spinner = ora();
  // Prompts write to the same terminal
  const stopSpinner = () => {
    if (spinner.isSpinning) spinner.stop();
  };

  try {
    const config = discoverConfig(cwd);
    if (config.configPath) log.dim(`Using ${relative(cwd, config.configPath)}`);

    spinner.start(`Reading ${relative(cwd, config.lockfile)}...`);

    const outcome = await runUprev(config, {
      prompter: stdinPrompter,
      runner: spawnRunner,
      cwd,
      year: new Date().getFullYear(),
      onDecision: (decision) => {
        stopSpinner();
        printDecision(decision);
      },
      onApplied: (applied) => {
        if (applied.recipe) {
          log.success(`Wrote ${relative(cwd, applied.recipe)}`);
        } else {
          log.success(`Updated ${relative(cwd, config.lockfile)}`);
        }
      },
    });
    stopSpinner();

    const { applied, declined, plan } = outcome;
    console.log();
    if (applied.length + declined.length === 0) {
      log.success(`All ${plan.summary.none} package(s) match their recipes`);
    } else {
      log.info(`${applied.length} applied, ${plan.summary.none} already up to date`);
    }
    if (declined.length > 0) {
      log.warn(`${declined.length} skipped — run "crate-uprev status" to review them`);
    }
    process.exit(EXIT_OK);
  } catch (err) {
    stopSpinner();
    log.error(errorMessage(err));
    process.exit(EXIT_ERROR);
  }
}

function printDecision(decision: ActionableDecision): void {
  console.log();
  switch (decision.kind) {
    case "create":
      console.log(`${decisionBadge(decision.kind)} ${packageLabel(decision.name)} ${decision.version}`);
      console.log(`          no recipe found`);
      break;
    case "update-lockfile":
      console.log(
        `${decisionBadge(decision.kind)} ${packageLabel(decision.name)} ${versionChange(decision.from, decision.to)}`
      );
      console.log(`          recipe ${pathLabel(decision.recipe.path)} is newer than the lockfile`);
      break;
    case "uprev-recipe":
      console.log(
        `${decisionBadge(decision.kind)} ${packageLabel(decision.name)} ${versionChange(decision.from, decision.to)}`
      );
      console.log(`          recipe ${pathLabel(decision.recipe.path)} is older than the lockfile`);
      break;
  }
}
