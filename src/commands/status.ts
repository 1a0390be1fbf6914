import ora from "ora";
import { discoverConfig } from "../parsers/config-discovery.js";
import { isActionable, loadPlan } from "../core/uprev.js";
import type { UprevPlan } from "../core/types.js";
import { describeDecision } from "../core/planner.js";
import { decisionBadge } from "../reporters/console.js";
import { log } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import { EXIT_OK, EXIT_DRIFT, EXIT_ERROR } from "../utils/constants.js";

interface StatusOptions {
  json?: boolean;
  verbose?: boolean;
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  const spinner = options.json ? null : ora("Comparing lockfile and recipes...");
  let plan: UprevPlan;
  try {
    spinner?.start();
    plan = loadPlan(discoverConfig());
    spinner?.stop();
  } catch (err) {
    spinner?.stop();
    log.error(errorMessage(err));
    process.exit(EXIT_ERROR);
  }

  const pending = plan.decisions.filter(isActionable);

  if (options.json) {
    console.log(JSON.stringify({ pending, skipped: plan.skipped, summary: plan.summary }, null, 2));
    process.exit(pending.length > 0 ? EXIT_DRIFT : EXIT_OK);
  }

  if (options.verbose) {
    for (const s of plan.skipped) {
      log.dim(`skipped ${s.name} ${s.version} (${s.reason})`);
    }
  }

  if (pending.length === 0) {
    log.success(`Lockfile and recipes agree (${plan.summary.none} package(s))`);
    process.exit(EXIT_OK);
  }

  console.log();
  for (const decision of pending) {
    console.log(`  ${decisionBadge(decision.kind)} ${describeDecision(decision)}`);
  }
  console.log();
  log.pending(
    `${pending.length} pending: ${plan.summary.create} to create, ${plan.summary["uprev-recipe"]} to uprev, ${plan.summary["update-lockfile"]} lockfile pin(s)`
  );
  log.info('Run "crate-uprev uprev" to reconcile them.');
  process.exit(EXIT_DRIFT);
}
