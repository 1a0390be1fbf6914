import type { ActionableDecision, Decision, UprevPlan } from "./types.js";
import type { UprevConfig } from "../parsers/types.js";
import { readLockfile } from "./lockfile.js";
import { scanRecipes } from "./recipes.js";
import { planUprev } from "./planner.js";
import { loadTemplate } from "./template.js";
import { applyDecision, type AppliedAction } from "./actions.js";
import type { CommandRunner } from "./runner.js";
import { LockfileError } from "../utils/errors.js";

/**
 * Asks the user a yes/no question.
 */
export interface Prompter {
  confirm(message: string): Promise<boolean>;
}

export interface UprevContext {
  prompter: Prompter;
  runner: CommandRunner;
  cwd: string;
  year: number;
  /** Called before each prompt, e.g. to print the decision */
  onDecision?: (decision: ActionableDecision) => void;
  onApplied?: (applied: AppliedAction) => void;
}

export interface UprevOutcome {
  plan: UprevPlan;
  applied: AppliedAction[];
  declined: ActionableDecision[];
}

/**
 * Read the lockfile and recipes and plan, without touching anything.
 */
export function loadPlan(config: UprevConfig): UprevPlan {
  const lockfile = readLockfile(config.lockfile);
  if (!lockfile) {
    throw new LockfileError(`Lockfile not found: ${config.lockfile}`);
  }
  const index = scanRecipes(config.recipesDir, config.recipeExtension);
  return planUprev(lockfile, index, { ignore: config.ignore });
}

export function isActionable(decision: Decision): decision is ActionableDecision {
  return decision.kind !== "none";
}

/**
 * Plan, then walk every pending decision asking for confirmation.
 * Accepted decisions are applied immediately, one at a time.
 */
export async function runUprev(
  config: UprevConfig,
  ctx: UprevContext
): Promise<UprevOutcome> {
  const plan = loadPlan(config);
  const template = loadTemplate(config.template);

  const applied: AppliedAction[] = [];
  const declined: ActionableDecision[] = [];

  for (const decision of plan.decisions.filter(isActionable)) {
    ctx.onDecision?.(decision);

    const ok = await ctx.prompter.confirm(promptFor(decision));
    if (!ok) {
      declined.push(decision);
      continue;
    }

    const result = applyDecision(decision, {
      config,
      runner: ctx.runner,
      template,
      year: ctx.year,
      cwd: ctx.cwd,
    });
    applied.push(result);
    ctx.onApplied?.(result);
  }

  return { plan, applied, declined };
}

export function promptFor(decision: ActionableDecision): string {
  switch (decision.kind) {
    case "create":
      return `Create a recipe for ${decision.name} ${decision.version}?`;
    case "update-lockfile":
      return `Pin ${decision.name} in the lockfile from ${decision.from} to ${decision.to}?`;
    case "uprev-recipe":
      return `Rename the ${decision.name} recipe from ${decision.from} to ${decision.to}?`;
  }
}
