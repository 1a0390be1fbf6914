// Public API — for programmatic usage
export { parseLockfile, readLockfile, isRegistryPackage } from "./core/lockfile.js";
export { scanRecipes, parseRecipeFilename, recipePath } from "./core/recipes.js";
export { decide, planUprev, describeDecision } from "./core/planner.js";
export { runUprev, loadPlan } from "./core/uprev.js";
export { applyDecision } from "./core/actions.js";
export { renderRecipe, DEFAULT_RECIPE_TEMPLATE } from "./core/template.js";
export { runLint, buildLintArgs, splitLintArgs } from "./core/linter.js";
export { spawnRunner } from "./core/runner.js";
export { discoverConfig, normalizeConfig } from "./parsers/config-discovery.js";
export { compareVersions, parseVersion } from "./utils/version.js";
export { SUPPRESSED_LINTS } from "./rules/suppressions.js";
export {
  LockfileError,
  ConfigError,
  CommandError,
  InvalidVersionError,
  RecipeError,
} from "./utils/errors.js";
export type {
  LockedPackage,
  Recipe,
  RecipeIndex,
  Decision,
  DecisionKind,
  UprevPlan,
} from "./core/types.js";
export type { UprevOutcome, Prompter } from "./core/uprev.js";
export type { CommandRunner, CommandResult } from "./core/runner.js";
export type { UprevConfig, LintConfig } from "./parsers/types.js";
