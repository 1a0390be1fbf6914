import { existsSync, mkdirSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { ActionableDecision } from "./types.js";
import type { UprevConfig } from "../parsers/types.js";
import { recipePath } from "./recipes.js";
import { renderRecipe } from "./template.js";
import { expandCommand, runChecked, type CommandRunner } from "./runner.js";
import { RecipeError } from "../utils/errors.js";

export interface ActionContext {
  config: UprevConfig;
  runner: CommandRunner;
  /** Recipe template text */
  template: string;
  /** Year stamped into new recipes */
  year: number;
  cwd: string;
}

export interface AppliedAction {
  decision: ActionableDecision;
  /** Recipe file written or renamed to, when the action touched one */
  recipe?: string;
}

/**
 * Carry out one decision: the file change (or lockfile update), then the
 * manifest regeneration it needs. Nothing is rolled back on failure.
 */
export function applyDecision(
  decision: ActionableDecision,
  ctx: ActionContext
): AppliedAction {
  const { config } = ctx;

  switch (decision.kind) {
    case "create": {
      const target = recipePath(
        config.recipesDir,
        decision.name,
        decision.version,
        config.recipeExtension
      );
      mkdirSync(dirname(target), { recursive: true });
      writeFileSync(
        target,
        renderRecipe(ctx.template, { name: decision.name, year: ctx.year }),
        "utf-8"
      );
      regenerateManifest(target, decision.name, decision.version, ctx);
      return { decision, recipe: target };
    }

    case "uprev-recipe": {
      const target = recipePath(
        config.recipesDir,
        decision.name,
        decision.to,
        config.recipeExtension
      );
      if (existsSync(target)) {
        throw new RecipeError(`Refusing to overwrite existing recipe ${target}`, target);
      }
      renameSync(decision.recipe.path, target);
      regenerateManifest(target, decision.name, decision.to, ctx);
      return { decision, recipe: target };
    }

    case "update-lockfile": {
      const argv = expandCommand(config.commands.updateLockfile, {
        name: decision.name,
        from: decision.from,
        to: decision.to,
      });
      runChecked(ctx.runner, argv, { cwd: ctx.cwd });
      return { decision };
    }
  }
}

function regenerateManifest(
  recipe: string,
  name: string,
  version: string,
  ctx: ActionContext
): void {
  const argv = expandCommand(ctx.config.commands.manifest, {
    recipe,
    name,
    version,
  });
  runChecked(ctx.runner, argv, { cwd: ctx.cwd });
}
