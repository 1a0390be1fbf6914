/**
 * Shared types for lockfile entries, recipe files and the decisions
 * that reconcile them.
 */

/** One `[[package]]` table from the lockfile. */
export interface LockedPackage {
  name: string;
  version: string;
  /** Registry or git source; absent for workspace-local crates */
  source?: string;
}

/** One recipe file found under the recipes root. */
export interface Recipe {
  name: string;
  version: string;
  path: string;
}

/** Recipes grouped by package, each list sorted ascending by version. */
export type RecipeIndex = Map<string, Recipe[]>;

export type DecisionKind = "create" | "update-lockfile" | "uprev-recipe" | "none";

export type Decision =
  | { kind: "create"; name: string; version: string }
  | {
      kind: "update-lockfile";
      name: string;
      /** Version currently in the lockfile */
      from: string;
      /** Newer version a recipe already exists for */
      to: string;
      recipe: Recipe;
    }
  | {
      kind: "uprev-recipe";
      name: string;
      from: string;
      to: string;
      recipe: Recipe;
    }
  | { kind: "none"; name: string; version: string; recipe: Recipe };

export type ActionableDecision = Exclude<Decision, { kind: "none" }>;

export interface UprevPlan {
  decisions: Decision[];
  /** Lockfile entries left out of the plan, with the reason */
  skipped: Array<{ name: string; version: string; reason: string }>;
  summary: Record<DecisionKind, number>;
}
