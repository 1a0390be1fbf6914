import type {
  Decision,
  DecisionKind,
  LockedPackage,
  Recipe,
  RecipeIndex,
  UprevPlan,
} from "./types.js";
import { isRegistryPackage } from "./lockfile.js";
import { compareVersions, compatibilityKey, isVersion } from "../utils/version.js";

export interface PlanOptions {
  /** Package names never reconciled */
  ignore?: string[];
}

/**
 * Decide what to do for one locked package given the recipes of its
 * package, compared against the newest one.
 */
export function decide(locked: LockedPackage, recipes: Recipe[]): Decision {
  if (recipes.length === 0) {
    return { kind: "create", name: locked.name, version: locked.version };
  }
  const newest = recipes.reduce((a, b) =>
    compareVersions(a.version, b.version) >= 0 ? a : b
  );
  return compare(locked, newest);
}

function compare(locked: LockedPackage, recipe: Recipe): Decision {
  const order = compareVersions(recipe.version, locked.version);
  if (order === 0) {
    return { kind: "none", name: locked.name, version: locked.version, recipe };
  }
  if (order > 0) {
    return {
      kind: "update-lockfile",
      name: locked.name,
      from: locked.version,
      to: recipe.version,
      recipe,
    };
  }
  return {
    kind: "uprev-recipe",
    name: locked.name,
    from: recipe.version,
    to: locked.version,
    recipe,
  };
}

/**
 * Reconcile a whole lockfile against the recipe index.
 *
 * A package may be locked at several versions at once. Pairing runs in
 * three passes: exact matches, then recipes in the entry's compatibility
 * series, then the newest unclaimed recipe of any series. Each recipe is
 * paired at most once.
 */
export function planUprev(
  lockfile: LockedPackage[],
  index: RecipeIndex,
  options: PlanOptions = {}
): UprevPlan {
  const ignore = new Set(options.ignore ?? []);
  const skipped: UprevPlan["skipped"] = [];
  const byName = new Map<string, LockedPackage[]>();

  for (const pkg of lockfile) {
    if (!isRegistryPackage(pkg)) {
      skipped.push({ name: pkg.name, version: pkg.version, reason: "not from a registry" });
      continue;
    }
    if (ignore.has(pkg.name)) {
      skipped.push({ name: pkg.name, version: pkg.version, reason: "ignored" });
      continue;
    }
    if (!isVersion(pkg.version)) continue;

    const entries = byName.get(pkg.name);
    if (entries) {
      if (!entries.some((e) => e.version === pkg.version)) entries.push(pkg);
    } else {
      byName.set(pkg.name, [pkg]);
    }
  }

  const decisions: Decision[] = [];
  for (const [name, entries] of byName) {
    decisions.push(...planPackage(entries, index.get(name) ?? []));
  }

  const summary: Record<DecisionKind, number> = {
    create: 0,
    "update-lockfile": 0,
    "uprev-recipe": 0,
    none: 0,
  };
  for (const d of decisions) summary[d.kind]++;

  return { decisions, skipped, summary };
}

function planPackage(entries: LockedPackage[], recipes: Recipe[]): Decision[] {
  const unclaimed = [...recipes];
  const results = new Map<LockedPackage, Decision>();

  const claim = (recipe: Recipe) => {
    unclaimed.splice(unclaimed.indexOf(recipe), 1);
  };

  for (const entry of entries) {
    const exact = unclaimed.find(
      (r) => compareVersions(r.version, entry.version) === 0
    );
    if (exact) {
      claim(exact);
      results.set(entry, compare(entry, exact));
    }
  }

  for (const entry of entries) {
    if (results.has(entry)) continue;
    const series = compatibilityKey(entry.version);
    const sameSeries = unclaimed.filter(
      (r) => compatibilityKey(r.version) === series
    );
    if (sameSeries.length === 0) continue;
    const decision = decide(entry, sameSeries);
    if (decision.kind !== "create") claim(decision.recipe);
    results.set(entry, decision);
  }

  // Cross-series fallback only once every series has had its pick
  return entries.map((entry) => {
    const known = results.get(entry);
    if (known) return known;
    const decision = decide(entry, unclaimed);
    if (decision.kind !== "create") claim(decision.recipe);
    return decision;
  });
}

/**
 * Human-readable one-liner for a decision.
 */
export function describeDecision(decision: Decision): string {
  switch (decision.kind) {
    case "create":
      return `${decision.name} ${decision.version} has no recipe — create one`;
    case "update-lockfile":
      return `${decision.name}: recipe is at ${decision.to}, lockfile at ${decision.from} — pin the lockfile to ${decision.to}`;
    case "uprev-recipe":
      return `${decision.name}: recipe is at ${decision.from}, lockfile at ${decision.to} — uprev the recipe to ${decision.to}`;
    case "none":
      return `${decision.name} ${decision.version} is up to date`;
  }
}
