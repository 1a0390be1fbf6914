// Badges and labels for decisions printed by the uprev and status commands.

import chalk from "chalk";
import type { DecisionKind } from "../core/types.js";

const noColor = !!process.env.NO_COLOR;

export function decisionBadge(kind: DecisionKind): string {
  const labels: Record<DecisionKind, string> = {
    create: " CREATE ",
    "update-lockfile": " LOCKFILE ",
    "uprev-recipe": " UPREV ",
    none: " OK ",
  };
  if (noColor) return labels[kind].trim().padEnd(8);

  const badges: Record<DecisionKind, string> = {
    create: chalk.bgGreen.black(labels.create),
    "update-lockfile": chalk.bgYellow.black(labels["update-lockfile"]),
    "uprev-recipe": chalk.bgCyan.black(labels["uprev-recipe"]),
    none: chalk.bgBlue.white(labels.none),
  };
  return badges[kind];
}

export function packageLabel(name: string): string {
  return noColor ? name : chalk.bold(name);
}

export function versionChange(from: string, to: string): string {
  if (noColor) return `${from} → ${to}`;
  return `${chalk.red(from)} → ${chalk.green(to)}`;
}

export function pathLabel(p: string): string {
  return noColor ? p : chalk.dim(p);
}
