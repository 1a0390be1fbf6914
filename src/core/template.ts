import { readFileSync } from "node:fs";
import { ConfigError, errorMessage } from "../utils/errors.js";

const TOKEN_PATTERN = /\{\{(\w+)\}\}/g;

export const DEFAULT_RECIPE_TEMPLATE = `# Copyright {{year}} The Project Authors
# Distributed under the terms of the GNU General Public License v2

EAPI="8"

CRATES="{{name}}-\${PV}"

inherit cargo

DESCRIPTION="Build file for the {{name}} crate."
HOMEPAGE="https://crates.io/crates/{{name}}"
SRC_URI="\${CARGO_CRATE_URIS}"

LICENSE="|| ( MIT Apache-2.0 )"
SLOT="\${PV}/\${PR}"
KEYWORDS="*"
`;

export interface RecipeVariables {
  name: string;
  year: number;
}

/**
 * Fill `{{name}}` and `{{year}}`. Other `{{tokens}}` are left as they are.
 */
export function renderRecipe(template: string, vars: RecipeVariables): string {
  const values: Record<string, string> = {
    name: vars.name,
    year: String(vars.year),
  };
  return template.replace(TOKEN_PATTERN, (match, token: string) =>
    token in values ? values[token] : match
  );
}

export function loadTemplate(templatePath?: string): string {
  if (!templatePath) return DEFAULT_RECIPE_TEMPLATE;
  try {
    return readFileSync(templatePath, "utf-8");
  } catch (err) {
    throw new ConfigError(
      `Cannot read recipe template ${templatePath}: ${errorMessage(err)}`
    );
  }
}
