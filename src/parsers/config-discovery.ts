import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import yaml from "js-yaml";
import { parse as parseJsonc, type ParseError } from "jsonc-parser";
import type { LintConfig, UprevConfig } from "./types.js";
import {
  CONFIG_FILENAMES,
  DEFAULT_LOCKFILE,
  DEFAULT_RECIPES_DIR,
  DEFAULT_RECIPE_EXTENSION,
} from "../utils/constants.js";
import { ConfigError, errorMessage } from "../utils/errors.js";

export function defaultConfig(): UprevConfig {
  return {
    lockfile: DEFAULT_LOCKFILE,
    recipesDir: DEFAULT_RECIPES_DIR,
    recipeExtension: DEFAULT_RECIPE_EXTENSION,
    ignore: [],
    commands: {
      manifest: ["ebuild", "{recipe}", "manifest"],
      updateLockfile: ["cargo", "update", "-p", "{name}@{from}", "--precise", "{to}"],
    },
    lint: {
      tool: ["cargo", "clippy"],
      clean: ["cargo", "clean"],
      sysroot: ["rustc", "--print", "sysroot"],
      allow: [],
    },
  };
}

/**
 * Load the first config file found in `cwd`, merged over the defaults.
 * Priority: .crate-uprev.yaml > .crate-uprev.yml > .crate-uprev.json
 * Relative paths in the result are resolved against `cwd`.
 */
export function discoverConfig(cwd: string = process.cwd()): UprevConfig {
  const found = CONFIG_FILENAMES.map((name) => join(cwd, name)).find((p) =>
    existsSync(p)
  );

  const config = found
    ? { ...normalizeConfig(parseConfigFile(found)), configPath: found }
    : defaultConfig();

  return {
    ...config,
    lockfile: resolve(cwd, config.lockfile),
    recipesDir: resolve(cwd, config.recipesDir),
    template: config.template ? resolve(cwd, config.template) : undefined,
  };
}

/**
 * Parse a config file. YAML, or JSON with comments for `.json`.
 */
function parseConfigFile(configPath: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read ${configPath}: ${errorMessage(err)}`);
  }

  if (configPath.endsWith(".json")) {
    const errors: ParseError[] = [];
    const parsed: unknown = parseJsonc(raw, errors, { allowTrailingComma: true });
    if (errors.length > 0) {
      throw new ConfigError(
        `Invalid JSON in ${configPath} at offset ${errors[0].offset}`
      );
    }
    return parsed;
  }

  try {
    return yaml.load(raw);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${configPath}: ${errorMessage(err)}`);
  }
}

/**
 * Merge a parsed config document over the defaults. Keys of the wrong type
 * are ignored.
 */
export function normalizeConfig(raw: unknown): UprevConfig {
  const config = defaultConfig();
  if (raw === null || raw === undefined) return config;
  if (!isRecord(raw)) {
    throw new ConfigError("Config file must contain a mapping at the top level");
  }

  if (typeof raw.lockfile === "string") config.lockfile = raw.lockfile;
  if (typeof raw.recipesDir === "string") config.recipesDir = raw.recipesDir;
  if (typeof raw.recipeExtension === "string") {
    config.recipeExtension = raw.recipeExtension.replace(/^\./, "");
  }
  if (typeof raw.template === "string") config.template = raw.template;
  config.ignore = stringArray(raw.ignore) ?? config.ignore;

  const commands = raw.commands;
  if (isRecord(commands)) {
    config.commands.manifest =
      command(commands.manifest) ?? config.commands.manifest;
    config.commands.updateLockfile =
      command(commands.updateLockfile) ?? config.commands.updateLockfile;
  }

  const lint = raw.lint;
  if (isRecord(lint)) {
    config.lint = normalizeLint(lint, config.lint);
  }

  return config;
}

function normalizeLint(raw: Record<string, unknown>, defaults: LintConfig): LintConfig {
  return {
    tool: command(raw.tool) ?? defaults.tool,
    clean: command(raw.clean) ?? defaults.clean,
    sysroot: command(raw.sysroot) ?? defaults.sysroot,
    allow: stringArray(raw.allow) ?? defaults.allow,
  };
}

function stringArray(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((v): v is string => typeof v === "string");
}

/** A command is a non-empty argv array, or a string split on whitespace. */
function command(value: unknown): string[] | undefined {
  const argv =
    typeof value === "string" ? value.trim().split(/\s+/) : stringArray(value);
  return argv && argv.length > 0 && argv[0] !== "" ? argv : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
