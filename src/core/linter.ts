import { delimiter, join } from "node:path";
import type { LintConfig } from "../parsers/types.js";
import { SUPPRESSED_LINTS } from "../rules/suppressions.js";
import { runChecked, type CommandRunner, type RunOptions } from "./runner.js";
import { CommandError } from "../utils/errors.js";

export const USE_CACHE_FLAG = "--use-cache";

export interface LintArgs {
  useCache: boolean;
  /** Forwarded to the tool untouched */
  passthrough: string[];
}

/**
 * Only a leading `--use-cache` is ours; everything else belongs to the tool.
 */
export function splitLintArgs(argv: string[]): LintArgs {
  if (argv[0] === USE_CACHE_FLAG) {
    return { useCache: true, passthrough: argv.slice(1) };
  }
  return { useCache: false, passthrough: [...argv] };
}

/**
 * `<tool> <args> -- <tool-driver args> -D warnings -A <lint>...`
 *
 * Caller arguments after a `--` go after the separator, ahead of the lint
 * flags. Each `-A` comes after `-D warnings` and overrides it.
 */
export function buildLintArgs(
  tool: string[],
  passthrough: string[],
  allow: readonly string[]
): string[] {
  const sep = passthrough.indexOf("--");
  const toolArgs = sep === -1 ? passthrough : passthrough.slice(0, sep);
  const driverArgs = sep === -1 ? [] : passthrough.slice(sep + 1);

  return [
    ...tool,
    ...toolArgs,
    "--",
    ...driverArgs,
    "-D",
    "warnings",
    ...allow.flatMap((lint) => ["-A", lint]),
  ];
}

export function allowedLints(config: LintConfig): string[] {
  return [...new Set([...SUPPRESSED_LINTS, ...config.allow])];
}

export function resolveSysroot(
  runner: CommandRunner,
  command: string[],
  options?: RunOptions
): string {
  const sysroot = runChecked(runner, command, options).stdout.trim();
  if (!sysroot) {
    throw new CommandError(`\`${command.join(" ")}\` printed no sysroot`, command, 0);
  }
  return sysroot;
}

/**
 * Environment for the tool: `SYSROOT` set and the sysroot's libraries first
 * on the loader path.
 */
export function lintEnv(
  sysroot: string,
  base: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  const lib = join(sysroot, "lib");
  return {
    ...base,
    SYSROOT: sysroot,
    LD_LIBRARY_PATH: base.LD_LIBRARY_PATH
      ? `${lib}${delimiter}${base.LD_LIBRARY_PATH}`
      : lib,
  };
}

export interface LintContext {
  runner: CommandRunner;
  cwd: string;
  env?: NodeJS.ProcessEnv;
  onStep?: (step: "clean" | "sysroot" | "lint", detail: string) => void;
}

export interface LintResult {
  argv: string[];
  sysroot: string;
  cleaned: boolean;
  /** Exit status of the wrapped tool */
  status: number;
}

/**
 * Clear cached build state unless asked to reuse it, then run the tool with
 * the curated suppressions. Warnings surface as a non-zero status.
 */
export function runLint(
  args: LintArgs,
  config: LintConfig,
  ctx: LintContext
): LintResult {
  if (!args.useCache) {
    ctx.onStep?.("clean", config.clean.join(" "));
    runChecked(ctx.runner, config.clean, { cwd: ctx.cwd, env: ctx.env });
  }

  ctx.onStep?.("sysroot", config.sysroot.join(" "));
  const sysroot = resolveSysroot(ctx.runner, config.sysroot, {
    cwd: ctx.cwd,
    env: ctx.env,
  });

  const argv = buildLintArgs(config.tool, args.passthrough, allowedLints(config));
  ctx.onStep?.("lint", argv.join(" "));
  const { status } = ctx.runner.run(argv, {
    cwd: ctx.cwd,
    env: lintEnv(sysroot, ctx.env),
    inherit: true,
  });

  return { argv, sysroot, cleaned: !args.useCache, status };
}
