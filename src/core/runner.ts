import { spawnSync } from "node:child_process";
import { CommandError } from "../utils/errors.js";

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Stream the child's stdio to the terminal instead of capturing it */
  inherit?: boolean;
}

export interface CommandResult {
  status: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs external commands. Commands and tests swap in their own.
 */
export interface CommandRunner {
  run(argv: string[], options?: RunOptions): CommandResult;
}

export const spawnRunner: CommandRunner = {
  run(argv, options = {}) {
    const [command, ...args] = argv;
    if (!command) {
      throw new CommandError("Empty command", argv, null);
    }

    const result = spawnSync(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: options.inherit ? "inherit" : ["ignore", "pipe", "pipe"],
      encoding: "utf-8",
    });

    if (result.error) {
      throw new CommandError(
        `Failed to run ${command}: ${result.error.message}`,
        argv,
        null
      );
    }
    if (result.status === null) {
      throw new CommandError(
        `${command} was terminated by ${result.signal ?? "a signal"}`,
        argv,
        null
      );
    }

    return {
      status: result.status,
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
    };
  },
};

/**
 * Run a command that has to succeed; a non-zero exit raises CommandError.
 */
export function runChecked(
  runner: CommandRunner,
  argv: string[],
  options?: RunOptions
): CommandResult {
  const result = runner.run(argv, options);
  if (result.status !== 0) {
    const detail = result.stderr.trim();
    throw new CommandError(
      `\`${argv.join(" ")}\` exited with status ${result.status}${detail ? `: ${detail}` : ""}`,
      argv,
      result.status
    );
  }
  return result;
}

/**
 * Fill `{token}` placeholders in every element of a configured command.
 */
export function expandCommand(
  template: string[],
  vars: Record<string, string>
): string[] {
  return template.map((part) =>
    part.replace(/\{(\w+)\}/g, (match, token: string) =>
      token in vars ? vars[token] : match
    )
  );
}
