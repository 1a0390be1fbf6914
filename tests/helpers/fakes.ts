import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { CommandResult, CommandRunner, RunOptions } from "../../src/core/runner.js";
import type { Prompter } from "../../src/core/uprev.js";

export interface RecordedCall {
  argv: string[];
  options?: RunOptions;
}

/**
 * Records every command and answers from a table keyed by argv[0].
 */
export function fakeRunner(
  responses: Record<string, Partial<CommandResult>> = {}
): CommandRunner & { calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  return {
    calls,
    run(argv, options) {
      calls.push({ argv, options });
      const response = responses[argv[0] ?? ""] ?? {};
      return { status: 0, stdout: "", stderr: "", ...response };
    },
  };
}

/**
 * Answers prompts in order; runs out as "no".
 */
export function scriptedPrompter(answers: boolean[]): Prompter & { asked: string[] } {
  const asked: string[] = [];
  const queue = [...answers];
  return {
    asked,
    async confirm(message) {
      asked.push(message);
      return queue.shift() ?? false;
    },
  };
}

export function tempProject(files: Record<string, string>): string {
  const root = mkdtempSync(join(tmpdir(), "crate-uprev-test-"));
  for (const [path, content] of Object.entries(files)) {
    const full = join(root, path);
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, content, "utf-8");
  }
  return root;
}

export const REGISTRY = "registry+https://github.com/rust-lang/crates.io-index";

export function lockfileText(
  packages: Array<{ name: string; version: string; source?: string | null }>
): string {
  const tables = packages.map((p) => {
    const lines = ["[[package]]", `name = "${p.name}"`, `version = "${p.version}"`];
    const source = p.source === undefined ? REGISTRY : p.source;
    if (source !== null) lines.push(`source = "${source}"`);
    return lines.join("\n");
  });
  return ["# This file is automatically @generated by Cargo.", "version = 3", "", tables.join("\n\n"), ""].join("\n");
}
