import { describe, it, expect } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { discoverConfig } from "../../src/parsers/config-discovery.js";
import { runUprev, loadPlan } from "../../src/core/uprev.js";
import { runLint } from "../../src/core/linter.js";
import { SUPPRESSED_LINTS } from "../../src/rules/suppressions.js";
import { LockfileError, CommandError } from "../../src/utils/errors.js";
import { fakeRunner, lockfileText, scriptedPrompter, tempProject } from "../helpers/fakes.js";

function project() {
  return tempProject({
    "Cargo.lock": lockfileText([
      { name: "my-app", version: "0.1.0", source: null },
      { name: "anyhow", version: "1.0.81" },
      { name: "libc", version: "0.2.150" },
      { name: "log", version: "0.4.21" },
      { name: "memchr", version: "2.7.1" },
    ]),
    "recipes/libc/libc-0.2.153.ebuild": "# libc\n",
    "recipes/log/log-0.4.20.ebuild": "# log 0.4.20\n",
    "recipes/log/Manifest": "DIST log-0.4.20.crate\n",
    "recipes/memchr/memchr-2.7.1.ebuild": "# memchr\n",
  });
}

describe("uprev workflow", () => {
  it("plans create, lockfile pin and recipe uprev", () => {
    const root = project();
    const plan = loadPlan(discoverConfig(root));

    expect(plan.decisions.map((d) => [d.name, d.kind])).toEqual([
      ["anyhow", "create"],
      ["libc", "update-lockfile"],
      ["log", "uprev-recipe"],
      ["memchr", "none"],
    ]);
    expect(plan.skipped).toEqual([
      { name: "my-app", version: "0.1.0", reason: "not from a registry" },
    ]);
  });

  it("applies every confirmed decision and regenerates manifests", async () => {
    const root = project();
    const runner = fakeRunner();
    const prompter = scriptedPrompter([true, true, true]);

    const outcome = await runUprev(discoverConfig(root), {
      prompter,
      runner,
      cwd: root,
      year: 2026,
    });

    expect(prompter.asked).toEqual([
      "Create a recipe for anyhow 1.0.81?",
      "Pin libc in the lockfile from 0.2.150 to 0.2.153?",
      "Rename the log recipe from 0.4.20 to 0.4.21?",
    ]);
    expect(outcome.applied).toHaveLength(3);
    expect(outcome.declined).toEqual([]);

    // create
    const created = join(root, "recipes/anyhow/anyhow-1.0.81.ebuild");
    const text = readFileSync(created, "utf-8");
    expect(text.split("\n")[0]).toBe("# Copyright 2026 The Project Authors");
    expect(text).toContain('DESCRIPTION="Build file for the anyhow crate."');

    // uprev
    const oldLog = join(root, "recipes/log/log-0.4.20.ebuild");
    const newLog = join(root, "recipes/log/log-0.4.21.ebuild");
    expect(existsSync(oldLog)).toBe(false);
    expect(readFileSync(newLog, "utf-8")).toBe("# log 0.4.20\n");

    expect(runner.calls.map((c) => c.argv)).toEqual([
      ["ebuild", created, "manifest"],
      ["cargo", "update", "-p", "libc@0.2.150", "--precise", "0.2.153"],
      ["ebuild", newLog, "manifest"],
    ]);
    expect(runner.calls.every((c) => c.options?.cwd === root)).toBe(true);
  });

  it("leaves everything untouched when each prompt is declined", async () => {
    const root = project();
    const runner = fakeRunner();

    const outcome = await runUprev(discoverConfig(root), {
      prompter: scriptedPrompter([false, false, false]),
      runner,
      cwd: root,
      year: 2026,
    });

    expect(outcome.applied).toEqual([]);
    expect(outcome.declined.map((d) => d.kind)).toEqual([
      "create",
      "update-lockfile",
      "uprev-recipe",
    ]);
    expect(runner.calls).toEqual([]);
    expect(existsSync(join(root, "recipes/anyhow"))).toBe(false);
    expect(existsSync(join(root, "recipes/log/log-0.4.20.ebuild"))).toBe(true);
  });

  it("asks nothing when lockfile and recipes agree", async () => {
    const root = tempProject({
      "Cargo.lock": lockfileText([{ name: "memchr", version: "2.7.1" }]),
      "recipes/memchr/memchr-2.7.1.ebuild": "",
    });
    const prompter = scriptedPrompter([]);

    const outcome = await runUprev(discoverConfig(root), {
      prompter,
      runner: fakeRunner(),
      cwd: root,
      year: 2026,
    });

    expect(prompter.asked).toEqual([]);
    expect(outcome.plan.summary.none).toBe(1);
  });

  it("uses the configured template and commands", async () => {
    const root = tempProject({
      ".crate-uprev.yaml": [
        "recipesDir: third_party",
        "recipeExtension: bb",
        "template: crate.tpl",
        "commands:",
        "  manifest: [regen, --name, '{name}', --version, '{version}']",
        "",
      ].join("\n"),
      "crate.tpl": "# {{name}} © {{year}}\n",
      "Cargo.lock": lockfileText([{ name: "cfg-if", version: "1.0.0" }]),
    });
    const runner = fakeRunner();

    await runUprev(discoverConfig(root), {
      prompter: scriptedPrompter([true]),
      runner,
      cwd: root,
      year: 2024,
    });

    expect(readFileSync(join(root, "third_party/cfg-if/cfg-if-1.0.0.bb"), "utf-8")).toBe(
      "# cfg-if © 2024\n"
    );
    expect(runner.calls.map((c) => c.argv)).toEqual([
      ["regen", "--name", "cfg-if", "--version", "1.0.0"],
    ]);
  });

  it("stops at the first failing external command", async () => {
    const root = project();
    const runner = fakeRunner({ ebuild: { status: 1, stderr: "digest failed" } });

    await expect(
      runUprev(discoverConfig(root), {
        prompter: scriptedPrompter([true, true, true]),
        runner,
        cwd: root,
        year: 2026,
      })
    ).rejects.toThrow(CommandError);

    // The recipe was written before the manifest step failed
    expect(existsSync(join(root, "recipes/anyhow/anyhow-1.0.81.ebuild"))).toBe(true);
    expect(runner.calls).toHaveLength(1);
  });

  it("fails with LockfileError when there is no lockfile", async () => {
    const root = tempProject({});
    await expect(
      runUprev(discoverConfig(root), {
        prompter: scriptedPrompter([]),
        runner: fakeRunner(),
        cwd: root,
        year: 2026,
      })
    ).rejects.toThrow(LockfileError);
  });
});

describe("lint workflow", () => {
  it("cleans, resolves the sysroot and runs the tool with suppressions", () => {
    const root = tempProject({});
    const runner = fakeRunner({ rustc: { stdout: "/opt/rust\n" } });
    const config = discoverConfig(root).lint;

    const result = runLint({ useCache: false, passthrough: ["--all-targets"] }, config, {
      runner,
      cwd: root,
      env: { PATH: "/bin" },
    });

    expect(result.cleaned).toBe(true);
    expect(result.sysroot).toBe("/opt/rust");
    expect(result.status).toBe(0);
    expect(runner.calls.map((c) => c.argv[0])).toEqual(["cargo", "rustc", "cargo"]);
    expect(runner.calls[0].argv).toEqual(["cargo", "clean"]);

    const lint = runner.calls[2];
    expect(lint.argv.slice(0, 6)).toEqual(["cargo", "clippy", "--all-targets", "--", "-D", "warnings"]);
    expect(lint.argv).toHaveLength(6 + 2 * SUPPRESSED_LINTS.length);
    expect(lint.options?.inherit).toBe(true);
    expect(lint.options?.env?.SYSROOT).toBe("/opt/rust");
    expect(lint.options?.env?.LD_LIBRARY_PATH).toBe("/opt/rust/lib");
  });

  it("skips cleaning with --use-cache", () => {
    const root = tempProject({});
    const runner = fakeRunner({ rustc: { stdout: "/opt/rust\n" } });

    const result = runLint({ useCache: true, passthrough: [] }, discoverConfig(root).lint, {
      runner,
      cwd: root,
    });

    expect(result.cleaned).toBe(false);
    expect(runner.calls.map((c) => c.argv[0])).toEqual(["rustc", "cargo"]);
  });

  it("reports the tool's failing status", () => {
    const root = tempProject({});
    const runner = {
      calls: 0,
      run(argv: string[]) {
        this.calls++;
        if (argv[0] === "rustc") return { status: 0, stdout: "/opt/rust", stderr: "" };
        return { status: argv[1] === "clippy" ? 101 : 0, stdout: "", stderr: "" };
      },
    };

    const result = runLint({ useCache: false, passthrough: [] }, discoverConfig(root).lint, {
      runner,
      cwd: root,
    });
    expect(result.status).toBe(101);
    expect(runner.calls).toBe(3);
  });

  it("fails before linting when the clean step fails", () => {
    const root = tempProject({});
    const runner = fakeRunner({ cargo: { status: 1 } });

    expect(() =>
      runLint({ useCache: false, passthrough: [] }, discoverConfig(root).lint, {
        runner,
        cwd: root,
      })
    ).toThrow("`cargo clean` exited with status 1");
    expect(runner.calls).toHaveLength(1);
  });
});
