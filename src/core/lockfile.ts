import { existsSync, readFileSync } from "node:fs";
import { parse as parseToml } from "smol-toml";
import type { LockedPackage } from "./types.js";
import { LockfileError, errorMessage } from "../utils/errors.js";

const REGISTRY_SOURCE = /^(registry|sparse)\+/;

/**
 * Extract (name, version) pairs from a Cargo lockfile, in file order.
 * `[[package]]` tables without a string name and version are skipped.
 */
export function parseLockfile(text: string): LockedPackage[] {
  let doc: Record<string, unknown>;
  try {
    doc = parseToml(text);
  } catch (err) {
    throw new LockfileError(`Lockfile is not valid TOML: ${errorMessage(err)}`);
  }

  const tables = doc.package;
  if (!Array.isArray(tables)) return [];

  const packages: LockedPackage[] = [];
  for (const table of tables) {
    if (!isRecord(table)) continue;
    const { name, version, source } = table;
    if (typeof name !== "string" || typeof version !== "string") continue;

    packages.push({
      name,
      version,
      source: typeof source === "string" ? source : undefined,
    });
  }
  return packages;
}

/**
 * Read and parse the lockfile at `lockfilePath`; null when it does not exist.
 */
export function readLockfile(lockfilePath: string): LockedPackage[] | null {
  if (!existsSync(lockfilePath)) return null;
  let raw: string;
  try {
    raw = readFileSync(lockfilePath, "utf-8");
  } catch (err) {
    throw new LockfileError(`Cannot read ${lockfilePath}: ${errorMessage(err)}`);
  }
  return parseLockfile(raw);
}

/**
 * Workspace members and git checkouts have no published crate to build a
 * recipe from.
 */
export function isRegistryPackage(pkg: LockedPackage): boolean {
  return pkg.source !== undefined && REGISTRY_SOURCE.test(pkg.source);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
