import { InvalidVersionError } from "./errors.js";

export interface ParsedVersion {
  components: bigint[];
  prerelease?: string;
  build?: string;
}

const VERSION_PATTERN =
  /^(\d+(?:\.\d+)*)(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?$/;

export function parseVersion(v: string): ParsedVersion {
  const match = VERSION_PATTERN.exec(v);
  if (!match) {
    throw new InvalidVersionError(v);
  }
  return {
    components: match[1].split(".").map((c) => BigInt(c)),
    prerelease: match[2],
    build: match[3],
  };
}

export function isVersion(v: string): boolean {
  return VERSION_PATTERN.test(v);
}

/**
 * Dotted-numeric ordering on arbitrary-size components. Missing trailing
 * components count as 0 and a pre-release sorts before its release.
 * Build metadata is ignored. Returns -1, 0 or 1.
 */
export function compareVersions(a: string, b: string): number {
  const pa = parseVersion(a);
  const pb = parseVersion(b);

  const length = Math.max(pa.components.length, pb.components.length);
  for (let i = 0; i < length; i++) {
    const x = pa.components[i] ?? 0n;
    const y = pb.components[i] ?? 0n;
    if (x !== y) return x < y ? -1 : 1;
  }

  if (pa.prerelease === pb.prerelease) return 0;
  if (pa.prerelease === undefined) return 1;
  if (pb.prerelease === undefined) return -1;
  return comparePrerelease(pa.prerelease, pb.prerelease);
}

function comparePrerelease(a: string, b: string): number {
  const ia = a.split(".");
  const ib = b.split(".");
  const length = Math.max(ia.length, ib.length);

  for (let i = 0; i < length; i++) {
    const x = ia[i];
    const y = ib[i];
    if (x === undefined) return -1;
    if (y === undefined) return 1;

    const xNum = /^\d+$/.test(x);
    const yNum = /^\d+$/.test(y);
    if (xNum && yNum) {
      const xn = BigInt(x);
      const yn = BigInt(y);
      if (xn !== yn) return xn < yn ? -1 : 1;
    } else if (xNum !== yNum) {
      // Numeric identifiers have lower precedence
      return xNum ? -1 : 1;
    } else if (x !== y) {
      return x < y ? -1 : 1;
    }
  }
  return 0;
}

/**
 * Cargo's semver-compatible series: the leftmost non-zero component
 * and everything before it.
 */
export function compatibilityKey(v: string): string {
  const { components } = parseVersion(v);
  const firstNonZero = components.findIndex((c) => c !== 0n);
  const end = firstNonZero === -1 ? components.length : firstNonZero + 1;
  return components.slice(0, end).join(".");
}
