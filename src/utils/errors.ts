export class LockfileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LockfileError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * A recipe change that would clobber a file already on disk.
 */
export class RecipeError extends Error {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = "RecipeError";
    this.path = path;
  }
}

export class InvalidVersionError extends Error {
  constructor(version: string) {
    super(`Invalid version: "${version}"`);
    this.name = "InvalidVersionError";
  }
}

/**
 * An external command that could not be started, or exited non-zero
 * where the caller needs it to succeed.
 */
export class CommandError extends Error {
  readonly argv: string[];
  readonly status: number | null;

  constructor(message: string, argv: string[], status: number | null) {
    super(message);
    this.name = "CommandError";
    this.argv = argv;
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
