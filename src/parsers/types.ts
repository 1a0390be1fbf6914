/**
 * Project configuration, read from an optional file in the working directory.
 */

export interface UprevConfig {
  /** Absolute path of the config file, when one was found */
  configPath?: string;
  /** Lockfile to reconcile */
  lockfile: string;
  /** Root of `<package>/<package>-<version>.<ext>` recipe files */
  recipesDir: string;
  /** Recipe file extension, without the dot */
  recipeExtension: string;
  /** Template for new recipes; the built-in one when unset */
  template?: string;
  /** Package names never reconciled */
  ignore: string[];
  commands: {
    /** Regenerates a recipe's manifest. Placeholders: {recipe} {name} {version} */
    manifest: string[];
    /** Re-pins the lockfile. Placeholders: {name} {from} {to} */
    updateLockfile: string[];
  };
  lint: LintConfig;
}

export interface LintConfig {
  /** The wrapped static-analysis command */
  tool: string[];
  /** Clears cached build state before linting */
  clean: string[];
  /** Prints the compiler sysroot */
  sysroot: string[];
  /** Lint categories suppressed on top of the built-in list */
  allow: string[];
}
