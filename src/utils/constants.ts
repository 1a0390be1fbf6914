export const VERSION = "0.1.0";
export const PROGRAM_NAME = "crate-uprev";

export const DEFAULT_LOCKFILE = "Cargo.lock";
export const DEFAULT_RECIPES_DIR = "recipes";
export const DEFAULT_RECIPE_EXTENSION = "ebuild";

// Searched in order in the working directory
export const CONFIG_FILENAMES = [
  ".crate-uprev.yaml",
  ".crate-uprev.yml",
  ".crate-uprev.json",
];

// Exit codes following Unix conventions
export const EXIT_OK = 0; // Lockfile and recipes agree, lint clean
export const EXIT_DRIFT = 1; // Pending decisions or lint warnings
export const EXIT_ERROR = 2; // Runtime error (missing file, failed command)
