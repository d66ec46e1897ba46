// ABOUTME: Core types for the documentation build orchestrator: targets, dependency specs, recipes.
// ABOUTME: Also declares the filesystem and command-runner capabilities injected into the orchestrator.

/**
 * Token inside a recipe argv. Literals pass through; `firstPrerequisite`
 * expands to the first resolved prerequisite (make's `$<`).
 */
export type RecipeToken = string | { ref: 'firstPrerequisite' };

export const FIRST_PREREQUISITE: RecipeToken = { ref: 'firstPrerequisite' };

export type DependencySpec =
  /** Required prerequisite: a declared target or an existing file */
  | { kind: 'path'; path: string }
  /** Present only when the path exists at resolution time */
  | { kind: 'optional'; path: string }
  /**
   * Present only when the path exists, and never built first even when it
   * names a declared target. Used by targets that delete files.
   */
  | { kind: 'existing'; path: string }
  /** Every file under root whose base name matches pattern */
  | { kind: 'glob'; root: string; pattern: string };

export type Recipe =
  | { kind: 'capture'; argv: RecipeToken[] }
  | { kind: 'remove'; path: RecipeToken }
  | { kind: 'none' };

export interface TargetDefinition {
  name: string;
  dependencies: DependencySpec[];
  recipe: Recipe;
  phony?: boolean;
}

export interface FileStat {
  mtimeMs: number;
  isDirectory: boolean;
}

export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
}

/**
 * Filesystem access used for staleness checks and target replacement.
 * Paths are relative to the build root.
 */
export interface BuildFileSystem {
  stat(path: string): Promise<FileStat | null>;
  /** Returns null when the directory does not exist */
  readdir(path: string): Promise<DirectoryEntry[] | null>;
  /** Returns false when there was nothing to remove */
  remove(path: string): Promise<boolean>;
  rename(from: string, to: string): Promise<void>;
}

export interface CommandRunOptions {
  /** File receiving the command's stdout, relative to the build root */
  stdoutPath: string;
}

export interface CommandRunResult {
  exitCode: number | null;
  signal: string | null;
  stderr: string;
}

export interface CommandRunner {
  run(argv: string[], options: CommandRunOptions): Promise<CommandRunResult>;
}

export type StaleReason =
  | 'phony'
  | 'missing'
  | 'newer-prerequisite'
  | 'prerequisite-rebuilt'
  | 'forced';

export type TargetAction =
  | 'rebuilt'
  | 'removed'
  | 'nothing-to-do'
  | 'up-to-date'
  | 'would-rebuild';

export interface TargetOutcome {
  name: string;
  action: TargetAction;
  reason?: StaleReason;
  /** Prerequisites newer than the target, when that was the reason */
  newerPrerequisites?: string[];
  /** Shell-style rendering of what ran (or would run) */
  commandLine?: string;
  durationMs: number;
}

export interface BuildReport {
  goals: string[];
  outcomes: TargetOutcome[];
  /** True when any target was (or, in dry-run/question mode, would be) rebuilt */
  changed: boolean;
  durationMs: number;
}

export interface BuildOptions {
  dryRun?: boolean;
  alwaysMake?: boolean;
}
