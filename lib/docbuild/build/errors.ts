// ABOUTME: Typed error hierarchy for target resolution and recipe execution failures.

export type BuildErrorCode =
  | 'UNKNOWN_TARGET'
  | 'DEPENDENCY_CYCLE'
  | 'MISSING_SOURCE'
  | 'RECIPE_FAILED'
  | 'COMMAND_NOT_FOUND'
  | 'INVALID_CONFIG';

export class BuildError extends Error {
  constructor(
    message: string,
    public readonly code: BuildErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BuildError';
  }
}

export class UnknownTargetError extends BuildError {
  constructor(public readonly target: string) {
    super(`No rule to make target '${target}'`, 'UNKNOWN_TARGET', { target });
    this.name = 'UnknownTargetError';
  }
}

export class DependencyCycleError extends BuildError {
  constructor(public readonly chain: string[]) {
    super(`Circular dependency: ${chain.join(' -> ')}`, 'DEPENDENCY_CYCLE', { chain });
    this.name = 'DependencyCycleError';
  }
}

export class MissingSourceError extends BuildError {
  constructor(public readonly path: string, public readonly neededBy: string) {
    super(`No rule to make target '${path}', needed by '${neededBy}'`, 'MISSING_SOURCE', { path, neededBy });
    this.name = 'MissingSourceError';
  }
}

export class RecipeFailedError extends BuildError {
  constructor(
    public readonly target: string,
    public readonly exitCode: number | null,
    public readonly signal: string | null,
    public readonly stderr: string
  ) {
    const status = signal ? `signal ${signal}` : `exit code ${exitCode}`;
    super(`Recipe for target '${target}' failed (${status})`, 'RECIPE_FAILED', {
      target,
      exitCode,
      signal,
      stderr
    });
    this.name = 'RecipeFailedError';
  }
}

export class CommandNotFoundError extends BuildError {
  constructor(public readonly command: string, public readonly target: string) {
    super(`${command}: command not found (needed by '${target}')`, 'COMMAND_NOT_FOUND', { command, target });
    this.name = 'CommandNotFoundError';
  }
}

export class BuildConfigError extends BuildError {
  constructor(message: string, public readonly errors: string[] = []) {
    super(errors.length > 0 ? `${message}: ${errors.join('; ')}` : message, 'INVALID_CONFIG', { errors });
    this.name = 'BuildConfigError';
  }
}
